import { execFile } from 'child_process';

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeoutMs: number;
}

/** 외부 프로세스 실행 추상화. 테스트에서는 가짜 구현으로 교체한다. */
export type CommandRunner = (file: string, args: readonly string[], options: CommandOptions) => Promise<CommandOutput>;

export const COMMAND_RUNNER = Symbol('UPS_STATS_COMMAND_RUNNER');

/** 제한 시간 안에 끝나지 않아 강제 종료된 명령. */
export class CommandTimeoutError extends Error {
  constructor(
    readonly file: string,
    readonly timeoutMs: number,
  ) {
    super(`${file} did not finish within ${timeoutMs} ms`);
    this.name = 'CommandTimeoutError';
  }
}

/** 실행에 실패했거나 0 이 아닌 종료 코드로 끝난 명령. */
export class CommandFailedError extends Error {
  constructor(
    readonly file: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    detail: string,
  ) {
    super(`${file} failed: ${detail}`);
    this.name = 'CommandFailedError';
  }
}

/**
 * child_process.execFile 기반 러너.
 * timeout 초과 시 SIGKILL 로 정리하므로 호출이 무한정 대기하지 않는다.
 */
export const execFileRunner: CommandRunner = (file, args, options) =>
  new Promise<CommandOutput>((resolve, reject) => {
    execFile(
      file,
      [...args],
      { encoding: 'utf8', timeout: options.timeoutMs, killSignal: 'SIGKILL', maxBuffer: 1024 * 1024, windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }
        if (error.killed && error.signal === 'SIGKILL') {
          reject(new CommandTimeoutError(file, options.timeoutMs));
          return;
        }
        const code: unknown = error.code;
        const exitCode = typeof code === 'number' ? code : null;
        const detail = stderr.trim() || (typeof code === 'string' ? code : error.message);
        reject(new CommandFailedError(file, exitCode, stderr, detail));
      },
    );
  });
