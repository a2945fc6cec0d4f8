import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { COMMAND_RUNNER, CommandFailedError, CommandTimeoutError } from '../common/command-runner';
import type { CommandRunner } from '../common/command-runner';
import { upsStatsConfig } from '../config/ups-stats.config';
import type { ShutdownTarget } from '../config/ups-stats.config';
import { ShutdownActionError } from './shutdown.types';
import type { ShutdownTransport } from './shutdown.types';

/** ssh 클라이언트가 연결 단계에서 실패하면 255 로 종료한다. */
const SSH_CONNECTION_FAILURE_EXIT_CODE = 255;

/**
 * 비대화식 ssh 로 대상 호스트에서 종료 명령을 실행한다.
 * 대상 호스트에는 키 인증과 암호 없는 sudo 가 준비되어 있어야 한다.
 */
@Injectable()
export class SshShutdownTransport implements ShutdownTransport {
  constructor(
    @Inject(upsStatsConfig.KEY)
    private readonly config: ConfigType<typeof upsStatsConfig>,
    @Inject(COMMAND_RUNNER)
    private readonly runCommand: CommandRunner,
  ) {}

  async execute(target: ShutdownTarget, command: string, timeoutMs: number): Promise<void> {
    try {
      await this.runCommand(this.config.shutdown.sshPath, this.buildArgs(target, command, timeoutMs), { timeoutMs });
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        throw new ShutdownActionError('timeout', `ssh to ${target.label} timed out after ${timeoutMs} ms`);
      }
      if (error instanceof CommandFailedError && error.exitCode === SSH_CONNECTION_FAILURE_EXIT_CODE) {
        throw new ShutdownActionError('transport', `ssh connection to ${target.label} failed: ${error.stderr.trim()}`);
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ShutdownActionError('command', `Shutdown command on ${target.label} failed: ${detail}`);
    }
  }

  buildArgs(target: ShutdownTarget, command: string, timeoutMs: number): string[] {
    const connectTimeoutSeconds = Math.max(1, Math.floor(timeoutMs / 2000));
    const args = ['-o', 'BatchMode=yes', '-o', `ConnectTimeout=${connectTimeoutSeconds}`];
    if (target.port !== undefined) {
      args.push('-p', String(target.port));
    }
    if (this.config.shutdown.sshIdentityFile) {
      args.push('-i', this.config.shutdown.sshIdentityFile);
    }
    args.push(target.user ? `${target.user}@${target.host}` : target.host, command);
    return args;
  }
}
