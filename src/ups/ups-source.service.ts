import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { upsStatsConfig } from '../config/ups-stats.config';
import { COMMAND_RUNNER, CommandTimeoutError } from '../common/command-runner';
import type { CommandRunner } from '../common/command-runner';
import { parseUpscLines, parseUpsStatus, UpscVariablesSchema } from './upsc.parser';
import type { PollFailureReason, PollResult } from './ups.types';

/**
 * NUT upsc 클라이언트를 통해 UPS 상태를 한 번 읽어오는 어댑터.
 * 실패 시 샘플을 만들지 않고 PollFailure 를 돌려준다.
 */
@Injectable()
export class UpsSourceService {
  private readonly logger = new Logger(UpsSourceService.name);

  constructor(
    @Inject(upsStatsConfig.KEY)
    private readonly config: ConfigType<typeof upsStatsConfig>,
    @Inject(COMMAND_RUNNER)
    private readonly runCommand: CommandRunner,
  ) {}

  async poll(): Promise<PollResult> {
    const { upscPath, name } = this.config.ups;
    let stdout: string;
    try {
      ({ stdout } = await this.runCommand(upscPath, [name], { timeoutMs: this.config.poller.timeoutMs }));
    } catch (error) {
      const reason: PollFailureReason = error instanceof CommandTimeoutError ? 'timeout' : 'unreachable';
      return this.failure(reason, error instanceof Error ? error.message : String(error));
    }

    const parsed = UpscVariablesSchema.safeParse(parseUpscLines(stdout));
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return this.failure('malformed', `Unexpected upsc response (${details})`);
    }

    const variables = parsed.data;
    const status = parseUpsStatus(variables['ups.status']);
    if (status === 'UNKNOWN') {
      this.logger.debug(`Unrecognised ups.status "${variables['ups.status']}"`);
    }

    return {
      ok: true,
      sample: {
        timestamp: Date.now(),
        status,
        chargePct: variables['battery.charge'],
        loadPct: variables['ups.load'],
        runtimeEstimateSeconds: status === 'ON_BATTERY' ? variables['battery.runtime'] ?? null : null,
      },
    };
  }

  private failure(reason: PollFailureReason, message: string): PollResult {
    return { ok: false, failure: { reason, message, at: Date.now() } };
  }
}
