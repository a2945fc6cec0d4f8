import { registerAs } from '@nestjs/config';
import { z } from 'zod';

/** 원격 종료 대상 호스트. `label` 은 로그에만 쓰고 외부 API 로는 노출하지 않는다. */
export interface ShutdownTarget {
  label: string;
  host: string;
  user?: string;
  port?: number;
}

const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');
const milliseconds = z.coerce.number().int().nonnegative();

const TARGET_PATTERN = /^(?:([A-Za-z0-9._-]+)@)?([A-Za-z0-9.-]+|\[[0-9A-Fa-f:]+\])(?::(\d{1,5}))?$/;

/** `root@nas:2222, backup-box` 형식의 목록을 ShutdownTarget 배열로 변환한다. */
export const ShutdownTargetsSchema = z.string().transform((raw, ctx): ShutdownTarget[] => {
  const targets: ShutdownTarget[] = [];
  for (const entry of raw.split(/[,\s]+/)) {
    const label = entry.trim();
    if (!label) continue;
    const match = TARGET_PATTERN.exec(label);
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid shutdown target "${label}"` });
      return z.NEVER;
    }
    const [, user, host, port] = match;
    const parsedPort = port !== undefined ? Number(port) : undefined;
    if (parsedPort !== undefined && (parsedPort < 1 || parsedPort > 65_535)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid port in shutdown target "${label}"` });
      return z.NEVER;
    }
    if (targets.some((target) => target.label === label)) {
      continue;
    }
    targets.push({ label, host: host.replace(/^\[|\]$/g, ''), user, port: parsedPort });
  }
  return targets;
});

export const UpsStatsEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  JEST_WORKER_ID: z.string().optional(),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  UPS_STATS_DB_PATH: z.string().min(1).default('ups-stats.db'),
  UPS_STATS_DB_IN_MEMORY: booleanFlag.default('false'),
  UPS_STATS_UPS_NAME: z.string().min(1).default('ups@localhost'),
  UPS_STATS_UPSC_PATH: z.string().min(1).default('upsc'),
  UPS_STATS_POLLER_ENABLED: booleanFlag.default('true'),
  UPS_STATS_POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(1000),
  UPS_STATS_POLL_TIMEOUT_MS: z.coerce.number().int().min(50).default(2000),
  UPS_STATS_POLL_FAILURE_ALERT_COUNT: z.coerce.number().int().min(1).default(5),
  UPS_STATS_DOWN_GAP_MS: z.coerce.number().int().positive().optional(),
  UPS_STATS_AGGREGATE_CACHE_TTL_MS: milliseconds.optional(),
  UPS_STATS_RETENTION_DAYS: z.coerce.number().int().min(30).default(30),
  UPS_STATS_PRUNE_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
  UPS_STATS_LOAD_ALERT_PCT: z.coerce.number().min(10).max(200).default(90),
  UPS_STATS_SHUTDOWN_THRESHOLD_PCT: z.coerce.number().min(0).max(100).default(20),
  UPS_STATS_SHUTDOWN_HYSTERESIS_PCT: z.coerce.number().min(0).max(50).default(5),
  UPS_STATS_SHUTDOWN_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  UPS_STATS_SHUTDOWN_BACKOFF_MS: milliseconds.default(2000),
  UPS_STATS_SHUTDOWN_ATTEMPT_TIMEOUT_MS: z.coerce.number().int().min(100).default(30_000),
  UPS_STATS_SHUTDOWN_TARGETS: ShutdownTargetsSchema.default(''),
  UPS_STATS_SHUTDOWN_COMMAND: z.string().min(1).default('sudo -n systemctl poweroff'),
  UPS_STATS_SSH_PATH: z.string().min(1).default('ssh'),
  UPS_STATS_SSH_IDENTITY_FILE: z.string().min(1).optional(),
  UPS_STATS_ALERT_WEBHOOK_URL: z.string().url().optional(),
  UPS_STATS_REDIS_URL: z.string().url().optional(),
});

export interface UpsStatsConfig {
  port: number;
  database: {
    path: string;
    inMemory: boolean;
  };
  ups: {
    name: string;
    upscPath: string;
  };
  poller: {
    enabled: boolean;
    intervalMs: number;
    timeoutMs: number;
    failureAlertCount: number;
    pruneIntervalMs: number;
  };
  aggregation: {
    downGapMs: number;
    cacheTtlMs: number;
    retentionDays: number;
  };
  alerts: {
    loadHighPct: number;
    webhookUrl?: string;
  };
  shutdown: {
    thresholdPct: number;
    hysteresisPct: number;
    maxAttempts: number;
    backoffMs: number;
    attemptTimeoutMs: number;
    command: string;
    sshPath: string;
    sshIdentityFile?: string;
    targets: ShutdownTarget[];
  };
  redisUrl?: string;
}

/**
 * 환경 변수를 검증하여 UpsStatsConfig 로 변환한다.
 * 테스트 환경에서는 항상 in-memory DB 를 쓰고 poller 를 끈다.
 */
export function loadUpsStatsConfig(env: Record<string, string | undefined>): UpsStatsConfig {
  const parsed = UpsStatsEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid ups-stats configuration: ${details}`);
  }
  const values = parsed.data;
  const isTestEnvironment = values.NODE_ENV === 'test' || values.JEST_WORKER_ID !== undefined;
  const intervalMs = values.UPS_STATS_POLL_INTERVAL_MS;

  return {
    port: values.PORT,
    database: {
      path: values.UPS_STATS_DB_PATH,
      inMemory: isTestEnvironment || values.UPS_STATS_DB_IN_MEMORY,
    },
    ups: {
      name: values.UPS_STATS_UPS_NAME,
      upscPath: values.UPS_STATS_UPSC_PATH,
    },
    poller: {
      enabled: !isTestEnvironment && values.UPS_STATS_POLLER_ENABLED,
      intervalMs,
      timeoutMs: values.UPS_STATS_POLL_TIMEOUT_MS,
      failureAlertCount: values.UPS_STATS_POLL_FAILURE_ALERT_COUNT,
      pruneIntervalMs: values.UPS_STATS_PRUNE_INTERVAL_MS,
    },
    aggregation: {
      downGapMs: values.UPS_STATS_DOWN_GAP_MS ?? intervalMs * 2,
      cacheTtlMs: Math.min(values.UPS_STATS_AGGREGATE_CACHE_TTL_MS ?? intervalMs, intervalMs),
      retentionDays: values.UPS_STATS_RETENTION_DAYS,
    },
    alerts: {
      loadHighPct: values.UPS_STATS_LOAD_ALERT_PCT,
      webhookUrl: values.UPS_STATS_ALERT_WEBHOOK_URL,
    },
    shutdown: {
      thresholdPct: values.UPS_STATS_SHUTDOWN_THRESHOLD_PCT,
      hysteresisPct: values.UPS_STATS_SHUTDOWN_HYSTERESIS_PCT,
      maxAttempts: values.UPS_STATS_SHUTDOWN_MAX_ATTEMPTS,
      backoffMs: values.UPS_STATS_SHUTDOWN_BACKOFF_MS,
      attemptTimeoutMs: values.UPS_STATS_SHUTDOWN_ATTEMPT_TIMEOUT_MS,
      command: values.UPS_STATS_SHUTDOWN_COMMAND,
      sshPath: values.UPS_STATS_SSH_PATH,
      sshIdentityFile: values.UPS_STATS_SSH_IDENTITY_FILE,
      targets: values.UPS_STATS_SHUTDOWN_TARGETS,
    },
    redisUrl: values.UPS_STATS_REDIS_URL,
  };
}

export const upsStatsConfig = registerAs('upsStats', (): UpsStatsConfig => loadUpsStatsConfig(process.env));
