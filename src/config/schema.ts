import { z } from 'zod';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase());
};

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  ALERTS_CONFIG_PATH: z.string().min(1).default('./config/alerts.yml'),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  CONFIG_RELOAD_ON_SIGHUP: z.string().optional(),

  DOCKER_SOCKET_PATH: z.string().min(1).default('/var/run/docker.sock'),

  HISTORY_ENABLED: z.string().optional(),
  HISTORY_DB_PATH: z.string().min(1).default('./data/history.sqlite'),
  HISTORY_RETENTION_DAYS: z.coerce.number().int().positive().default(7),
  HISTORY_CLEANUP_INTERVAL_MS: z.coerce.number().int().positive().default(3_600_000)
});

export const configSchema = rawSchema.transform((raw) => ({
  nodeEnv: raw.NODE_ENV,
  logLevel: raw.LOG_LEVEL,

  alertsConfigPath: raw.ALERTS_CONFIG_PATH,
  pollIntervalMs: raw.POLL_INTERVAL_MS,
  reloadOnSighup: parseBoolean(raw.CONFIG_RELOAD_ON_SIGHUP, true),

  docker: {
    socketPath: raw.DOCKER_SOCKET_PATH
  },

  history: {
    enabled: parseBoolean(raw.HISTORY_ENABLED, true),
    dbPath: raw.HISTORY_DB_PATH,
    retentionDays: raw.HISTORY_RETENTION_DAYS,
    cleanupIntervalMs: raw.HISTORY_CLEANUP_INTERVAL_MS
  }
}));
