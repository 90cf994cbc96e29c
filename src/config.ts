import { AppConfig } from './types';
import { DEFAULT_ARCHIVE_BASE_URL } from './archive';
import { envConfigSchema, parseOrThrow } from './utils';

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key];
  if (value) return value;
  if (defaultValue === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return defaultValue;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = parseOrThrow(
    envConfigSchema,
    {
      archiveBaseUrl: getEnvVar(env, 'ARCHIVE_BASE_URL', DEFAULT_ARCHIVE_BASE_URL),
      dataRoot: getEnvVar(env, 'DATA_ROOT', 'binance_data'),
      logDir: getEnvVar(env, 'LOG_DIR', 'logs'),
      logLevel: getEnvVar(env, 'LOG_LEVEL', 'info').toLowerCase(),
      nodeEnv: getEnvVar(env, 'NODE_ENV', 'development'),
      concurrency: getEnvVar(env, 'SYNC_CONCURRENCY', '5'),
      maxAttempts: getEnvVar(env, 'SYNC_MAX_ATTEMPTS', '3'),
      retryDelayMs: getEnvVar(env, 'SYNC_RETRY_DELAY_MS', '1000'),
      httpTimeoutMs: getEnvVar(env, 'HTTP_TIMEOUT_MS', '30000'),
      localIoErrorLimit: getEnvVar(env, 'SYNC_LOCAL_IO_ERROR_LIMIT', '5'),
      dailyCron: getEnvVar(env, 'SCHEDULE_DAILY_CRON', '30 1 * * *'),
      monthlyCron: getEnvVar(env, 'SCHEDULE_MONTHLY_CRON', '30 2 1 * *'),
    },
    'environment'
  );

  return {
    archive: {
      baseUrl: parsed.archiveBaseUrl,
      timeoutMs: parsed.httpTimeoutMs,
    },
    storage: {
      dataRoot: parsed.dataRoot,
    },
    sync: {
      concurrency: parsed.concurrency,
      maxAttempts: parsed.maxAttempts,
      retryDelayMs: parsed.retryDelayMs,
      localIoErrorLimit: parsed.localIoErrorLimit,
    },
    schedule: {
      dailyCron: parsed.dailyCron,
      monthlyCron: parsed.monthlyCron,
    },
    app: {
      logDir: parsed.logDir,
      logLevel: parsed.logLevel,
      nodeEnv: parsed.nodeEnv,
    },
  };
}
