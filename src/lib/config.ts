import { isLogLevel, type LogLevel } from './logger';

export const PLACEHOLDER_SECRET = 'CHANGE_ME_IN_PRODUCTION';

export type GatewayConfig = {
  nodeEnv: string | undefined;
  production: boolean;
  secretKey: string | undefined;
  sessionTtlSeconds: number;
  rateLimit: number;
  rateWindowSeconds: number;
  cacheMemorySize: number;
  cacheMemoryTtlSeconds: number;
  cacheDiskTtlSeconds: number;
  cacheDiskMaxEntries: number;
  redisUrl: string | undefined;
  cacheNamespace: string;
  sweepIntervalSeconds: number;
  statsIntervalSeconds: number;
  enableScheduler: boolean;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

function parsePositiveInt(input: string | undefined, fallback: number): number {
  if (!input) return fallback;
  const parsed = Number.parseInt(input, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function parseFlag(input: string | undefined, fallback: boolean): boolean {
  if (input === undefined || input.trim() === '') return fallback;
  return ['true', '1', 'yes'].includes(input.trim().toLowerCase());
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  const nodeEnv = env.NODE_ENV;
  const secretKey = env.GATEWAY_SECRET_KEY?.trim() || undefined;
  const logLevelRaw = (env.GATEWAY_LOG_LEVEL ?? 'info').trim().toLowerCase();

  return {
    nodeEnv,
    production: nodeEnv === 'production',
    secretKey,
    sessionTtlSeconds: parsePositiveInt(env.GATEWAY_SESSION_TTL_SECONDS, 24 * 60 * 60),
    rateLimit: parsePositiveInt(env.GATEWAY_RATE_LIMIT, 100),
    rateWindowSeconds: parsePositiveInt(env.GATEWAY_RATE_WINDOW_SECONDS, 60 * 60),
    cacheMemorySize: parsePositiveInt(env.GATEWAY_CACHE_MEMORY_SIZE, 1000),
    cacheMemoryTtlSeconds: parsePositiveInt(env.GATEWAY_CACHE_MEMORY_TTL_SECONDS, 15 * 60),
    cacheDiskTtlSeconds: parsePositiveInt(env.GATEWAY_CACHE_DISK_TTL_SECONDS, 60 * 60),
    cacheDiskMaxEntries: parsePositiveInt(env.GATEWAY_CACHE_DISK_MAX_ENTRIES, 100_000),
    redisUrl: env.GATEWAY_REDIS_URL?.trim() || undefined,
    cacheNamespace: env.GATEWAY_CACHE_NAMESPACE?.trim() || 'tg:',
    sweepIntervalSeconds: parsePositiveInt(env.GATEWAY_SWEEP_INTERVAL_SECONDS, 60 * 60),
    statsIntervalSeconds: parsePositiveInt(env.GATEWAY_STATS_INTERVAL_SECONDS, 15 * 60),
    enableScheduler: parseFlag(env.GATEWAY_ENABLE_SCHEDULER, true),
    logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : 'info',
  };
}

// Never log the secret itself.
export function describeConfig(cfg: GatewayConfig): Record<string, unknown> {
  const { secretKey, redisUrl, ...rest } = cfg;
  return {
    ...rest,
    secretKey: secretKey === undefined || secretKey === PLACEHOLDER_SECRET ? 'DEFAULT' : '***',
    redisUrl: redisUrl ? redisUrl.replace(/\/\/[^@/]*@/, '//***@') : undefined,
  };
}
