export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Tier = 1 | 2;

export type CacheReadResult =
  | { hit: true; value: JsonValue; tier: Tier }
  | { hit: false };

export interface PersistentEntry {
  value: JsonValue;
  createdAt: number; // epoch ms
  expiresAt: number; // epoch ms
}

export interface CullOptions {
  now: number;
  maxEntries: number;
  signal?: AbortSignal;
}

/**
 * Storage behind the persistent tier. Implementations may be slow or
 * unavailable; TierCache treats every rejection as a backend outage.
 */
export interface PersistentStore {
  get(key: string): Promise<PersistentEntry | undefined>;
  set(key: string, entry: PersistentEntry): Promise<void>;
  delete(key: string): Promise<boolean>;
  deleteByPrefix(prefix: string): Promise<number>;
  size(): Promise<number>;
  // Drops expired entries, then the oldest-inserted ones beyond maxEntries.
  cull(options: CullOptions): Promise<number>;
  clear(): Promise<void>;
  close?(): Promise<void>;
}

export interface CacheStats {
  hitsTier1: number;
  hitsTier2: number;
  misses: number;
  promotions: number;
  evictions: number;
  sets: number;
  backendErrors: number;
  fastTierSize: number;
  persistentTierSize: number | null; // null when the backend could not be reached
  totalRequests: number;
  hitRatePercent: number;
}

export interface RateDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: number; // epoch ms
}

export interface RateLimiterStats {
  principals: number;
  allowed: number;
  blocked: number;
}

export interface Principal {
  id: string;
  secret: string;
  issuedAt: number;
  expiresAt: number;
}

export interface SessionIssue {
  token: string;
  issuedAt: number;
  expiresAt: number;
}

export interface GatewaySnapshot {
  timestamp: number;
  cache: CacheStats;
  rateLimit: RateLimiterStats;
}

/**
 * The one operation the gateway needs from the HTTP client that talks to the
 * upstream portal. Blocking or pooled implementations fit equally.
 */
export interface UpstreamClient {
  request(principal: Principal, resource: string): Promise<JsonValue>;
}
