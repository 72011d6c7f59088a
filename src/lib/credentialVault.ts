import crypto from 'node:crypto';
import { AuthenticationError, ConfigurationError } from './errors';
import { PLACEHOLDER_SECRET } from './config';
import { systemClock, type Clock } from './clock';
import { silentLogger, type Logger } from './logger';
import type { Principal, SessionIssue } from '../types';

const TOKEN_VERSION = 1;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const HEADER_BYTES = 1 + IV_BYTES;
const MIN_TOKEN_BYTES = HEADER_BYTES + 1 + TAG_BYTES;
const BASE64URL_RE = /^[A-Za-z0-9_-]+$/;

export const KNOWN_PLACEHOLDER_SECRETS = new Set([
  PLACEHOLDER_SECRET,
  'changeme',
  'change-me',
  'secret',
  'dev-secret',
]);

export type CredentialVaultOptions = {
  secretKey: string | undefined;
  production: boolean;
  defaultTtlSeconds: number;
  clock?: Clock;
  logger?: Logger;
};

type Claims = {
  sub: string;
  sec: string;
  iat: number;
  exp: number;
};

function isClaims(value: unknown): value is Claims {
  if (typeof value !== 'object' || value === null) return false;
  const rec: Record<string, unknown> = { ...value };
  return (
    typeof rec.sub === 'string' &&
    rec.sub.length > 0 &&
    typeof rec.sec === 'string' &&
    typeof rec.iat === 'number' &&
    typeof rec.exp === 'number'
  );
}

export function derivePrincipalId(username: string): string {
  return crypto.createHash('sha256').update(username).digest('hex').slice(0, 16);
}

/**
 * Issues and verifies stateless session tokens.
 *
 * Token bytes are `version | iv | ciphertext | tag` under AES-256-GCM with the
 * version byte as additional data, base64url encoded. The claims (principal,
 * secret, issue and expiry times) live inside the ciphertext, so the GCM tag
 * covers the whole token and any replica holding the same key can verify it.
 */
export class CredentialVault {
  private readonly key: Buffer;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly defaultTtlSeconds: number;

  constructor(options: CredentialVaultOptions) {
    const { secretKey, production, defaultTtlSeconds } = options;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.defaultTtlSeconds = defaultTtlSeconds;

    const placeholder = secretKey === undefined || KNOWN_PLACEHOLDER_SECRETS.has(secretKey);
    if (placeholder && production) {
      throw new ConfigurationError('GATEWAY_SECRET_KEY must be set to a non-placeholder value in production');
    }
    if (placeholder) {
      this.logger.warn('Using placeholder session secret; set GATEWAY_SECRET_KEY before deploying');
    }
    this.key = crypto.createHash('sha256').update(secretKey ?? PLACEHOLDER_SECRET).digest();
  }

  create(principalId: string, secret: string, ttlSeconds: number = this.defaultTtlSeconds): SessionIssue {
    if (!principalId) throw new TypeError('principalId must be a non-empty string');
    if (!(ttlSeconds > 0)) throw new RangeError('ttlSeconds must be positive');

    const issuedAt = this.clock.now();
    const expiresAt = issuedAt + ttlSeconds * 1000;
    const claims: Claims = { sub: principalId, sec: secret, iat: issuedAt, exp: expiresAt };

    const header = Buffer.alloc(HEADER_BYTES);
    header.writeUInt8(TOKEN_VERSION, 0);
    crypto.randomBytes(IV_BYTES).copy(header, 1);
    const iv = header.subarray(1, HEADER_BYTES);

    const cipher = crypto.createCipheriv('aes-256-gcm', this.key, iv);
    cipher.setAAD(header.subarray(0, 1));
    const ciphertext = Buffer.concat([cipher.update(JSON.stringify(claims), 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    const token = Buffer.concat([header, ciphertext, tag]).toString('base64url');
    return { token, issuedAt, expiresAt };
  }

  verify(token: string): Principal {
    const raw = this.decode(token);
    const header = raw.subarray(0, HEADER_BYTES);
    const ciphertext = raw.subarray(HEADER_BYTES, raw.length - TAG_BYTES);
    const tag = raw.subarray(raw.length - TAG_BYTES);

    let plaintext: string;
    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, header.subarray(1));
      decipher.setAAD(header.subarray(0, 1));
      decipher.setAuthTag(tag);
      plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch {
      throw this.tampered(raw.length);
    }

    let claims: unknown;
    try {
      claims = JSON.parse(plaintext);
    } catch {
      throw new AuthenticationError('Malformed', 'Invalid token: unreadable claims');
    }
    if (header.readUInt8(0) !== TOKEN_VERSION || !isClaims(claims)) {
      throw new AuthenticationError('Malformed', 'Invalid token: missing required fields');
    }
    if (this.clock.now() > claims.exp) {
      throw new AuthenticationError('Expired', 'Token has expired; log in again');
    }
    return { id: claims.sub, secret: claims.sec, issuedAt: claims.iat, expiresAt: claims.exp };
  }

  // Fresh expiry for the same principal and secret.
  refresh(token: string, ttlSeconds?: number): SessionIssue {
    const principal = this.verify(token);
    return this.create(principal.id, principal.secret, ttlSeconds);
  }

  private decode(token: string): Buffer {
    if (typeof token !== 'string' || !BASE64URL_RE.test(token)) {
      throw new AuthenticationError('Malformed', 'Invalid token: not base64url');
    }
    const raw = Buffer.from(token, 'base64url');
    if (raw.length < MIN_TOKEN_BYTES) {
      throw new AuthenticationError('Malformed', 'Invalid token: too short');
    }
    // The decoder ignores the unused low bits of a partial final character;
    // only the canonical spelling of the bytes is accepted.
    if (raw.toString('base64url') !== token) {
      throw this.tampered(raw.length);
    }
    return raw;
  }

  private tampered(tokenBytes: number): AuthenticationError {
    this.logger.warn('Session token failed integrity check', {
      event: 'security.token_tampered',
      tokenBytes,
    });
    return new AuthenticationError('SignatureInvalid', 'Invalid token: signature verification failed');
  }
}
