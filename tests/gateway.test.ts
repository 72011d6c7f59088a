import { createGatewayContext, type GatewayContext } from '../src/lib/context';
import { loadConfig } from '../src/lib/config';
import { ManualClock } from '../src/lib/clock';
import { silentLogger } from '../src/lib/logger';
import { MemoryStore } from '../src/stores/memoryStore';
import { AuthenticationError, ClosedError, ConfigurationError, RateLimitExceeded } from '../src/lib/errors';
import type { JsonValue, Principal, UpstreamClient } from '../src/types';

const START = 1_700_000_000_000;

function makeContext(env: Record<string, string> = {}) {
  const clock = new ManualClock(START);
  const config = loadConfig({
    GATEWAY_SECRET_KEY: 'test-secret',
    GATEWAY_RATE_LIMIT: '2',
    GATEWAY_RATE_WINDOW_SECONDS: '60',
    GATEWAY_ENABLE_SCHEDULER: 'false',
    ...env,
  });
  const ctx = createGatewayContext(config, { clock, logger: silentLogger, persistent: new MemoryStore() });
  return { ctx, clock };
}

class RecordingClient implements UpstreamClient {
  readonly calls: Array<{ principalId: string; resource: string }> = [];

  async request(principal: Principal, resource: string): Promise<JsonValue> {
    this.calls.push({ principalId: principal.id, resource });
    return { resource, reading: this.calls.length };
  }
}

describe('GatewayFacade', () => {
  let ctx: GatewayContext;
  let clock: ManualClock;

  beforeEach(async () => {
    ({ ctx, clock } = makeContext());
    await ctx.init();
  });

  afterEach(async () => {
    await ctx.close();
  });

  test('login issues a token that authenticates back to the principal', () => {
    const { token } = ctx.gateway.login('user-1', 'portal-password');
    expect(ctx.gateway.authenticate(token)).toEqual({
      id: 'user-1',
      secret: 'portal-password',
      issuedAt: START,
      expiresAt: START + 86_400_000,
    });
  });

  test('a missing token is its own failure', () => {
    for (const token of [undefined, '']) {
      try {
        ctx.gateway.authenticate(token);
        throw new Error('expected authenticate to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(AuthenticationError);
        expect(error).toMatchObject({ kind: 'Missing', code: 'MISSING_CREDENTIALS' });
      }
    }
  });

  test('refresh extends the session', () => {
    const first = ctx.gateway.login('user-1', 'pw', 60);
    clock.advance(10_000);
    const second = ctx.gateway.refresh(first.token);
    expect(second.expiresAt).toBe(START + 10_000 + 86_400_000);
  });

  test('admit rejects with the time left until a slot frees up', () => {
    const principal = ctx.gateway.authenticate(ctx.gateway.login('user-1', 'pw').token);
    expect(ctx.gateway.admit(principal).remaining).toBe(1);
    expect(ctx.gateway.admit(principal).remaining).toBe(0);

    clock.advance(59_500);
    try {
      ctx.gateway.admit(principal);
      throw new Error('expected admit to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(RateLimitExceeded);
      expect(error).toMatchObject({ limit: 2, remaining: 0, resetAt: START + 60_000, retryAfterSeconds: 1 });
    }
  });

  test('cached computes once, then serves from each tier', async () => {
    let computed = 0;
    const compute = async () => {
      computed += 1;
      return { unit: 17.5 };
    };

    expect(await ctx.gateway.cached('meter:42:unit', compute)).toEqual({ value: { unit: 17.5 }, source: 'computed' });
    expect(await ctx.gateway.cached('meter:42:unit', compute)).toEqual({ value: { unit: 17.5 }, source: 'tier1' });
    clock.advance(900_000);
    expect(await ctx.gateway.cached('meter:42:unit', compute)).toEqual({ value: { unit: 17.5 }, source: 'tier2' });
    expect(computed).toBe(1);
  });

  test('an aborted request computes nothing', async () => {
    const controller = new AbortController();
    controller.abort(new Error('client went away'));
    let computed = 0;

    await expect(
      ctx.gateway.cached(
        'meter:1:unit',
        async () => {
          computed += 1;
          return 1;
        },
        { signal: controller.signal },
      ),
    ).rejects.toThrow('client went away');
    expect(computed).toBe(0);
  });

  test('fetchThrough calls the upstream client only on a miss, and invalidate forces a refetch', async () => {
    const client = new RecordingClient();
    const principal = ctx.gateway.authenticate(ctx.gateway.login('user-1', 'pw').token);

    const first = await ctx.gateway.fetchThrough(principal, 'meter:42:unit', client, '/meters/42');
    const second = await ctx.gateway.fetchThrough(principal, 'meter:42:unit', client, '/meters/42');
    expect(first).toEqual({ value: { resource: '/meters/42', reading: 1 }, source: 'computed' });
    expect(second.source).toBe('tier1');

    expect(await ctx.gateway.invalidate('meter:42:*')).toBe(2);
    const third = await ctx.gateway.fetchThrough(principal, 'meter:42:unit', client, '/meters/42');
    expect(third.value).toEqual({ resource: '/meters/42', reading: 2 });
    expect(client.calls).toEqual([
      { principalId: 'user-1', resource: '/meters/42' },
      { principalId: 'user-1', resource: '/meters/42' },
    ]);
  });
});

describe('GatewayContext', () => {
  test('operations fail once the context is closed', async () => {
    const { ctx } = makeContext();
    await ctx.init();
    const principal = ctx.gateway.authenticate(ctx.gateway.login('user-1', 'pw').token);
    await ctx.close();

    expect(() => ctx.gateway.admit(principal)).toThrow(ClosedError);
    await expect(ctx.gateway.cached('meter:1:unit', async () => 1)).rejects.toThrow(ClosedError);
    await expect(ctx.init()).rejects.toThrow(ClosedError);
  });

  test('starts and stops the scheduler with the context', async () => {
    const { ctx } = makeContext({ GATEWAY_ENABLE_SCHEDULER: 'true' });
    await ctx.init();
    expect(ctx.scheduler.running).toBe(true);
    await ctx.close();
    expect(ctx.scheduler.running).toBe(false);
  });

  test('refuses a placeholder secret in production before anything starts', () => {
    const config = loadConfig({ NODE_ENV: 'production' });
    expect(() => createGatewayContext(config, { logger: silentLogger, persistent: new MemoryStore() })).toThrow(
      ConfigurationError,
    );
  });
});
