import { assertCacheKey, cacheKey, isValidCacheKey, matchesInvalidation, parseInvalidation } from '../src/lib/keys';
import { InvalidCacheKeyError } from '../src/lib/errors';

describe('cache key grammar', () => {
  test.each(['meter:42', 'meter:42:unit', 'meter:42:unit:2024-01', 'account:user-1:info', 'a:b'])(
    'accepts %s',
    (key) => {
      expect(assertCacheKey(key)).toBe(key);
    },
  );

  test.each(['meter', 'a:b:c:d:e', 'meter::unit', 'meter:4 2', 'meter:*', ':meter:1', 'météo:1'])('rejects %s', (key) => {
    expect(isValidCacheKey(key)).toBe(false);
  });

  test('cacheKey joins segments and skips missing ones', () => {
    expect(cacheKey('meter', 42)).toBe('meter:42');
    expect(cacheKey('meter', 42, 'unit')).toBe('meter:42:unit');
    expect(cacheKey('meter', '42', 'unit', 7)).toBe('meter:42:unit:7');
    expect(() => cacheKey('meter', 'a b')).toThrow(InvalidCacheKeyError);
  });

  test('parseInvalidation tells exact keys from prefix patterns', () => {
    expect(parseInvalidation('meter:42:unit')).toEqual({ kind: 'exact', key: 'meter:42:unit' });
    expect(parseInvalidation('meter:42:*')).toEqual({ kind: 'prefix', prefix: 'meter:42:' });
    expect(parseInvalidation('meter:*')).toEqual({ kind: 'prefix', prefix: 'meter:' });
    expect(() => parseInvalidation('a:b:c:d:*')).toThrow(InvalidCacheKeyError);
    expect(() => parseInvalidation('meter:*:unit')).toThrow('wildcard must be the final segment');
  });

  test('a prefix pattern matches whole segments only', () => {
    const pattern = parseInvalidation('meter:42:*');
    expect(matchesInvalidation('meter:42:unit', pattern)).toBe(true);
    expect(matchesInvalidation('meter:42:unit:2024', pattern)).toBe(true);
    expect(matchesInvalidation('meter:420:unit', pattern)).toBe(false);
    expect(matchesInvalidation('meter:42', pattern)).toBe(false);
  });
});
