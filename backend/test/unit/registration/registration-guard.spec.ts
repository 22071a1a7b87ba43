import { describe, it, expect } from 'vitest';
import type { RegistrationGuard } from '../../../src/modules/registration/guard/registration-guard';
import { InMemRegistrationGuard } from '../../../src/modules/registration/guard/inmem-registration.guard';
import { CacheRegistrationGuard } from '../../../src/modules/registration/guard/cache-registration.guard';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { logger } from '../../../src/shared/logger/logger';
import { FlakyIndexCache } from '../../helpers/flaky-index-cache';
import { TestClock } from '../../helpers/test-clock';

const drivers: Array<[string, () => RegistrationGuard]> = [
  ['memory', () => new InMemRegistrationGuard(logger)],
  [
    'cache',
    () =>
      new CacheRegistrationGuard({
        cache: new InMemCache(new TestClock().nowMs),
        logger,
        ttlSeconds: 120,
      }),
  ],
];

describe.each(drivers)('%s registration guard', (_name, create) => {
  it('admits a key once until it is released', async () => {
    const guard = create();

    expect(await guard.tryAdmit('k')).toBe(true);
    expect(await guard.tryAdmit('k')).toBe(false);

    await guard.release('k');
    expect(await guard.tryAdmit('k')).toBe(true);
  });

  it('admits exactly one of many concurrent callers', async () => {
    const guard = create();

    const results = await Promise.all(Array.from({ length: 10 }, () => guard.tryAdmit('k')));

    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it('keeps different keys independent', async () => {
    const guard = create();

    expect(await guard.tryAdmit('a')).toBe(true);
    expect(await guard.tryAdmit('b')).toBe(true);
    expect(await guard.inFlightCount()).toBe(2);
    expect((await guard.snapshot()).sort()).toEqual(['a', 'b']);
  });

  it('release of an unknown key is a no-op', async () => {
    const guard = create();

    await guard.release('never-admitted');
    expect(await guard.inFlightCount()).toBe(0);
  });

  it('clearAll removes every key and reports the count', async () => {
    const guard = create();
    await guard.tryAdmit('a');
    await guard.tryAdmit('b');

    expect(await guard.clearAll()).toBe(2);
    expect(await guard.inFlightCount()).toBe(0);
    expect(await guard.tryAdmit('a')).toBe(true);
  });
});

describe('CacheRegistrationGuard lease', () => {
  it('expires a wedged key after the TTL', async () => {
    const clock = new TestClock();
    const guard = new CacheRegistrationGuard({
      cache: new InMemCache(clock.nowMs),
      logger,
      ttlSeconds: 120,
    });

    expect(await guard.tryAdmit('k')).toBe(true);

    clock.advance(119_000);
    expect(await guard.tryAdmit('k')).toBe(false);

    clock.advance(2_000);
    expect(await guard.inFlightCount()).toBe(0);
    expect(await guard.tryAdmit('k')).toBe(true);
  });
});

describe('CacheRegistrationGuard index failure', () => {
  it('does not keep the lease when the index write fails', async () => {
    const cache = new FlakyIndexCache();
    const guard = new CacheRegistrationGuard({ cache, logger, ttlSeconds: 120 });

    await expect(guard.tryAdmit('k')).rejects.toThrow('redis connection reset');
    expect(await cache.get('registration-guard:key:k')).toBeNull();

    cache.failIndexWrites = false;
    expect(await guard.tryAdmit('k')).toBe(true);
    expect(await guard.snapshot()).toEqual(['k']);
  });
});
