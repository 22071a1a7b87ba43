import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';

describe('InMemCache', () => {
  it('setIfAbsent creates once and again after expiry', async () => {
    let nowMs = 0;
    const cache = new InMemCache(() => nowMs);

    expect(await cache.setIfAbsent('k', '1', { ttlSeconds: 10 })).toBe(true);
    expect(await cache.setIfAbsent('k', '2', { ttlSeconds: 10 })).toBe(false);
    expect(await cache.get('k')).toBe('1');

    nowMs = 10_000;
    expect(await cache.get('k')).toBeNull();
    expect(await cache.setIfAbsent('k', '3')).toBe(true);
  });

  it('tracks set members', async () => {
    const cache = new InMemCache();

    await cache.sadd('s', 'a');
    await cache.sadd('s', 'b');
    await cache.sadd('s', 'a');
    await cache.srem('s', 'b');

    expect(await cache.smembers('s')).toEqual(['a']);
    expect(await cache.smembers('missing')).toEqual([]);
  });

  it('del removes strings and sets', async () => {
    const cache = new InMemCache();

    await cache.set('k', 'v');
    await cache.sadd('k2', 'm');
    await cache.del('k');
    await cache.del('k2');

    expect(await cache.get('k')).toBeNull();
    expect(await cache.smembers('k2')).toEqual([]);
  });
});
