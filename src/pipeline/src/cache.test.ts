import { describe, it, expect, vi } from 'vitest';
import { TableCache } from './cache.js';

describe('TableCache', () => {
  it('should start empty and stale', () => {
    const cache = new TableCache<string>(1000, () => 0);

    expect(cache.peek()).toBeUndefined();
    expect(cache.isStale()).toBe(true);
    expect(cache.info()).toEqual({ ttlMs: 1000, stale: true });
  });

  it('should stay fresh until the ttl elapses', async () => {
    let now = 5000;
    const cache = new TableCache<string>(1000, () => now);

    await cache.rebuild(async () => 'table');

    expect(cache.peek()).toEqual({ value: 'table', builtAt: 5000 });
    now = 5999;
    expect(cache.isStale()).toBe(false);
    now = 6000;
    expect(cache.isStale()).toBe(true);
    expect(cache.info()).toEqual({ ttlMs: 1000, builtAt: 5000, expiresAt: 6000, stale: true });
  });

  it('should keep the previous entry when a rebuild fails', async () => {
    const cache = new TableCache<string>(1000, () => 0);
    await cache.rebuild(async () => 'first');

    const failing = vi.fn().mockRejectedValue(new Error('offline'));
    await expect(cache.rebuild(failing)).rejects.toThrow('offline');

    expect(cache.peek()?.value).toBe('first');
  });

  it('should drop its entry on clear', async () => {
    const cache = new TableCache<number>(1000, () => 0);
    await cache.rebuild(async () => 1);

    cache.clear();

    expect(cache.peek()).toBeUndefined();
  });
});
