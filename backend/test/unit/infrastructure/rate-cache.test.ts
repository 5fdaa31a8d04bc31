// Unit tests for RateCache
import { RateCache } from '../../../src/infrastructure/cache/rate-cache';

describe('RateCache', () => {
  let cache: RateCache;

  beforeEach(() => {
    cache = new RateCache();
  });

  it('should compute a missing entry once', async () => {
    const compute = jest.fn().mockResolvedValue({ EUR: 0.9 });

    await cache.getOrCompute('USD', compute);
    await cache.getOrCompute('USD', compute);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, entries: 1, hitRate: 0.5 });
  });

  it('should store a frozen copy of the computed table', async () => {
    const table = { EUR: 0.9 };

    const stored = await cache.getOrCompute('USD', () => Promise.resolve(table));
    table.EUR = 2;

    expect(stored).toEqual({ EUR: 0.9 });
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('should hand the in-flight computation to concurrent callers', async () => {
    let resolve: (table: Record<string, number>) => void = () => undefined;
    const compute = jest.fn(() => new Promise<Record<string, number>>(res => { resolve = res; }));

    const first = cache.getOrCompute('USD', compute);
    const second = cache.getOrCompute('USD', compute);
    resolve({ EUR: 0.9 });

    await expect(first).resolves.toEqual({ EUR: 0.9 });
    await expect(second).resolves.toEqual({ EUR: 0.9 });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should evict a rejected computation', async () => {
    const failure = new Error('boom');
    const compute = jest.fn()
      .mockRejectedValueOnce(failure)
      .mockResolvedValueOnce({ EUR: 0.9 });

    await expect(cache.getOrCompute('USD', compute)).rejects.toBe(failure);
    expect(cache.has('USD')).toBe(false);

    await expect(cache.getOrCompute('USD', compute)).resolves.toEqual({ EUR: 0.9 });
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('should not evict a newer entry when a cleared computation fails', async () => {
    let reject: (error: Error) => void = () => undefined;
    const pending = cache.getOrCompute('USD', () => new Promise<Record<string, number>>((_res, rej) => { reject = rej; }));

    cache.clear();
    await cache.getOrCompute('USD', () => Promise.resolve({ EUR: 0.9 }));
    reject(new Error('late failure'));

    await expect(pending).rejects.toThrow('late failure');
    expect(cache.has('USD')).toBe(true);
  });

  it('should delete single entries and clear all of them', async () => {
    await cache.getOrCompute('USD', () => Promise.resolve({ EUR: 0.9 }));
    await cache.getOrCompute('EUR', () => Promise.resolve({ USD: 1.1 }));

    expect(cache.delete('USD')).toBe(true);
    expect(cache.delete('USD')).toBe(false);
    expect(cache.size).toBe(1);

    cache.clear();
    expect(cache.size).toBe(0);
  });
});
