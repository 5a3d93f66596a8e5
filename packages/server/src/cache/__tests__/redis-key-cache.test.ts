import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RedisKeyCache, type RedisKeyCacheClient } from '../redis-key-cache.js';

// In-process stand-in for the ioredis commands the cache uses
function createMockRedis() {
	return {
		getBuffer: vi.fn(async (_key: string): Promise<Buffer | null> => null),
		set: vi.fn(async (..._args: unknown[]) => 'OK'),
		ping: vi.fn(async () => 'PONG'),
		quit: vi.fn(async () => 'OK'),
	};
}

const NOW = new Date('2026-01-01T00:00:00Z');

describe('RedisKeyCache', () => {
	let redis: ReturnType<typeof createMockRedis>;
	let cache: RedisKeyCache;

	beforeEach(() => {
		vi.useFakeTimers({ toFake: ['Date'] });
		vi.setSystemTime(NOW);
		redis = createMockRedis();
		cache = new RedisKeyCache(redis as unknown as RedisKeyCacheClient);
		return () => {
			vi.useRealTimers();
		};
	});

	it('misses when Redis has no value', async () => {
		expect(await cache.get('Jwt-Kms-app-1-kid')).toEqual({ hit: false });
		expect(redis.getBuffer).toHaveBeenCalledWith('Jwt-Kms-app-1-kid');
	});

	it('hits with the stored bytes', async () => {
		redis.getBuffer.mockResolvedValueOnce(Buffer.from([1, 2, 3]));

		expect(await cache.get('k1')).toEqual({ hit: true, value: new Uint8Array([1, 2, 3]) });
	});

	it('hands out a copy of the fetched bytes', async () => {
		const stored = Buffer.from([1, 2, 3]);
		redis.getBuffer.mockResolvedValueOnce(stored);

		const lookup = await cache.get('k1');
		if (lookup.hit) lookup.value.fill(0);

		expect(lookup.hit).toBe(true);
		expect(stored).toEqual(Buffer.from([1, 2, 3]));
	});

	it('writes with an absolute PXAT expiry', async () => {
		const expiresAt = new Date(NOW.getTime() + 60_000);

		await cache.set('k1', new Uint8Array([7, 8]), expiresAt);

		expect(redis.set).toHaveBeenCalledWith('k1', Buffer.from([7, 8]), 'PXAT', expiresAt.getTime());
	});

	it('skips a write whose expiry has passed', async () => {
		await cache.set('k1', new Uint8Array([1]), new Date(NOW.getTime() - 1));

		expect(redis.set).not.toHaveBeenCalled();
	});

	it('rejects an invalid expiry date', async () => {
		await expect(cache.set('k1', new Uint8Array([1]), new Date(Number.NaN))).rejects.toThrow(
			'Invalid expiry for cache key k1',
		);
	});

	it('propagates Redis failures', async () => {
		redis.getBuffer.mockRejectedValueOnce(new Error('Connection is closed.'));

		await expect(cache.get('k1')).rejects.toThrow('Connection is closed.');
	});

	it('is healthy when PING answers PONG', async () => {
		expect(await cache.healthCheck()).toBe(true);
	});

	it('is unhealthy when PING fails', async () => {
		redis.ping.mockRejectedValueOnce(new Error('ECONNREFUSED'));

		expect(await cache.healthCheck()).toBe(false);
	});

	it('quits the connection on destroy', async () => {
		await cache.destroy();

		expect(redis.quit).toHaveBeenCalledOnce();
	});
});
