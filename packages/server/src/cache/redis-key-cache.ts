import type { CacheLookup, IKeyCache } from '@kms-jwt/core';
import { Logger } from '@nestjs/common';
import { Redis } from 'ioredis';

export type RedisKeyCacheClient = Pick<Redis, 'getBuffer' | 'set' | 'ping' | 'quit'>;

/**
 * Data key cache backed by Redis. Keys are written with `PXAT` so Redis
 * drops them at the token's expiry instant.
 */
export class RedisKeyCache implements IKeyCache {
	readonly name = 'redis';
	private readonly logger = new Logger(RedisKeyCache.name);

	constructor(private readonly redis: RedisKeyCacheClient) {}

	static fromUrl(url: string): RedisKeyCache {
		const client = new Redis(url, {
			retryStrategy: (times: number): number => Math.min(times * 50, 2000),
			maxRetriesPerRequest: 3,
			commandTimeout: 5000,
		});
		const cache = new RedisKeyCache(client);
		client.on('error', (err: Error) => {
			cache.logger.error(`Redis connection error: ${err.message}`);
		});
		return cache;
	}

	async get(key: string): Promise<CacheLookup> {
		const value = await this.redis.getBuffer(key);
		if (value === null) return { hit: false };
		return { hit: true, value: new Uint8Array(value) };
	}

	async set(key: string, value: Uint8Array, expiresAt: Date): Promise<void> {
		const expiresAtMs = expiresAt.getTime();
		if (Number.isNaN(expiresAtMs)) {
			throw new Error(`Invalid expiry for cache key ${key}`);
		}
		if (Date.now() > expiresAtMs) return;

		await this.redis.set(key, Buffer.from(value), 'PXAT', expiresAtMs);
	}

	async healthCheck(): Promise<boolean> {
		try {
			return (await this.redis.ping()) === 'PONG';
		} catch {
			return false;
		}
	}

	async destroy(): Promise<void> {
		await this.redis.quit();
	}
}
