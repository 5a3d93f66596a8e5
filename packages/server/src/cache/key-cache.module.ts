import type { IKeyCache } from '@kms-jwt/core';
import { Global, Inject, Logger, Module, type OnModuleDestroy } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../common/config.js';
import { MemoryKeyCache } from './memory-key-cache.js';
import { RedisKeyCache } from './redis-key-cache.js';

/** Injects `IKeyCache | null`; null means every verification decrypts through the KMS. */
export const KEY_CACHE = Symbol('KEY_CACHE');

const logger = new Logger('KeyCacheModule');

export function createKeyCache(config: AppConfig): IKeyCache | null {
	switch (config.KEY_CACHE) {
		case 'none':
			logger.log('Data key cache disabled; every verification decrypts via KMS');
			return null;
		case 'memory':
			return new MemoryKeyCache(config.KEY_CACHE_MAX_ENTRIES);
		case 'redis':
			return RedisKeyCache.fromUrl(config.REDIS_URL);
	}
}

@Global()
@Module({
	providers: [
		{
			provide: KEY_CACHE,
			useFactory: createKeyCache,
			inject: [APP_CONFIG],
		},
	],
	exports: [KEY_CACHE],
})
export class KeyCacheModule implements OnModuleDestroy {
	constructor(@Inject(KEY_CACHE) private readonly cache: IKeyCache | null) {}

	async onModuleDestroy() {
		await this.cache?.destroy();
	}
}
