import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { KeyCacheModule } from './cache/key-cache.module.js';
import { ConfigModule } from './common/config.module.js';
import { GlobalExceptionFilter } from './common/global-exception.filter.js';
import { HealthController } from './health.controller.js';
import { KmsModule } from './kms/kms.module.js';
import { TokensModule } from './tokens/tokens.module.js';

@Module({
	imports: [ConfigModule, KmsModule, KeyCacheModule, TokensModule],
	controllers: [HealthController],
	providers: [
		{
			provide: APP_FILTER,
			useClass: GlobalExceptionFilter,
		},
	],
})
export class AppModule {}
