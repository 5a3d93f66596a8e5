import { Global, Logger, Module } from '@nestjs/common';
import { APP_CONFIG, type AppConfig, parseConfig } from './config.js';

const logger = new Logger('ConfigModule');

function loadConfig(): AppConfig {
	let config: AppConfig;
	try {
		config = parseConfig();
	} catch (error) {
		throw new Error(
			`Invalid environment configuration: ${error instanceof Error ? error.message : String(error)}`,
			{ cause: error },
		);
	}
	logger.log(
		`kms=${config.KMS_PROVIDER} cache=${config.KEY_CACHE} signingKey=${config.TOKEN_SIGNING_KEY_ID} ttl=${config.TOKEN_TTL_SECONDS}s`,
	);
	return config;
}

@Global()
@Module({
	providers: [
		{
			provide: APP_CONFIG,
			useFactory: loadConfig,
		},
	],
	exports: [APP_CONFIG],
})
export class ConfigModule {}
