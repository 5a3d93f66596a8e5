import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module.js';
import { APP_CONFIG, type AppConfig } from './common/config.js';

const logger = new Logger('Bootstrap');

async function bootstrap() {
	const app = await NestFactory.create<NestExpressApplication>(AppModule);
	const config = app.get<AppConfig>(APP_CONFIG);

	app.useBodyParser('json', { limit: '64kb' });

	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);

	app.enableShutdownHooks();
	app.setGlobalPrefix('api/v1');
	await app.listen(config.PORT);
	logger.log(`Server running on port ${config.PORT} [kms=${config.KMS_PROVIDER} cache=${config.KEY_CACHE}]`);
}

bootstrap().catch((err: unknown) => {
	logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
	process.exit(1);
});
