import type { IKeyCache, IKmsProvider } from '@kms-jwt/core';
import { Controller, Get, Inject, Res } from '@nestjs/common';
import type { Response } from 'express';
import { KEY_CACHE } from './cache/key-cache.module.js';
import { KMS_PROVIDER } from './kms/kms.module.js';

async function probe(check: () => Promise<boolean>): Promise<boolean> {
	try {
		return await check();
	} catch {
		return false;
	}
}

@Controller('health')
export class HealthController {
	constructor(
		@Inject(KMS_PROVIDER) private readonly kms: IKmsProvider,
		@Inject(KEY_CACHE) private readonly cache: IKeyCache | null,
	) {}

	@Get()
	async check(@Res() res: Response) {
		const { cache } = this;
		const [kmsOk, cacheOk] = await Promise.all([
			probe(() => this.kms.healthCheck()),
			cache ? probe(() => cache.healthCheck()) : Promise.resolve(true),
		]);

		const healthy = kmsOk && cacheOk;

		res.status(healthy ? 200 : 503).json({
			status: healthy ? 'ok' : 'degraded',
			uptime: Math.floor(process.uptime()),
			kms: { provider: this.kms.name, connected: kmsOk },
			cache: { provider: cache?.name ?? 'none', connected: cacheOk },
			timestamp: new Date().toISOString(),
		});
	}
}
