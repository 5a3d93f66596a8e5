import type { IKeyCache } from '@kms-jwt/core';
import { Body, Controller, HttpCode, HttpStatus, Inject, Post } from '@nestjs/common';
import { KEY_CACHE } from '../cache/key-cache.module.js';
import { APP_CONFIG, type AppConfig } from '../common/config.js';
import { KmsTokenService } from '../envelope/kms-token.service.js';
import { IssueTokenDto } from './dto/issue-token.dto.js';
import { VerifyTokenDto } from './dto/verify-token.dto.js';

@Controller('tokens')
export class TokensController {
	constructor(
		@Inject(APP_CONFIG) private readonly config: AppConfig,
		@Inject(KmsTokenService) private readonly kmsTokens: KmsTokenService,
		@Inject(KEY_CACHE) private readonly cache: IKeyCache | null,
	) {}

	/**
	 * Issue a token for a client application. Master and signing keys come
	 * from configuration, never from the request.
	 */
	@Post()
	async issue(@Body() body: IssueTokenDto) {
		const issuedAt = Math.floor(Date.now() / 1000);
		const expiresAt = issuedAt + (body.expiresIn ?? this.config.TOKEN_TTL_SECONDS);

		const token = await this.kmsTokens.issueToken({
			masterKeyId: this.config.KMS_MASTER_KEY_ID,
			clientAppId: body.clientAppId,
			audience: body.audience,
			subject: body.subject,
			issuedAt,
			expiresAt,
			customClaims: body.claims,
			signingKeyId: this.config.TOKEN_SIGNING_KEY_ID,
		});

		return { token, expiresAt };
	}

	@Post('verify')
	@HttpCode(HttpStatus.OK)
	async verify(@Body() body: VerifyTokenDto) {
		const token = await this.kmsTokens.parseAndVerifyToken(
			body.token,
			this.config.TOKEN_SIGNING_KEY_ID,
			this.cache ?? undefined,
		);
		return { headers: token.headers, claims: token.claims };
	}
}
