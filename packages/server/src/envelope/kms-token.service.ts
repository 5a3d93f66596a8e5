import {
	ClaimConflictError,
	type CustomClaims,
	ENVELOPE_PROTOCOL,
	type IKeyCache,
	InvalidSignatureError,
	InvalidTokenRequestError,
	STANDARD_CLAIM_NAMES,
	type StandardClaimName,
	type TokenClaims,
} from '@kms-jwt/core';
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Token } from '../token/token.js';
import { TokenCore } from '../token/token-core.js';
import { EnvelopeKeyManager, keyResolutionFor } from './envelope-key-manager.js';

export interface IssueTokenRequest {
	readonly masterKeyId: string;
	readonly clientAppId: string;
	readonly audience: readonly string[];
	readonly subject: string;
	readonly issuedAt: number; // unix seconds
	readonly expiresAt: number; // unix seconds
	readonly customClaims?: CustomClaims;
	readonly signingKeyId: string;
}

function isStandardClaim(name: string): name is StandardClaimName {
	return STANDARD_CLAIM_NAMES.some((standard) => standard === name);
}

function assertIssuable(request: IssueTokenRequest): void {
	if (!request.masterKeyId) {
		throw new InvalidTokenRequestError('masterKeyId must not be empty');
	}
	if (!request.clientAppId) {
		throw new InvalidTokenRequestError('clientAppId must not be empty');
	}
	if (request.audience.length === 0 || request.audience.some((aud) => !aud)) {
		throw new InvalidTokenRequestError('audience must contain at least one non-empty entry');
	}
	if (!Number.isSafeInteger(request.issuedAt) || !Number.isSafeInteger(request.expiresAt)) {
		throw new InvalidTokenRequestError('issuedAt and expiresAt must be integer unix timestamps');
	}
	if (Math.abs(request.expiresAt) > ENVELOPE_PROTOCOL.maxExpSeconds) {
		throw new InvalidTokenRequestError(
			`expiresAt must not exceed ${ENVELOPE_PROTOCOL.maxExpSeconds} seconds since the epoch`,
		);
	}
	if (request.expiresAt <= request.issuedAt) {
		throw new InvalidTokenRequestError('expiresAt must be later than issuedAt');
	}
	if (!request.signingKeyId) {
		throw new InvalidTokenRequestError('signingKeyId must not be empty');
	}

	const conflicts = Object.keys(request.customClaims ?? {}).filter(isStandardClaim);
	if (conflicts.length > 0) {
		throw new ClaimConflictError(conflicts);
	}
}

/**
 * Issues and verifies tokens whose HMAC secret is a per-token KMS data key.
 * The wrapped key rides in the `kct` header; the plaintext never leaves memory.
 */
@Injectable()
export class KmsTokenService {
	private readonly logger = new Logger(KmsTokenService.name);

	constructor(
		@Inject(TokenCore) private readonly tokenCore: TokenCore,
		@Inject(EnvelopeKeyManager) private readonly envelope: EnvelopeKeyManager,
	) {}

	async issueToken(request: IssueTokenRequest): Promise<string> {
		assertIssuable(request);

		const dataKey = await this.envelope.generateEnvelopeKey(request.masterKeyId);
		try {
			const headers = this.envelope.buildEnvelopeHeaders(request.clientAppId, dataKey.ciphertext);
			const claims: TokenClaims = {
				aud: [...request.audience],
				sub: request.subject,
				iat: request.issuedAt,
				exp: request.expiresAt,
				...request.customClaims,
			};

			const token = this.tokenCore.sign({ ...headers }, claims, dataKey.plaintext, request.signingKeyId);
			this.logger.debug(`Issued token [aid=${headers.aid} kid=${headers.kid}]`);
			return token.toString();
		} finally {
			// Wipe data key from memory
			dataKey.plaintext.fill(0);
		}
	}

	/**
	 * Parse, resolve the data key, verify. Each stage fails with its own error:
	 * MalformedTokenError, MalformedEnvelopeError, KeyDecryptionError, InvalidSignatureError.
	 * Without a cache every call decrypts through the KMS.
	 */
	async parseAndVerifyToken(
		serialized: string,
		signingKeyId: string,
		cache?: IKeyCache,
	): Promise<Token> {
		const token = this.tokenCore.parseCompact(serialized);
		const envelope = this.envelope.readEnvelope(token);
		const plaintext = await this.envelope.resolvePlaintextKey(envelope, keyResolutionFor(cache));

		try {
			if (!token.verifySignature(signingKeyId, plaintext)) {
				throw new InvalidSignatureError();
			}
		} finally {
			plaintext.fill(0);
		}
		return token;
	}
}
