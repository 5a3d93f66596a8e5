import { KeySpec } from './enums/key-spec.js';

/**
 * Wire-level constants shared by issuance and verification. Changing any of
 * these breaks interoperability with tokens already in circulation.
 */
export const ENVELOPE_PROTOCOL = Object.freeze({
	headers: Object.freeze({
		appId: 'aid',
		keyId: 'kid',
		keyCiphertext: 'kct',
	}),
	keySpec: KeySpec.AES_128,
	cacheKeyPrefix: 'Jwt-Kms-',
	algorithm: 'HS256',
	type: 'JWT',
	// exp * 1000 must stay within the Date range (±8.64e15 ms)
	maxExpSeconds: 8_640_000_000_000,
} as const);

export const STANDARD_CLAIM_NAMES = Object.freeze(['aud', 'sub', 'iat', 'exp'] as const);

export type StandardClaimName = (typeof STANDARD_CLAIM_NAMES)[number];
