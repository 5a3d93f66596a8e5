// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export type KmsTokenErrorCode =
	| 'KEY_GENERATION_FAILED'
	| 'KEY_DECRYPTION_FAILED'
	| 'KEY_CACHE_FAILED'
	| 'MALFORMED_ENVELOPE'
	| 'MALFORMED_TOKEN'
	| 'INVALID_SIGNATURE'
	| 'CLAIM_CONFLICT'
	| 'INVALID_TOKEN_REQUEST';

export abstract class KmsTokenError extends Error {
	abstract readonly code: KmsTokenErrorCode;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

// ---------------------------------------------------------------------------
// Infrastructure (KMS / cache)
// ---------------------------------------------------------------------------

export class KeyGenerationError extends KmsTokenError {
	readonly code = 'KEY_GENERATION_FAILED';

	constructor(
		public readonly masterKeyId: string,
		options?: { cause?: unknown },
	) {
		super(`KMS failed to generate a data key under master key ${masterKeyId}`, options);
	}
}

export class KeyDecryptionError extends KmsTokenError {
	readonly code = 'KEY_DECRYPTION_FAILED';

	constructor(message = 'KMS failed to decrypt the data key ciphertext', options?: { cause?: unknown }) {
		super(message, options);
	}
}

export class KeyCacheError extends KmsTokenError {
	readonly code = 'KEY_CACHE_FAILED';

	constructor(
		public readonly operation: 'get' | 'set',
		options?: { cause?: unknown },
	) {
		super(`Key cache ${operation} failed`, options);
	}
}

// ---------------------------------------------------------------------------
// Structural
// ---------------------------------------------------------------------------

export class MalformedTokenError extends KmsTokenError {
	readonly code = 'MALFORMED_TOKEN';
}

export class MalformedEnvelopeError extends KmsTokenError {
	readonly code = 'MALFORMED_ENVELOPE';

	constructor(public readonly field: string) {
		super(`Token envelope is missing or has an invalid "${field}"`);
	}
}

// ---------------------------------------------------------------------------
// Security
// ---------------------------------------------------------------------------

export class InvalidSignatureError extends KmsTokenError {
	readonly code = 'INVALID_SIGNATURE';

	constructor() {
		super('Token signature does not match');
	}
}

// ---------------------------------------------------------------------------
// Issuance
// ---------------------------------------------------------------------------

export class ClaimConflictError extends KmsTokenError {
	readonly code = 'CLAIM_CONFLICT';

	constructor(public readonly claims: readonly string[]) {
		super(`Custom claims may not override standard claims: ${claims.join(', ')}`);
	}
}

export class InvalidTokenRequestError extends KmsTokenError {
	readonly code = 'INVALID_TOKEN_REQUEST';
}
