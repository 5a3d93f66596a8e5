// Enums
export { KeySpec, KEY_SPEC_BYTES } from './enums/key-spec.js';

// Protocol
export { ENVELOPE_PROTOCOL, STANDARD_CLAIM_NAMES } from './protocol.js';
export type { StandardClaimName } from './protocol.js';

// Errors
export {
	ClaimConflictError,
	InvalidSignatureError,
	InvalidTokenRequestError,
	KeyCacheError,
	KeyDecryptionError,
	KeyGenerationError,
	KmsTokenError,
	MalformedEnvelopeError,
	MalformedTokenError,
} from './errors.js';
export type { KmsTokenErrorCode } from './errors.js';

// Interfaces
export type { CacheLookup, IKeyCache, IKmsProvider } from './interfaces/index.js';

// Types
export type {
	ClaimValue,
	CustomClaims,
	DataKey,
	Envelope,
	EnvelopeHeaders,
	ProtectedHeaders,
	StandardClaims,
	TokenClaims,
} from './types/index.js';
