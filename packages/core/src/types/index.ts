export type { DataKey } from './data-key.js';
export type { Envelope, EnvelopeHeaders } from './envelope.js';
export type {
	ClaimValue,
	CustomClaims,
	ProtectedHeaders,
	StandardClaims,
	TokenClaims,
} from './token-claims.js';
