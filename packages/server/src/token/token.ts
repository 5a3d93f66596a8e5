import { createHmac, timingSafeEqual } from 'node:crypto';
import type { ClaimValue, ProtectedHeaders } from '@kms-jwt/core';

export type JsonObject = { readonly [key: string]: ClaimValue };

/**
 * HMAC-SHA256 over the signing input, keyed by `HMAC-SHA256(secret, keyId)`
 * so the same secret signs differently under different signing key ids.
 */
export function computeSignature(signingInput: string, keyId: string, secret: Uint8Array): Buffer {
	const signingKey = createHmac('sha256', secret).update(keyId, 'utf-8').digest();
	return createHmac('sha256', signingKey).update(signingInput, 'utf-8').digest();
}

function isClaimArray(value: ClaimValue): value is readonly ClaimValue[] {
	return Array.isArray(value);
}

function freezeValue(value: ClaimValue): ClaimValue {
	if (isClaimArray(value)) return Object.freeze(value.map(freezeValue));
	if (typeof value === 'object' && value !== null) return freezeObject(value);
	return value;
}

// Copies as it freezes; fromEntries keeps a parsed "__proto__" key as an own property.
function freezeObject(value: JsonObject): JsonObject {
	return Object.freeze(
		Object.fromEntries(
			Object.entries(value).map(([key, nested]): [string, ClaimValue] => [key, freezeValue(nested)]),
		),
	);
}

export interface TokenParts {
	readonly headers: ProtectedHeaders;
	readonly claims: JsonObject;
	readonly signingInput: string;
	readonly signature: Uint8Array;
}

/** A signed or parsed compact token. Deeply immutable. */
export class Token {
	readonly headers: ProtectedHeaders;
	readonly claims: JsonObject;
	readonly signature: Uint8Array;
	private readonly signingInput: string;

	constructor(parts: TokenParts) {
		this.headers = freezeObject(parts.headers);
		this.claims = freezeObject(parts.claims);
		this.signature = Uint8Array.from(parts.signature);
		this.signingInput = parts.signingInput;
		Object.freeze(this);
	}

	getProtectedHeader(name: string): ClaimValue | undefined {
		return Object.hasOwn(this.headers, name) ? this.headers[name] : undefined;
	}

	getClaim(name: string): ClaimValue | undefined {
		return Object.hasOwn(this.claims, name) ? this.claims[name] : undefined;
	}

	verifySignature(keyId: string, secret: Uint8Array): boolean {
		const expected = computeSignature(this.signingInput, keyId, secret);
		const actual = Buffer.from(this.signature);
		return expected.length === actual.length && timingSafeEqual(expected, actual);
	}

	toString(): string {
		return `${this.signingInput}.${Buffer.from(this.signature).toString('base64url')}`;
	}
}
