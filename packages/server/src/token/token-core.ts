import { ENVELOPE_PROTOCOL, MalformedTokenError, type ProtectedHeaders } from '@kms-jwt/core';
import { Injectable } from '@nestjs/common';
import { computeSignature, type JsonObject, Token } from './token.js';

const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

function encodeSegment(value: object): string {
	return Buffer.from(JSON.stringify(value), 'utf-8').toString('base64url');
}

// JSON.parse only ever yields JSON values, so a plain object here is a JsonObject.
function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeSegment(segment: string, part: 'header' | 'payload'): JsonObject {
	let parsed: unknown;
	try {
		parsed = JSON.parse(Buffer.from(segment, 'base64url').toString('utf-8'));
	} catch (err) {
		throw new MalformedTokenError(`Token ${part} is not valid JSON`, { cause: err });
	}
	if (!isJsonObject(parsed)) {
		throw new MalformedTokenError(`Token ${part} must be a JSON object`);
	}
	return parsed;
}

/**
 * Compact (header.payload.signature) serialization and HS256 signing.
 * Knows nothing about envelopes; any token variant can reuse it.
 */
@Injectable()
export class TokenCore {
	sign(headers: ProtectedHeaders, claims: JsonObject, secret: Uint8Array, keyId: string): Token {
		const { alg: _alg, typ: _typ, ...rest } = headers;
		const protectedHeaders: ProtectedHeaders = {
			alg: ENVELOPE_PROTOCOL.algorithm,
			typ: ENVELOPE_PROTOCOL.type,
			...rest,
		};

		const signingInput = `${encodeSegment(protectedHeaders)}.${encodeSegment(claims)}`;
		const signature = computeSignature(signingInput, keyId, secret);

		return new Token({ headers: protectedHeaders, claims, signingInput, signature });
	}

	parseCompact(serialized: string): Token {
		const parts = serialized.trim().split('.');
		if (parts.length !== 3) {
			throw new MalformedTokenError('Token must have three dot-separated segments');
		}

		const [headerB64, payloadB64, signatureB64] = parts;
		if (
			!headerB64 ||
			!payloadB64 ||
			!signatureB64 ||
			!SEGMENT_PATTERN.test(headerB64) ||
			!SEGMENT_PATTERN.test(payloadB64) ||
			!SEGMENT_PATTERN.test(signatureB64)
		) {
			throw new MalformedTokenError('Token segments must be non-empty base64url');
		}

		const signature = Buffer.from(signatureB64, 'base64url');
		if (signature.toString('base64url') !== signatureB64) {
			throw new MalformedTokenError('Token signature is not canonical base64url');
		}

		const headers = decodeSegment(headerB64, 'header');
		if (headers.alg !== ENVELOPE_PROTOCOL.algorithm) {
			throw new MalformedTokenError(
				`Unsupported token algorithm: ${String(headers.alg)} (expected ${ENVELOPE_PROTOCOL.algorithm})`,
			);
		}
		const claims = decodeSegment(payloadB64, 'payload');

		return new Token({
			headers,
			claims,
			signingInput: `${headerB64}.${payloadB64}`,
			signature,
		});
	}
}
