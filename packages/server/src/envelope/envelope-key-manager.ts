import { randomUUID } from 'node:crypto';
import {
	type CacheLookup,
	type DataKey,
	ENVELOPE_PROTOCOL,
	type Envelope,
	type EnvelopeHeaders,
	type IKeyCache,
	type IKmsProvider,
	KeyCacheError,
	KeyDecryptionError,
	KeyGenerationError,
	MalformedEnvelopeError,
} from '@kms-jwt/core';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { KMS_PROVIDER } from '../kms/kms.module.js';
import type { Token } from '../token/token.js';

/**
 * How a verification recovers the plaintext data key: straight from the KMS,
 * or through a cache in front of it.
 */
export type KeyResolution =
	| { readonly kind: 'direct' }
	| { readonly kind: 'cached'; readonly cache: IKeyCache };

export const DIRECT_RESOLUTION: KeyResolution = Object.freeze({ kind: 'direct' });

export function keyResolutionFor(cache?: IKeyCache): KeyResolution {
	return cache ? { kind: 'cached', cache } : DIRECT_RESOLUTION;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// Cancellation and timeouts raised by a collaborator surface as-is.
function isCancellation(err: unknown): boolean {
	return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

function readStringHeader(token: Token, name: string): string {
	const value = token.getProtectedHeader(name);
	if (typeof value !== 'string' || value.length === 0) {
		throw new MalformedEnvelopeError(name);
	}
	return value;
}

@Injectable()
export class EnvelopeKeyManager {
	private readonly logger = new Logger(EnvelopeKeyManager.name);

	constructor(@Inject(KMS_PROVIDER) private readonly kms: IKmsProvider) {}

	async generateEnvelopeKey(masterKeyId: string): Promise<DataKey> {
		try {
			return await this.kms.generateDataKey(masterKeyId, ENVELOPE_PROTOCOL.keySpec);
		} catch (err) {
			if (isCancellation(err)) throw err;
			throw new KeyGenerationError(masterKeyId, { cause: err });
		}
	}

	buildEnvelopeHeaders(clientAppId: string, ciphertext: Uint8Array): EnvelopeHeaders {
		return {
			aid: clientAppId,
			kid: randomUUID(),
			kct: Buffer.from(ciphertext).toString('base64'),
		};
	}

	/** Pull `aid`, `kid`, `kct` and `exp` off a parsed token. */
	readEnvelope(token: Token): Envelope {
		const { appId, keyId, keyCiphertext } = ENVELOPE_PROTOCOL.headers;
		const aid = readStringHeader(token, appId);
		const kid = readStringHeader(token, keyId);
		const kct = readStringHeader(token, keyCiphertext);
		if (!BASE64_PATTERN.test(kct)) {
			throw new MalformedEnvelopeError(keyCiphertext);
		}

		const exp = token.getClaim('exp');
		if (
			typeof exp !== 'number' ||
			!Number.isSafeInteger(exp) ||
			Math.abs(exp) > ENVELOPE_PROTOCOL.maxExpSeconds
		) {
			throw new MalformedEnvelopeError('exp');
		}

		return { aid, kid, kct, exp };
	}

	cacheKeyFor(aid: string, kid: string): string {
		return `${ENVELOPE_PROTOCOL.cacheKeyPrefix}${aid}-${kid}`;
	}

	async resolvePlaintextKey(envelope: Envelope, resolution: KeyResolution): Promise<Uint8Array> {
		switch (resolution.kind) {
			case 'direct':
				return this.decryptDirect(envelope);
			case 'cached':
				return this.decryptCached(envelope, resolution.cache);
		}
	}

	/** KMS round trip with no cache involvement. */
	private async decryptDirect(envelope: Envelope): Promise<Uint8Array> {
		const ciphertext = new Uint8Array(Buffer.from(envelope.kct, 'base64'));
		try {
			return await this.kms.decrypt(ciphertext);
		} catch (err) {
			if (isCancellation(err)) throw err;
			throw new KeyDecryptionError(undefined, { cause: err });
		}
	}

	/**
	 * Cache-first lookup. Concurrent misses for the same (aid, kid) decrypt the
	 * same ciphertext, so a racing second write stores the same bytes.
	 */
	private async decryptCached(envelope: Envelope, cache: IKeyCache): Promise<Uint8Array> {
		const key = this.cacheKeyFor(envelope.aid, envelope.kid);

		let cached: CacheLookup;
		try {
			cached = await cache.get(key);
		} catch (err) {
			if (isCancellation(err)) throw err;
			throw new KeyCacheError('get', { cause: err });
		}
		if (cached.hit) return cached.value;

		this.logger.debug(`Data key cache miss [cache=${cache.name}]`);
		const plaintext = await this.decryptDirect(envelope);

		try {
			await cache.set(key, plaintext, new Date(envelope.exp * 1000));
		} catch (err) {
			plaintext.fill(0);
			if (isCancellation(err)) throw err;
			throw new KeyCacheError('set', { cause: err });
		}
		return plaintext;
	}
}
