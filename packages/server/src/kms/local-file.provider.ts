import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { type DataKey, type IKmsProvider, KEY_SPEC_BYTES, type KeySpec } from '@kms-jwt/core';
import { Logger } from '@nestjs/common';

const ALGORITHM = 'aes-256-gcm';
const MASTER_KEY_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const MAX_KEY_ID_LENGTH = 255;

export interface LocalFileKmsOptions {
	keyFilePath: string;
	masterKeyId: string;
}

/**
 * Single master key read from a hex file. Data keys are wrapped with
 * AES-256-GCM and the master key id is bound in as AAD.
 *
 * Blob layout: idLen (1) + masterKeyId (idLen) + iv (12) + authTag (16) + wrapped key
 */
export class LocalFileKmsProvider implements IKmsProvider {
	readonly name = 'local-file';
	private readonly logger = new Logger(LocalFileKmsProvider.name);
	private readonly masterKey: Buffer;
	private readonly masterKeyId: string;

	constructor(options: LocalFileKmsOptions) {
		const idLength = Buffer.byteLength(options.masterKeyId, 'utf-8');
		if (idLength === 0 || idLength > MAX_KEY_ID_LENGTH) {
			throw new Error(`Master key id must be 1-${MAX_KEY_ID_LENGTH} bytes, got ${idLength}`);
		}

		const hex = readFileSync(options.keyFilePath, 'utf-8').trim();
		const buf = Buffer.from(hex, 'hex');
		if (buf.length !== MASTER_KEY_LENGTH) {
			throw new Error(
				`Master key must be ${MASTER_KEY_LENGTH} bytes (${MASTER_KEY_LENGTH * 2} hex chars), got ${buf.length} bytes`,
			);
		}
		this.masterKey = buf;
		this.masterKeyId = options.masterKeyId;

		if (process.env.NODE_ENV === 'production') {
			this.logger.warn(
				'LocalFileKmsProvider is intended for dev/simple deployments. ' +
					'Consider a cloud KMS (AWS, Vault transit) for production.',
			);
		}

		this.logger.log(`Master key "${this.masterKeyId}" loaded from file`);
	}

	async generateDataKey(masterKeyId: string, keySpec: KeySpec): Promise<DataKey> {
		this.assertKnownKey(masterKeyId);

		const plaintext = randomBytes(KEY_SPEC_BYTES[keySpec]);
		const keyIdBytes = Buffer.from(masterKeyId, 'utf-8');
		const iv = randomBytes(IV_LENGTH);

		const cipher = createCipheriv(ALGORITHM, this.masterKey, iv);
		cipher.setAAD(keyIdBytes);
		const wrapped = Buffer.concat([cipher.update(plaintext), cipher.final()]);
		const authTag = cipher.getAuthTag();

		const ciphertext = Buffer.concat([
			Buffer.from([keyIdBytes.length]),
			keyIdBytes,
			iv,
			authTag,
			wrapped,
		]);

		return {
			plaintext: new Uint8Array(plaintext),
			ciphertext: new Uint8Array(ciphertext),
		};
	}

	async decrypt(ciphertext: Uint8Array): Promise<Uint8Array> {
		const buf = Buffer.from(ciphertext);
		const idLength = buf[0];
		if (idLength === undefined || idLength === 0) {
			throw new Error('Invalid encrypted key format');
		}

		const ivStart = 1 + idLength;
		const tagStart = ivStart + IV_LENGTH;
		const bodyStart = tagStart + AUTH_TAG_LENGTH;
		if (buf.length <= bodyStart) {
			throw new Error('Invalid encrypted key format');
		}

		const keyIdBytes = buf.subarray(1, ivStart);
		this.assertKnownKey(keyIdBytes.toString('utf-8'));

		const decipher = createDecipheriv(ALGORITHM, this.masterKey, buf.subarray(ivStart, tagStart));
		decipher.setAAD(keyIdBytes);
		decipher.setAuthTag(buf.subarray(tagStart, bodyStart));

		const decrypted = Buffer.concat([decipher.update(buf.subarray(bodyStart)), decipher.final()]);
		return new Uint8Array(decrypted);
	}

	async healthCheck(): Promise<boolean> {
		// Key must exist and not be wiped (all zeros)
		return (
			this.masterKey.length === MASTER_KEY_LENGTH && !this.masterKey.every((b) => b === 0)
		);
	}

	async destroy(): Promise<void> {
		this.masterKey.fill(0);
		this.logger.log('Master key wiped from memory');
	}

	private assertKnownKey(masterKeyId: string): void {
		if (masterKeyId !== this.masterKeyId) {
			throw new Error(`Unknown master key: ${masterKeyId}`);
		}
	}
}
