import { type DataKey, type IKmsProvider, KEY_SPEC_BYTES, type KeySpec } from '@kms-jwt/core';
import { Logger } from '@nestjs/common';
import NodeVault from 'node-vault';

export interface VaultTransitOptions {
	endpoint: string;
	token: string;
	mount: string;
}

export type VaultTransitClient = Pick<NodeVault.client, 'write' | 'health'>;

/**
 * Vault's transit ciphertext ("vault:v1:...") does not name its key, so the
 * blob handed back to callers is JSON `{ k: keyName, c: vaultCiphertext }`.
 */
interface TransitBlob {
	k: string;
	c: string;
}

function readDataField(response: unknown, field: string): string {
	if (typeof response === 'object' && response !== null && 'data' in response) {
		const { data } = response;
		if (typeof data === 'object' && data !== null && field in data) {
			const value: unknown = Reflect.get(data, field);
			if (typeof value === 'string' && value.length > 0) return value;
		}
	}
	throw new Error(`Vault transit response is missing data.${field}`);
}

function decodeBlob(ciphertext: Uint8Array): TransitBlob {
	let parsed: unknown;
	try {
		parsed = JSON.parse(Buffer.from(ciphertext).toString('utf-8'));
	} catch (err) {
		throw new Error('Invalid transit ciphertext blob', { cause: err });
	}
	if (
		typeof parsed === 'object' &&
		parsed !== null &&
		'k' in parsed &&
		'c' in parsed &&
		typeof parsed.k === 'string' &&
		typeof parsed.c === 'string'
	) {
		return { k: parsed.k, c: parsed.c };
	}
	throw new Error('Invalid transit ciphertext blob');
}

export class VaultTransitKmsProvider implements IKmsProvider {
	readonly name = 'vault-transit';
	private readonly logger = new Logger(VaultTransitKmsProvider.name);
	private readonly vault: VaultTransitClient;
	private readonly mount: string;

	constructor(options: VaultTransitOptions, client?: VaultTransitClient) {
		this.vault =
			client ??
			NodeVault({
				apiVersion: 'v1',
				endpoint: options.endpoint,
				token: options.token,
			});
		this.mount = options.mount;
		this.logger.log(`Using Vault transit engine at ${options.endpoint}/${options.mount}`);
	}

	async generateDataKey(masterKeyId: string, keySpec: KeySpec): Promise<DataKey> {
		const response: unknown = await this.vault.write(
			`${this.mount}/datakey/plaintext/${encodeURIComponent(masterKeyId)}`,
			{ bits: KEY_SPEC_BYTES[keySpec] * 8 },
		);

		const plaintext = Buffer.from(readDataField(response, 'plaintext'), 'base64');
		const blob: TransitBlob = { k: masterKeyId, c: readDataField(response, 'ciphertext') };

		return {
			plaintext: new Uint8Array(plaintext),
			ciphertext: new Uint8Array(Buffer.from(JSON.stringify(blob), 'utf-8')),
		};
	}

	async decrypt(ciphertext: Uint8Array): Promise<Uint8Array> {
		const blob = decodeBlob(ciphertext);
		const response: unknown = await this.vault.write(
			`${this.mount}/decrypt/${encodeURIComponent(blob.k)}`,
			{ ciphertext: blob.c },
		);
		return new Uint8Array(Buffer.from(readDataField(response, 'plaintext'), 'base64'));
	}

	async healthCheck(): Promise<boolean> {
		try {
			const result: unknown = await this.vault.health();
			return (
				typeof result === 'object' &&
				result !== null &&
				'sealed' in result &&
				result.sealed === false
			);
		} catch {
			return false;
		}
	}

	async destroy(): Promise<void> {
		// node-vault holds no sockets or key material between requests.
	}
}
