import type { KeySpec } from '../enums/key-spec.js';
import type { DataKey } from '../types/data-key.js';

export interface IKmsProvider {
	readonly name: string;

	/**
	 * Ask the KMS for a fresh data key wrapped under `masterKeyId`.
	 * The plaintext half is the caller's to use and then wipe.
	 */
	generateDataKey(masterKeyId: string, keySpec: KeySpec): Promise<DataKey>;

	/** Unwrap a ciphertext blob previously returned by `generateDataKey`. */
	decrypt(ciphertext: Uint8Array): Promise<Uint8Array>;

	healthCheck(): Promise<boolean>;

	/** Wipe any in-memory key material (e.g., local-file master key) */
	destroy(): Promise<void>;
}
