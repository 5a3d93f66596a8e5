/**
 * A per-token data key as handed out by the KMS.
 * - plaintext: the signing secret, held in memory only while signing or verifying
 * - ciphertext: the KMS-wrapped form, the only one that is ever persisted (inside the token)
 */
export interface DataKey {
	readonly plaintext: Uint8Array;
	readonly ciphertext: Uint8Array;
}
