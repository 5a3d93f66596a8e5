export interface EnvelopeHeaders {
	readonly aid: string; // client application id
	readonly kid: string; // UUID v4, cache discriminator only
	readonly kct: string; // base64 KMS ciphertext of the data key
}

/** Envelope headers plus the `exp` claim: everything needed to resolve a data key. */
export interface Envelope extends EnvelopeHeaders {
	readonly exp: number;
}
