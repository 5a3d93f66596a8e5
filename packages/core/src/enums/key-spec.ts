/** Data key sizes a KMS can be asked for. Values match the AWS KMS `KeySpec` names. */
export enum KeySpec {
	AES_128 = 'AES_128',
	AES_256 = 'AES_256',
}

export const KEY_SPEC_BYTES: Readonly<Record<KeySpec, number>> = {
	[KeySpec.AES_128]: 16,
	[KeySpec.AES_256]: 32,
};
