import { DecryptCommand, GenerateDataKeyCommand, ListKeysCommand } from '@aws-sdk/client-kms';
import { KeySpec } from '@kms-jwt/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { type AwsKmsClient, AwsKmsProvider } from '../aws-kms.provider.js';

function createMockClient() {
	return {
		send: vi.fn(),
		destroy: vi.fn(),
	};
}

describe('AwsKmsProvider', () => {
	let client: ReturnType<typeof createMockClient>;
	let provider: AwsKmsProvider;

	beforeEach(() => {
		client = createMockClient();
		provider = new AwsKmsProvider({ client: client as unknown as AwsKmsClient });
	});

	it('requests a data key of the matching spec', async () => {
		client.send.mockResolvedValueOnce({
			Plaintext: new Uint8Array(16).fill(7),
			CiphertextBlob: new Uint8Array([0xff, 0xee]),
		});

		const dataKey = await provider.generateDataKey('alias/tokens', KeySpec.AES_128);

		const command = client.send.mock.calls[0]?.[0];
		expect(command).toBeInstanceOf(GenerateDataKeyCommand);
		expect(command.input).toEqual({ KeyId: 'alias/tokens', KeySpec: 'AES_128' });
		expect(dataKey).toEqual({
			plaintext: new Uint8Array(16).fill(7),
			ciphertext: new Uint8Array([0xff, 0xee]),
		});
	});

	it('fails on an incomplete data key response', async () => {
		client.send.mockResolvedValueOnce({ CiphertextBlob: new Uint8Array([1]) });

		await expect(provider.generateDataKey('alias/tokens', KeySpec.AES_128)).rejects.toThrow(
			'AWS KMS returned an incomplete data key for alias/tokens',
		);
	});

	it('propagates service errors', async () => {
		client.send.mockRejectedValueOnce(new Error('NotFoundException'));

		await expect(provider.generateDataKey('alias/missing', KeySpec.AES_128)).rejects.toThrow(
			'NotFoundException',
		);
	});

	it('decrypts the ciphertext blob', async () => {
		client.send.mockResolvedValueOnce({ Plaintext: new Uint8Array([1, 2, 3]) });

		const plaintext = await provider.decrypt(new Uint8Array([0xff, 0xee]));

		const command = client.send.mock.calls[0]?.[0];
		expect(command).toBeInstanceOf(DecryptCommand);
		expect(command.input).toEqual({ CiphertextBlob: new Uint8Array([0xff, 0xee]) });
		expect(plaintext).toEqual(new Uint8Array([1, 2, 3]));
	});

	it('fails when decrypt returns no plaintext', async () => {
		client.send.mockResolvedValueOnce({});

		await expect(provider.decrypt(new Uint8Array([1]))).rejects.toThrow('AWS KMS returned no plaintext');
	});

	it('probes health with ListKeys', async () => {
		client.send.mockResolvedValueOnce({ Keys: [] });

		expect(await provider.healthCheck()).toBe(true);
		expect(client.send.mock.calls[0]?.[0]).toBeInstanceOf(ListKeysCommand);
	});

	it('reports unhealthy when ListKeys fails', async () => {
		client.send.mockRejectedValueOnce(new Error('UnrecognizedClientException'));

		expect(await provider.healthCheck()).toBe(false);
	});

	it('destroys the client', async () => {
		await provider.destroy();

		expect(client.destroy).toHaveBeenCalledOnce();
	});
});
