import {
	DataKeySpec,
	DecryptCommand,
	GenerateDataKeyCommand,
	KMSClient,
	ListKeysCommand,
} from '@aws-sdk/client-kms';
import { type DataKey, type IKmsProvider, KeySpec } from '@kms-jwt/core';
import { Logger } from '@nestjs/common';

const AWS_KEY_SPEC: Readonly<Record<KeySpec, DataKeySpec>> = {
	[KeySpec.AES_128]: DataKeySpec.AES_128,
	[KeySpec.AES_256]: DataKeySpec.AES_256,
};

export type AwsKmsClient = Pick<KMSClient, 'send' | 'destroy'>;

export interface AwsKmsOptions {
	region?: string;
	/** Pre-built client; takes precedence over `region`. */
	client?: AwsKmsClient;
}

export class AwsKmsProvider implements IKmsProvider {
	readonly name = 'aws';
	private readonly logger = new Logger(AwsKmsProvider.name);
	private readonly client: AwsKmsClient;

	constructor(options: AwsKmsOptions) {
		this.client = options.client ?? new KMSClient({ region: options.region });
		this.logger.log(`Using AWS KMS${options.region ? ` in ${options.region}` : ''}`);
	}

	async generateDataKey(masterKeyId: string, keySpec: KeySpec): Promise<DataKey> {
		const result = await this.client.send(
			new GenerateDataKeyCommand({
				KeyId: masterKeyId,
				KeySpec: AWS_KEY_SPEC[keySpec],
			}),
		);

		if (!result.Plaintext || !result.CiphertextBlob) {
			throw new Error(`AWS KMS returned an incomplete data key for ${masterKeyId}`);
		}

		return {
			plaintext: result.Plaintext,
			ciphertext: result.CiphertextBlob,
		};
	}

	async decrypt(ciphertext: Uint8Array): Promise<Uint8Array> {
		// The ciphertext blob carries the master key reference; KeyId is not needed.
		const result = await this.client.send(new DecryptCommand({ CiphertextBlob: ciphertext }));
		if (!result.Plaintext) {
			throw new Error('AWS KMS returned no plaintext');
		}
		return result.Plaintext;
	}

	async healthCheck(): Promise<boolean> {
		try {
			await this.client.send(new ListKeysCommand({ Limit: 1 }));
			return true;
		} catch (err) {
			this.logger.warn(`AWS KMS health check failed: ${err instanceof Error ? err.message : String(err)}`);
			return false;
		}
	}

	async destroy(): Promise<void> {
		this.client.destroy();
	}
}
