import type { IKmsProvider } from '@kms-jwt/core';
import { Global, Inject, Module, type OnModuleDestroy } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../common/config.js';
import { AwsKmsProvider } from './aws-kms.provider.js';
import { LocalFileKmsProvider } from './local-file.provider.js';
import { VaultTransitKmsProvider } from './vault-transit.provider.js';

export const KMS_PROVIDER = Symbol('KMS_PROVIDER');

export function createKmsProvider(config: AppConfig): IKmsProvider {
	switch (config.KMS_PROVIDER) {
		case 'local-file':
			return new LocalFileKmsProvider({
				keyFilePath: config.KMS_LOCAL_KEY_FILE,
				masterKeyId: config.KMS_MASTER_KEY_ID,
			});
		case 'aws':
			return new AwsKmsProvider({ region: config.AWS_REGION });
		case 'vault-transit':
			return new VaultTransitKmsProvider({
				endpoint: config.VAULT_ADDR,
				token: config.VAULT_TOKEN,
				mount: config.VAULT_TRANSIT_MOUNT,
			});
	}
}

@Global()
@Module({
	providers: [
		{
			provide: KMS_PROVIDER,
			useFactory: createKmsProvider,
			inject: [APP_CONFIG],
		},
	],
	exports: [KMS_PROVIDER],
})
export class KmsModule implements OnModuleDestroy {
	constructor(@Inject(KMS_PROVIDER) private readonly kms: IKmsProvider) {}

	async onModuleDestroy() {
		await this.kms.destroy();
	}
}
