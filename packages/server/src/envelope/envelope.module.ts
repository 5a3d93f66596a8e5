import { Module } from '@nestjs/common';
import { TokenCore } from '../token/token-core.js';
import { EnvelopeKeyManager } from './envelope-key-manager.js';
import { KmsTokenService } from './kms-token.service.js';

@Module({
	providers: [TokenCore, EnvelopeKeyManager, KmsTokenService],
	exports: [KmsTokenService],
})
export class EnvelopeModule {}
