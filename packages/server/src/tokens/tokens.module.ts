import { Module } from '@nestjs/common';
import { EnvelopeModule } from '../envelope/envelope.module.js';
import { TokensController } from './tokens.controller.js';

@Module({
	imports: [EnvelopeModule],
	controllers: [TokensController],
})
export class TokensModule {}
