import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class VerifyTokenDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(16_384)
	token!: string;
}
