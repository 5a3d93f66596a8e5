import type { CustomClaims } from '@kms-jwt/core';
import {
	ArrayMaxSize,
	ArrayNotEmpty,
	IsArray,
	IsInt,
	IsNotEmpty,
	IsObject,
	IsOptional,
	IsString,
	Max,
	MaxLength,
	Min,
} from 'class-validator';

const MAX_EXPIRES_IN = 30 * 86400; // 30 days

export class IssueTokenDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(128)
	clientAppId!: string;

	@IsArray()
	@ArrayNotEmpty()
	@ArrayMaxSize(32)
	@IsString({ each: true })
	@IsNotEmpty({ each: true })
	audience!: string[];

	@IsString()
	@IsNotEmpty()
	@MaxLength(256)
	subject!: string;

	@IsOptional()
	@IsInt()
	@Min(1)
	@Max(MAX_EXPIRES_IN)
	expiresIn?: number; // seconds; defaults to TOKEN_TTL

	@IsOptional()
	@IsObject()
	claims?: CustomClaims;
}
