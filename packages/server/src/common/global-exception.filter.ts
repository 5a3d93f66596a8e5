import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from '@nestjs/common';
import { KmsTokenError, type KmsTokenErrorCode } from '@kms-jwt/core';
import type { Response } from 'express';

const STATUS_BY_CODE: Readonly<Record<KmsTokenErrorCode, HttpStatus>> = {
	MALFORMED_TOKEN: HttpStatus.BAD_REQUEST,
	MALFORMED_ENVELOPE: HttpStatus.BAD_REQUEST,
	CLAIM_CONFLICT: HttpStatus.BAD_REQUEST,
	INVALID_TOKEN_REQUEST: HttpStatus.BAD_REQUEST,
	INVALID_SIGNATURE: HttpStatus.UNAUTHORIZED,
	KEY_GENERATION_FAILED: HttpStatus.SERVICE_UNAVAILABLE,
	KEY_DECRYPTION_FAILED: HttpStatus.SERVICE_UNAVAILABLE,
	KEY_CACHE_FAILED: HttpStatus.SERVICE_UNAVAILABLE,
};

function readMessage(body: object, fallback: string): string | string[] {
	if (!('message' in body)) return fallback;
	const { message } = body;
	if (typeof message === 'string') return message;
	if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) {
		return message;
	}
	return fallback;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(GlobalExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost): void {
		const ctx = host.switchToHttp();
		const response = ctx.getResponse<Response>();

		let status = HttpStatus.INTERNAL_SERVER_ERROR;
		let message: string | string[] = 'Internal server error';
		let code: KmsTokenErrorCode | undefined;

		if (exception instanceof KmsTokenError) {
			status = STATUS_BY_CODE[exception.code];
			code = exception.code;
			message = exception.message;

			// Infrastructure failures need operator attention; rejected tokens do not.
			if (status === HttpStatus.SERVICE_UNAVAILABLE) {
				const cause = exception.cause instanceof Error ? exception.cause.message : undefined;
				this.logger.error(`${exception.code}: ${exception.message}${cause ? ` (${cause})` : ''}`);
			} else {
				this.logger.warn(`Token rejected: ${exception.code}`);
			}
		} else if (exception instanceof HttpException) {
			status = exception.getStatus();
			const exResponse = exception.getResponse();
			message =
				typeof exResponse === 'string' ? exResponse : readMessage(exResponse, exception.message);
		} else if (exception instanceof Error) {
			this.logger.error(exception.message, exception.stack);
		} else {
			this.logger.error(`Non-Error exception caught: ${String(exception)}`);
		}

		const responseBody: Record<string, unknown> = {
			statusCode: status,
			message,
			timestamp: new Date().toISOString(),
		};

		if (code !== undefined) {
			responseBody.code = code;
		}

		response.status(status).json(responseBody);
	}
}
