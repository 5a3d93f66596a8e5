import type { ArgumentsHost } from '@nestjs/common';
import { BadRequestException, HttpStatus, NotFoundException } from '@nestjs/common';
import {
	ClaimConflictError,
	InvalidSignatureError,
	KeyDecryptionError,
	MalformedEnvelopeError,
	MalformedTokenError,
} from '@kms-jwt/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { GlobalExceptionFilter } from '../global-exception.filter.js';

function createMockHost() {
	const json = vi.fn();
	const status = vi.fn().mockReturnValue({ json });
	const host = {
		switchToHttp: () => ({
			getResponse: () => ({ status }),
		}),
	} as unknown as ArgumentsHost;
	return { host, status, json };
}

describe('GlobalExceptionFilter', () => {
	let filter: GlobalExceptionFilter;
	let mock: ReturnType<typeof createMockHost>;

	beforeEach(() => {
		filter = new GlobalExceptionFilter();
		mock = createMockHost();
	});

	it.each([
		[new MalformedTokenError('Token must have three dot-separated segments'), 400, 'MALFORMED_TOKEN'],
		[new MalformedEnvelopeError('kct'), 400, 'MALFORMED_ENVELOPE'],
		[new ClaimConflictError(['sub']), 400, 'CLAIM_CONFLICT'],
		[new InvalidSignatureError(), 401, 'INVALID_SIGNATURE'],
		[new KeyDecryptionError(), 503, 'KEY_DECRYPTION_FAILED'],
	])('maps %s to its status and code', (error, statusCode, code) => {
		filter.catch(error, mock.host);

		expect(mock.status).toHaveBeenCalledWith(statusCode);
		expect(mock.json).toHaveBeenCalledWith({
			statusCode,
			message: error.message,
			code,
			timestamp: expect.any(String),
		});
	});

	it('passes validation messages through', () => {
		filter.catch(new BadRequestException(['audience must not be empty']), mock.host);

		expect(mock.status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
		expect(mock.json).toHaveBeenCalledWith({
			statusCode: 400,
			message: ['audience must not be empty'],
			timestamp: expect.any(String),
		});
	});

	it('keeps the status of other HTTP exceptions', () => {
		filter.catch(new NotFoundException('Cannot GET /api/v1/nope'), mock.host);

		expect(mock.json).toHaveBeenCalledWith({
			statusCode: 404,
			message: 'Cannot GET /api/v1/nope',
			timestamp: expect.any(String),
		});
	});

	it('hides the message of unexpected errors', () => {
		filter.catch(new TypeError('Cannot read properties of undefined'), mock.host);

		expect(mock.json).toHaveBeenCalledWith({
			statusCode: 500,
			message: 'Internal server error',
			timestamp: expect.any(String),
		});
	});

	it('handles thrown non-Error values', () => {
		filter.catch('boom', mock.host);

		expect(mock.status).toHaveBeenCalledWith(500);
	});
});
