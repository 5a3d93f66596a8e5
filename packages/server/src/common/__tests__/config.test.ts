import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseConfig } from '../config.js';

const CONFIG_VARS = [
	'NODE_ENV',
	'PORT',
	'KMS_PROVIDER',
	'KMS_MASTER_KEY_ID',
	'KMS_LOCAL_KEY_FILE',
	'AWS_REGION',
	'VAULT_ADDR',
	'VAULT_TOKEN',
	'VAULT_TRANSIT_MOUNT',
	'KEY_CACHE',
	'KEY_CACHE_MAX_ENTRIES',
	'REDIS_URL',
	'TOKEN_SIGNING_KEY_ID',
	'TOKEN_TTL',
];

describe('parseConfig', () => {
	beforeEach(() => {
		// Empty values fall back to defaults, isolating tests from the host environment.
		for (const name of CONFIG_VARS) vi.stubEnv(name, '');
		vi.stubEnv('KMS_MASTER_KEY_ID', 'master-1');
		vi.stubEnv('KMS_LOCAL_KEY_FILE', '/run/secrets/master.key');
	});

	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('applies defaults', () => {
		expect(parseConfig()).toEqual({
			NODE_ENV: 'development',
			PORT: 8080,
			KMS_PROVIDER: 'local-file',
			KMS_MASTER_KEY_ID: 'master-1',
			KMS_LOCAL_KEY_FILE: '/run/secrets/master.key',
			AWS_REGION: '',
			VAULT_ADDR: '',
			VAULT_TOKEN: '',
			VAULT_TRANSIT_MOUNT: 'transit',
			KEY_CACHE: 'memory',
			KEY_CACHE_MAX_ENTRIES: 10000,
			REDIS_URL: '',
			TOKEN_SIGNING_KEY_ID: 'default',
			TOKEN_TTL_SECONDS: 3600,
		});
	});

	it('requires KMS_MASTER_KEY_ID', () => {
		vi.stubEnv('KMS_MASTER_KEY_ID', '');

		expect(() => parseConfig()).toThrow('Missing required env var: KMS_MASTER_KEY_ID');
	});

	it('requires a key file for the local-file provider', () => {
		vi.stubEnv('KMS_LOCAL_KEY_FILE', '');

		expect(() => parseConfig()).toThrow('KMS_LOCAL_KEY_FILE is required when KMS_PROVIDER=local-file');
	});

	it('requires a region for the aws provider', () => {
		vi.stubEnv('KMS_PROVIDER', 'aws');

		expect(() => parseConfig()).toThrow('AWS_REGION is required when KMS_PROVIDER=aws');
	});

	it('accepts the aws provider with a region', () => {
		vi.stubEnv('KMS_PROVIDER', 'aws');
		vi.stubEnv('AWS_REGION', 'eu-west-1');

		expect(parseConfig()).toMatchObject({ KMS_PROVIDER: 'aws', AWS_REGION: 'eu-west-1' });
	});

	it('requires address and token for vault-transit', () => {
		vi.stubEnv('KMS_PROVIDER', 'vault-transit');
		expect(() => parseConfig()).toThrow('VAULT_ADDR is required when KMS_PROVIDER=vault-transit');

		vi.stubEnv('VAULT_ADDR', 'http://127.0.0.1:8200');
		expect(() => parseConfig()).toThrow('VAULT_TOKEN is required when KMS_PROVIDER=vault-transit');
	});

	it('rejects an unknown provider', () => {
		vi.stubEnv('KMS_PROVIDER', 'gcp');

		expect(() => parseConfig()).toThrow(
			'KMS_PROVIDER must be one of: local-file, aws, vault-transit. Got: gcp',
		);
	});

	it('rejects an unknown cache', () => {
		vi.stubEnv('KEY_CACHE', 'memcached');

		expect(() => parseConfig()).toThrow('KEY_CACHE must be one of: none, memory, redis. Got: memcached');
	});

	it('requires a redis URL for the redis cache', () => {
		vi.stubEnv('KEY_CACHE', 'redis');
		expect(() => parseConfig()).toThrow('REDIS_URL is required when KEY_CACHE=redis');

		vi.stubEnv('REDIS_URL', 'http://cache:6379');
		expect(() => parseConfig()).toThrow('REDIS_URL must use redis:// or rediss:// scheme');

		vi.stubEnv('REDIS_URL', 'rediss://cache:6380');
		expect(parseConfig().REDIS_URL).toBe('rediss://cache:6380');
	});

	it('rejects a non-numeric PORT', () => {
		vi.stubEnv('PORT', 'http');

		expect(() => parseConfig()).toThrow('PORT must be a valid number, got: http');
	});

	it('rejects a non-positive cache size', () => {
		vi.stubEnv('KEY_CACHE_MAX_ENTRIES', '0');

		expect(() => parseConfig()).toThrow('KEY_CACHE_MAX_ENTRIES must be a positive integer');
	});

	it('reads TOKEN_TTL as a duration', () => {
		vi.stubEnv('TOKEN_TTL', '15m');

		expect(parseConfig().TOKEN_TTL_SECONDS).toBe(900);
	});

	it('rejects a zero TOKEN_TTL', () => {
		vi.stubEnv('TOKEN_TTL', '0s');

		expect(() => parseConfig()).toThrow('TOKEN_TTL must be at least one second, got: 0s');
	});
});
