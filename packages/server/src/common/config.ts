import { parseDuration } from './duration.js';

function requireEnv(name: string): string {
	const value = process.env[name];
	if (!value) throw new Error(`Missing required env var: ${name}`);
	return value;
}

function optionalEnv(name: string, fallback: string): string {
	return process.env[name] || fallback;
}

const KMS_PROVIDERS = ['local-file', 'aws', 'vault-transit'] as const;
const KEY_CACHES = ['none', 'memory', 'redis'] as const;

export type KmsProviderName = (typeof KMS_PROVIDERS)[number];
export type KeyCacheName = (typeof KEY_CACHES)[number];

export interface AppConfig {
	readonly NODE_ENV: string;
	readonly PORT: number;

	// KMS
	readonly KMS_PROVIDER: KmsProviderName;
	readonly KMS_MASTER_KEY_ID: string;
	readonly KMS_LOCAL_KEY_FILE: string;
	readonly AWS_REGION: string;

	// Vault transit
	readonly VAULT_ADDR: string;
	readonly VAULT_TOKEN: string;
	readonly VAULT_TRANSIT_MOUNT: string;

	// Key cache
	readonly KEY_CACHE: KeyCacheName;
	readonly KEY_CACHE_MAX_ENTRIES: number;
	readonly REDIS_URL: string;

	// Tokens
	readonly TOKEN_SIGNING_KEY_ID: string;
	readonly TOKEN_TTL_SECONDS: number;
}

function parseChoice<T extends string>(name: string, fallback: T, choices: readonly T[]): T {
	const raw = optionalEnv(name, fallback);
	const match = choices.find((choice) => choice === raw);
	if (match === undefined) {
		throw new Error(`${name} must be one of: ${choices.join(', ')}. Got: ${raw}`);
	}
	return match;
}

function parsePositiveInt(name: string, fallback: string): number {
	const val = Number.parseInt(optionalEnv(name, fallback), 10);
	if (Number.isNaN(val) || val < 1) {
		throw new Error(`${name} must be a positive integer`);
	}
	return val;
}

export function parseConfig(): AppConfig {
	const portStr = process.env.PORT;
	const port = portStr ? Number.parseInt(portStr, 10) : 8080;
	if (Number.isNaN(port)) {
		throw new Error(`PORT must be a valid number, got: ${portStr}`);
	}

	const kmsProvider = parseChoice<KmsProviderName>('KMS_PROVIDER', 'local-file', KMS_PROVIDERS);
	const kmsLocalKeyFile = optionalEnv('KMS_LOCAL_KEY_FILE', '');
	const awsRegion = optionalEnv('AWS_REGION', '');
	const vaultAddr = optionalEnv('VAULT_ADDR', '');
	const vaultToken = optionalEnv('VAULT_TOKEN', '');

	if (kmsProvider === 'local-file' && !kmsLocalKeyFile) {
		throw new Error('KMS_LOCAL_KEY_FILE is required when KMS_PROVIDER=local-file');
	}
	if (kmsProvider === 'aws' && !awsRegion) {
		throw new Error('AWS_REGION is required when KMS_PROVIDER=aws');
	}
	if (kmsProvider === 'vault-transit') {
		if (!vaultAddr) throw new Error('VAULT_ADDR is required when KMS_PROVIDER=vault-transit');
		if (!vaultToken) throw new Error('VAULT_TOKEN is required when KMS_PROVIDER=vault-transit');
	}

	const keyCache = parseChoice<KeyCacheName>('KEY_CACHE', 'memory', KEY_CACHES);
	const redisUrl = optionalEnv('REDIS_URL', '');
	if (keyCache === 'redis') {
		if (!redisUrl) throw new Error('REDIS_URL is required when KEY_CACHE=redis');
		if (!redisUrl.startsWith('redis://') && !redisUrl.startsWith('rediss://')) {
			throw new Error('REDIS_URL must use redis:// or rediss:// scheme');
		}
	}

	const tokenTtl = optionalEnv('TOKEN_TTL', '1h');
	const tokenTtlSeconds = parseDuration(tokenTtl);
	if (tokenTtlSeconds < 1) {
		throw new Error(`TOKEN_TTL must be at least one second, got: ${tokenTtl}`);
	}

	return {
		NODE_ENV: optionalEnv('NODE_ENV', 'development'),
		PORT: port,

		KMS_PROVIDER: kmsProvider,
		KMS_MASTER_KEY_ID: requireEnv('KMS_MASTER_KEY_ID'),
		KMS_LOCAL_KEY_FILE: kmsLocalKeyFile,
		AWS_REGION: awsRegion,

		VAULT_ADDR: vaultAddr,
		VAULT_TOKEN: vaultToken,
		VAULT_TRANSIT_MOUNT: optionalEnv('VAULT_TRANSIT_MOUNT', 'transit'),

		KEY_CACHE: keyCache,
		KEY_CACHE_MAX_ENTRIES: parsePositiveInt('KEY_CACHE_MAX_ENTRIES', '10000'),
		REDIS_URL: redisUrl,

		TOKEN_SIGNING_KEY_ID: optionalEnv('TOKEN_SIGNING_KEY_ID', 'default'),
		TOKEN_TTL_SECONDS: tokenTtlSeconds,
	};
}

export const APP_CONFIG = Symbol('APP_CONFIG');
