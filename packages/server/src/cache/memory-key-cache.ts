import type { CacheLookup, IKeyCache } from '@kms-jwt/core';

interface CachedKey {
	value: Uint8Array;
	expiresAt: number; // epoch ms
}

const DEFAULT_MAX_ENTRIES = 10_000;

/**
 * In-process data key cache. Entries expire at an absolute instant and are
 * served up to and including it. Values are copied in and out so callers may
 * wipe what they hold.
 */
export class MemoryKeyCache implements IKeyCache {
	readonly name = 'memory';
	private readonly store = new Map<string, CachedKey>();

	constructor(private readonly maxEntries = DEFAULT_MAX_ENTRIES) {
		if (!Number.isInteger(maxEntries) || maxEntries < 1) {
			throw new Error(`maxEntries must be a positive integer, got ${maxEntries}`);
		}
	}

	get size(): number {
		return this.store.size;
	}

	async get(key: string): Promise<CacheLookup> {
		const entry = this.store.get(key);
		if (!entry) return { hit: false };
		if (Date.now() > entry.expiresAt) {
			this.evict(key, entry);
			return { hit: false };
		}
		return { hit: true, value: Uint8Array.from(entry.value) };
	}

	async set(key: string, value: Uint8Array, expiresAt: Date): Promise<void> {
		const expiresAtMs = expiresAt.getTime();
		if (Number.isNaN(expiresAtMs)) {
			throw new Error(`Invalid expiry for cache key ${key}`);
		}

		const now = Date.now();
		if (now > expiresAtMs) return;

		const existing = this.store.get(key);
		if (existing) {
			this.evict(key, existing);
		} else if (this.store.size >= this.maxEntries) {
			this.cleanup(now);
			if (this.store.size >= this.maxEntries) this.evictOldest();
		}
		this.store.set(key, { value: Uint8Array.from(value), expiresAt: expiresAtMs });
	}

	/** Absolute expiry of a live entry. */
	expiresAt(key: string): Date | undefined {
		const entry = this.store.get(key);
		return entry ? new Date(entry.expiresAt) : undefined;
	}

	cleanup(now = Date.now()): void {
		for (const [key, entry] of this.store) {
			if (now > entry.expiresAt) {
				this.evict(key, entry);
			}
		}
	}

	async healthCheck(): Promise<boolean> {
		return true;
	}

	async destroy(): Promise<void> {
		for (const [key, entry] of this.store) {
			this.evict(key, entry);
		}
	}

	private evictOldest(): void {
		const oldest = this.store.entries().next();
		if (!oldest.done) {
			const [key, entry] = oldest.value;
			this.evict(key, entry);
		}
	}

	private evict(key: string, entry: CachedKey): void {
		entry.value.fill(0);
		this.store.delete(key);
	}
}
