export type CacheLookup = { readonly hit: true; readonly value: Uint8Array } | { readonly hit: false };

export interface IKeyCache {
	readonly name: string;

	/**
	 * On a hit, `value` belongs to the caller, which wipes it after use.
	 * Return a copy, never the stored buffer.
	 */
	get(key: string): Promise<CacheLookup>;

	/**
	 * Store `value` until the absolute instant `expiresAt`; it must not be served after that.
	 * Implementations keep their own copy: callers wipe the buffer they pass in.
	 */
	set(key: string, value: Uint8Array, expiresAt: Date): Promise<void>;

	healthCheck(): Promise<boolean>;

	/** Release connections and wipe held key material. */
	destroy(): Promise<void>;
}
