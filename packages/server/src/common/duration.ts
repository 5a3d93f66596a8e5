const UNIT_SECONDS: Readonly<Record<string, number>> = {
	s: 1,
	m: 60,
	h: 3600,
	d: 86400,
};

/**
 * Parse a lifetime such as `90s`, `15m`, `1h` or `7d` into seconds.
 * A bare integer is read as hours.
 */
export function parseDuration(value: string): number {
	const match = value.trim().match(/^(\d+)([smhd])$/);
	if (!match) {
		if (/^\d+$/.test(value.trim())) return Number.parseInt(value, 10) * 3600;
		throw new Error(`Invalid duration "${value}" (expected e.g. 90s, 15m, 1h, 7d)`);
	}

	const [, amount = '', unit = ''] = match;
	const multiplier = UNIT_SECONDS[unit];
	if (multiplier === undefined) {
		throw new Error(`Invalid duration unit in "${value}"`);
	}
	return Number.parseInt(amount, 10) * multiplier;
}
