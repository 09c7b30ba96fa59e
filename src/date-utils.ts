const US_TIMESTAMP_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4}),?\s+(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?\s*([AP]M)$/i;
const ISO_WITHOUT_ZONE_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ].*)?$/;

function parseUsTimestamp(match: RegExpMatchArray): Date | null {
	const [, monthStr = '', dayStr = '', yearStr = '', hourStr = '', minuteStr = '', secondStr = '0', msStr = '0', meridiem = ''] = match;
	const month = Number.parseInt(monthStr, 10);
	const day = Number.parseInt(dayStr, 10);
	const year = Number.parseInt(yearStr, 10);
	let hour = Number.parseInt(hourStr, 10);
	const minute = Number.parseInt(minuteStr, 10);
	const second = Number.parseInt(secondStr, 10);
	const millisecond = Number.parseInt(msStr.padEnd(3, '0'), 10);

	if (month < 1 || month > 12 || day < 1 || day > 31 || hour < 1 || hour > 12 || minute > 59 || second > 59) {
		return null;
	}

	if (meridiem.toUpperCase() === 'AM') {
		hour = hour === 12 ? 0 : hour;
	}
	else {
		hour = hour === 12 ? 12 : hour + 12;
	}

	const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millisecond));
	// Reject overflowing dates such as 2/30
	if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
		return null;
	}
	return date;
}

/**
 * Parses a usage export timestamp as UTC.
 *
 * Accepts `M/D/YYYY, h:mm:ss.SSS AM` as written by the usage export, and ISO
 * 8601. ISO values without an offset are read as UTC.
 * @returns The parsed date, or null when the value is not a timestamp
 */
export function parseUsageTimestamp(value: string): Date | null {
	const trimmed = value.trim();
	if (trimmed === '') {
		return null;
	}

	const usMatch = trimmed.match(US_TIMESTAMP_PATTERN);
	if (usMatch != null) {
		return parseUsTimestamp(usMatch);
	}

	if (!ISO_DATE_PATTERN.test(trimmed)) {
		return null;
	}

	const normalized = ISO_WITHOUT_ZONE_PATTERN.test(trimmed)
		? `${trimmed.replace(' ', 'T')}Z`
		: trimmed.replace(' ', 'T');
	const date = new Date(normalized);
	return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * UTC calendar date (YYYY-MM-DD) of a timestamp
 */
export function toDateKey(timestamp: Date): string {
	return timestamp.toISOString().slice(0, 10);
}

export function normalizeFilterDate(value?: string): string | undefined {
	if (value == null) {
		return undefined;
	}

	const compact = value.replaceAll('-', '').trim();
	if (!/^\d{8}$/.test(compact)) {
		throw new Error(`Invalid date format: ${value}. Expected YYYYMMDD or YYYY-MM-DD.`);
	}

	return `${compact.slice(0, 4)}-${compact.slice(4, 6)}-${compact.slice(6, 8)}`;
}

export function isWithinRange(dateKey: string, since?: string, until?: string): boolean {
	const value = dateKey.replaceAll('-', '');
	const sinceValue = since?.replaceAll('-', '');
	const untilValue = until?.replaceAll('-', '');

	if (sinceValue != null && value < sinceValue) {
		return false;
	}

	if (untilValue != null && value > untilValue) {
		return false;
	}

	return true;
}

if (import.meta.vitest != null) {
	describe('parseUsageTimestamp', () => {
		it('parses usage export timestamps as UTC', () => {
			expect(parseUsageTimestamp('8/18/2025, 12:00:38.941 AM')?.toISOString()).toBe('2025-08-18T00:00:38.941Z');
			expect(parseUsageTimestamp('8/18/2025, 12:05:00 PM')?.toISOString()).toBe('2025-08-18T12:05:00.000Z');
			expect(parseUsageTimestamp('12/1/2025 3:07:09.5 pm')?.toISOString()).toBe('2025-12-01T15:07:09.500Z');
		});

		it('parses ISO timestamps', () => {
			expect(parseUsageTimestamp('2025-08-18T10:15:30Z')?.toISOString()).toBe('2025-08-18T10:15:30.000Z');
			expect(parseUsageTimestamp('2025-08-18T10:15:30+02:00')?.toISOString()).toBe('2025-08-18T08:15:30.000Z');
			expect(parseUsageTimestamp('2025-08-18 10:15:30')?.toISOString()).toBe('2025-08-18T10:15:30.000Z');
		});

		it('rejects values that are not timestamps', () => {
			expect(parseUsageTimestamp('')).toBeNull();
			expect(parseUsageTimestamp('yesterday')).toBeNull();
			expect(parseUsageTimestamp('2/30/2025, 1:00:00 AM')).toBeNull();
			expect(parseUsageTimestamp('8/18/2025, 13:00:00 PM')).toBeNull();
			expect(parseUsageTimestamp('12345')).toBeNull();
		});
	});

	describe('normalizeFilterDate', () => {
		it('accepts both date spellings', () => {
			expect(normalizeFilterDate('20250818')).toBe('2025-08-18');
			expect(normalizeFilterDate('2025-08-18')).toBe('2025-08-18');
			expect(normalizeFilterDate(undefined)).toBeUndefined();
		});

		it('rejects other formats', () => {
			expect(() => normalizeFilterDate('Aug 18')).toThrow('Invalid date format: Aug 18. Expected YYYYMMDD or YYYY-MM-DD.');
		});
	});

	describe('isWithinRange', () => {
		it('includes both bounds', () => {
			expect(isWithinRange('2025-08-18', '2025-08-18', '2025-08-18')).toBe(true);
			expect(isWithinRange('2025-08-17', '2025-08-18')).toBe(false);
			expect(isWithinRange('2025-08-19', undefined, '2025-08-18')).toBe(false);
		});
	});

	describe('toDateKey', () => {
		it('uses the UTC date', () => {
			expect(toDateKey(new Date('2025-08-18T23:59:59.999Z'))).toBe('2025-08-18');
		});
	});
}
