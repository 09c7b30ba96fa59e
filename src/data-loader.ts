/**
 * @fileoverview Usage CSV ingestion
 *
 * Reads a per-request usage export and produces validated request records.
 * Column names are matched case-insensitively; `total tokens` is ignored since
 * it is derived from the input and output counts.
 *
 * @module data-loader
 */

import type { UsageRequest } from './_types.ts';
import { readFile } from 'node:fs/promises';
import { Result } from '@praha/byethrow';
import * as v from 'valibot';
import { parseCsv } from './_csv-utils.ts';
import { isWithinRange, parseUsageTimestamp, toDateKey } from './date-utils.ts';
import { DataError } from './errors.ts';
import { logger } from './logger.ts';

type UsageField = keyof UsageRequest;

const COLUMN_ALIASES = {
	timestamp: ['timestamp [utc]', 'timestamp (utc)', 'timestamp utc', 'timestamp'],
	inputTokens: ['input tokens', 'input token', 'prompt tokens'],
	outputTokens: ['output tokens', 'output token', 'completion tokens'],
} as const satisfies Record<UsageField, readonly string[]>;

const FIELD_ERROR_CODES = {
	timestamp: 'invalid-timestamp',
	inputTokens: 'invalid-token-count',
	outputTokens: 'invalid-token-count',
} as const satisfies Record<UsageField, DataError['code']>;

type ColumnIndexes = Record<UsageField, number>;

const tokenCountSchema = v.pipe(
	v.string(),
	v.trim(),
	v.transform(value => value.replaceAll(',', '')),
	v.regex(/^\d+$/, 'must be a non-negative whole number'),
	v.transform(Number),
	v.safeInteger('is too large'),
);

const timestampSchema = v.pipe(
	v.string(),
	v.transform(parseUsageTimestamp),
	v.date('is not a valid timestamp'),
);

const usageRowSchema = v.object({
	timestamp: timestampSchema,
	inputTokens: tokenCountSchema,
	outputTokens: tokenCountSchema,
});

function normalizeHeader(header: string): string {
	return header.trim().toLowerCase().replace(/[\s_]+/g, ' ');
}

/**
 * Locates the required columns in a header row
 */
export function resolveColumns(header: readonly string[]): ColumnIndexes {
	const normalized = header.map(normalizeHeader);
	const find = (field: UsageField): number => {
		for (const alias of COLUMN_ALIASES[field]) {
			const index = normalized.indexOf(alias);
			if (index >= 0) {
				return index;
			}
		}
		throw new DataError('missing-column', `Missing required column "${COLUMN_ALIASES[field][0]}" (found: ${header.join(', ')})`);
	};

	return {
		timestamp: find('timestamp'),
		inputTokens: find('inputTokens'),
		outputTokens: find('outputTokens'),
	};
}

export type LoadUsageOptions = {
	/** Inclusive UTC date filter, YYYY-MM-DD */
	since?: string;
	until?: string;
};

function filterByDate(requests: UsageRequest[], options: LoadUsageOptions): UsageRequest[] {
	if (options.since == null && options.until == null) {
		return requests;
	}
	return requests.filter(request => isWithinRange(toDateKey(request.timestamp), options.since, options.until));
}

/**
 * Parses usage CSV text into requests. Any malformed row rejects the whole file.
 */
export function parseUsageCsv(text: string, options: LoadUsageOptions = {}): UsageRequest[] {
	const [header, ...rows] = parseCsv(text);
	if (header == null) {
		throw new DataError('empty-dataset', 'Usage file is empty');
	}

	const columns = resolveColumns(header);
	const requests: UsageRequest[] = [];

	for (const [index, row] of rows.entries()) {
		const rowNumber = index + 1;
		const parsed = v.safeParse(usageRowSchema, {
			timestamp: row[columns.timestamp] ?? '',
			inputTokens: row[columns.inputTokens] ?? '',
			outputTokens: row[columns.outputTokens] ?? '',
		});

		if (!parsed.success) {
			const issue = parsed.issues[0];
			const field = v.getDotPath(issue);
			const key: UsageField = field === 'inputTokens' || field === 'outputTokens' ? field : 'timestamp';
			const column = header[columns[key]] ?? key;
			const raw = row[columns[key]] ?? '';
			throw new DataError(FIELD_ERROR_CODES[key], `Row ${rowNumber}, column "${column}": ${issue.message} (got "${raw}")`);
		}

		requests.push(parsed.output);
	}

	if (requests.length === 0) {
		throw new DataError('empty-dataset', 'Usage file contains no requests');
	}

	const filtered = filterByDate(requests, options);
	if (filtered.length === 0) {
		throw new DataError('empty-dataset', 'No requests fall inside the selected date range');
	}
	return filtered;
}

/**
 * Reads and parses a usage CSV file
 */
export async function loadUsageCsv(filePath: string, options: LoadUsageOptions = {}): Promise<UsageRequest[]> {
	const content = await Result.try({
		try: readFile(filePath, 'utf-8'),
		catch: error => error instanceof Error ? error : new Error(String(error)),
	});

	if (Result.isFailure(content)) {
		throw new DataError('unreadable-file', `Could not read usage file ${filePath}: ${content.error.message}`);
	}

	const requests = parseUsageCsv(content.value, options);
	logger.debug(`Loaded ${requests.length} requests from ${filePath}`);
	return requests;
}

if (import.meta.vitest != null) {
	const { createFixture } = await import('fs-fixture');

	const HEADER = 'timestamp [UTC],input tokens,output tokens,total tokens';

	describe('resolveColumns', () => {
		it('matches headers case-insensitively in any order', () => {
			expect(resolveColumns(['Output Tokens', ' TIMESTAMP [UTC] ', 'Input_Tokens'])).toEqual({
				timestamp: 1,
				inputTokens: 2,
				outputTokens: 0,
			});
		});

		it('accepts a plain timestamp column', () => {
			expect(resolveColumns(['timestamp', 'input tokens', 'output tokens']).timestamp).toBe(0);
		});

		it('rejects a missing column', () => {
			expect(() => resolveColumns(['timestamp', 'input tokens'])).toThrow('Missing required column "output tokens" (found: timestamp, input tokens)');
		});
	});

	describe('parseUsageCsv', () => {
		it('parses usage export rows', () => {
			const csv = [
				HEADER,
				'"8/18/2025, 12:00:38.941 AM",1200,300,1500',
				'"8/18/2025, 12:01:02.000 AM","1,000",0,1000',
			].join('\n');

			expect(parseUsageCsv(csv)).toEqual([
				{ timestamp: new Date('2025-08-18T00:00:38.941Z'), inputTokens: 1200, outputTokens: 300 },
				{ timestamp: new Date('2025-08-18T00:01:02.000Z'), inputTokens: 1000, outputTokens: 0 },
			]);
		});

		it('ignores the total tokens column', () => {
			const csv = `${HEADER}\n2025-08-18T00:00:00Z,10,20,999`;
			expect(parseUsageCsv(csv)[0]).toEqual({ timestamp: new Date('2025-08-18T00:00:00Z'), inputTokens: 10, outputTokens: 20 });
		});

		it('rejects negative token counts with the row number', () => {
			const csv = `${HEADER}\n2025-08-18T00:00:00Z,10,20,30\n2025-08-18T00:01:00Z,-5,20,15`;
			expect(() => parseUsageCsv(csv)).toThrow('Row 2, column "input tokens": must be a non-negative whole number (got "-5")');
		});

		it('rejects unparseable timestamps', () => {
			const csv = `${HEADER}\nsometime,10,20,30`;
			expect(() => parseUsageCsv(csv)).toThrow(expect.objectContaining({
				code: 'invalid-timestamp',
				message: 'Row 1, column "timestamp [UTC]": is not a valid timestamp (got "sometime")',
			}));
		});

		it('rejects short rows', () => {
			const csv = `${HEADER}\n2025-08-18T00:00:00Z,10`;
			expect(() => parseUsageCsv(csv)).toThrow(expect.objectContaining({ code: 'invalid-token-count' }));
		});

		it('rejects files without requests', () => {
			expect(() => parseUsageCsv('')).toThrow('Usage file is empty');
			expect(() => parseUsageCsv(`${HEADER}\n`)).toThrow('Usage file contains no requests');
		});

		it('filters by inclusive date range', () => {
			const csv = [
				HEADER,
				'2025-08-17T23:59:59Z,1,1,2',
				'2025-08-18T00:00:00Z,2,2,4',
				'2025-08-19T12:00:00Z,3,3,6',
				'2025-08-20T00:00:00Z,4,4,8',
			].join('\n');
			const requests = parseUsageCsv(csv, { since: '2025-08-18', until: '2025-08-19' });
			expect(requests.map(request => request.inputTokens)).toEqual([2, 3]);
		});

		it('rejects a filter that removes every request', () => {
			const csv = `${HEADER}\n2025-08-18T00:00:00Z,2,2,4`;
			expect(() => parseUsageCsv(csv, { since: '2025-09-01' })).toThrow(DataError);
		});
	});

	describe('loadUsageCsv', () => {
		it('reads a usage file from disk', async () => {
			await using fixture = await createFixture({
				'usage.csv': `${HEADER}\r\n"8/18/2025, 1:30:00.000 PM",100,50,150\r\n`,
			});
			const requests = await loadUsageCsv(fixture.getPath('usage.csv'));
			expect(requests).toEqual([
				{ timestamp: new Date('2025-08-18T13:30:00.000Z'), inputTokens: 100, outputTokens: 50 },
			]);
		});

		it('reports unreadable files', async () => {
			await expect(loadUsageCsv('/nonexistent/usage.csv')).rejects.toThrow(expect.objectContaining({ code: 'unreadable-file' }));
		});
	});
}
