import type { AnalysisRow, DailyStats } from './analysis.ts';
import { arrayToCsv } from './_csv-utils.ts';
import { ConfigurationError } from './errors.ts';

const ANALYSIS_HEADERS = [
	'PTUs',
	'PTU Capacity (TPM)',
	'PTU Input Tokens',
	'PTU Output Tokens',
	'PAYGO Input Tokens',
	'PAYGO Output Tokens',
	'% Tokens by PTU',
	'Utilization %',
	'PTU Cost',
	'PAYGO Cost',
	'Total Cost',
	'Pure PAYGO Cost',
	'Cost Diff vs PAYGO',
	'Cost Diff %',
	'Annualization Factor',
	'Recommended',
] as const;

const DAILY_HEADERS = [
	'Date',
	'Requests',
	'Input Tokens',
	'Output Tokens',
	'Active Minutes',
	'Peak TPM',
	'Average TPM',
] as const;

/**
 * Analysis rows as CSV. Numbers are written at full precision. The row whose PTU
 * count equals `recommendedPtuCount` is marked `true` in the last column; no row
 * is marked when the sweep ended without a recommendation.
 */
export function analysisRowsToCsv(rows: readonly AnalysisRow[], recommendedPtuCount?: number): string {
	return arrayToCsv(rows.map(row => ({
		ptuCount: row.ptuCount,
		capacityTpm: row.capacityTpm,
		ptuInputTokens: row.ptuInputTokens,
		ptuOutputTokens: row.ptuOutputTokens,
		paygoInputTokens: row.paygoInputTokens,
		paygoOutputTokens: row.paygoOutputTokens,
		ptuTokenSharePct: row.ptuTokenSharePct,
		meanUtilizationPct: row.meanUtilizationPct,
		ptuCost: row.ptuCost,
		paygoCost: row.paygoCost,
		totalCost: row.totalCost,
		purePaygoCost: row.purePaygoCost,
		costDiff: row.costDiff,
		costDiffPct: row.costDiffPct,
		annualizationFactor: row.annualizationFactor,
		recommended: row.ptuCount === recommendedPtuCount,
	})), ANALYSIS_HEADERS);
}

export function dailyStatsToCsv(stats: readonly DailyStats[]): string {
	return arrayToCsv(stats.map(day => ({
		date: day.date,
		requests: day.requests,
		inputTokens: day.inputTokens,
		outputTokens: day.outputTokens,
		activeBuckets: day.activeBuckets,
		peakTpm: day.peakTpm,
		averageTpm: day.averageTpm,
	})), DAILY_HEADERS);
}

/**
 * JSON and CSV output are mutually exclusive
 */
export function validateCsvJsonExclusive(hasJson: boolean, hasCsv: boolean): void {
	if (hasJson && hasCsv) {
		throw new ConfigurationError('invalid-option', 'Cannot use both --json and --csv options together');
	}
}

if (import.meta.vitest != null) {
	const { parseCsv } = await import('./_csv-utils.ts');

	const row: AnalysisRow = {
		ptuCount: 15,
		capacityTpm: 45000,
		ptuInputTokens: 1000,
		ptuOutputTokens: 250,
		paygoInputTokens: 10,
		paygoOutputTokens: 0,
		ptuTokenSharePct: 99.20634920634922,
		meanUtilizationPct: 12.5,
		ptuCost: 46800,
		paygoCost: 0.123456789,
		totalCost: 46800.123456789,
		purePaygoCost: 46812.5,
		costDiff: -12.5,
		costDiffPct: -0.026702,
		annualizationFactor: 12,
	};

	describe('analysisRowsToCsv', () => {
		it('writes one header and one line per row', () => {
			const lines = analysisRowsToCsv([row]).split('\n');
			expect(lines).toHaveLength(2);
			expect(lines[0]).toBe('PTUs,PTU Capacity (TPM),PTU Input Tokens,PTU Output Tokens,PAYGO Input Tokens,PAYGO Output Tokens,% Tokens by PTU,Utilization %,PTU Cost,PAYGO Cost,Total Cost,Pure PAYGO Cost,Cost Diff vs PAYGO,Cost Diff %,Annualization Factor,Recommended');
			expect(lines[1]).toBe('15,45000,1000,250,10,0,99.20634920634922,12.5,46800,0.123456789,46800.123456789,46812.5,-12.5,-0.026702,12,false');
		});

		it('keeps every numeric field without loss and marks the recommended row', () => {
			const [, values] = parseCsv(analysisRowsToCsv([row], 15));
			expect(values?.slice(0, -1).map(Number)).toEqual(Object.values(row));
			expect(values?.at(-1)).toBe('true');
		});

		it('marks only the recommended row', () => {
			const baseline: AnalysisRow = { ...row, ptuCount: 0, capacityTpm: 0 };
			const [, first, second] = parseCsv(analysisRowsToCsv([baseline, row], 0));
			expect(first?.at(-1)).toBe('true');
			expect(second?.at(-1)).toBe('false');
		});

		it('writes only headers without rows', () => {
			expect(analysisRowsToCsv([]).split(',')).toHaveLength(16);
		});
	});

	describe('dailyStatsToCsv', () => {
		it('writes per-date stats', () => {
			const csv = dailyStatsToCsv([
				{ date: '2025-08-18', requests: 2, inputTokens: 400, outputTokens: 100, activeBuckets: 2, peakTpm: 400, averageTpm: 250 },
			]);
			expect(csv).toBe('Date,Requests,Input Tokens,Output Tokens,Active Minutes,Peak TPM,Average TPM\n2025-08-18,2,400,100,2,400,250');
		});
	});

	describe('validateCsvJsonExclusive', () => {
		it('rejects json and csv together', () => {
			expect(() => validateCsvJsonExclusive(true, true)).toThrow('Cannot use both --json and --csv options together');
			expect(() => validateCsvJsonExclusive(true, false)).not.toThrow();
		});
	});
}
