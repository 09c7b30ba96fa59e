import type { AnalysisReport } from './analysis.ts';
import type { ModelPricing } from './_types.ts';
import { ConfigurationError } from './errors.ts';
import { formatCurrency, formatPercent, formatSignedPercent, formatTokens } from './format.ts';
import { getTpmPerUnit, loadPricingTable, lookupModelPricing } from './pricing.ts';

export function requireFile(file: string | undefined): string {
	if (file == null || file.trim() === '') {
		throw new ConfigurationError('invalid-option', 'A usage CSV file is required (--file <path>)');
	}
	return file;
}

export type ModelContextOptions = {
	model: string;
	pricingFile?: string;
	tpmPerUnit?: number;
	inputPrice?: number;
	outputPrice?: number;
};

export type ModelContext = {
	pricing: ModelPricing;
	tpmPerUnit: number;
};

/**
 * Prices and PTU throughput for the model a run is planned against
 */
export async function resolveModelContext(options: ModelContextOptions): Promise<ModelContext> {
	const table = await loadPricingTable(options.pricingFile);
	const pricing = lookupModelPricing(table, options.model, {
		inputPricePer1k: options.inputPrice,
		outputPricePer1k: options.outputPrice,
	});
	return {
		pricing,
		tpmPerUnit: options.tpmPerUnit ?? getTpmPerUnit(table, options.model),
	};
}

/**
 * Summary lines for the recommended PTU count, or a single line explaining that
 * the sweep ended before the strategy found one
 */
export function summarizeRecommendation(report: AnalysisReport): string[] {
	const { outcome, recommendation, suggestedMaxPtu } = report;
	if (outcome.kind === 'range-exceeded' || recommendation == null) {
		const largest = outcome.kind === 'range-exceeded' ? outcome.largest?.candidate.ptuCount : undefined;
		const hint = suggestedMaxPtu != null ? ` Try --max-ptu ${suggestedMaxPtu}.` : '';
		return [`No recommendation within the sweep (largest: ${largest ?? 0} PTUs).${hint}`];
	}

	return [
		`Recommended PTUs: ${recommendation.ptuCount} (${formatTokens(recommendation.capacityTpm)} TPM)`,
		`Tokens served by PTU: ${formatPercent(recommendation.ptuTokenSharePct)}`,
		`Total cost: ${formatCurrency(recommendation.totalCost)} per ${report.basis.horizon} (${formatSignedPercent(recommendation.costDiffPct)} vs PAYGO)`,
	];
}

if (import.meta.vitest != null) {
	const { MINUTE_MS } = await import('./_consts.ts');
	const { runPtuAnalysis } = await import('./analysis.ts');

	describe('requireFile', () => {
		it('rejects a missing file option', () => {
			expect(() => requireFile(undefined)).toThrow(ConfigurationError);
			expect(() => requireFile('  ')).toThrow('A usage CSV file is required (--file <path>)');
			expect(requireFile('usage.csv')).toBe('usage.csv');
		});
	});

	describe('resolveModelContext', () => {
		it('reads prices and PTU throughput from the built-in table', async () => {
			const context = await resolveModelContext({ model: 'GPT-4.1' });
			expect(context.pricing).toEqual({ model: 'gpt-4.1', inputPricePer1k: 0.002, outputPricePer1k: 0.008 });
			expect(context.tpmPerUnit).toBe(3000);
		});

		it('applies explicit prices and throughput', async () => {
			const context = await resolveModelContext({ model: 'in-house', inputPrice: 0.001, outputPrice: 0.002, tpmPerUnit: 500 });
			expect(context.pricing).toEqual({ model: 'in-house', inputPricePer1k: 0.001, outputPricePer1k: 0.002 });
			expect(context.tpmPerUnit).toBe(500);
		});
	});

	describe('summarizeRecommendation', () => {
		const start = Date.UTC(2025, 7, 18);
		const requests = Array.from({ length: 730 }, (_, minute) => ({
			timestamp: new Date(start + minute * MINUTE_MS),
			inputTokens: 2000,
			outputTokens: 0,
		}));
		const baseOptions = {
			pricing: { model: 'test-model', inputPricePer1k: 0.01, outputPricePer1k: 0.04 },
			tpmPerUnit: 1000,
			minPtu: 1,
			maxPtu: 3,
			step: 1,
			horizon: 'month',
		} as const;
		const scheme = {
			name: 'MonthlyReservation',
			label: 'Monthly Reservation',
			billingPeriod: 'month',
			discountPct: 0,
		} as const;

		it('describes the recommended count', () => {
			const report = runPtuAnalysis(requests, { ...baseOptions, scheme: { ...scheme, unitCost: 500 } });
			expect(summarizeRecommendation(report)).toEqual([
				'Recommended PTUs: 1 (1,000 TPM)',
				'Tokens served by PTU: 50.0%',
				'Total cost: $938.00 per month (+7.1% vs PAYGO)',
			]);
		});

		it('suggests a larger sweep when no count qualifies', () => {
			const report = runPtuAnalysis(requests, { ...baseOptions, scheme: { ...scheme, unitCost: 0.7 } });
			// 876 PAYGO / 0.7 per PTU = 1251.4, well past twice the 2000 TPM peak
			expect(summarizeRecommendation(report)).toEqual([
				'No recommendation within the sweep (largest: 3 PTUs). Try --max-ptu 1252.',
			]);
		});
	});
}
