import type {
	CostBasis,
	Horizon,
	MinuteBucket,
	ModelPricing,
	OptimizationStrategy,
	PricingScheme,
	ScoredCandidate,
	SearchOutcome,
	UsageRequest,
} from './_types.ts';
import { groupBy, sumBy } from 'es-toolkit';
import { DAY_MS, DEFAULT_BUCKET_MINUTES } from './_consts.ts';
import { aggregateMinuteBuckets, getDatasetSpan } from './bucket-aggregator.ts';
import { calculatePtuCost, createCostBasis } from './cost-model.ts';
import { toDateKey } from './date-utils.ts';
import { DataError } from './errors.ts';
import { logger } from './logger.ts';
import { buildCapacityCandidates, runOptimizationSearch, suggestMaxPtu, trafficOptimalStrategy } from './optimization.ts';
import { calculatePaygoCost, getOutputWeight, getTotalTokens } from './token-utils.ts';

export type DatasetOverview = {
	totalRequests: number;
	totalInputTokens: number;
	totalOutputTokens: number;
	start: Date;
	end: Date;
	durationDays: number;
	activeBuckets: number;
	/** Raw input + output tokens per minute */
	peakTpm: number;
	averageTpm: number;
	/** Output tokens scaled by the output weight */
	peakWeightedTpm: number;
	averageWeightedTpm: number;
};

export type DailyStats = {
	date: string;
	requests: number;
	inputTokens: number;
	outputTokens: number;
	activeBuckets: number;
	peakTpm: number;
	averageTpm: number;
};

function maxOf(values: readonly number[]): number {
	return values.reduce((peak, value) => Math.max(peak, value), 0);
}

function bucketTpm(bucket: MinuteBucket, bucketMinutes: number): number {
	return getTotalTokens(bucket) / bucketMinutes;
}

export function summarizeDataset(buckets: readonly MinuteBucket[], bucketMinutes = DEFAULT_BUCKET_MINUTES): DatasetOverview {
	const span = getDatasetSpan(buckets, bucketMinutes);
	const tpm = buckets.map(bucket => bucketTpm(bucket, bucketMinutes));
	const weightedTpm = buckets.map(bucket => bucket.weightedDemand / bucketMinutes);

	return {
		totalRequests: sumBy(buckets, bucket => bucket.requestCount),
		totalInputTokens: sumBy(buckets, bucket => bucket.inputTokens),
		totalOutputTokens: sumBy(buckets, bucket => bucket.outputTokens),
		start: span.start,
		end: span.end,
		durationDays: span.spanMs / DAY_MS,
		activeBuckets: buckets.length,
		peakTpm: maxOf(tpm),
		averageTpm: sumBy(tpm, value => value) / tpm.length,
		peakWeightedTpm: maxOf(weightedTpm),
		averageWeightedTpm: sumBy(weightedTpm, value => value) / weightedTpm.length,
	};
}

/**
 * Per UTC date statistics. Averages cover minutes with traffic only.
 */
export function summarizeByDate(buckets: readonly MinuteBucket[], bucketMinutes = DEFAULT_BUCKET_MINUTES): DailyStats[] {
	const byDate = groupBy([...buckets], bucket => toDateKey(bucket.start));
	return Object.entries(byDate)
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([date, group]) => {
			const tpm = group.map(bucket => bucketTpm(bucket, bucketMinutes));
			return {
				date,
				requests: sumBy(group, bucket => bucket.requestCount),
				inputTokens: sumBy(group, bucket => bucket.inputTokens),
				outputTokens: sumBy(group, bucket => bucket.outputTokens),
				activeBuckets: group.length,
				peakTpm: maxOf(tpm),
				averageTpm: sumBy(tpm, value => value) / tpm.length,
			};
		});
}

/**
 * One row of the analysis table, one per evaluated PTU count
 */
export type AnalysisRow = {
	ptuCount: number;
	capacityTpm: number;
	ptuInputTokens: number;
	ptuOutputTokens: number;
	paygoInputTokens: number;
	paygoOutputTokens: number;
	ptuTokenSharePct: number;
	meanUtilizationPct: number;
	ptuCost: number;
	paygoCost: number;
	totalCost: number;
	purePaygoCost: number;
	costDiff: number;
	costDiffPct: number;
	annualizationFactor: number;
};

function toPercentage(part: number, whole: number): number {
	return whole === 0 ? 0 : (part / whole) * 100;
}

export function toAnalysisRow({ candidate, simulation, cost }: ScoredCandidate): AnalysisRow {
	const ptuTokens = simulation.ptuInputTokens + simulation.ptuOutputTokens;
	const totalTokens = ptuTokens + simulation.paygoInputTokens + simulation.paygoOutputTokens;
	return {
		ptuCount: candidate.ptuCount,
		capacityTpm: candidate.capacityTpm,
		ptuInputTokens: simulation.ptuInputTokens,
		ptuOutputTokens: simulation.ptuOutputTokens,
		paygoInputTokens: simulation.paygoInputTokens,
		paygoOutputTokens: simulation.paygoOutputTokens,
		ptuTokenSharePct: toPercentage(ptuTokens, totalTokens),
		meanUtilizationPct: simulation.meanUtilizationPct,
		ptuCost: cost.ptuCost,
		paygoCost: cost.paygoCost,
		totalCost: cost.totalCost,
		purePaygoCost: cost.purePaygoCost,
		costDiff: cost.costDiff,
		costDiffPct: toPercentage(cost.costDiff, cost.purePaygoCost),
		annualizationFactor: cost.annualizationFactor,
	};
}

function createBaselineRow(overview: DatasetOverview, pricing: ModelPricing, basis: CostBasis): AnalysisRow {
	const paygoCost = calculatePaygoCost({
		inputTokens: overview.totalInputTokens,
		outputTokens: overview.totalOutputTokens,
	}, pricing) * basis.annualizationFactor;

	return {
		ptuCount: 0,
		capacityTpm: 0,
		ptuInputTokens: 0,
		ptuOutputTokens: 0,
		paygoInputTokens: overview.totalInputTokens,
		paygoOutputTokens: overview.totalOutputTokens,
		ptuTokenSharePct: 0,
		meanUtilizationPct: 0,
		ptuCost: 0,
		paygoCost,
		totalCost: paygoCost,
		purePaygoCost: paygoCost,
		costDiff: 0,
		costDiffPct: 0,
		annualizationFactor: basis.annualizationFactor,
	};
}

export type AnalysisOptions = {
	pricing: ModelPricing;
	scheme: PricingScheme;
	tpmPerUnit: number;
	minPtu: number;
	maxPtu: number;
	step: number;
	horizon?: Horizon;
	strategy?: OptimizationStrategy;
	bucketMinutes?: number;
	signal?: AbortSignal;
};

export type AnalysisReport = {
	overview: DatasetOverview;
	basis: CostBasis;
	outputWeight: number;
	scheme: PricingScheme;
	pricing: ModelPricing;
	/** Pure PAYGO baseline first, then one row per swept PTU count */
	rows: AnalysisRow[];
	outcome: SearchOutcome;
	recommendation: AnalysisRow | undefined;
	/** Wider `--max-ptu` worth sweeping when the range was exceeded */
	suggestedMaxPtu: number | undefined;
};

/**
 * Runs the full PTU sweep over a request stream: aggregates once, projects every
 * candidate onto one shared cost basis and selects a recommendation.
 */
export function runPtuAnalysis(requests: readonly UsageRequest[], options: AnalysisOptions): AnalysisReport {
	const bucketMinutes = options.bucketMinutes ?? DEFAULT_BUCKET_MINUTES;
	const outputWeight = getOutputWeight(options.pricing);
	const candidates = buildCapacityCandidates({
		minPtu: options.minPtu,
		maxPtu: options.maxPtu,
		step: options.step,
		tpmPerUnit: options.tpmPerUnit,
		scheme: options.scheme,
	});

	if (requests.length === 0) {
		throw new DataError('empty-dataset', 'Dataset contains no requests');
	}

	const buckets = aggregateMinuteBuckets(requests, { outputWeight, bucketMinutes });
	const overview = summarizeDataset(buckets, bucketMinutes);
	const basis = createCostBasis(overview.end.getTime() - overview.start.getTime(), options.horizon);
	logger.debug(`Simulating ${candidates.length} PTU counts over ${buckets.length} buckets (output weight ${outputWeight})`);

	const outcome = runOptimizationSearch({
		buckets,
		candidates,
		pricing: options.pricing,
		basis,
		bucketMinutes,
		strategy: options.strategy ?? trafficOptimalStrategy,
		signal: options.signal,
	});

	const baseline = createBaselineRow(overview, options.pricing, basis);
	const rows = [baseline, ...outcome.evaluated.map(toAnalysisRow)];
	const recommendation = outcome.kind === 'optimal'
		? rows.find(row => row.ptuCount === outcome.selected.candidate.ptuCount)
		: undefined;
	const suggestedMaxPtu = outcome.kind === 'range-exceeded'
		? suggestMaxPtu({
				peakWeightedDemand: overview.peakWeightedTpm,
				tpmPerUnit: options.tpmPerUnit,
				minPtu: options.minPtu,
				step: options.step,
				largestPtu: outcome.largest?.candidate.ptuCount ?? options.maxPtu,
				purePaygoCost: baseline.totalCost,
				unitPtuCost: calculatePtuCost({ ptuCount: 1, capacityTpm: options.tpmPerUnit, scheme: options.scheme }, basis),
			})
		: undefined;
	logger.debug(`Search outcome (${outcome.strategy}): ${outcome.kind}`);

	return {
		overview,
		basis,
		outputWeight,
		scheme: options.scheme,
		pricing: options.pricing,
		rows,
		outcome,
		recommendation,
		suggestedMaxPtu,
	};
}

if (import.meta.vitest != null) {
	const { MINUTE_MS, HOURS_PER_MONTH } = await import('./_consts.ts');
	const { ConfigurationError } = await import('./errors.ts');

	const pricing: ModelPricing = { model: 'test-model', inputPricePer1k: 0.01, outputPricePer1k: 0.04 };
	const scheme: PricingScheme = {
		name: 'MonthlyReservation',
		label: 'Monthly Reservation',
		unitCost: 1,
		billingPeriod: 'month',
		discountPct: 0,
	};

	function requestsForMinutes(count: number, inputTokens: number, outputTokens: number): UsageRequest[] {
		const start = Date.UTC(2025, 7, 18);
		return Array.from({ length: count }, (_, minute) => ({
			timestamp: new Date(start + minute * MINUTE_MS + 1000),
			inputTokens,
			outputTokens,
		}));
	}

	describe('summarizeDataset', () => {
		it('reports totals and per-minute rates', () => {
			const buckets = aggregateMinuteBuckets([
				{ timestamp: new Date('2025-08-18T00:00:10Z'), inputTokens: 100, outputTokens: 50 },
				{ timestamp: new Date('2025-08-18T00:00:20Z'), inputTokens: 300, outputTokens: 0 },
				{ timestamp: new Date('2025-08-18T00:09:00Z'), inputTokens: 50, outputTokens: 0 },
			], { outputWeight: 4 });
			const overview = summarizeDataset(buckets);

			expect(overview.totalRequests).toBe(3);
			expect(overview.totalInputTokens).toBe(450);
			expect(overview.totalOutputTokens).toBe(50);
			expect(overview.activeBuckets).toBe(2);
			expect(overview.peakTpm).toBe(450);
			expect(overview.averageTpm).toBe(250);
			expect(overview.peakWeightedTpm).toBe(600);
			expect(overview.averageWeightedTpm).toBe(325);
			expect(overview.durationDays).toBeCloseTo(10 / (24 * 60), 12);
		});
	});

	describe('summarizeByDate', () => {
		it('groups buckets per UTC date', () => {
			const buckets = aggregateMinuteBuckets([
				{ timestamp: new Date('2025-08-19T08:00:00Z'), inputTokens: 10, outputTokens: 10 },
				{ timestamp: new Date('2025-08-18T23:59:00Z'), inputTokens: 100, outputTokens: 0 },
				{ timestamp: new Date('2025-08-18T12:00:00Z'), inputTokens: 300, outputTokens: 100 },
			], { outputWeight: 1 });

			expect(summarizeByDate(buckets)).toEqual([
				{ date: '2025-08-18', requests: 2, inputTokens: 400, outputTokens: 100, activeBuckets: 2, peakTpm: 400, averageTpm: 250 },
				{ date: '2025-08-19', requests: 1, inputTokens: 10, outputTokens: 10, activeBuckets: 1, peakTpm: 20, averageTpm: 20 },
			]);
		});
	});

	describe('runPtuAnalysis', () => {
		it('produces a baseline row and one row per PTU count', () => {
			// 730 one-minute buckets of 2000 input tokens: span 730 minutes
			const requests = requestsForMinutes(730, 2000, 0);
			const report = runPtuAnalysis(requests, {
				pricing,
				scheme,
				tpmPerUnit: 1000,
				minPtu: 1,
				maxPtu: 3,
				step: 1,
				horizon: 'month',
			});

			expect(report.rows.map(row => row.ptuCount)).toEqual([0, 1, 2, 3]);
			expect(report.basis.annualizationFactor).toBeCloseTo(HOURS_PER_MONTH * 60 / 730, 10);
			expect(report.outputWeight).toBe(4);

			const [baseline, one, two, three] = report.rows;
			// 1,460,000 tokens * 0.01 / 1000 = 14.6 USD per span, 60x per month
			expect(baseline?.totalCost).toBeCloseTo(876, 6);
			expect(baseline?.paygoInputTokens).toBe(1_460_000);
			expect(one?.ptuTokenSharePct).toBe(50);
			expect(one?.meanUtilizationPct).toBe(100);
			expect(one?.paygoCost).toBeCloseTo(438, 6);
			expect(one?.ptuCost).toBeCloseTo(1, 10);
			expect(two?.ptuTokenSharePct).toBe(100);
			expect(two?.totalCost).toBeCloseTo(2, 10);
			expect(three?.meanUtilizationPct).toBeCloseTo(200 / 3, 10);
			expect(three?.costDiffPct).toBeCloseTo((3 - 876) / 876 * 100, 10);
		});

		it('reports an exhausted range when PTU stays cheaper than PAYGO', () => {
			const report = runPtuAnalysis(requestsForMinutes(730, 2000, 0), {
				pricing,
				scheme,
				tpmPerUnit: 1000,
				minPtu: 1,
				maxPtu: 3,
				step: 1,
				horizon: 'month',
			});
			expect(report.outcome.kind).toBe('range-exceeded');
			expect(report.recommendation).toBeUndefined();
		});

		it('suggests a wider sweep that reaches the break-even count when the range already covers peak demand', () => {
			const options = {
				pricing,
				scheme: { ...scheme, unitCost: 0.7 },
				tpmPerUnit: 1000,
				minPtu: 100,
				maxPtu: 1000,
				step: 100,
				horizon: 'month',
			} as const;
			const exceeded = runPtuAnalysis(requestsForMinutes(730, 2000, 0), options);
			// 100 PTUs already serve the 2000 TPM peak; 1000 PTUs cost 700 against 876 PAYGO
			expect(exceeded.outcome.kind).toBe('range-exceeded');
			// 876 / 0.7 = 1251.4 -> 1252, on the grid from 100 in steps of 100
			expect(exceeded.suggestedMaxPtu).toBe(1300);

			const widened = runPtuAnalysis(requestsForMinutes(730, 2000, 0), { ...options, maxPtu: 1300 });
			// 1200 -> 840, 1300 -> 910
			expect(widened.outcome.kind).toBe('optimal');
			expect(widened.recommendation?.ptuCount).toBe(1300);
			expect(widened.suggestedMaxPtu).toBeUndefined();
		});

		it('recommends the first PTU count at or above PAYGO cost', () => {
			const report = runPtuAnalysis(requestsForMinutes(730, 2000, 0), {
				pricing,
				scheme: { ...scheme, unitCost: 500 },
				tpmPerUnit: 1000,
				minPtu: 1,
				maxPtu: 3,
				step: 1,
				horizon: 'month',
			});
			// totals: 1 -> 938, 2 -> 1000, 3 -> 1500 against 876 PAYGO
			expect(report.outcome.kind).toBe('optimal');
			expect(report.recommendation?.ptuCount).toBe(1);
			expect(report.recommendation?.costDiff).toBeCloseTo(62, 6);
			expect(report.recommendation?.purePaygoCost).toBeCloseTo(876, 6);
			expect(report.recommendation?.annualizationFactor).toBeCloseTo(60, 10);
			expect(report.rows[0]?.purePaygoCost).toBe(report.rows[0]?.paygoCost);
			expect(report.suggestedMaxPtu).toBeUndefined();
		});

		it('validates configuration before touching the data', () => {
			expect(() => runPtuAnalysis([], {
				pricing: { ...pricing, inputPricePer1k: 0 },
				scheme,
				tpmPerUnit: 1000,
				minPtu: 1,
				maxPtu: 3,
				step: 1,
			})).toThrow(ConfigurationError);
		});

		it('rejects an empty dataset', () => {
			expect(() => runPtuAnalysis([], { pricing, scheme, tpmPerUnit: 1000, minPtu: 1, maxPtu: 3, step: 1 })).toThrow(DataError);
		});
	});
}
