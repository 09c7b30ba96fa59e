import type {
	CapacityCandidate,
	CostBasis,
	MinuteBucket,
	ModelPricing,
	OptimizationStrategy,
	PricingScheme,
	ScoredCandidate,
	SearchOutcome,
} from './_types.ts';
import { sort } from 'fast-sort';
import { simulateCapacity, validateCapacity } from './capacity-simulator.ts';
import { calculateCost, validateDiscount } from './cost-model.ts';
import { ConfigurationError } from './errors.ts';
import { validateModelPricing } from './token-utils.ts';

export type SweepOptions = {
	minPtu: number;
	maxPtu: number;
	step: number;
};

export type CandidateOptions = SweepOptions & {
	tpmPerUnit: number;
	scheme: PricingScheme;
	discountPct?: number;
};

function assertWholeNumber(value: number, label: string, minimum: number): void {
	if (!Number.isInteger(value) || value < minimum) {
		throw new ConfigurationError('invalid-sweep', `${label} must be a whole number of at least ${minimum} (got ${value})`);
	}
}

/**
 * PTU counts from `minPtu` to `maxPtu` inclusive in `step` increments.
 * Zero is skipped: pure PAYGO is the baseline, not a candidate.
 */
export function buildPtuSweep({ minPtu, maxPtu, step }: SweepOptions): number[] {
	assertWholeNumber(minPtu, 'Minimum PTU count', 0);
	assertWholeNumber(maxPtu, 'Maximum PTU count', 1);
	assertWholeNumber(step, 'PTU step', 1);
	if (minPtu > maxPtu) {
		throw new ConfigurationError('invalid-sweep', `Minimum PTU count (${minPtu}) must not exceed maximum PTU count (${maxPtu})`);
	}

	const counts: number[] = [];
	for (let count = minPtu; count <= maxPtu; count += step) {
		if (count > 0) {
			counts.push(count);
		}
	}
	if (counts.length === 0) {
		throw new ConfigurationError('invalid-sweep', `Sweep ${minPtu}-${maxPtu} step ${step} contains no PTU counts`);
	}
	return counts;
}

export function buildCapacityCandidates(options: CandidateOptions): CapacityCandidate[] {
	validateCapacity(options.tpmPerUnit);
	return buildPtuSweep(options).map(ptuCount => ({
		ptuCount,
		capacityTpm: ptuCount * options.tpmPerUnit,
		scheme: options.scheme,
		...(options.discountPct != null ? { discountPct: options.discountPct } : {}),
	}));
}

export type MaxPtuHint = {
	peakWeightedDemand: number;
	tpmPerUnit: number;
	minPtu: number;
	step: number;
	/** Largest PTU count already swept */
	largestPtu: number;
	purePaygoCost: number;
	/** Projected cost of one PTU on the run's cost basis */
	unitPtuCost: number;
	multiple?: number;
};

/**
 * Upper end for a wider sweep. It reaches the count whose fixed PTU cost alone
 * matches pure PAYGO cost, covers `multiple` times the peak weighted demand and
 * always lies beyond the largest count already swept. The result is a count the
 * sweep from `minPtu` in `step` increments visits.
 */
export function suggestMaxPtu(hint: MaxPtuHint): number {
	const { peakWeightedDemand, tpmPerUnit, minPtu, step, largestPtu, purePaygoCost, unitPtuCost, multiple = 2 } = hint;
	validateCapacity(tpmPerUnit);
	assertWholeNumber(minPtu, 'Minimum PTU count', 0);
	assertWholeNumber(step, 'PTU step', 1);

	const peakUnits = Math.ceil((peakWeightedDemand * multiple) / tpmPerUnit);
	const breakEvenUnits = unitPtuCost > 0 ? Math.ceil(purePaygoCost / unitPtuCost) : 0;
	const target = Math.max(peakUnits, breakEvenUnits, largestPtu + step, 1);
	return minPtu + Math.max(0, Math.ceil((target - minPtu) / step)) * step;
}

function compareCandidates(scored: readonly ScoredCandidate[], key: (item: ScoredCandidate) => number): ScoredCandidate | undefined {
	return sort([...scored]).by([
		{ asc: key },
		{ asc: item => item.candidate.ptuCount },
	])[0];
}

function largestCandidate(scored: readonly ScoredCandidate[]): ScoredCandidate | undefined {
	return sort([...scored]).desc(item => item.candidate.ptuCount)[0];
}

/**
 * Picks the candidate closest to break-even from above: among candidates that
 * cost at least as much as pure PAYGO, the smallest cost difference. Ties go to
 * the lower PTU count. When every candidate is cheaper than PAYGO the sweep did
 * not reach break-even and the outcome says so.
 */
export const trafficOptimalStrategy: OptimizationStrategy = {
	name: 'traffic',
	select(evaluated) {
		const atOrAbove = evaluated.filter(item => item.cost.costDiff >= 0);
		const selected = compareCandidates(atOrAbove, item => item.cost.costDiff);
		if (selected == null) {
			return { kind: 'range-exceeded', strategy: 'traffic', largest: largestCandidate(evaluated), evaluated };
		}
		return { kind: 'optimal', strategy: 'traffic', selected, evaluated };
	},
};

/**
 * Picks the candidate with the lowest total cost, ties to the lower PTU count.
 * The sweep is exhausted when the cheapest candidate is also the largest, since
 * a larger capacity might be cheaper still.
 */
export const minimumCostStrategy: OptimizationStrategy = {
	name: 'min-cost',
	select(evaluated) {
		const selected = compareCandidates(evaluated, item => item.cost.totalCost);
		const largest = largestCandidate(evaluated);
		if (selected == null || (evaluated.length > 1 && selected === largest)) {
			return { kind: 'range-exceeded', strategy: 'min-cost', largest, evaluated };
		}
		return { kind: 'optimal', strategy: 'min-cost', selected, evaluated };
	},
};

export const OPTIMIZATION_STRATEGIES = {
	'traffic': trafficOptimalStrategy,
	'min-cost': minimumCostStrategy,
} as const satisfies Record<string, OptimizationStrategy>;

export type StrategyName = keyof typeof OPTIMIZATION_STRATEGIES;

export function isStrategyName(value: string): value is StrategyName {
	return Object.hasOwn(OPTIMIZATION_STRATEGIES, value);
}

export function resolveStrategy(name: string): OptimizationStrategy {
	if (!isStrategyName(name)) {
		throw new ConfigurationError('invalid-option', `Unknown optimization strategy: ${name}. Expected one of ${Object.keys(OPTIMIZATION_STRATEGIES).join(', ')}`);
	}
	return OPTIMIZATION_STRATEGIES[name];
}

export type EvaluationContext = {
	buckets: readonly MinuteBucket[];
	pricing: ModelPricing;
	basis: CostBasis;
	bucketMinutes?: number;
};

export function evaluateCandidate(candidate: CapacityCandidate, context: EvaluationContext): ScoredCandidate {
	const simulation = simulateCapacity(context.buckets, candidate.capacityTpm, { bucketMinutes: context.bucketMinutes });
	const cost = calculateCost({ candidate, simulation, pricing: context.pricing, basis: context.basis });
	return { candidate, simulation, cost };
}

export type SearchOptions = EvaluationContext & {
	candidates: readonly CapacityCandidate[];
	strategy?: OptimizationStrategy;
	/** Aborting discards the partial sweep */
	signal?: AbortSignal;
};

function validateCandidates(candidates: readonly CapacityCandidate[]): void {
	if (candidates.length === 0) {
		throw new ConfigurationError('invalid-sweep', 'No capacity candidates to evaluate');
	}
	for (const candidate of candidates) {
		validateCapacity(candidate.capacityTpm);
		validateDiscount(candidate.discountPct ?? candidate.scheme.discountPct);
		if (!Number.isFinite(candidate.scheme.unitCost) || candidate.scheme.unitCost < 0) {
			throw new ConfigurationError('invalid-price', `Unit cost of ${candidate.scheme.name} must be 0 or greater (got ${candidate.scheme.unitCost})`);
		}
	}
}

/**
 * Scores every candidate against the same buckets and cost basis and lets the
 * strategy pick one. All configuration is validated before the first simulation.
 */
export function runOptimizationSearch(options: SearchOptions): SearchOutcome {
	const strategy = options.strategy ?? trafficOptimalStrategy;
	validateModelPricing(options.pricing);
	validateCandidates(options.candidates);

	const evaluated: ScoredCandidate[] = [];
	for (const candidate of options.candidates) {
		options.signal?.throwIfAborted();
		evaluated.push(evaluateCandidate(candidate, options));
	}

	return strategy.select(evaluated);
}

if (import.meta.vitest != null) {
	const { DAY_MS } = await import('./_consts.ts');
	const { createCostBasis } = await import('./cost-model.ts');

	const scheme: PricingScheme = {
		name: 'MonthlyReservation',
		label: 'Monthly Reservation',
		unitCost: 260,
		billingPeriod: 'month',
		discountPct: 0,
	};

	function scored(ptuCount: number, costDiff: number, totalCost = 1000 + costDiff): ScoredCandidate {
		return {
			candidate: { ptuCount, capacityTpm: ptuCount * 3000, scheme },
			simulation: {
				capacityTpm: ptuCount * 3000,
				ptuInputTokens: 0,
				ptuOutputTokens: 0,
				paygoInputTokens: 0,
				paygoOutputTokens: 0,
				meanUtilizationPct: 0,
				minuteUtilizations: [],
			},
			cost: {
				ptuCost: 0,
				paygoCost: 0,
				totalCost,
				purePaygoCost: 1000,
				costDiff,
				annualizationFactor: 1,
			},
		};
	}

	describe('trafficOptimalStrategy', () => {
		it('selects the smallest non-negative cost difference', () => {
			const outcome = trafficOptimalStrategy.select([scored(500, -50), scored(1000, 5), scored(1500, 60)]);
			expect(outcome.kind).toBe('optimal');
			if (outcome.kind === 'optimal') {
				expect(outcome.selected.candidate.ptuCount).toBe(1000);
				expect(outcome.strategy).toBe('traffic');
			}
		});

		it('treats break-even as acceptable', () => {
			const outcome = trafficOptimalStrategy.select([scored(10, -1), scored(20, 0), scored(30, 1)]);
			expect(outcome.kind === 'optimal' ? outcome.selected.candidate.ptuCount : undefined).toBe(20);
		});

		it('breaks ties with the lower PTU count', () => {
			const outcome = trafficOptimalStrategy.select([scored(40, 5), scored(25, 5), scored(30, 8)]);
			expect(outcome.kind === 'optimal' ? outcome.selected.candidate.ptuCount : undefined).toBe(25);
		});

		it('reports an exhausted range instead of the least negative candidate', () => {
			const outcome = trafficOptimalStrategy.select([scored(15, -300), scored(20, -5), scored(25, -90)]);
			expect(outcome.kind).toBe('range-exceeded');
			if (outcome.kind === 'range-exceeded') {
				expect(outcome.largest?.candidate.ptuCount).toBe(25);
				expect(outcome.evaluated).toHaveLength(3);
			}
		});

		it('reports an exhausted range for an empty evaluation', () => {
			const outcome = trafficOptimalStrategy.select([]);
			expect(outcome).toEqual({ kind: 'range-exceeded', strategy: 'traffic', largest: undefined, evaluated: [] });
		});
	});

	describe('minimumCostStrategy', () => {
		it('selects the cheapest candidate inside the sweep', () => {
			const outcome = minimumCostStrategy.select([scored(10, -20, 980), scored(20, -50, 950), scored(30, 10, 1010)]);
			expect(outcome.kind === 'optimal' ? outcome.selected.candidate.ptuCount : undefined).toBe(20);
		});

		it('reports an exhausted range when the largest candidate is cheapest', () => {
			const outcome = minimumCostStrategy.select([scored(10, -20, 980), scored(20, -50, 950)]);
			expect(outcome.kind).toBe('range-exceeded');
		});
	});

	describe('buildPtuSweep', () => {
		it('steps from min to max inclusive', () => {
			expect(buildPtuSweep({ minPtu: 15, maxPtu: 35, step: 5 })).toEqual([15, 20, 25, 30, 35]);
		});

		it('skips zero', () => {
			expect(buildPtuSweep({ minPtu: 0, maxPtu: 300, step: 100 })).toEqual([100, 200, 300]);
		});

		it('stops below max when the step overshoots', () => {
			expect(buildPtuSweep({ minPtu: 15, maxPtu: 22, step: 5 })).toEqual([15, 20]);
		});

		it('rejects inverted or invalid ranges', () => {
			expect(() => buildPtuSweep({ minPtu: 50, maxPtu: 10, step: 5 })).toThrow(ConfigurationError);
			expect(() => buildPtuSweep({ minPtu: 15, maxPtu: 100, step: 0 })).toThrow('PTU step must be a whole number of at least 1 (got 0)');
		});
	});

	describe('suggestMaxPtu', () => {
		const hint = {
			peakWeightedDemand: 0,
			tpmPerUnit: 3000,
			minPtu: 15,
			step: 5,
			largestPtu: 20,
			purePaygoCost: 0,
			unitPtuCost: 1,
		};

		it('covers a multiple of the peak on the sweep grid', () => {
			// 2 * 40000 / 3000 = 26.67 -> 27 units -> 30
			expect(suggestMaxPtu({ ...hint, peakWeightedDemand: 40000 })).toBe(30);
		});

		it('reaches the break-even count', () => {
			// 1000 / 30 = 33.3 -> 34 units -> 35
			expect(suggestMaxPtu({ ...hint, purePaygoCost: 1000, unitPtuCost: 30 })).toBe(35);
		});

		it('always goes beyond the largest swept count', () => {
			expect(suggestMaxPtu({ ...hint, largestPtu: 100 })).toBe(105);
			expect(suggestMaxPtu({ ...hint, minPtu: 0, largestPtu: 0 })).toBe(5);
		});
	});

	describe('runOptimizationSearch', () => {
		const pricing: ModelPricing = { model: 'test-model', inputPricePer1k: 0.01, outputPricePer1k: 0.04 };
		const buckets: MinuteBucket[] = [0, 1, 2, 3].map(minute => ({
			start: new Date(Date.UTC(2025, 7, 18, 0, minute)),
			requestCount: 1,
			inputTokens: 6000,
			outputTokens: 0,
			weightedDemand: 6000,
		}));

		it('evaluates each candidate on the shared basis', () => {
			const basis = createCostBasis(DAY_MS, 'month');
			const candidates = buildCapacityCandidates({ minPtu: 1, maxPtu: 3, step: 1, tpmPerUnit: 3000, scheme: { ...scheme, unitCost: 3 } });
			const outcome = runOptimizationSearch({ buckets, candidates, pricing, basis });

			expect(outcome.evaluated.map(item => item.simulation.paygoInputTokens)).toEqual([12000, 0, 0]);
			expect(outcome.evaluated.every(item => item.cost.annualizationFactor === basis.annualizationFactor)).toBe(true);
			// pure PAYGO: 0.24 USD per day * 730/24 = 7.30; PTU costs 6.65, 6.00, 9.00
			expect(outcome.evaluated[0]?.cost.purePaygoCost).toBeCloseTo(7.3, 10);
			expect(outcome.evaluated.map(item => item.cost.totalCost)).toEqual([
				expect.closeTo(6.65, 10),
				expect.closeTo(6, 10),
				expect.closeTo(9, 10),
			]);
			expect(outcome.kind === 'optimal' ? outcome.selected.candidate.ptuCount : undefined).toBe(3);
		});

		it('validates every candidate before simulating', () => {
			const basis = createCostBasis(DAY_MS);
			const candidates: CapacityCandidate[] = [
				{ ptuCount: 1, capacityTpm: 3000, scheme },
				{ ptuCount: 2, capacityTpm: 6000, scheme, discountPct: 120 },
			];
			expect(() => runOptimizationSearch({ buckets, candidates, pricing, basis })).toThrow(ConfigurationError);
		});

		it('stops when aborted', () => {
			const controller = new AbortController();
			controller.abort();
			const basis = createCostBasis(DAY_MS);
			const candidates = buildCapacityCandidates({ minPtu: 1, maxPtu: 2, step: 1, tpmPerUnit: 3000, scheme });
			expect(() => runOptimizationSearch({ buckets, candidates, pricing, basis, signal: controller.signal })).toThrow();
		});

		it('resolves strategies by name', () => {
			expect(resolveStrategy('min-cost')).toBe(minimumCostStrategy);
			expect(() => resolveStrategy('cheapest')).toThrow(ConfigurationError);
		});
	});
}
