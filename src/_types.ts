export type UsageRequest = {
	timestamp: Date;
	inputTokens: number;
	outputTokens: number;
};

export const PRICING_SCHEME_NAMES = [
	'MonthlyReservation',
	'YearlyReservation',
	'HourlyGlobal',
	'HourlyDataZone',
	'HourlyRegional',
	'MonthlyCommitment',
] as const;

export type PricingSchemeName = typeof PRICING_SCHEME_NAMES[number];

export type BillingPeriod = 'hour' | 'month' | 'year';

export type PricingScheme = {
	name: PricingSchemeName;
	label: string;
	/** Price of one provisioned unit for one billing period, before discount */
	unitCost: number;
	billingPeriod: BillingPeriod;
	/** 0-100, applied multiplicatively to unitCost */
	discountPct: number;
	deprecated?: boolean;
};

export type ModelPricing = {
	model: string;
	inputPricePer1k: number;
	outputPricePer1k: number;
};

/**
 * Aggregated traffic for one fixed-width time bucket (one minute by default)
 */
export type MinuteBucket = {
	start: Date;
	requestCount: number;
	inputTokens: number;
	outputTokens: number;
	/** inputTokens + outputTokens * outputWeight */
	weightedDemand: number;
};

export type CapacityCandidate = {
	ptuCount: number;
	/** Weighted tokens per minute the provisioned tier can serve */
	capacityTpm: number;
	scheme: PricingScheme;
	discountPct?: number;
};

export type SimulationResult = {
	capacityTpm: number;
	ptuInputTokens: number;
	ptuOutputTokens: number;
	paygoInputTokens: number;
	paygoOutputTokens: number;
	meanUtilizationPct: number;
	minuteUtilizations: readonly number[];
};

export type Horizon = 'month' | 'year';

/**
 * Shared time basis for every candidate of one comparison run
 */
export type CostBasis = {
	spanMs: number;
	horizon: Horizon;
	horizonMs: number;
	annualizationFactor: number;
};

export type CostResult = {
	ptuCost: number;
	paygoCost: number;
	totalCost: number;
	purePaygoCost: number;
	costDiff: number;
	annualizationFactor: number;
};

export type ScoredCandidate = {
	candidate: CapacityCandidate;
	simulation: SimulationResult;
	cost: CostResult;
};

export type SearchOutcome =
	| {
		kind: 'optimal';
		strategy: string;
		selected: ScoredCandidate;
		evaluated: readonly ScoredCandidate[];
	}
	| {
		kind: 'range-exceeded';
		strategy: string;
		/** Largest capacity that was evaluated, when any was */
		largest: ScoredCandidate | undefined;
		evaluated: readonly ScoredCandidate[];
	};

export type OptimizationStrategy = {
	name: string;
	select: (evaluated: readonly ScoredCandidate[]) => SearchOutcome;
};
