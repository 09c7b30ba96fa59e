import type {
	BillingPeriod,
	CapacityCandidate,
	CostBasis,
	CostResult,
	Horizon,
	ModelPricing,
	PricingScheme,
	SimulationResult,
} from './_types.ts';
import { HOUR_MS, HOURS_PER_MONTH, HOURS_PER_YEAR } from './_consts.ts';
import { ConfigurationError, DataError } from './errors.ts';
import { calculatePaygoCost, validateModelPricing } from './token-utils.ts';

const BILLING_PERIOD_MS = {
	hour: HOUR_MS,
	month: HOURS_PER_MONTH * HOUR_MS,
	year: HOURS_PER_YEAR * HOUR_MS,
} as const satisfies Record<BillingPeriod, number>;

const HORIZON_MS = {
	month: BILLING_PERIOD_MS.month,
	year: BILLING_PERIOD_MS.year,
} as const satisfies Record<Horizon, number>;

/**
 * Builds the time basis shared by every candidate of a comparison run.
 *
 * Costs observed over `spanMs` are scaled by `horizonMs / spanMs` so that
 * schemes billed hourly, monthly or yearly land on the same horizon.
 */
export function createCostBasis(spanMs: number, horizon: Horizon = 'year'): CostBasis {
	if (!Number.isFinite(spanMs) || spanMs <= 0) {
		throw new DataError('empty-dataset', `Dataset span must be positive to project costs (got ${spanMs}ms)`);
	}
	const horizonMs = HORIZON_MS[horizon];
	return Object.freeze({
		spanMs,
		horizon,
		horizonMs,
		annualizationFactor: horizonMs / spanMs,
	});
}

export function validateDiscount(discountPct: number): number {
	if (!Number.isFinite(discountPct) || discountPct < 0 || discountPct > 100) {
		throw new ConfigurationError('invalid-discount', `Discount must be between 0 and 100 percent (got ${discountPct})`);
	}
	return discountPct;
}

/**
 * Number of billing periods of the given cadence that fit in a span
 */
export function getBillingPeriods(spanMs: number, period: BillingPeriod): number {
	return spanMs / BILLING_PERIOD_MS[period];
}

export function getDiscountedUnitCost(scheme: PricingScheme, discountOverride?: number): number {
	const discountPct = validateDiscount(discountOverride ?? scheme.discountPct);
	return scheme.unitCost * (1 - discountPct / 100);
}

/**
 * Unit cost of a scheme expressed per month, for display
 */
export function getMonthlyUnitCost(scheme: PricingScheme, discountOverride?: number): number {
	return getDiscountedUnitCost(scheme, discountOverride) * getBillingPeriods(BILLING_PERIOD_MS.month, scheme.billingPeriod);
}

/**
 * Fixed PTU cost of a candidate over the dataset span, projected onto the horizon
 */
export function calculatePtuCost(candidate: CapacityCandidate, basis: CostBasis): number {
	const periods = getBillingPeriods(basis.spanMs, candidate.scheme.billingPeriod);
	const spanCost = getDiscountedUnitCost(candidate.scheme, candidate.discountPct) * candidate.ptuCount * periods;
	return spanCost * basis.annualizationFactor;
}

/**
 * Cost of billing all traffic at PAYGO rates, projected onto the horizon
 */
export function calculatePurePaygoCost(simulation: SimulationResult, pricing: ModelPricing, basis: CostBasis): number {
	const spanCost = calculatePaygoCost({
		inputTokens: simulation.ptuInputTokens + simulation.paygoInputTokens,
		outputTokens: simulation.ptuOutputTokens + simulation.paygoOutputTokens,
	}, pricing);
	return spanCost * basis.annualizationFactor;
}

export type CostInput = {
	candidate: CapacityCandidate;
	simulation: SimulationResult;
	pricing: ModelPricing;
	basis: CostBasis;
};

/**
 * Blended cost of a candidate: fixed PTU cost plus PAYGO cost of the spillover,
 * compared against billing everything at PAYGO rates.
 */
export function calculateCost({ candidate, simulation, pricing, basis }: CostInput): CostResult {
	validateModelPricing(pricing);
	if (!Number.isInteger(candidate.ptuCount) || candidate.ptuCount < 0) {
		throw new ConfigurationError('invalid-capacity', `PTU count must be a non-negative whole number (got ${candidate.ptuCount})`);
	}

	const ptuCost = calculatePtuCost(candidate, basis);
	const paygoCost = calculatePaygoCost({
		inputTokens: simulation.paygoInputTokens,
		outputTokens: simulation.paygoOutputTokens,
	}, pricing) * basis.annualizationFactor;
	const purePaygoCost = calculatePurePaygoCost(simulation, pricing, basis);
	const totalCost = ptuCost + paygoCost;

	return {
		ptuCost,
		paygoCost,
		totalCost,
		purePaygoCost,
		costDiff: totalCost - purePaygoCost,
		annualizationFactor: basis.annualizationFactor,
	};
}

if (import.meta.vitest != null) {
	const { DAY_MS } = await import('./_consts.ts');

	const monthly: PricingScheme = {
		name: 'MonthlyReservation',
		label: 'Monthly Reservation',
		unitCost: 260,
		billingPeriod: 'month',
		discountPct: 0,
	};
	const hourly: PricingScheme = {
		name: 'HourlyGlobal',
		label: 'Hourly - Global',
		unitCost: 1,
		billingPeriod: 'hour',
		discountPct: 0,
	};
	const pricing: ModelPricing = { model: 'test-model', inputPricePer1k: 0.002, outputPricePer1k: 0.008 };

	const simulation: SimulationResult = {
		capacityTpm: 30000,
		ptuInputTokens: 9_000_000,
		ptuOutputTokens: 1_000_000,
		paygoInputTokens: 1_000_000,
		paygoOutputTokens: 500_000,
		meanUtilizationPct: 50,
		minuteUtilizations: [50],
	};

	describe('createCostBasis', () => {
		it('projects a ten day span onto a year', () => {
			const basis = createCostBasis(10 * DAY_MS, 'year');
			expect(basis.annualizationFactor).toBeCloseTo(36.5, 10);
			expect(Object.isFrozen(basis)).toBe(true);
		});

		it('projects onto a month of 730 hours', () => {
			const basis = createCostBasis(73 * HOUR_MS, 'month');
			expect(basis.annualizationFactor).toBeCloseTo(10, 10);
		});

		it('rejects an empty span', () => {
			expect(() => createCostBasis(0)).toThrow(DataError);
		});
	});

	describe('calculatePtuCost', () => {
		it('charges monthly reservations twelve times per year', () => {
			const basis = createCostBasis(10 * DAY_MS, 'year');
			const cost = calculatePtuCost({ ptuCount: 10, capacityTpm: 30000, scheme: monthly }, basis);
			expect(cost).toBeCloseTo(31200, 6);
		});

		it('charges hourly schemes per hour of the horizon', () => {
			const basis = createCostBasis(3 * DAY_MS, 'month');
			const cost = calculatePtuCost({ ptuCount: 15, capacityTpm: 45000, scheme: hourly }, basis);
			expect(cost).toBeCloseTo(730 * 15, 6);
		});

		it('applies the candidate discount over the scheme discount', () => {
			const basis = createCostBasis(10 * DAY_MS, 'month');
			const discounted = { ...monthly, discountPct: 50 };
			expect(calculatePtuCost({ ptuCount: 1, capacityTpm: 3000, scheme: discounted }, basis)).toBeCloseTo(130, 6);
			expect(calculatePtuCost({ ptuCount: 1, capacityTpm: 3000, scheme: discounted, discountPct: 10 }, basis)).toBeCloseTo(234, 6);
		});

		it('rejects discounts outside 0-100', () => {
			const basis = createCostBasis(DAY_MS);
			expect(() => calculatePtuCost({ ptuCount: 1, capacityTpm: 3000, scheme: monthly, discountPct: 101 }, basis))
				.toThrow(ConfigurationError);
			expect(() => calculatePtuCost({ ptuCount: 1, capacityTpm: 3000, scheme: monthly, discountPct: -1 }, basis))
				.toThrow('Discount must be between 0 and 100 percent (got -1)');
		});
	});

	describe('calculateCost', () => {
		it('blends PTU and spillover costs against pure PAYGO', () => {
			const basis = createCostBasis(HOURS_PER_MONTH * HOUR_MS, 'month');
			const result = calculateCost({
				candidate: { ptuCount: 10, capacityTpm: 30000, scheme: monthly },
				simulation,
				pricing,
				basis,
			});

			// spill: 1M input * 0.002/1K + 0.5M output * 0.008/1K = 2 + 4
			// all: 10M input * 0.002/1K + 1.5M output * 0.008/1K = 20 + 12
			expect(result.annualizationFactor).toBeCloseTo(1, 10);
			expect(result.ptuCost).toBeCloseTo(2600, 6);
			expect(result.paygoCost).toBeCloseTo(6, 6);
			expect(result.totalCost).toBeCloseTo(2606, 6);
			expect(result.purePaygoCost).toBeCloseTo(32, 6);
			expect(result.costDiff).toBeCloseTo(2574, 6);
		});

		it('uses the shared basis for every candidate', () => {
			const basis = createCostBasis(5 * DAY_MS, 'year');
			const small = calculateCost({ candidate: { ptuCount: 1, capacityTpm: 3000, scheme: hourly }, simulation, pricing, basis });
			const large = calculateCost({ candidate: { ptuCount: 2, capacityTpm: 6000, scheme: hourly }, simulation, pricing, basis });
			expect(small.annualizationFactor).toBe(large.annualizationFactor);
			expect(large.ptuCost).toBeCloseTo(small.ptuCost * 2, 6);
			expect(small.ptuCost).toBeCloseTo(HOURS_PER_YEAR, 6);
		});

		it('rejects a zero input price', () => {
			const basis = createCostBasis(DAY_MS);
			expect(() => calculateCost({
				candidate: { ptuCount: 1, capacityTpm: 3000, scheme: monthly },
				simulation,
				pricing: { ...pricing, inputPricePer1k: 0 },
				basis,
			})).toThrow(ConfigurationError);
		});
	});

	describe('getMonthlyUnitCost', () => {
		it('expresses every cadence per month', () => {
			expect(getMonthlyUnitCost(hourly)).toBeCloseTo(730, 10);
			expect(getMonthlyUnitCost({ ...monthly, unitCost: 2652, billingPeriod: 'year' })).toBeCloseTo(221, 10);
			expect(getMonthlyUnitCost(monthly, 14.5)).toBeCloseTo(222.3, 10);
		});
	});
}
