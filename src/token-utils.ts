import type { ModelPricing, UsageRequest } from './_types.ts';
import { TOKENS_PER_PRICE_UNIT } from './_consts.ts';
import { ConfigurationError } from './errors.ts';

export type TokenTotals = {
	inputTokens: number;
	outputTokens: number;
};

export function createEmptyTotals(): TokenTotals {
	return {
		inputTokens: 0,
		outputTokens: 0,
	};
}

export function addTotals(target: TokenTotals, delta: TokenTotals): void {
	target.inputTokens += delta.inputTokens;
	target.outputTokens += delta.outputTokens;
}

export function getTotalTokens(totals: TokenTotals): number {
	return totals.inputTokens + totals.outputTokens;
}

export function validateModelPricing(pricing: ModelPricing): ModelPricing {
	if (!Number.isFinite(pricing.inputPricePer1k) || pricing.inputPricePer1k <= 0) {
		throw new ConfigurationError(
			'invalid-price',
			`Input price for ${pricing.model} must be greater than 0 (got ${pricing.inputPricePer1k})`,
		);
	}
	if (!Number.isFinite(pricing.outputPricePer1k) || pricing.outputPricePer1k < 0) {
		throw new ConfigurationError(
			'invalid-price',
			`Output price for ${pricing.model} must be 0 or greater (got ${pricing.outputPricePer1k})`,
		);
	}
	return pricing;
}

/**
 * Ratio of the output to the input PAYGO price.
 *
 * PTU capacity is denominated in input-token equivalents, so output tokens
 * count against capacity scaled by this weight.
 */
export function getOutputWeight(pricing: ModelPricing): number {
	validateModelPricing(pricing);
	return pricing.outputPricePer1k / pricing.inputPricePer1k;
}

export function getWeightedDemand(totals: TokenTotals, outputWeight: number): number {
	return totals.inputTokens + totals.outputTokens * outputWeight;
}

/**
 * Weighted capacity demand of a single request
 */
export function normalizeRequest(request: UsageRequest, outputWeight: number): number {
	return getWeightedDemand(request, outputWeight);
}

/**
 * PAYGO cost in USD for the given token totals
 */
export function calculatePaygoCost(totals: TokenTotals, pricing: ModelPricing): number {
	const inputCost = (totals.inputTokens / TOKENS_PER_PRICE_UNIT) * pricing.inputPricePer1k;
	const outputCost = (totals.outputTokens / TOKENS_PER_PRICE_UNIT) * pricing.outputPricePer1k;
	return inputCost + outputCost;
}

if (import.meta.vitest != null) {
	const pricing: ModelPricing = {
		model: 'test-model',
		inputPricePer1k: 0.002,
		outputPricePer1k: 0.008,
	};

	describe('getOutputWeight', () => {
		it('divides output price by input price', () => {
			expect(getOutputWeight(pricing)).toBeCloseTo(4, 10);
		});

		it('rejects a zero input price', () => {
			expect(() => getOutputWeight({ ...pricing, inputPricePer1k: 0 })).toThrow(ConfigurationError);
		});

		it('rejects a negative output price', () => {
			expect(() => getOutputWeight({ ...pricing, outputPricePer1k: -1 })).toThrow('Output price for test-model');
		});
	});

	describe('normalizeRequest', () => {
		it('weights output tokens', () => {
			const request = { timestamp: new Date('2025-08-18T00:00:00Z'), inputTokens: 100, outputTokens: 100 };
			expect(normalizeRequest(request, 4)).toBe(500);
		});

		it('returns input tokens when there is no output', () => {
			const request = { timestamp: new Date('2025-08-18T00:00:00Z'), inputTokens: 1000, outputTokens: 0 };
			expect(normalizeRequest(request, 4)).toBe(1000);
		});
	});

	describe('calculatePaygoCost', () => {
		it('prices tokens per thousand', () => {
			const cost = calculatePaygoCost({ inputTokens: 10_000, outputTokens: 2_000 }, pricing);
			expect(cost).toBeCloseTo(0.02 + 0.016, 10);
		});

		it('returns zero for no tokens', () => {
			expect(calculatePaygoCost(createEmptyTotals(), pricing)).toBe(0);
		});
	});

	describe('addTotals', () => {
		it('accumulates into the target', () => {
			const totals = createEmptyTotals();
			addTotals(totals, { inputTokens: 5, outputTokens: 7 });
			addTotals(totals, { inputTokens: 1, outputTokens: 2 });
			expect(totals).toEqual({ inputTokens: 6, outputTokens: 9 });
			expect(getTotalTokens(totals)).toBe(15);
		});
	});
}
