import type { ModelPricing, PricingScheme, PricingSchemeName } from './_types.ts';
import { readFile } from 'node:fs/promises';
import { Result } from '@praha/byethrow';
import * as v from 'valibot';
import { DEFAULT_TPM_PER_UNIT, GPT4_TPM_PER_UNIT } from './_consts.ts';
import { PRICING_SCHEME_NAMES } from './_types.ts';
import { validateDiscount } from './cost-model.ts';
import { ConfigurationError } from './errors.ts';
import { logger } from './logger.ts';
import builtinPricing from './model-pricing.json';
import { validateModelPricing } from './token-utils.ts';

/**
 * Default PTU price list. Reservations and commitments are billed per month or
 * year, hourly deployments per hour.
 */
export const PRICING_SCHEMES = {
	MonthlyReservation: {
		name: 'MonthlyReservation',
		label: 'Monthly Reservation',
		unitCost: 260,
		billingPeriod: 'month',
		discountPct: 0,
	},
	YearlyReservation: {
		name: 'YearlyReservation',
		label: 'Yearly Reservation',
		unitCost: 2652,
		billingPeriod: 'year',
		discountPct: 0,
	},
	HourlyGlobal: {
		name: 'HourlyGlobal',
		label: 'Hourly - Global',
		unitCost: 1,
		billingPeriod: 'hour',
		discountPct: 0,
	},
	HourlyDataZone: {
		name: 'HourlyDataZone',
		label: 'Hourly - Data Zone',
		unitCost: 1.1,
		billingPeriod: 'hour',
		discountPct: 0,
	},
	HourlyRegional: {
		name: 'HourlyRegional',
		label: 'Hourly - Regional',
		unitCost: 2,
		billingPeriod: 'hour',
		discountPct: 0,
	},
	MonthlyCommitment: {
		name: 'MonthlyCommitment',
		label: 'Monthly Commitment (Deprecated)',
		unitCost: 312,
		billingPeriod: 'month',
		discountPct: 0,
		deprecated: true,
	},
} as const satisfies Record<PricingSchemeName, PricingScheme>;

function toSchemeKey(value: string): string {
	return value.replace(/[\s_-]/g, '').toLowerCase();
}

/**
 * Matches scheme names case-insensitively, ignoring dashes, underscores and spaces
 * (`hourly-global`, `Hourly Global` and `HourlyGlobal` are the same scheme)
 */
export function parseSchemeName(value: string): PricingSchemeName {
	const key = toSchemeKey(value);
	const match = PRICING_SCHEME_NAMES.find(name => toSchemeKey(name) === key);
	if (match == null) {
		throw new ConfigurationError('unknown-scheme', `Unknown pricing scheme: ${value}. Expected one of ${PRICING_SCHEME_NAMES.join(', ')}`);
	}
	return match;
}

export type SchemeOverrides = {
	discountPct?: number;
	unitCost?: number;
};

export function resolvePricingScheme(name: string, overrides: SchemeOverrides = {}): PricingScheme {
	const base: PricingScheme = PRICING_SCHEMES[parseSchemeName(name)];
	const unitCost = overrides.unitCost ?? base.unitCost;
	if (!Number.isFinite(unitCost) || unitCost < 0) {
		throw new ConfigurationError('invalid-price', `Unit cost of ${base.name} must be 0 or greater (got ${unitCost})`);
	}
	return {
		...base,
		unitCost,
		discountPct: validateDiscount(overrides.discountPct ?? base.discountPct),
	};
}

const pricingEntrySchema = v.object({
	input_price_per_1k: v.pipe(v.number(), v.minValue(0)),
	output_price_per_1k: v.pipe(v.number(), v.minValue(0)),
	ptu_tpm_per_unit: v.optional(v.pipe(v.number(), v.minValue(1))),
});

const pricingTableSchema = v.record(v.string(), pricingEntrySchema);

export type PricingTableEntry = ModelPricing & {
	tpmPerUnit?: number;
};

export type PricingTable = Map<string, PricingTableEntry>;

export function parsePricingTable(data: unknown, source = 'pricing table'): PricingTable {
	const parsed = v.safeParse(pricingTableSchema, data);
	if (!parsed.success) {
		const issue = parsed.issues[0];
		const path = v.getDotPath(issue) ?? '(root)';
		throw new ConfigurationError('invalid-config-file', `Invalid ${source} at ${path}: ${issue.message}`);
	}

	const table: PricingTable = new Map();
	for (const [model, entry] of Object.entries(parsed.output)) {
		table.set(model.toLowerCase(), {
			model,
			inputPricePer1k: entry.input_price_per_1k,
			outputPricePer1k: entry.output_price_per_1k,
			...(entry.ptu_tpm_per_unit != null ? { tpmPerUnit: entry.ptu_tpm_per_unit } : {}),
		});
	}
	return table;
}

export const BUILTIN_PRICING_TABLE: PricingTable = parsePricingTable(builtinPricing, 'built-in pricing table');

/**
 * Loads a pricing table from a local JSON file, or the built-in table when no
 * file is given
 */
export async function loadPricingTable(filePath?: string): Promise<PricingTable> {
	if (filePath == null) {
		return BUILTIN_PRICING_TABLE;
	}

	const content = await Result.try({
		try: readFile(filePath, 'utf-8'),
		catch: error => error instanceof Error ? error : new Error(String(error)),
	});
	if (Result.isFailure(content)) {
		throw new ConfigurationError('invalid-config-file', `Could not read pricing file ${filePath}: ${content.error.message}`);
	}

	const parseJson = Result.try({
		try: () => JSON.parse(content.value) as unknown,
		catch: error => error instanceof Error ? error : new Error(String(error)),
	});
	const data = parseJson();
	if (Result.isFailure(data)) {
		throw new ConfigurationError('invalid-config-file', `Pricing file ${filePath} is not valid JSON: ${data.error.message}`);
	}

	const table = parsePricingTable(data.value, `pricing file ${filePath}`);
	logger.info(`Loaded pricing for ${table.size} models from ${filePath}`);
	return table;
}

export type PriceOverrides = {
	inputPricePer1k?: number;
	outputPricePer1k?: number;
};

/**
 * Looks up a model case-insensitively. A model missing from the table is
 * accepted only when both prices are given explicitly.
 */
export function lookupModelPricing(table: PricingTable, model: string, overrides: PriceOverrides = {}): ModelPricing {
	const entry = table.get(model.toLowerCase());
	const inputPricePer1k = overrides.inputPricePer1k ?? entry?.inputPricePer1k;
	const outputPricePer1k = overrides.outputPricePer1k ?? entry?.outputPricePer1k;

	if (inputPricePer1k == null || outputPricePer1k == null) {
		throw new ConfigurationError('unknown-model', `Pricing not found for model ${model}. Pass --input-price and --output-price or use a pricing file.`);
	}

	return validateModelPricing({
		model: entry?.model ?? model,
		inputPricePer1k,
		outputPricePer1k,
	});
}

/**
 * PTU capacity per unit for a model: the table value when present, otherwise
 * 3000 TPM for GPT-4 class models and 1000 TPM for the rest
 */
export function getTpmPerUnit(table: PricingTable, model: string): number {
	const entry = table.get(model.toLowerCase());
	if (entry?.tpmPerUnit != null) {
		return entry.tpmPerUnit;
	}
	return model.toLowerCase().includes('gpt-4') ? GPT4_TPM_PER_UNIT : DEFAULT_TPM_PER_UNIT;
}

if (import.meta.vitest != null) {
	const { createFixture } = await import('fs-fixture');

	describe('parseSchemeName', () => {
		it('accepts several spellings', () => {
			expect(parseSchemeName('HourlyGlobal')).toBe('HourlyGlobal');
			expect(parseSchemeName('hourly-global')).toBe('HourlyGlobal');
			expect(parseSchemeName('Hourly Data_Zone')).toBe('HourlyDataZone');
		});

		it('rejects unknown schemes', () => {
			expect(() => parseSchemeName('spot')).toThrow(ConfigurationError);
		});
	});

	describe('resolvePricingScheme', () => {
		it('returns the default scheme', () => {
			expect(resolvePricingScheme('monthly-reservation')).toEqual({
				name: 'MonthlyReservation',
				label: 'Monthly Reservation',
				unitCost: 260,
				billingPeriod: 'month',
				discountPct: 0,
			});
		});

		it('applies overrides', () => {
			const scheme = resolvePricingScheme('YearlyReservation', { discountPct: 14.5, unitCost: 2400 });
			expect(scheme.unitCost).toBe(2400);
			expect(scheme.discountPct).toBe(14.5);
			expect(scheme.billingPeriod).toBe('year');
		});

		it('rejects invalid discounts and unit costs', () => {
			expect(() => resolvePricingScheme('HourlyGlobal', { discountPct: 150 })).toThrow('Discount must be between 0 and 100 percent (got 150)');
			expect(() => resolvePricingScheme('HourlyGlobal', { unitCost: -1 })).toThrow(ConfigurationError);
		});
	});

	describe('lookupModelPricing', () => {
		it('finds built-in models case-insensitively', () => {
			expect(lookupModelPricing(BUILTIN_PRICING_TABLE, 'GPT-4.1')).toEqual({
				model: 'gpt-4.1',
				inputPricePer1k: 0.002,
				outputPricePer1k: 0.008,
			});
		});

		it('applies price overrides', () => {
			const pricing = lookupModelPricing(BUILTIN_PRICING_TABLE, 'gpt-4.1', { outputPricePer1k: 0.01 });
			expect(pricing.outputPricePer1k).toBe(0.01);
			expect(pricing.inputPricePer1k).toBe(0.002);
		});

		it('accepts unknown models with explicit prices', () => {
			const pricing = lookupModelPricing(BUILTIN_PRICING_TABLE, 'custom-model', { inputPricePer1k: 1, outputPricePer1k: 2 });
			expect(pricing).toEqual({ model: 'custom-model', inputPricePer1k: 1, outputPricePer1k: 2 });
		});

		it('rejects unknown models without prices', () => {
			expect(() => lookupModelPricing(BUILTIN_PRICING_TABLE, 'custom-model')).toThrow(ConfigurationError);
		});

		it('rejects a zero input price override', () => {
			expect(() => lookupModelPricing(BUILTIN_PRICING_TABLE, 'gpt-4.1', { inputPricePer1k: 0 }))
				.toThrow(expect.objectContaining({ code: 'invalid-price' }));
		});
	});

	describe('getTpmPerUnit', () => {
		it('uses the table value', () => {
			expect(getTpmPerUnit(BUILTIN_PRICING_TABLE, 'gpt-4o')).toBe(2500);
		});

		it('falls back by model family', () => {
			expect(getTpmPerUnit(BUILTIN_PRICING_TABLE, 'o4-mini')).toBe(1000);
			expect(getTpmPerUnit(new Map(), 'gpt-4-turbo')).toBe(3000);
		});
	});

	describe('loadPricingTable', () => {
		it('returns the built-in table without a file', async () => {
			expect(await loadPricingTable()).toBe(BUILTIN_PRICING_TABLE);
		});

		it('loads a custom pricing file', async () => {
			await using fixture = await createFixture({
				'pricing.json': JSON.stringify({
					'My-Model': { input_price_per_1k: 0.5, output_price_per_1k: 1.5, ptu_tpm_per_unit: 2000 },
				}),
			});
			const table = await loadPricingTable(fixture.getPath('pricing.json'));
			expect(table.get('my-model')).toEqual({
				model: 'My-Model',
				inputPricePer1k: 0.5,
				outputPricePer1k: 1.5,
				tpmPerUnit: 2000,
			});
		});

		it('rejects invalid entries', async () => {
			await using fixture = await createFixture({
				'pricing.json': JSON.stringify({ broken: { input_price_per_1k: 'cheap', output_price_per_1k: 1 } }),
			});
			await expect(loadPricingTable(fixture.getPath('pricing.json'))).rejects.toThrow(ConfigurationError);
		});

		it('rejects missing files', async () => {
			await expect(loadPricingTable('/nonexistent/pricing.json')).rejects.toThrow('Could not read pricing file /nonexistent/pricing.json');
		});
	});
}
