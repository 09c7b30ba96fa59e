import type { PricingScheme } from '../_types.ts';
import type { PricingTable } from '../pricing.ts';
import process from 'node:process';
import { define } from 'gunshi';
import pc from 'picocolors';
import { loadConfig } from '../_config-loader.ts';
import { PRICING_SCHEME_NAMES } from '../_types.ts';
import { getMonthlyUnitCost } from '../cost-model.ts';
import { isPlannerError } from '../errors.ts';
import { formatCurrency } from '../format.ts';
import { log, logger } from '../logger.ts';
import { getTpmPerUnit, loadPricingTable, PRICING_SCHEMES } from '../pricing.ts';
import { ResponsiveTable } from '../table.ts';
import { getOutputWeight } from '../token-utils.ts';

export type SchemeSummary = {
	name: string;
	label: string;
	unitCost: number;
	billingPeriod: string;
	monthlyUnitCost: number;
	deprecated: boolean;
};

export type ModelSummary = {
	model: string;
	inputPricePer1k: number;
	outputPricePer1k: number;
	outputWeight: number;
	tpmPerUnit: number;
};

export function summarizeSchemes(discountPct?: number): SchemeSummary[] {
	return PRICING_SCHEME_NAMES.map((name) => {
		const scheme: PricingScheme = PRICING_SCHEMES[name];
		return {
			name,
			label: scheme.label,
			unitCost: scheme.unitCost,
			billingPeriod: scheme.billingPeriod,
			monthlyUnitCost: getMonthlyUnitCost(scheme, discountPct),
			deprecated: scheme.deprecated ?? false,
		};
	});
}

export function summarizeModels(table: PricingTable): ModelSummary[] {
	return Array.from(table.values(), entry => ({
		model: entry.model,
		inputPricePer1k: entry.inputPricePer1k,
		outputPricePer1k: entry.outputPricePer1k,
		outputWeight: getOutputWeight(entry),
		tpmPerUnit: getTpmPerUnit(table, entry.model),
	}));
}

export const schemesCommand = define({
	name: 'schemes',
	description: 'List PTU pricing schemes and model prices',
	args: {
		discount: {
			type: 'number',
			short: 'd',
			description: 'Discount percentage applied to the monthly cost column (0-100)',
		},
		pricing: {
			type: 'string',
			description: 'JSON file replacing the built-in model pricing table',
		},
		config: {
			type: 'string',
			description: 'Path to a configuration file',
		},
		json: {
			type: 'boolean',
			short: 'j',
			description: 'Output as JSON',
			default: false,
		},
	},
	async run(ctx) {
		if (ctx.values.json) {
			logger.level = 0;
		}

		try {
			const config = loadConfig(ctx.values.config);
			const schemes = summarizeSchemes(ctx.values.discount ?? config.discount);
			const models = summarizeModels(await loadPricingTable(ctx.values.pricing ?? config.pricing));

			if (ctx.values.json) {
				log(JSON.stringify({ schemes, models }, null, 2));
				return;
			}

			logger.box('PTU Pricing Schemes');
			const schemeTable = new ResponsiveTable({
				head: ['Scheme', 'Label', 'Unit Cost', 'Billed Per', 'Per PTU-Month'],
				colAligns: ['left', 'left', 'right', 'left', 'right'],
				style: { head: ['cyan'] },
			});
			for (const scheme of schemes) {
				const cells = [scheme.name, scheme.label, formatCurrency(scheme.unitCost), scheme.billingPeriod, formatCurrency(scheme.monthlyUnitCost)];
				schemeTable.push(scheme.deprecated ? cells.map(cell => pc.dim(cell)) : cells);
			}
			log(schemeTable.toString());
			log('');

			const modelTable = new ResponsiveTable({
				head: ['Model', 'Input / 1K', 'Output / 1K', 'Output Weight', 'TPM per PTU'],
				colAligns: ['left', 'right', 'right', 'right', 'right'],
				style: { head: ['cyan'] },
			});
			for (const model of models) {
				modelTable.push([
					model.model,
					`$${model.inputPricePer1k}`,
					`$${model.outputPricePer1k}`,
					model.outputWeight.toFixed(2),
					model.tpmPerUnit,
				]);
			}
			log(modelTable.toString());
		}
		catch (error) {
			if (isPlannerError(error)) {
				logger.error(error.message);
				process.exit(1);
			}
			throw error;
		}
	},
});

if (import.meta.vitest != null) {
	const { BUILTIN_PRICING_TABLE } = await import('../pricing.ts');

	describe('summarizeSchemes', () => {
		it('lists every scheme with its monthly cost', () => {
			const schemes = summarizeSchemes();
			expect(schemes.map(scheme => scheme.name)).toEqual([...PRICING_SCHEME_NAMES]);
			expect(schemes.find(scheme => scheme.name === 'MonthlyReservation')?.monthlyUnitCost).toBeCloseTo(260, 10);
			expect(schemes.find(scheme => scheme.name === 'YearlyReservation')?.monthlyUnitCost).toBeCloseTo(221, 10);
			expect(schemes.find(scheme => scheme.name === 'HourlyGlobal')?.monthlyUnitCost).toBeCloseTo(730, 10);
			expect(schemes.find(scheme => scheme.name === 'MonthlyCommitment')?.deprecated).toBe(true);
		});

		it('applies a discount', () => {
			const monthly = summarizeSchemes(50).find(scheme => scheme.name === 'MonthlyReservation');
			expect(monthly?.monthlyUnitCost).toBeCloseTo(130, 10);
		});
	});

	describe('summarizeModels', () => {
		it('derives the output weight of each model', () => {
			const gpt41 = summarizeModels(BUILTIN_PRICING_TABLE).find(model => model.model === 'gpt-4.1');
			expect(gpt41?.outputWeight).toBeCloseTo(4, 10);
			expect(gpt41?.tpmPerUnit).toBe(3000);
		});
	});
}
