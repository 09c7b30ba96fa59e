import type { Args } from 'gunshi';
import { normalizeFilterDate } from './date-utils.ts';

const parseDateArg = (value: string): string => normalizeFilterDate(value) ?? value;

/**
 * Options shared by every command that reads a usage export
 */
export const sharedArgs = {
	file: {
		type: 'string',
		short: 'f',
		description: 'Usage CSV export to analyze',
	},
	since: {
		type: 'custom',
		description: 'Filter from date (YYYY-MM-DD or YYYYMMDD)',
		parse: parseDateArg,
	},
	until: {
		type: 'custom',
		description: 'Filter until date (inclusive)',
		parse: parseDateArg,
	},
	model: {
		type: 'string',
		short: 'm',
		description: 'Model whose prices set the output token weight (default: gpt-4.1)',
	},
	inputPrice: {
		type: 'number',
		description: 'PAYGO input price per 1K tokens, overrides the pricing table',
	},
	outputPrice: {
		type: 'number',
		description: 'PAYGO output price per 1K tokens, overrides the pricing table',
	},
	pricing: {
		type: 'string',
		description: 'JSON file replacing the built-in model pricing table',
	},
	bucketMinutes: {
		type: 'number',
		description: 'Width of a demand bucket in minutes (default: 1)',
	},
	config: {
		type: 'string',
		description: 'Path to a configuration file (default: .ptusim/config.json, then ~/.config/ptusim/config.json)',
	},
	json: {
		type: 'boolean',
		short: 'j',
		description: 'Output report as JSON',
		default: false,
	},
	csv: {
		type: 'boolean',
		description: 'Output report as CSV',
		default: false,
	},
	compact: {
		type: 'boolean',
		description: 'Force compact table layout for narrow terminals',
		default: false,
	},
	color: { // --color and FORCE_COLOR=1 is handled by picocolors
		type: 'boolean',
		description: 'Enable colored output (default: auto). FORCE_COLOR=1 has the same effect.',
	},
	noColor: { // --no-color and NO_COLOR=1 is handled by picocolors
		type: 'boolean',
		description: 'Disable colored output (default: auto). NO_COLOR=1 has the same effect.',
	},
} as const satisfies Args;

/**
 * Capacity sweep and pricing scheme options of the analyze command
 */
export const plannerArgs = {
	scheme: {
		type: 'string',
		short: 's',
		description: 'PTU pricing scheme (default: YearlyReservation, see `ptusim schemes`)',
	},
	discount: {
		type: 'number',
		short: 'd',
		description: 'Discount percentage applied to the PTU unit cost (0-100)',
	},
	unitCost: {
		type: 'number',
		description: 'PTU unit cost per billing period, overrides the scheme table',
	},
	tpmPerUnit: {
		type: 'number',
		description: 'Tokens per minute provided by one PTU (default: from the pricing table)',
	},
	minPtu: {
		type: 'number',
		description: 'Smallest PTU count in the sweep (default: 15)',
	},
	maxPtu: {
		type: 'number',
		description: 'Largest PTU count in the sweep (default: 100)',
	},
	step: {
		type: 'number',
		description: 'Increment between swept PTU counts (default: 5)',
	},
	horizon: {
		type: 'enum',
		description: 'Period costs are projected to (default: year)',
		choices: ['month', 'year'] as const,
	},
	strategy: {
		type: 'enum',
		description: 'How the recommended PTU count is chosen (default: traffic)',
		choices: ['traffic', 'min-cost'] as const,
	},
} as const satisfies Args;

if (import.meta.vitest != null) {
	describe('sharedArgs', () => {
		it('normalizes filter dates', () => {
			expect(sharedArgs.since.parse('20250818')).toBe('2025-08-18');
			expect(sharedArgs.until.parse('2025-08-19')).toBe('2025-08-19');
		});

		it('rejects malformed filter dates', () => {
			expect(() => sharedArgs.since.parse('Aug 18')).toThrow('Invalid date format: Aug 18. Expected YYYYMMDD or YYYY-MM-DD.');
		});
	});
}
