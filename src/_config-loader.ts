import type { Horizon } from './_types.ts';
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import * as v from 'valibot';
import {
	CONFIG_FILE_NAME,
	DEFAULT_BUCKET_MINUTES,
	DEFAULT_HORIZON,
	DEFAULT_MAX_PTU,
	DEFAULT_MIN_PTU,
	DEFAULT_MODEL,
	DEFAULT_PTU_STEP,
	DEFAULT_SCHEME,
	DEFAULT_STRATEGY,
	LOCAL_CONFIG_DIR,
	USER_CONFIG_DIR,
} from './_consts.ts';
import { ConfigurationError } from './errors.ts';
import { logger } from './logger.ts';

const wholeNumber = (min: number) => v.pipe(v.number(), v.integer(), v.minValue(min));

const configSchema = v.object({
	$schema: v.optional(v.string()),
	model: v.optional(v.pipe(v.string(), v.nonEmpty())),
	scheme: v.optional(v.pipe(v.string(), v.nonEmpty())),
	discount: v.optional(v.pipe(v.number(), v.minValue(0), v.maxValue(100))),
	unitCost: v.optional(v.pipe(v.number(), v.minValue(0))),
	tpmPerUnit: v.optional(v.pipe(v.number(), v.gtValue(0))),
	minPtu: v.optional(wholeNumber(0)),
	maxPtu: v.optional(wholeNumber(1)),
	step: v.optional(wholeNumber(1)),
	horizon: v.optional(v.picklist(['month', 'year'] as const)),
	strategy: v.optional(v.picklist(['traffic', 'min-cost'] as const)),
	bucketMinutes: v.optional(wholeNumber(1)),
	pricing: v.optional(v.pipe(v.string(), v.nonEmpty())),
});

export type ConfigData = v.InferOutput<typeof configSchema>;

/**
 * Configuration file search paths in priority order (highest to lowest)
 * 1. Local .ptusim/config.json
 * 2. User config ~/.config/ptusim/config.json
 */
export function getConfigSearchPaths(cwd: string = process.cwd()): string[] {
	return [
		path.join(cwd, LOCAL_CONFIG_DIR, CONFIG_FILE_NAME),
		path.join(USER_CONFIG_DIR, CONFIG_FILE_NAME),
	];
}

/**
 * Reads and validates one configuration file
 */
export function readConfigFile(configPath: string): Result.Result<ConfigData, Error> {
	const parseConfig = Result.try({
		try: () => {
			const content = readFileSync(configPath, 'utf-8');
			const data = JSON.parse(content) as unknown;
			const parsed = v.safeParse(configSchema, data);
			if (!parsed.success) {
				const issue = parsed.issues[0];
				throw new Error(`${v.getDotPath(issue) ?? '(root)'}: ${issue.message}`);
			}
			return parsed.output;
		},
		catch: error => error instanceof Error ? error : new Error(String(error)),
	});

	return parseConfig();
}

/**
 * Loads configuration from an explicit path, or from the first valid file in
 * the search paths. An explicit file must exist and be valid; a searched file
 * that is invalid is skipped with a warning.
 */
export function loadConfig(explicitPath?: string, searchPaths: readonly string[] = getConfigSearchPaths()): ConfigData {
	if (explicitPath != null) {
		const result = readConfigFile(explicitPath);
		if (Result.isFailure(result)) {
			throw new ConfigurationError('invalid-config-file', `Invalid configuration file at ${explicitPath}: ${result.error.message}`);
		}
		logger.debug(`Loaded configuration from: ${explicitPath}`);
		return result.value;
	}

	for (const configPath of searchPaths) {
		if (!existsSync(configPath)) {
			continue;
		}

		const result = readConfigFile(configPath);
		if (Result.isSuccess(result)) {
			logger.debug(`Loaded configuration from: ${configPath}`);
			return result.value;
		}
		logger.warn(`Invalid configuration file at ${configPath}: ${result.error.message}`);
	}

	logger.debug('No configuration file found in search paths');
	return {};
}

/**
 * Values given on the command line. Options the user did not pass are undefined.
 */
export type PlannerArgs = {
	model?: string;
	scheme?: string;
	discount?: number;
	unitCost?: number;
	tpmPerUnit?: number;
	minPtu?: number;
	maxPtu?: number;
	step?: number;
	horizon?: Horizon;
	strategy?: string;
	bucketMinutes?: number;
	pricing?: string;
};

export type PlannerSettings = {
	model: string;
	scheme: string;
	discount?: number;
	unitCost?: number;
	tpmPerUnit?: number;
	minPtu: number;
	maxPtu: number;
	step: number;
	horizon: Horizon;
	strategy: string;
	bucketMinutes: number;
	pricing?: string;
};

/**
 * Merges configuration with CLI arguments
 * Priority order (highest to lowest):
 * 1. CLI arguments
 * 2. Configuration file
 * 3. Built-in defaults
 */
export function resolvePlannerSettings(args: PlannerArgs, config: ConfigData = {}): PlannerSettings {
	const settings: PlannerSettings = {
		model: args.model ?? config.model ?? DEFAULT_MODEL,
		scheme: args.scheme ?? config.scheme ?? DEFAULT_SCHEME,
		discount: args.discount ?? config.discount,
		unitCost: args.unitCost ?? config.unitCost,
		tpmPerUnit: args.tpmPerUnit ?? config.tpmPerUnit,
		minPtu: args.minPtu ?? config.minPtu ?? DEFAULT_MIN_PTU,
		maxPtu: args.maxPtu ?? config.maxPtu ?? DEFAULT_MAX_PTU,
		step: args.step ?? config.step ?? DEFAULT_PTU_STEP,
		horizon: args.horizon ?? config.horizon ?? DEFAULT_HORIZON,
		strategy: args.strategy ?? config.strategy ?? DEFAULT_STRATEGY,
		bucketMinutes: args.bucketMinutes ?? config.bucketMinutes ?? DEFAULT_BUCKET_MINUTES,
		pricing: args.pricing ?? config.pricing,
	};

	logger.debug('Resolved planner settings:', settings);
	return settings;
}

if (import.meta.vitest != null) {
	const { createFixture } = await import('fs-fixture');

	describe('readConfigFile', () => {
		it('accepts a valid configuration', async () => {
			await using fixture = await createFixture({
				'config.json': JSON.stringify({ model: 'gpt-4o', minPtu: 50, horizon: 'month', strategy: 'min-cost' }),
			});

			const result = readConfigFile(fixture.getPath('config.json'));
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value).toEqual({ model: 'gpt-4o', minPtu: 50, horizon: 'month', strategy: 'min-cost' });
			}
		});

		it('reports the offending key', async () => {
			await using fixture = await createFixture({
				'config.json': JSON.stringify({ step: 2.5 }),
			});

			const result = readConfigFile(fixture.getPath('config.json'));
			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error.message).toMatch(/^step: /);
			}
		});

		it('fails on malformed JSON', async () => {
			await using fixture = await createFixture({
				'config.json': '{ invalid json',
			});

			expect(Result.isFailure(readConfigFile(fixture.getPath('config.json')))).toBe(true);
		});
	});

	describe('loadConfig', () => {
		it('uses the first valid file and skips invalid ones', async () => {
			await using fixture = await createFixture({
				'local/config.json': JSON.stringify({ discount: 150 }),
				'user/config.json': JSON.stringify({ scheme: 'MonthlyReservation' }),
			});

			const config = loadConfig(undefined, [
				fixture.getPath('missing/config.json'),
				fixture.getPath('local/config.json'),
				fixture.getPath('user/config.json'),
			]);
			expect(config).toEqual({ scheme: 'MonthlyReservation' });
		});

		it('returns an empty configuration when nothing is found', async () => {
			await using fixture = await createFixture({});
			expect(loadConfig(undefined, [fixture.getPath('config.json')])).toEqual({});
		});

		it('throws when an explicit file is invalid', async () => {
			await using fixture = await createFixture({
				'bad.json': JSON.stringify({ horizon: 'week' }),
			});

			expect(() => loadConfig(fixture.getPath('bad.json'))).toThrow(ConfigurationError);
		});

		it('throws when an explicit file is missing', async () => {
			await using fixture = await createFixture({});
			expect(() => loadConfig(fixture.getPath('nope.json'))).toThrow(/Invalid configuration file/);
		});

		it('searches the local directory before the user directory', () => {
			const [local, user] = getConfigSearchPaths('/work');
			expect(local).toBe(path.join('/work', '.ptusim', 'config.json'));
			expect(user).toBe(path.join(USER_CONFIG_DIR, 'config.json'));
		});
	});

	describe('resolvePlannerSettings', () => {
		it('falls back to built-in defaults', () => {
			expect(resolvePlannerSettings({})).toEqual({
				model: 'gpt-4.1',
				scheme: 'YearlyReservation',
				discount: undefined,
				unitCost: undefined,
				tpmPerUnit: undefined,
				minPtu: 15,
				maxPtu: 100,
				step: 5,
				horizon: 'year',
				strategy: 'traffic',
				bucketMinutes: 1,
				pricing: undefined,
			});
		});

		it('prefers CLI arguments over the configuration file', () => {
			const settings = resolvePlannerSettings(
				{ maxPtu: 200, discount: 0 },
				{ maxPtu: 50, minPtu: 20, discount: 10, model: 'gpt-4o' },
			);
			expect(settings.maxPtu).toBe(200);
			expect(settings.discount).toBe(0);
			expect(settings.minPtu).toBe(20);
			expect(settings.model).toBe('gpt-4o');
		});
	});
}
