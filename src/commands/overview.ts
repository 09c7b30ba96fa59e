import process from 'node:process';
import { define } from 'gunshi';
import { loadConfig, resolvePlannerSettings } from '../_config-loader.ts';
import { dailyStatsToCsv, validateCsvJsonExclusive } from '../_csv-output.ts';
import { sharedArgs } from '../_shared-args.ts';
import { summarizeByDate, summarizeDataset } from '../analysis.ts';
import { aggregateMinuteBuckets } from '../bucket-aggregator.ts';
import { requireFile, resolveModelContext } from '../command-utils.ts';
import { loadUsageCsv } from '../data-loader.ts';
import { isPlannerError } from '../errors.ts';
import { formatDays, formatTokens } from '../format.ts';
import { log, logger } from '../logger.ts';
import { ResponsiveTable } from '../table.ts';
import { getOutputWeight } from '../token-utils.ts';

export const overviewCommand = define({
	name: 'overview',
	description: 'Show request and token statistics of a usage export, per date',
	args: sharedArgs,
	toKebab: true,
	async run(ctx) {
		const jsonOutput = ctx.values.json;
		const csvOutput = ctx.values.csv;
		if (jsonOutput || csvOutput) {
			logger.level = 0;
		}

		try {
			validateCsvJsonExclusive(jsonOutput, csvOutput);

			const settings = resolvePlannerSettings(ctx.values, loadConfig(ctx.values.config));
			const { pricing } = await resolveModelContext({
				model: settings.model,
				pricingFile: settings.pricing,
				inputPrice: ctx.values.inputPrice,
				outputPrice: ctx.values.outputPrice,
			});
			const requests = await loadUsageCsv(requireFile(ctx.values.file), {
				since: ctx.values.since,
				until: ctx.values.until,
			});

			const outputWeight = getOutputWeight(pricing);
			const buckets = aggregateMinuteBuckets(requests, { outputWeight, bucketMinutes: settings.bucketMinutes });
			const overview = summarizeDataset(buckets, settings.bucketMinutes);
			const daily = summarizeByDate(buckets, settings.bucketMinutes);

			if (jsonOutput) {
				log(JSON.stringify({ model: pricing.model, outputWeight, overview, daily }, null, 2));
				return;
			}

			if (csvOutput) {
				log(dailyStatsToCsv(daily));
				return;
			}

			logger.box(`Usage Overview - ${overview.start.toISOString()} to ${overview.end.toISOString()}`);
			log(`Requests: ${formatTokens(overview.totalRequests)} over ${formatDays(overview.durationDays)}`);
			log(`Input tokens: ${formatTokens(overview.totalInputTokens)}`);
			log(`Output tokens: ${formatTokens(overview.totalOutputTokens)}`);
			log(`Peak TPM: ${formatTokens(overview.peakTpm)} (weighted ${formatTokens(overview.peakWeightedTpm)} at output weight ${outputWeight.toFixed(2)} for ${pricing.model})`);
			log(`Average TPM: ${formatTokens(overview.averageTpm)} over ${formatTokens(overview.activeBuckets)} active buckets`);
			log('');

			const table = new ResponsiveTable({
				head: ['Date', 'Requests', 'Input', 'Output', 'Active Minutes', 'Peak TPM', 'Average TPM'],
				colAligns: ['left', 'right', 'right', 'right', 'right', 'right', 'right'],
				style: { head: ['cyan'] },
				compactHead: ['Date', 'Requests', 'Peak TPM', 'Average TPM'],
				forceCompact: ctx.values.compact,
			});
			for (const day of daily) {
				table.push([
					day.date,
					formatTokens(day.requests),
					formatTokens(day.inputTokens),
					formatTokens(day.outputTokens),
					formatTokens(day.activeBuckets),
					formatTokens(day.peakTpm),
					formatTokens(day.averageTpm),
				]);
			}
			log(table.toString());
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
