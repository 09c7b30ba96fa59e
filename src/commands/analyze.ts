import type { AnalysisReport, AnalysisRow } from '../analysis.ts';
import process from 'node:process';
import { define } from 'gunshi';
import pc from 'picocolors';
import { loadConfig, resolvePlannerSettings } from '../_config-loader.ts';
import { analysisRowsToCsv, validateCsvJsonExclusive } from '../_csv-output.ts';
import { plannerArgs, sharedArgs } from '../_shared-args.ts';
import { runPtuAnalysis } from '../analysis.ts';
import { requireFile, resolveModelContext, summarizeRecommendation } from '../command-utils.ts';
import { loadUsageCsv } from '../data-loader.ts';
import { isPlannerError } from '../errors.ts';
import { formatCurrency, formatDays, formatPercent, formatSignedPercent, formatTokens } from '../format.ts';
import { log, logger } from '../logger.ts';
import { resolveStrategy } from '../optimization.ts';
import { resolvePricingScheme } from '../pricing.ts';
import { ResponsiveTable } from '../table.ts';

function formatRowCells(row: AnalysisRow): string[] {
	return [
		row.ptuCount === 0 ? 'PAYGO' : String(row.ptuCount),
		formatTokens(row.capacityTpm),
		formatPercent(row.ptuTokenSharePct),
		formatPercent(row.meanUtilizationPct),
		formatCurrency(row.ptuCost),
		formatCurrency(row.paygoCost),
		formatCurrency(row.totalCost),
		row.ptuCount === 0 ? '-' : formatSignedPercent(row.costDiffPct),
	];
}

function renderReportTable(report: AnalysisReport, forceCompact: boolean): string {
	const table = new ResponsiveTable({
		head: ['PTUs', 'Capacity TPM', 'PTU Share', 'Utilization', 'PTU Cost', 'PAYGO Cost', 'Total Cost', 'vs PAYGO'],
		colAligns: ['right', 'right', 'right', 'right', 'right', 'right', 'right', 'right'],
		style: { head: ['cyan'] },
		compactHead: ['PTUs', 'PTU Share', 'Total Cost', 'vs PAYGO'],
		forceCompact,
	});

	const recommended = report.recommendation?.ptuCount;
	for (const row of report.rows) {
		const cells = formatRowCells(row);
		table.push(row.ptuCount === recommended ? cells.map(cell => pc.green(pc.bold(cell))) : cells);
	}

	return table.toString();
}

export const analyzeCommand = define({
	name: 'analyze',
	description: 'Simulate PTU capacities against recorded traffic and recommend a PTU count',
	args: {
		...sharedArgs,
		...plannerArgs,
	},
	toKebab: true,
	async run(ctx) {
		const jsonOutput = ctx.values.json;
		const csvOutput = ctx.values.csv;
		if (jsonOutput || csvOutput) {
			logger.level = 0;
		}

		try {
			validateCsvJsonExclusive(jsonOutput, csvOutput);

			const config = loadConfig(ctx.values.config);
			const settings = resolvePlannerSettings(ctx.values, config);
			const { pricing, tpmPerUnit } = await resolveModelContext({
				model: settings.model,
				pricingFile: settings.pricing,
				tpmPerUnit: settings.tpmPerUnit,
				inputPrice: ctx.values.inputPrice,
				outputPrice: ctx.values.outputPrice,
			});
			const scheme = resolvePricingScheme(settings.scheme, {
				discountPct: settings.discount,
				unitCost: settings.unitCost,
			});
			const strategy = resolveStrategy(settings.strategy);

			const requests = await loadUsageCsv(requireFile(ctx.values.file), {
				since: ctx.values.since,
				until: ctx.values.until,
			});

			const report = runPtuAnalysis(requests, {
				pricing,
				scheme,
				tpmPerUnit,
				minPtu: settings.minPtu,
				maxPtu: settings.maxPtu,
				step: settings.step,
				horizon: settings.horizon,
				strategy,
				bucketMinutes: settings.bucketMinutes,
			});
			const summary = summarizeRecommendation(report);

			if (jsonOutput) {
				log(JSON.stringify({
					model: report.pricing,
					scheme: report.scheme,
					tpmPerUnit,
					outputWeight: report.outputWeight,
					basis: report.basis,
					overview: report.overview,
					outcome: {
						kind: report.outcome.kind,
						strategy: report.outcome.strategy,
						selected: report.outcome.kind === 'optimal' ? report.outcome.selected.candidate.ptuCount : null,
						largest: report.outcome.kind === 'range-exceeded' ? report.outcome.largest?.candidate.ptuCount ?? null : null,
						suggestedMaxPtu: report.suggestedMaxPtu ?? null,
					},
					recommendation: report.recommendation ?? null,
					rows: report.rows,
				}, null, 2));
				return;
			}

			if (csvOutput) {
				log(analysisRowsToCsv(report.rows, report.recommendation?.ptuCount));
				return;
			}

			const { overview } = report;
			logger.box(`PTU vs PAYGO Analysis - ${pricing.model}, ${scheme.label}${scheme.discountPct > 0 ? ` (${scheme.discountPct}% discount)` : ''}`);
			log(`Requests: ${formatTokens(overview.totalRequests)} over ${formatDays(overview.durationDays)}`);
			log(`Tokens: ${formatTokens(overview.totalInputTokens)} input, ${formatTokens(overview.totalOutputTokens)} output (output weight ${report.outputWeight.toFixed(2)})`);
			log(`Peak demand: ${formatTokens(overview.peakWeightedTpm)} weighted TPM, ${formatTokens(tpmPerUnit)} TPM per PTU`);
			log(`Costs projected per ${report.basis.horizon} (x${report.basis.annualizationFactor.toFixed(2)})`);
			log('');
			log(renderReportTable(report, ctx.values.compact));
			log('');

			if (report.outcome.kind === 'range-exceeded') {
				for (const line of summary) {
					logger.warn(line);
				}
				return;
			}

			for (const line of summary) {
				log(pc.bold(line));
			}
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
