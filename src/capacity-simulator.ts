import type { MinuteBucket, SimulationResult } from './_types.ts';
import { DEFAULT_BUCKET_MINUTES } from './_consts.ts';
import { getBucketWidthMs } from './bucket-aggregator.ts';
import { ConfigurationError, DataError } from './errors.ts';

export type BucketAllocation = {
	utilizationPct: number;
	ptuInputTokens: number;
	ptuOutputTokens: number;
	paygoInputTokens: number;
	paygoOutputTokens: number;
};

export type SimulateOptions = {
	bucketMinutes?: number;
};

export function validateCapacity(capacityTpm: number): void {
	if (!Number.isFinite(capacityTpm) || capacityTpm <= 0) {
		throw new ConfigurationError('invalid-capacity', `PTU capacity must be greater than 0 tokens per minute (got ${capacityTpm})`);
	}
}

function clipPercentage(value: number): number {
	return Math.min(100, Math.max(0, value));
}

/**
 * Splits one bucket between PTU and PAYGO.
 *
 * Demand at or below capacity is served entirely by PTU. Above capacity, PTU
 * serves `capacity / demand` of both token kinds and the rest spills to PAYGO,
 * so served and spilled traffic keep the bucket's input/output ratio. Served
 * counts are rounded to whole tokens and the spill is the exact remainder.
 */
export function allocateBucket(bucket: MinuteBucket, bucketCapacity: number): BucketAllocation {
	const utilizationPct = clipPercentage((bucket.weightedDemand / bucketCapacity) * 100);

	if (bucket.weightedDemand <= bucketCapacity) {
		return {
			utilizationPct,
			ptuInputTokens: bucket.inputTokens,
			ptuOutputTokens: bucket.outputTokens,
			paygoInputTokens: 0,
			paygoOutputTokens: 0,
		};
	}

	const servedFraction = bucketCapacity / bucket.weightedDemand;
	const ptuInputTokens = Math.round(bucket.inputTokens * servedFraction);
	const ptuOutputTokens = Math.round(bucket.outputTokens * servedFraction);

	return {
		utilizationPct,
		ptuInputTokens,
		ptuOutputTokens,
		paygoInputTokens: bucket.inputTokens - ptuInputTokens,
		paygoOutputTokens: bucket.outputTokens - ptuOutputTokens,
	};
}

function assertAscending(buckets: readonly MinuteBucket[]): void {
	let previous = Number.NEGATIVE_INFINITY;
	for (const [index, bucket] of buckets.entries()) {
		const time = bucket.start.getTime();
		if (Number.isNaN(time)) {
			throw new DataError('invalid-timestamp', `Bucket ${index} has an unparseable start time`);
		}
		if (time <= previous) {
			throw new DataError('non-monotonic-buckets', `Bucket ${index} (${bucket.start.toISOString()}) does not follow the previous bucket`);
		}
		previous = time;
	}
}

/**
 * Simulates a provisioned capacity against the bucketed traffic.
 *
 * Capacity resets every bucket: nothing carries over from idle minutes and
 * nothing is borrowed from later ones. Mean utilization is the plain average
 * of per-bucket utilization, not weighted by traffic volume.
 */
export function simulateCapacity(
	buckets: readonly MinuteBucket[],
	capacityTpm: number,
	options: SimulateOptions = {},
): SimulationResult {
	validateCapacity(capacityTpm);
	if (buckets.length === 0) {
		throw new DataError('empty-dataset', 'Cannot simulate capacity without traffic buckets');
	}
	assertAscending(buckets);

	const bucketMinutes = options.bucketMinutes ?? DEFAULT_BUCKET_MINUTES;
	getBucketWidthMs(bucketMinutes);
	const bucketCapacity = capacityTpm * bucketMinutes;

	let ptuInputTokens = 0;
	let ptuOutputTokens = 0;
	let paygoInputTokens = 0;
	let paygoOutputTokens = 0;
	let utilizationSum = 0;
	const minuteUtilizations: number[] = [];

	for (const bucket of buckets) {
		const allocation = allocateBucket(bucket, bucketCapacity);
		ptuInputTokens += allocation.ptuInputTokens;
		ptuOutputTokens += allocation.ptuOutputTokens;
		paygoInputTokens += allocation.paygoInputTokens;
		paygoOutputTokens += allocation.paygoOutputTokens;
		utilizationSum += allocation.utilizationPct;
		minuteUtilizations.push(allocation.utilizationPct);
	}

	return {
		capacityTpm,
		ptuInputTokens,
		ptuOutputTokens,
		paygoInputTokens,
		paygoOutputTokens,
		meanUtilizationPct: utilizationSum / buckets.length,
		minuteUtilizations,
	};
}

if (import.meta.vitest != null) {
	function bucket(minute: number, inputTokens: number, outputTokens: number, outputWeight: number): MinuteBucket {
		return {
			start: new Date(Date.UTC(2025, 7, 18, 0, minute)),
			requestCount: 1,
			inputTokens,
			outputTokens,
			weightedDemand: inputTokens + outputTokens * outputWeight,
		};
	}

	describe('allocateBucket', () => {
		it('keeps each spilled token count within half a token of the proportional share', () => {
			// demand 3 + 1 * 4 = 7 against capacity 2: 5/7 of each kind spills
			const allocation = allocateBucket(bucket(0, 3, 1, 4), 2);
			expect(allocation.paygoInputTokens).toBe(2);
			expect(allocation.paygoOutputTokens).toBe(1);
			expect(Math.abs(allocation.paygoInputTokens - 3 * 5 / 7)).toBeLessThanOrEqual(0.5);
			expect(Math.abs(allocation.paygoOutputTokens - 1 * 5 / 7)).toBeLessThanOrEqual(0.5);
		});

		it('stays within half a token per kind across uneven buckets', () => {
			const capacity = 4;
			for (const [input, output] of [[3, 1], [97, 13], [1, 40], [1234, 567], [61, 0]] as const) {
				const source = bucket(0, input, output, 2.5);
				const allocation = allocateBucket(source, capacity);
				const spilledShare = (source.weightedDemand - capacity) / source.weightedDemand;
				expect(Math.abs(allocation.paygoInputTokens - input * spilledShare)).toBeLessThanOrEqual(0.5);
				expect(Math.abs(allocation.paygoOutputTokens - output * spilledShare)).toBeLessThanOrEqual(0.5);
				expect(allocation.ptuInputTokens + allocation.paygoInputTokens).toBe(input);
				expect(allocation.ptuOutputTokens + allocation.paygoOutputTokens).toBe(output);
			}
		});
	});

	describe('simulateCapacity', () => {
		it('spills half of an input-only bucket at double demand', () => {
			const result = simulateCapacity([bucket(0, 1000, 0, 4)], 500);
			expect(result).toEqual({
				capacityTpm: 500,
				ptuInputTokens: 500,
				ptuOutputTokens: 0,
				paygoInputTokens: 500,
				paygoOutputTokens: 0,
				meanUtilizationPct: 100,
				minuteUtilizations: [100],
			});
		});

		it('serves everything below capacity', () => {
			const result = simulateCapacity([bucket(0, 100, 100, 4)], 1000);
			expect(result.ptuInputTokens).toBe(100);
			expect(result.ptuOutputTokens).toBe(100);
			expect(result.paygoInputTokens).toBe(0);
			expect(result.paygoOutputTokens).toBe(0);
			expect(result.meanUtilizationPct).toBe(50);
		});

		it('averages utilization per bucket instead of per token', () => {
			const result = simulateCapacity([bucket(0, 800, 0, 4), bucket(1, 0, 0, 4)], 1000);
			expect(result.minuteUtilizations).toEqual([80, 0]);
			expect(result.meanUtilizationPct).toBe(40);
		});

		it('routes demand equal to capacity entirely to PTU', () => {
			const result = simulateCapacity([bucket(0, 200, 200, 4)], 1000);
			expect(result.ptuInputTokens).toBe(200);
			expect(result.ptuOutputTokens).toBe(200);
			expect(result.paygoInputTokens).toBe(0);
			expect(result.paygoOutputTokens).toBe(0);
			expect(result.minuteUtilizations).toEqual([100]);
		});

		it('keeps the input/output ratio of spilled traffic', () => {
			const result = simulateCapacity([bucket(0, 300, 100, 4)], 350);
			expect(result.ptuInputTokens).toBe(150);
			expect(result.ptuOutputTokens).toBe(50);
			expect(result.paygoInputTokens / result.paygoOutputTokens).toBeCloseTo(300 / 100, 10);
			expect(result.ptuInputTokens / result.ptuOutputTokens).toBeCloseTo(300 / 100, 10);
		});

		it('rounds served tokens to within half a token of the proportional share', () => {
			const item = bucket(0, 1000, 333, 2);
			const result = simulateCapacity([item], 1000);
			const servedFraction = 1000 / item.weightedDemand;
			expect(Math.abs(result.ptuInputTokens - 1000 * servedFraction)).toBeLessThanOrEqual(0.5);
			expect(Math.abs(result.ptuOutputTokens - 333 * servedFraction)).toBeLessThanOrEqual(0.5);
			expect(result.ptuInputTokens).toBe(600);
			expect(result.ptuOutputTokens).toBe(200);
		});

		it('conserves tokens exactly for every capacity', () => {
			const buckets = [
				bucket(0, 1234, 567, 4),
				bucket(1, 89, 4321, 4),
				bucket(2, 0, 0, 4),
				bucket(3, 77777, 1, 4),
				bucket(4, 13, 17, 4),
			];
			const totalInput = buckets.reduce((sum, item) => sum + item.inputTokens, 0);
			const totalOutput = buckets.reduce((sum, item) => sum + item.outputTokens, 0);

			for (const capacity of [1, 7, 333, 1000, 5000, 20000, 100000]) {
				const result = simulateCapacity(buckets, capacity);
				expect(result.ptuInputTokens + result.paygoInputTokens).toBe(totalInput);
				expect(result.ptuOutputTokens + result.paygoOutputTokens).toBe(totalOutput);
			}
		});

		it('never serves fewer tokens when capacity grows', () => {
			const buckets = [
				bucket(0, 5000, 1000, 4),
				bucket(1, 200, 50, 4),
				bucket(2, 12000, 3000, 4),
			];
			let previous = -1;
			for (let capacity = 100; capacity <= 30000; capacity += 100) {
				const result = simulateCapacity(buckets, capacity);
				const served = result.ptuInputTokens + result.ptuOutputTokens;
				expect(served).toBeGreaterThanOrEqual(previous);
				previous = served;
			}
		});

		it('returns bit-identical results when aggregating and simulating again', async () => {
			const { aggregateMinuteBuckets } = await import('./bucket-aggregator.ts');
			const requests = [
				{ timestamp: new Date('2025-08-18T00:01:40Z'), inputTokens: 333, outputTokens: 17 },
				{ timestamp: new Date('2025-08-18T00:00:05Z'), inputTokens: 900, outputTokens: 100 },
				{ timestamp: new Date('2025-08-18T00:01:10Z'), inputTokens: 10, outputTokens: 10 },
				{ timestamp: new Date('2025-08-18T00:00:30Z'), inputTokens: 1, outputTokens: 7 },
			];
			const run = () => simulateCapacity(aggregateMinuteBuckets(requests, { outputWeight: 3.7 }), 700);
			const first = run();
			const second = run();

			for (const key of ['capacityTpm', 'ptuInputTokens', 'ptuOutputTokens', 'paygoInputTokens', 'paygoOutputTokens', 'meanUtilizationPct'] as const) {
				expect(Object.is(first[key], second[key])).toBe(true);
			}
			expect(second.minuteUtilizations).toHaveLength(first.minuteUtilizations.length);
			for (const [index, value] of first.minuteUtilizations.entries()) {
				expect(Object.is(value, second.minuteUtilizations[index])).toBe(true);
			}
		});

		it('scales capacity with the bucket width', () => {
			const result = simulateCapacity([bucket(0, 1000, 0, 1)], 200, { bucketMinutes: 5 });
			expect(result.paygoInputTokens).toBe(0);
			expect(result.meanUtilizationPct).toBe(100);
		});

		it('rejects non-positive capacity', () => {
			expect(() => simulateCapacity([bucket(0, 1, 1, 1)], 0)).toThrow(ConfigurationError);
			expect(() => simulateCapacity([bucket(0, 1, 1, 1)], -5)).toThrow('PTU capacity must be greater than 0');
		});

		it('rejects empty and out-of-order buckets', () => {
			expect(() => simulateCapacity([], 100)).toThrow(DataError);
			expect(() => simulateCapacity([bucket(2, 1, 1, 1), bucket(1, 1, 1, 1)], 100))
				.toThrow(expect.objectContaining({ code: 'non-monotonic-buckets' }));
		});
	});
}
