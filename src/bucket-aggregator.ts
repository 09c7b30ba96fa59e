import type { MinuteBucket, UsageRequest } from './_types.ts';
import { DEFAULT_BUCKET_MINUTES, MINUTE_MS } from './_consts.ts';
import { ConfigurationError, DataError } from './errors.ts';
import { addTotals, createEmptyTotals, getWeightedDemand } from './token-utils.ts';

export type AggregateOptions = {
	outputWeight: number;
	/** Width of each time bucket, one minute unless configured otherwise */
	bucketMinutes?: number;
};

export type DatasetSpan = {
	start: Date;
	end: Date;
	spanMs: number;
};

type BucketAccumulator = {
	requestCount: number;
	inputTokens: number;
	outputTokens: number;
};

export function getBucketWidthMs(bucketMinutes = DEFAULT_BUCKET_MINUTES): number {
	if (!Number.isInteger(bucketMinutes) || bucketMinutes <= 0) {
		throw new ConfigurationError('invalid-bucket-width', `Bucket width must be a positive whole number of minutes (got ${bucketMinutes})`);
	}
	return bucketMinutes * MINUTE_MS;
}

/**
 * Floors a timestamp to the start of its bucket (UTC epoch aligned)
 */
export function floorToBucket(timestamp: Date, bucketMs: number): number {
	const time = timestamp.getTime();
	const offset = ((time % bucketMs) + bucketMs) % bucketMs;
	return time - offset;
}

function assertTokenCount(value: number, field: string, index: number): void {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new DataError('invalid-token-count', `Request ${index} has an invalid ${field} value: ${value}`);
	}
}

/**
 * Groups requests into fixed-width time buckets sorted by start time.
 *
 * Only buckets containing at least one request are produced. Output tokens are
 * weighted once per bucket from the summed counts.
 */
export function aggregateMinuteBuckets(
	requests: readonly UsageRequest[],
	options: AggregateOptions,
): MinuteBucket[] {
	const { outputWeight } = options;
	if (!Number.isFinite(outputWeight) || outputWeight < 0) {
		throw new ConfigurationError('invalid-price', `Output weight must be a finite non-negative number (got ${outputWeight})`);
	}
	const bucketMs = getBucketWidthMs(options.bucketMinutes);

	const accumulators = new Map<number, BucketAccumulator>();
	for (const [index, request] of requests.entries()) {
		if (Number.isNaN(request.timestamp.getTime())) {
			throw new DataError('invalid-timestamp', `Request ${index} has an unparseable timestamp`);
		}
		assertTokenCount(request.inputTokens, 'input token', index);
		assertTokenCount(request.outputTokens, 'output token', index);

		const key = floorToBucket(request.timestamp, bucketMs);
		const current = accumulators.get(key) ?? { requestCount: 0, ...createEmptyTotals() };
		current.requestCount += 1;
		addTotals(current, request);
		accumulators.set(key, current);
	}

	return [...accumulators.keys()]
		.sort((a, b) => a - b)
		.map((key) => {
			const accumulator = accumulators.get(key) ?? { requestCount: 0, ...createEmptyTotals() };
			return {
				start: new Date(key),
				requestCount: accumulator.requestCount,
				inputTokens: accumulator.inputTokens,
				outputTokens: accumulator.outputTokens,
				weightedDemand: getWeightedDemand(accumulator, outputWeight),
			};
		});
}

/**
 * Wall-clock span covered by the buckets: from the first bucket start to the
 * end of the last bucket. A single bucket spans one bucket width.
 */
export function getDatasetSpan(buckets: readonly MinuteBucket[], bucketMinutes = DEFAULT_BUCKET_MINUTES): DatasetSpan {
	const first = buckets[0];
	const last = buckets.at(-1);
	if (first == null || last == null) {
		throw new DataError('empty-dataset', 'Dataset contains no requests');
	}
	const end = new Date(last.start.getTime() + getBucketWidthMs(bucketMinutes));
	return {
		start: first.start,
		end,
		spanMs: end.getTime() - first.start.getTime(),
	};
}

if (import.meta.vitest != null) {
	const { normalizeRequest } = await import('./token-utils.ts');

	function request(timestamp: string, inputTokens: number, outputTokens: number): UsageRequest {
		return { timestamp: new Date(timestamp), inputTokens, outputTokens };
	}

	describe('aggregateMinuteBuckets', () => {
		it('returns no buckets for no requests', () => {
			expect(aggregateMinuteBuckets([], { outputWeight: 4 })).toEqual([]);
		});

		it('creates one bucket for a single request', () => {
			const buckets = aggregateMinuteBuckets([request('2025-08-18T00:00:38.941Z', 100, 50)], { outputWeight: 4 });
			expect(buckets).toEqual([
				{
					start: new Date('2025-08-18T00:00:00.000Z'),
					requestCount: 1,
					inputTokens: 100,
					outputTokens: 50,
					weightedDemand: 300,
				},
			]);
		});

		it('sums requests that share a minute and sorts unordered input', () => {
			const buckets = aggregateMinuteBuckets([
				request('2025-08-18T00:02:10Z', 10, 1),
				request('2025-08-18T00:00:05Z', 100, 20),
				request('2025-08-18T00:00:59.999Z', 200, 30),
			], { outputWeight: 2 });

			expect(buckets.map(bucket => bucket.start.toISOString())).toEqual([
				'2025-08-18T00:00:00.000Z',
				'2025-08-18T00:02:00.000Z',
			]);
			expect(buckets[0]).toMatchObject({ requestCount: 2, inputTokens: 300, outputTokens: 50, weightedDemand: 400 });
			expect(buckets[1]).toMatchObject({ requestCount: 1, inputTokens: 10, outputTokens: 1, weightedDemand: 12 });
		});

		it('weights per bucket the same as summing per-request weights', () => {
			const requests = [
				request('2025-08-18T10:15:01Z', 123, 45),
				request('2025-08-18T10:15:20Z', 77, 300),
				request('2025-08-18T10:15:59Z', 5, 0),
				request('2025-08-18T10:16:00Z', 999, 1),
			];
			const outputWeight = 4;
			const buckets = aggregateMinuteBuckets(requests, { outputWeight });

			const perRequest = new Map<number, number>();
			for (const item of requests) {
				const key = floorToBucket(item.timestamp, MINUTE_MS);
				perRequest.set(key, (perRequest.get(key) ?? 0) + normalizeRequest(item, outputWeight));
			}

			for (const bucket of buckets) {
				expect(bucket.weightedDemand).toBe(perRequest.get(bucket.start.getTime()));
			}
		});

		it('supports wider buckets', () => {
			const buckets = aggregateMinuteBuckets([
				request('2025-08-18T00:01:00Z', 10, 0),
				request('2025-08-18T00:04:59Z', 20, 0),
				request('2025-08-18T00:05:00Z', 30, 0),
			], { outputWeight: 1, bucketMinutes: 5 });
			expect(buckets.map(bucket => bucket.inputTokens)).toEqual([30, 30]);
		});

		it('rejects unparseable timestamps', () => {
			expect(() => aggregateMinuteBuckets([request('not a date', 1, 1)], { outputWeight: 1 })).toThrow(DataError);
		});

		it('rejects negative or fractional token counts', () => {
			expect(() => aggregateMinuteBuckets([request('2025-08-18T00:00:00Z', -1, 0)], { outputWeight: 1 }))
				.toThrow('Request 0 has an invalid input token value: -1');
			expect(() => aggregateMinuteBuckets([request('2025-08-18T00:00:00Z', 1, 0.5)], { outputWeight: 1 }))
				.toThrow('Request 0 has an invalid output token value: 0.5');
		});

		it('rejects invalid bucket widths', () => {
			expect(() => aggregateMinuteBuckets([], { outputWeight: 1, bucketMinutes: 0 })).toThrow(ConfigurationError);
			expect(() => aggregateMinuteBuckets([], { outputWeight: 1, bucketMinutes: 1.5 })).toThrow(ConfigurationError);
		});
	});

	describe('getDatasetSpan', () => {
		it('spans one bucket for a single bucket', () => {
			const buckets = aggregateMinuteBuckets([request('2025-08-18T00:00:30Z', 1, 1)], { outputWeight: 1 });
			const span = getDatasetSpan(buckets);
			expect(span.spanMs).toBe(MINUTE_MS);
			expect(span.end.toISOString()).toBe('2025-08-18T00:01:00.000Z');
		});

		it('covers first to last bucket inclusive', () => {
			const buckets = aggregateMinuteBuckets([
				request('2025-08-18T00:00:30Z', 1, 1),
				request('2025-08-18T01:59:00Z', 1, 1),
			], { outputWeight: 1 });
			expect(getDatasetSpan(buckets).spanMs).toBe(120 * MINUTE_MS);
		});

		it('rejects an empty dataset', () => {
			expect(() => getDatasetSpan([])).toThrow(DataError);
		});
	});

	describe('floorToBucket', () => {
		it('floors timestamps before the epoch', () => {
			expect(floorToBucket(new Date(-1), MINUTE_MS)).toBe(-MINUTE_MS);
		});
	});
}
