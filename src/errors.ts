export type ConfigurationErrorCode =
	| 'invalid-capacity'
	| 'invalid-price'
	| 'unknown-scheme'
	| 'unknown-model'
	| 'invalid-discount'
	| 'invalid-sweep'
	| 'invalid-bucket-width'
	| 'invalid-option'
	| 'invalid-config-file';

export type DataErrorCode =
	| 'empty-dataset'
	| 'invalid-timestamp'
	| 'non-monotonic-buckets'
	| 'invalid-token-count'
	| 'missing-column'
	| 'unreadable-file';

/**
 * Invalid run configuration. Raised before any simulation executes.
 */
export class ConfigurationError extends Error {
	readonly code: ConfigurationErrorCode;

	constructor(code: ConfigurationErrorCode, message: string) {
		super(message);
		this.name = 'ConfigurationError';
		this.code = code;
	}
}

/**
 * Dataset cannot be simulated as a whole. Rows are never dropped to recover.
 */
export class DataError extends Error {
	readonly code: DataErrorCode;

	constructor(code: DataErrorCode, message: string) {
		super(message);
		this.name = 'DataError';
		this.code = code;
	}
}

export function isPlannerError(error: unknown): error is ConfigurationError | DataError {
	return error instanceof ConfigurationError || error instanceof DataError;
}

if (import.meta.vitest != null) {
	describe('planner errors', () => {
		it('keeps name and code', () => {
			const error = new ConfigurationError('invalid-capacity', 'Capacity must be positive');
			expect(error).toBeInstanceOf(Error);
			expect(error.name).toBe('ConfigurationError');
			expect(error.code).toBe('invalid-capacity');
			expect(error.message).toBe('Capacity must be positive');
		});

		it('recognizes planner errors only', () => {
			expect(isPlannerError(new DataError('empty-dataset', 'empty'))).toBe(true);
			expect(isPlannerError(new ConfigurationError('invalid-price', 'price'))).toBe(true);
			expect(isPlannerError(new Error('other'))).toBe(false);
			expect(isPlannerError('text')).toBe(false);
		});
	});
}
