/**
 * Format a number as tokens with locale-specific formatting
 * @param value - Token count to format
 * @returns Formatted token string
 */
export function formatTokens(value: number): string {
	return new Intl.NumberFormat('en-US').format(Math.round(value));
}

/**
 * Format a number as USD currency with two decimals
 * @param value - Amount in USD
 * @param locale - Locale for formatting (default: 'en-US')
 * @returns Formatted currency string
 */
export function formatCurrency(value: number, locale?: string): string {
	return new Intl.NumberFormat(locale ?? 'en-US', {
		style: 'currency',
		currency: 'USD',
		minimumFractionDigits: 2,
		maximumFractionDigits: 2,
	}).format(value);
}

export function formatPercent(value: number, fractionDigits = 1): string {
	return `${value.toFixed(fractionDigits)}%`;
}

/**
 * Percentage with an explicit sign, e.g. "+4.2%" or "-12.0%"
 */
export function formatSignedPercent(value: number, fractionDigits = 1): string {
	const sign = value > 0 ? '+' : '';
	return `${sign}${value.toFixed(fractionDigits)}%`;
}

export function formatDays(days: number): string {
	return `${days.toFixed(1)} days`;
}

if (import.meta.vitest != null) {
	describe('formatTokens', () => {
		it('rounds and groups thousands', () => {
			expect(formatTokens(1234567.6)).toBe('1,234,568');
			expect(formatTokens(0)).toBe('0');
		});
	});

	describe('formatCurrency', () => {
		it('formats USD with two decimals', () => {
			expect(formatCurrency(1234.567)).toBe('$1,234.57');
			expect(formatCurrency(0)).toBe('$0.00');
			expect(formatCurrency(-10)).toBe('-$10.00');
		});
	});

	describe('formatSignedPercent', () => {
		it('signs positive values only', () => {
			expect(formatSignedPercent(4.24)).toBe('+4.2%');
			expect(formatSignedPercent(-12)).toBe('-12.0%');
			expect(formatSignedPercent(0)).toBe('0.0%');
		});
	});

	describe('formatPercent', () => {
		it('uses one decimal by default', () => {
			expect(formatPercent(66.666)).toBe('66.7%');
			expect(formatPercent(50, 0)).toBe('50%');
		});
	});

	describe('formatDays', () => {
		it('uses one decimal', () => {
			expect(formatDays(10.04)).toBe('10.0 days');
		});
	});
}
