/**
 * Escapes a value for CSV format
 * @param value - The value to escape
 * @returns Escaped value suitable for CSV
 */
export function escapeCsvValue(value: string | number | boolean | null | undefined): string {
	if (value == null) {
		return '';
	}

	const stringValue = String(value);

	if (
		stringValue.includes(',')
		|| stringValue.includes('"')
		|| stringValue.includes('\n')
		|| stringValue.includes('\r')
	) {
		const escaped = stringValue.replace(/"/g, '""');
		return `"${escaped}"`;
	}

	return stringValue;
}

/**
 * Converts an array of objects to CSV format
 * @param data - Array of objects to convert
 * @param headers - Optional custom headers, matched to object keys by position
 * @returns CSV string with headers and data
 */
export function arrayToCsv<T extends Record<string, string | number | boolean | null | undefined>>(
	data: readonly T[],
	headers?: readonly string[],
): string {
	const firstItem = data[0];
	if (firstItem == null) {
		return headers != null ? headers.map(escapeCsvValue).join(',') : '';
	}

	const keys = Object.keys(firstItem);
	const columnHeaders = headers ?? keys;

	const headerRow = columnHeaders.map(escapeCsvValue).join(',');
	const dataRows = data.map(row => columnHeaders
		.map((_, index) => {
			const key = keys[index];
			return escapeCsvValue(key != null ? row[key] : undefined);
		})
		.join(','));

	return [headerRow, ...dataRows].join('\n');
}

/**
 * Splits CSV text into rows of fields.
 *
 * Quoted fields may contain commas, doubled quotes and line breaks. Both LF and
 * CRLF line endings are accepted. Blank lines are dropped.
 */
export function parseCsv(text: string): string[][] {
	const rows: string[][] = [];
	let row: string[] = [];
	let field = '';
	let inQuotes = false;
	let index = text.startsWith('\uFEFF') ? 1 : 0;

	const endRow = (): void => {
		row.push(field);
		field = '';
		if (row.length > 1 || row[0] !== '') {
			rows.push(row);
		}
		row = [];
	};

	for (; index < text.length; index++) {
		const char = text[index];

		if (inQuotes) {
			if (char === '"') {
				if (text[index + 1] === '"') {
					field += '"';
					index++;
				}
				else {
					inQuotes = false;
				}
			}
			else {
				field += char;
			}
			continue;
		}

		if (char === '"') {
			inQuotes = true;
		}
		else if (char === ',') {
			row.push(field);
			field = '';
		}
		else if (char === '\n') {
			endRow();
		}
		else if (char === '\r') {
			if (text[index + 1] === '\n') {
				index++;
			}
			endRow();
		}
		else {
			field += char;
		}
	}

	if (field !== '' || row.length > 0) {
		endRow();
	}

	return rows;
}

if (import.meta.vitest != null) {
	describe('escapeCsvValue', () => {
		it('should return empty string for null/undefined', () => {
			expect(escapeCsvValue(null)).toBe('');
			expect(escapeCsvValue(undefined)).toBe('');
		});

		it('should convert numbers and booleans to strings', () => {
			expect(escapeCsvValue(123.456)).toBe('123.456');
			expect(escapeCsvValue(true)).toBe('true');
		});

		it('should quote and escape strings with commas or quotes', () => {
			expect(escapeCsvValue('hello,world')).toBe('"hello,world"');
			expect(escapeCsvValue('say "hello"')).toBe('"say ""hello"""');
		});

		it('should quote strings with newlines', () => {
			expect(escapeCsvValue('line1\r\nline2')).toBe('"line1\r\nline2"');
		});
	});

	describe('arrayToCsv', () => {
		it('should handle empty array', () => {
			expect(arrayToCsv([])).toBe('');
			expect(arrayToCsv([], ['col1', 'col2'])).toBe('col1,col2');
		});

		it('should use object keys as headers', () => {
			const data = [
				{ ptus: 15, cost: 1200.5 },
				{ ptus: 20, cost: 1600 },
			];
			expect(arrayToCsv(data)).toBe('ptus,cost\n15,1200.5\n20,1600');
		});

		it('should map custom headers by position', () => {
			const data = [{ ptus: 15, scheme: 'Hourly - Global' }];
			expect(arrayToCsv(data, ['PTUs', 'Scheme'])).toBe('PTUs,Scheme\n15,Hourly - Global');
		});
	});

	describe('parseCsv', () => {
		it('should split simple rows', () => {
			expect(parseCsv('a,b\n1,2\n')).toEqual([['a', 'b'], ['1', '2']]);
		});

		it('should handle quoted commas and escaped quotes', () => {
			expect(parseCsv('"8/18/2025, 12:00:38.941 AM","say ""hi""",3')).toEqual([
				['8/18/2025, 12:00:38.941 AM', 'say "hi"', '3'],
			]);
		});

		it('should handle CRLF, blank lines and a byte order mark', () => {
			expect(parseCsv('\uFEFFa,b\r\n\r\n1,2\r\n')).toEqual([['a', 'b'], ['1', '2']]);
		});

		it('should keep empty fields', () => {
			expect(parseCsv('a,,c\n,,\n')).toEqual([['a', '', 'c'], ['', '', '']]);
		});

		it('should keep line breaks inside quotes', () => {
			expect(parseCsv('"x\ny",z')).toEqual([['x\ny', 'z']]);
		});

		it('should round trip escaped values', () => {
			const csv = arrayToCsv([{ text: 'Hello, "world"', value: 7 }]);
			expect(parseCsv(csv)).toEqual([['text', 'value'], ['Hello, "world"', '7']]);
		});
	});
}
