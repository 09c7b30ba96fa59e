import process from 'node:process';
import Table from 'cli-table3';
import stringWidth from 'string-width';

/**
 * Horizontal alignment options for table cells
 */
export type TableCellAlign = 'left' | 'right' | 'center';

export type TableRow = (string | number)[];

export type TableOptions = {
	head: string[];
	colAligns?: TableCellAlign[];
	style?: {
		head?: string[];
	};
	/** Columns kept when the terminal is narrower than compactThreshold */
	compactHead?: string[];
	compactThreshold?: number;
	forceCompact?: boolean;
	terminalWidth?: number;
};

/**
 * Table that sizes columns to their content and drops to a reduced set of
 * columns on narrow terminals
 */
export class ResponsiveTable {
	private head: string[];
	private rows: TableRow[] = [];
	private colAligns: TableCellAlign[];
	private style?: { head?: string[] };
	private compactHead?: string[];
	private compactThreshold: number;
	private compactMode = false;
	private forceCompact: boolean;
	private terminalWidth?: number;

	constructor(options: TableOptions) {
		this.head = options.head;
		this.colAligns = options.colAligns ?? Array.from({ length: this.head.length }, () => 'left');
		this.style = options.style;
		this.compactHead = options.compactHead;
		this.compactThreshold = options.compactThreshold ?? 100;
		this.forceCompact = options.forceCompact ?? false;
		this.terminalWidth = options.terminalWidth;
	}

	push(row: TableRow): void {
		this.rows.push(row);
	}

	isCompactMode(): boolean {
		return this.compactMode;
	}

	private getCompactIndices(): number[] {
		if (this.compactHead == null || !this.compactMode) {
			return Array.from({ length: this.head.length }, (_, i) => i);
		}
		return this.compactHead
			.map(header => this.head.indexOf(header))
			.filter(index => index >= 0);
	}

	toString(): string {
		const terminalWidth = this.terminalWidth
			?? (Number.parseInt(process.env.COLUMNS ?? '', 10) || process.stdout.columns || 120);

		this.compactMode = this.forceCompact || (terminalWidth < this.compactThreshold && this.compactHead != null);

		const indices = this.getCompactIndices();
		const head = indices.map(index => this.head[index] ?? '');
		const colAligns = indices.map(index => this.colAligns[index] ?? 'left');
		const dataRows = this.rows.map(row => indices.map(index => row[index] ?? ''));

		const contentWidths = head.map((header, column) => Math.max(
			stringWidth(header),
			...dataRows.map(row => stringWidth(String(row[column] ?? ''))),
		));

		const tableOverhead = 3 * head.length + 1;
		const columnWidths = contentWidths.map((width, column) =>
			colAligns[column] === 'right' ? Math.max(width + 3, 11) : Math.max(width + 2, 10));
		const requiredWidth = columnWidths.reduce((sum, width) => sum + width, 0) + tableOverhead;

		const colWidths = requiredWidth > terminalWidth
			? columnWidths.map((width) => {
					const scale = (terminalWidth - tableOverhead) / (requiredWidth - tableOverhead);
					return Math.max(Math.floor(width * scale), 8);
				})
			: columnWidths;

		const table = new Table({
			head,
			style: this.style,
			colAligns,
			colWidths,
			wordWrap: true,
			wrapOnWordBoundary: true,
		});

		for (const row of dataRows) {
			table.push(row);
		}

		return table.toString();
	}
}

if (import.meta.vitest != null) {
	const stripAnsi = (text: string): string => text.replace(/\u001B\[[0-9;]*m/g, '');

	describe('ResponsiveTable', () => {
		it('renders every column on wide terminals', () => {
			const table = new ResponsiveTable({
				head: ['PTUs', 'Capacity', 'Cost'],
				colAligns: ['left', 'right', 'right'],
				compactHead: ['PTUs', 'Cost'],
				terminalWidth: 200,
			});
			table.push([15, '45,000', '$3,900.00']);
			const output = stripAnsi(table.toString());

			expect(table.isCompactMode()).toBe(false);
			expect(output).toContain('Capacity');
			expect(output).toContain('45,000');
		});

		it('keeps only compact columns on narrow terminals', () => {
			const table = new ResponsiveTable({
				head: ['PTUs', 'Capacity', 'Cost'],
				compactHead: ['PTUs', 'Cost'],
				compactThreshold: 100,
				terminalWidth: 60,
			});
			table.push([15, '45,000', '$3,900.00']);
			const output = stripAnsi(table.toString());

			expect(table.isCompactMode()).toBe(true);
			expect(output).not.toContain('Capacity');
			expect(output).toContain('$3,900.00');
		});
	});
}
