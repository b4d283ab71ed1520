/**
 * Shared markdown formatting utilities for the rdat-inspect CLI.
 */

export interface MarkdownTableOptions {
	/** Indices of columns to right-align (numeric columns) */
	alignRight?: readonly number[] | undefined;
}

/** Escape characters that would break a table cell */
export function escapeCell(cell: string): string {
	return cell.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

/**
 * Build a markdown table from headers and rows.
 *
 * Column widths are computed as the maximum of the header length and the
 * longest cell value in that column, so separators are never too short.
 *
 * @param headers - Column header strings
 * @param rows - Data rows (each row is an array of cell strings)
 * @param options - Alignment options
 * @returns Formatted markdown table string
 */
export function buildMarkdownTable(
	headers: string[],
	rows: string[][],
	options: MarkdownTableOptions = {},
): string {
	const rightAligned = new Set(options.alignRight ?? []);
	const escapedRows = rows.map((row) => row.map(escapeCell));
	const colWidths = headers.map((h) => h.length);
	for (const row of escapedRows) {
		for (let i = 0; i < row.length; i++) {
			const cell = row[i] ?? "";
			if (cell.length > (colWidths[i] ?? 0)) {
				colWidths[i] = cell.length;
			}
		}
	}

	const pad = (s: string, i: number) => {
		const w = colWidths[i] ?? s.length;
		return rightAligned.has(i) ? s.padStart(w) : s.padEnd(w);
	};
	const separator = (w: number, i: number) => {
		const dashes = "-".repeat(Math.max(w, 1));
		return rightAligned.has(i) ? `${dashes.slice(1)}:` : dashes;
	};

	const headerRow = `| ${headers.map(pad).join(" | ")} |`;
	const sepRow = `| ${colWidths.map(separator).join(" | ")} |`;
	const dataRows = escapedRows.map((row) => `| ${row.map(pad).join(" | ")} |`);

	return [headerRow, sepRow, ...dataRows].join("\n");
}
