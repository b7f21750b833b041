/**
 * Table Rendering Utilities
 *
 * Formatted tables and status lines for CLI results.
 */

import { colors as c } from "./colors.js";

/** Column definition for table */
export interface TableColumn {
	header: string;
	width: number;
	align?: "left" | "right";
}

/** Cell value with optional highlighting */
export interface CellValue {
	value: string;
	highlight?: "best" | "worst" | "neutral";
}

/**
 * Truncate string with ellipsis
 */
export function truncate(s: string, max: number): string {
	return s.length > max ? s.slice(0, max - 1) + "…" : s;
}

/**
 * Format a ratio in [0, 1] as a percentage
 */
export function formatPercent(ratio: number, decimals = 1): string {
	return `${(ratio * 100).toFixed(decimals)}%`;
}

function applyCellHighlight(value: string, highlight?: "best" | "worst" | "neutral"): string {
	if (highlight === "best") return `${c.green}${value}${c.reset}`;
	if (highlight === "worst") return `${c.red}${value}${c.reset}`;
	return value;
}

/**
 * Render a table as lines (without printing)
 */
export function formatTable(columns: TableColumn[], rows: CellValue[][]): string[] {
	const totalWidth = columns.reduce((sum, col) => sum + col.width + 1, 0) - 1;

	const header = columns
		.map((col) => (col.align === "right" ? col.header.padStart(col.width) : col.header.padEnd(col.width)))
		.join(" ");
	const lines = [`  ${header.trimEnd()}`, "  " + "─".repeat(totalWidth)];

	for (const row of rows) {
		const cells = row.map((cell, i) => {
			const col = columns[i];
			const text = truncate(cell.value, col.width);
			const value = col.align === "right" ? text.padStart(col.width) : text.padEnd(col.width);
			return applyCellHighlight(value, cell.highlight);
		});
		lines.push(`  ${cells.join(" ").trimEnd()}`);
	}
	return lines;
}

/**
 * Print a results table
 */
export function renderTable(columns: TableColumn[], rows: CellValue[][]): void {
	for (const line of formatTable(columns, rows)) {
		console.log(line);
	}
}

/**
 * Determine highlight based on ranking
 */
export function getHighlight(
	value: number,
	min: number,
	max: number,
	higherIsBetter: boolean,
): "best" | "worst" | "neutral" {
	if (min === max) return "neutral";
	const best = higherIsBetter ? max : min;
	const worst = higherIsBetter ? min : max;
	if (value === best) return "best";
	if (value === worst) return "worst";
	return "neutral";
}

/**
 * Print section header
 */
export function renderHeader(title: string): void {
	console.log(`\n${c.bold}${title}${c.reset}\n`);
}

/**
 * Print info line
 */
export function renderInfo(text: string): void {
	console.log(`${c.dim}${text}${c.reset}`);
}

/**
 * Print success message
 */
export function renderSuccess(message: string): void {
	console.log(`${c.green}${c.bold}✓ ${message}${c.reset}`);
}

/**
 * Print error message
 */
export function renderError(message: string): void {
	console.error(`${c.red}${c.bold}✗ ${message}${c.reset}`);
}
