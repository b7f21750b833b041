/**
 * Terminal Color Constants
 *
 * ANSI styling shared by the CLI output helpers. Setting NO_COLOR (or
 * writing to something that is not a TTY) turns all codes into "".
 */

const ANSI = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	dim: "\x1b[2m",

	red: "\x1b[31m",
	green: "\x1b[38;5;78m",
	yellow: "\x1b[33m",
	cyan: "\x1b[36m",
	orange: "\x1b[38;5;209m",
} as const;

export type ColorName = keyof typeof ANSI;

function colorEnabled(): boolean {
	return !process.env.NO_COLOR && Boolean(process.stdout.isTTY);
}

const PLAIN: Record<ColorName, string> = {
	reset: "",
	bold: "",
	dim: "",
	red: "",
	green: "",
	yellow: "",
	cyan: "",
	orange: "",
};

/** ANSI escape codes, or empty strings when color is off */
export const colors: Record<ColorName, string> = colorEnabled() ? { ...ANSI } : PLAIN;

/** Shorthand for colors (for compact code) */
export const c = colors;
