/**
 * Diagnostic output.
 *
 * Debug lines go to stderr so they never mix with JSON written to stdout.
 */

import { isDebugEnabled } from "../config.js";
import { colors as c } from "./colors.js";

export function logDebug(message: string, details?: Record<string, unknown>): void {
	if (!isDebugEnabled()) return;
	const suffix = details ? ` ${JSON.stringify(details)}` : "";
	console.error(`${c.dim}[debug] ${message}${suffix}${c.reset}`);
}

export function logWarn(message: string): void {
	console.warn(`${c.yellow}⚠ ${message}${c.reset}`);
}
