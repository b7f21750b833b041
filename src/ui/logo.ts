/**
 * Logo and Banner Utilities
 */

import { colors as c } from "./colors.js";

/**
 * Banner for rankblend
 */
export function getLogo(version: string): string {
	return `
${c.orange}${c.bold}  ┏━┓┏━┓┏┓╻╻┏ ${c.reset}${c.green}${c.bold}┏┓ ╻  ┏━╸┏┓╻╺┳┓${c.reset}
${c.orange}${c.bold}  ┣┳┛┣━┫┃┗┫┣┻┓${c.reset}${c.green}${c.bold}┣┻┓┃  ┣╸ ┃┗┫ ┃┃${c.reset}
${c.orange}${c.bold}  ╹┗╸╹ ╹╹ ╹╹ ╹${c.reset}${c.green}${c.bold}┗━┛┗━╸┗━╸╹ ╹╺┻┛${c.reset}
${c.dim}  Click-based ranker comparison by interleaving   v${version}${c.reset}
`;
}

/**
 * Print logo to console
 */
export function printLogo(version: string): void {
	console.log(getLogo(version));
}
