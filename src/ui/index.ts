/**
 * Shared UI Components
 *
 * Terminal output helpers for the rankblend CLI.
 */

// Colors
export { colors, c, type ColorName } from "./colors.js";

// Table rendering
export {
	truncate,
	formatPercent,
	formatTable,
	renderTable,
	renderHeader,
	renderInfo,
	renderSuccess,
	renderError,
	getHighlight,
	type TableColumn,
	type CellValue,
} from "./table.js";

// Logo and branding
export { getLogo, printLogo } from "./logo.js";

// Diagnostics
export { logDebug, logWarn } from "./log.js";
