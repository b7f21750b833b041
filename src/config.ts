/**
 * Configuration management for rankblend
 *
 * Settings come from, in increasing precedence:
 * 1) built-in defaults, 2) the project file (rankblend.json),
 * 3) environment variables (.env is loaded at startup), 4) CLI flags.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./interleaving/errors.js";
import { MAX_SEED } from "./interleaving/random.js";
import {
	DEFAULT_INTERLEAVING_CONFIG,
	type InterleavingConfig,
} from "./interleaving/types.js";

// ============================================================================
// Constants
// ============================================================================

/** Project config file name (at the working directory root) */
export const PROJECT_CONFIG_FILE = "rankblend.json";

// ============================================================================
// Environment Variables
// ============================================================================

export const ENV = {
	RANKBLEND_TAU: "RANKBLEND_TAU",
	RANKBLEND_SEED: "RANKBLEND_SEED",
	/** Any non-empty value turns on debug output on stderr */
	RANKBLEND_DEBUG: "RANKBLEND_DEBUG",
} as const;

type Env = Record<string, string | undefined>;

// ============================================================================
// Schemas
// ============================================================================

const projectConfigSchema = z
	.object({
		tau: z.number().positive().finite().optional(),
		seed: z.number().int().min(0).max(MAX_SEED).optional(),
		k: z.number().int().positive().optional(),
	})
	.strict();

export type ProjectConfig = z.infer<typeof projectConfigSchema>;

const envConfigSchema = z.object({
	[ENV.RANKBLEND_TAU]: z.coerce.number().positive().finite().optional(),
	[ENV.RANKBLEND_SEED]: z.coerce.number().int().min(0).max(MAX_SEED).optional(),
});

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Load rankblend.json from `projectPath`, or null when there is none.
 */
export function loadProjectConfig(projectPath: string): ProjectConfig | null {
	const configPath = join(projectPath, PROJECT_CONFIG_FILE);
	if (!existsSync(configPath)) {
		return null;
	}

	let content: unknown;
	try {
		content = JSON.parse(readFileSync(configPath, "utf-8"));
	} catch (error) {
		throw new ConfigurationError(
			`Failed to read ${PROJECT_CONFIG_FILE}`,
			{ path: configPath },
			error instanceof Error ? error : undefined,
		);
	}

	const parsed = projectConfigSchema.safeParse(content);
	if (!parsed.success) {
		throw new ConfigurationError(`Invalid ${PROJECT_CONFIG_FILE}: ${formatIssues(parsed.error)}`, {
			path: configPath,
		});
	}
	return parsed.data;
}

/**
 * Read interleaving settings from environment variables.
 * Empty values count as unset.
 */
export function loadEnvConfig(env: Env = process.env): Partial<InterleavingConfig> {
	const parsed = envConfigSchema.safeParse({
		[ENV.RANKBLEND_TAU]: env[ENV.RANKBLEND_TAU] || undefined,
		[ENV.RANKBLEND_SEED]: env[ENV.RANKBLEND_SEED] || undefined,
	});
	if (!parsed.success) {
		throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
	}

	const config: Partial<InterleavingConfig> = {};
	const tau = parsed.data[ENV.RANKBLEND_TAU];
	const seed = parsed.data[ENV.RANKBLEND_SEED];
	if (tau !== undefined) config.tau = tau;
	if (seed !== undefined) config.seed = seed;
	return config;
}

/**
 * Merge defaults, project file, environment and explicit overrides.
 */
export function resolveConfig(
	projectPath: string,
	overrides: Partial<InterleavingConfig> = {},
	env: Env = process.env,
): InterleavingConfig {
	const config: InterleavingConfig = {
		...DEFAULT_INTERLEAVING_CONFIG,
		...loadProjectConfig(projectPath),
		...loadEnvConfig(env),
	};

	// CLI flags arrive as undefined when not given
	if (overrides.tau !== undefined) config.tau = overrides.tau;
	if (overrides.seed !== undefined) config.seed = overrides.seed;
	if (overrides.k !== undefined) config.k = overrides.k;
	return config;
}

export function isDebugEnabled(env: Env = process.env): boolean {
	return Boolean(env[ENV.RANKBLEND_DEBUG]);
}

// ============================================================================
// Helpers
// ============================================================================

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}
