/**
 * Interleaving Error Hierarchy
 *
 * Structured error types shared by the engine, the evaluation helpers
 * and the CLI.
 */

// ============================================================================
// Base Error Class
// ============================================================================

export class InterleavingError extends Error {
	/** Error code for programmatic handling */
	readonly code: string;
	/** Additional context */
	readonly context?: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		options?: {
			context?: Record<string, unknown>;
			cause?: Error;
		},
	) {
		super(message, { cause: options?.cause });
		this.name = "InterleavingError";
		this.code = code;
		this.context = options?.context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			context: this.context,
		};
	}
}

// ============================================================================
// Caller Errors
// ============================================================================

/**
 * A caller passed a value outside the accepted domain (k ≤ 0, τ ≤ 0,
 * no rankers, a click beyond the result, ...). Never clamped.
 */
export class InvalidArgumentError extends InterleavingError {
	readonly argument: string;

	constructor(
		argument: string,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(`Invalid ${argument}: ${message}`, "INVALID_ARGUMENT", {
			context: { argument, ...context },
		});
		this.name = "InvalidArgumentError";
		this.argument = argument;
	}
}

export class ConfigurationError extends InterleavingError {
	constructor(
		message: string,
		context?: Record<string, unknown>,
		cause?: Error,
	) {
		super(message, "CONFIG_ERROR", { context, cause });
		this.name = "ConfigurationError";
	}
}

// ============================================================================
// Internal Errors
// ============================================================================

/**
 * An internal guard failed, e.g. a draw from an already-empty sequence.
 * Always a bug in the caller of the failing component.
 */
export class InvariantViolationError extends InterleavingError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, "INVARIANT_VIOLATION", { context });
		this.name = "InvariantViolationError";
	}
}

// ============================================================================
// Type Guards & Validators
// ============================================================================

export function isInterleavingError(error: unknown): error is InterleavingError {
	return error instanceof InterleavingError;
}

/**
 * Throw unless `value` is a positive integer.
 */
export function assertPositiveInteger(name: string, value: number): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new InvalidArgumentError(name, `expected a positive integer, got ${value}`, {
			value,
		});
	}
}

/**
 * Throw unless `value` is a finite number greater than zero.
 */
export function assertPositiveNumber(name: string, value: number): void {
	if (!Number.isFinite(value) || value <= 0) {
		throw new InvalidArgumentError(name, `expected a positive number, got ${value}`, {
			value,
		});
	}
}
