export class P2Error extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "P2Error";
	}
}

export class ConfigurationError extends P2Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}

export class InputDataError extends P2Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "InputDataError";
	}
}

/** An env-file line that cannot be turned into a key/value pair. */
export class EnvironmentVariablesError extends InputDataError {
	readonly reason: string;
	readonly rawEnvVar: string;

	constructor(reason: string, rawEnvVar: string) {
		super(`${reason}: ${rawEnvVar}`);
		this.name = "EnvironmentVariablesError";
		this.reason = reason;
		this.rawEnvVar = rawEnvVar;
	}
}

export class TemplateLoadError extends P2Error {
	readonly templatePath: string;

	constructor(templatePath: string, cause: unknown) {
		super(`Could not load template ${templatePath}: ${describeError(cause)}`, { cause });
		this.name = "TemplateLoadError";
		this.templatePath = templatePath;
	}
}

export type FilterErrorKind = "validation" | "lookup" | "io" | "serialization";

export class FilterError extends P2Error {
	readonly filter: string;
	readonly kind: FilterErrorKind;
	readonly reason: string;

	constructor(filter: string, kind: FilterErrorKind, reason: string, options?: { cause?: unknown }) {
		super(`filter:${filter}: ${reason}`, options);
		this.name = "FilterError";
		this.filter = filter;
		this.kind = kind;
		this.reason = reason;
	}
}

// ── Render lifecycle errors ──
// All three carry the template and output path so the batch driver can report
// which render failed without string matching.

abstract class RenderLifecycleError extends P2Error {
	readonly templatePath: string;
	readonly outputPath: string;

	constructor(summary: string, templatePath: string, outputPath: string, cause: unknown) {
		super(`${summary} (template ${templatePath}, output ${outputPath}): ${describeError(cause)}`, { cause });
		this.templatePath = templatePath;
		this.outputPath = outputPath;
	}
}

export class OutputPreparationError extends RenderLifecycleError {
	constructor(templatePath: string, outputPath: string, cause: unknown) {
		super("Could not prepare output", templatePath, outputPath, cause);
		this.name = "OutputPreparationError";
	}
}

export class RenderError extends RenderLifecycleError {
	constructor(templatePath: string, outputPath: string, cause: unknown) {
		super("Render failed", templatePath, outputPath, cause);
		this.name = "RenderError";
	}
}

export class FinalizationError extends RenderLifecycleError {
	constructor(templatePath: string, outputPath: string, cause: unknown) {
		super("Could not finalize output", templatePath, outputPath, cause);
		this.name = "FinalizationError";
	}
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Walk the error chain and return the first FilterError, if any. LiquidJS
 * keeps the error a filter threw on `originalError` rather than `cause`.
 */
export function findFilterError(err: unknown): FilterError | undefined {
	let current: unknown = err;
	const seen = new Set<unknown>();
	while (current instanceof Error && !seen.has(current)) {
		if (current instanceof FilterError) return current;
		seen.add(current);
		const original: unknown = Reflect.get(current, "originalError");
		current = original instanceof Error ? original : current.cause;
	}
	return undefined;
}
