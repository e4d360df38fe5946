import { readFileSync } from "node:fs";
import { extname } from "node:path";
import type { Readable } from "node:stream";
import { type ParseEntry, parse as parseShellWords } from "shell-quote";
import { parse as parseYaml } from "yaml";
import type { InputData } from "./engine";
import { ConfigurationError, EnvironmentVariablesError, InputDataError, describeError } from "./errors";
import { logInfo, logWarn } from "./log";

export const INPUT_FORMATS = ["auto", "env", "envkey", "json", "yml", "yaml"] as const;
export type InputFormat = (typeof INPUT_FORMATS)[number];

export type DataFormat = "env" | "json" | "yaml";

export type InputSource =
	| { kind: "environment" }
	| { kind: "file"; path: string }
	| { kind: "stdin" }
	| { kind: "envKey"; key: string };

export interface InputSelection {
	format: DataFormat;
	source: InputSource;
}

export interface InputStreams {
	/** Already filtered to identifier keys. */
	env: Record<string, string>;
	stdin: Readable;
}

const EXTENSION_FORMATS: Record<string, DataFormat> = {
	json: "json",
	yaml: "yaml",
	yml: "yaml",
	env: "env",
};

function explicitFormat(format: Exclude<InputFormat, "auto">): DataFormat {
	switch (format) {
		case "json":
			return "json";
		case "yml":
		case "yaml":
			return "yaml";
		case "env":
		case "envkey":
			return "env";
	}
}

/**
 * Decide where input data comes from and how to decode it:
 * no input path reads the environment (auto) or stdin (explicit format),
 * an input path is a file whose extension picks the format under auto, and
 * --use-env-key (or the envkey format) treats the input path as a variable name.
 */
export function selectInput(options: { format: InputFormat; input?: string; useEnvKey?: boolean }): InputSelection {
	const input = options.input || undefined;
	const useEnvKey = options.useEnvKey === true || options.format === "envkey";

	if (useEnvKey) {
		if (!input) {
			throw new ConfigurationError("--use-env-key is incompatible with stdin file input.");
		}
		const format = options.format === "auto" ? "env" : explicitFormat(options.format);
		return { format, source: { kind: "envKey", key: input } };
	}

	if (options.format === "auto") {
		if (!input) return { format: "env", source: { kind: "environment" } };
		const format = EXTENSION_FORMATS[extname(input).replace(/^\./, "")];
		if (!format) {
			throw new ConfigurationError(
				`Unrecognized file extension on '${input}'. If the file is in a supported format, try specifying it explicitly.`,
			);
		}
		return { format, source: { kind: "file", path: input } };
	}

	const format = explicitFormat(options.format);
	return input ? { format, source: { kind: "file", path: input } } : { format, source: { kind: "stdin" } };
}

// ── Decoders ─────────────────────────────────────────────────────────

function wordOf(entry: ParseEntry): string | undefined {
	if (typeof entry === "string") return entry;
	if ("op" in entry && entry.op === "glob") return entry.pattern;
	return undefined;
}

// Stands in for `$` while shell-quote unquotes a value, so `$VAR` and
// `${VAR}` come back verbatim instead of being expanded.
const DOLLAR_PLACEHOLDER = "\uE000";

function unquoteValue(value: string): ParseEntry[] {
	const hidden = value.split("$").join(DOLLAR_PLACEHOLDER);
	return parseShellWords(hidden).map((entry): ParseEntry => {
		if (typeof entry === "string") return entry.split(DOLLAR_PLACEHOLDER).join("$");
		if ("op" in entry && entry.op === "glob") {
			return { op: "glob", pattern: entry.pattern.split(DOLLAR_PLACEHOLDER).join("$") };
		}
		return entry;
	});
}

/**
 * Parse env-file syntax: one `KEY=value` per line, the value shell-unquoted.
 * Variable references in values stay literal; blank lines are skipped.
 */
export function parseEnvLines(text: string): Record<string, string> {
	const data: Record<string, string> = {};
	for (const line of text.split(/\r?\n/)) {
		if (line.trim() === "") continue;
		const eq = line.indexOf("=");
		if (eq < 0) {
			throw new EnvironmentVariablesError("Could not find an equals value to split on", line);
		}
		let entries: ParseEntry[];
		try {
			entries = unquoteValue(line.slice(eq + 1));
		} catch (e) {
			throw new EnvironmentVariablesError(describeError(e), line);
		}
		const words: string[] = [];
		for (const entry of entries) {
			const word = wordOf(entry);
			if (word === undefined) {
				throw new EnvironmentVariablesError("Improperly escaped environment variable. p2 does not parse shell syntax.", line);
			}
			words.push(word);
		}
		if (words.length > 1) {
			throw new EnvironmentVariablesError("Improperly escaped environment variable. p2 does not parse arrays.", line);
		}
		data[line.slice(0, eq)] = words[0] ?? "";
	}
	return data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeInput(format: DataFormat, text: string, origin: string): InputData {
	switch (format) {
		case "env":
			return parseEnvLines(text);
		case "json": {
			let value: unknown;
			try {
				value = JSON.parse(text);
			} catch (e) {
				throw new InputDataError(`Error parsing JSON input from ${origin}: ${describeError(e)}`, { cause: e });
			}
			if (!isRecord(value)) throw new InputDataError(`JSON input from ${origin} must be an object`);
			return value;
		}
		case "yaml": {
			let value: unknown;
			try {
				value = parseYaml(text);
			} catch (e) {
				throw new InputDataError(`Error parsing YAML input from ${origin}: ${describeError(e)}`, { cause: e });
			}
			if (value === null || value === undefined) return {};
			if (!isRecord(value)) throw new InputDataError(`YAML input from ${origin} must be a mapping`);
			return value;
		}
	}
}

// ── Sources ──────────────────────────────────────────────────────────

export async function readStream(stream: Readable): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(Buffer.from(chunk));
	}
	return Buffer.concat(chunks).toString("utf-8");
}

function describeSource(source: InputSource): string {
	switch (source.kind) {
		case "environment":
			return "environment";
		case "stdin":
			return "stdin";
		case "file":
			return source.path;
		case "envKey":
			return `environment key ${source.key}`;
	}
}

export async function readRawInput(source: InputSource, streams: InputStreams): Promise<string> {
	switch (source.kind) {
		case "stdin":
			return readStream(streams.stdin);
		case "file":
			try {
				return readFileSync(source.path, "utf-8");
			} catch (e) {
				throw new InputDataError(`Could not read data from ${source.path}: ${describeError(e)}`, { cause: e });
			}
		case "envKey":
			return streams.env[source.key] ?? "";
		case "environment":
			throw new InputDataError("The environment is not a raw input source");
	}
}

/** Assemble the data a batch renders against. */
export async function loadInputData(
	selection: InputSelection,
	streams: InputStreams,
	includeEnv = false,
): Promise<InputData> {
	const { source } = selection;
	if (source.kind === "environment") {
		if (includeEnv) logWarn("--include-env has no effect when data source is already the environment");
		return { ...streams.env };
	}

	const data = decodeInput(selection.format, await readRawInput(source, streams), describeSource(source));
	if (includeEnv) {
		logInfo("Including environment variables");
		return { ...data, ...streams.env };
	}
	return data;
}
