import { dim, red, yellow } from "./output";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ["console", "json"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export type LogFields = Record<string, unknown>;

export interface LoggerConfig {
	level: LogLevel;
	format: LogFormat;
	write: (text: string) => void;
	/** Colour the level label. Only meaningful for the console format. */
	color: boolean;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function defaultConfig(): LoggerConfig {
	return {
		level: "warn",
		format: "console",
		write: (text) => process.stderr.write(text),
		color: true,
	};
}

let config: LoggerConfig = defaultConfig();

export function configureLogger(overrides: Partial<LoggerConfig>): void {
	config = { ...config, ...overrides };
}

export function resetLogger(): void {
	config = defaultConfig();
}

export function isLevelEnabled(level: LogLevel): boolean {
	return SEVERITY[level] >= SEVERITY[config.level];
}

export function logDebug(message: string, fields?: LogFields): void {
	emit("debug", message, fields);
}

export function logInfo(message: string, fields?: LogFields): void {
	emit("info", message, fields);
}

export function logWarn(message: string, fields?: LogFields): void {
	emit("warn", message, fields);
}

export function logError(message: string, fields?: LogFields): void {
	emit("error", message, fields);
}

function emit(level: LogLevel, message: string, fields: LogFields = {}): void {
	if (!isLevelEnabled(level)) return;
	if (config.format === "json") {
		config.write(`${JSON.stringify({ level, msg: message, ...normalizeFields(fields) })}\n`);
		return;
	}
	const pairs = Object.entries(normalizeFields(fields)).map(([key, value]) => `${key}=${formatValue(value)}`);
	const line = [label(level), message, ...pairs].join(" ");
	config.write(`${line}\n`);
}

function label(level: LogLevel): string {
	const text = `[${level}]`;
	if (!config.color) return text;
	switch (level) {
		case "debug":
			return dim(text);
		case "warn":
			return yellow(text);
		case "error":
			return red(text);
		default:
			return text;
	}
}

function normalizeFields(fields: LogFields): LogFields {
	const out: LogFields = {};
	for (const [key, value] of Object.entries(fields)) {
		out[key] = value instanceof Error ? value.message : value;
	}
	return out;
}

function formatValue(value: unknown): string {
	if (typeof value === "string") return /\s/.test(value) || value === "" ? JSON.stringify(value) : value;
	return JSON.stringify(value) ?? String(value);
}
