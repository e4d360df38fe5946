import { z } from "zod";
import { ConfigurationError } from "./errors";
import { INPUT_FORMATS } from "./input-data";
import { LOG_FORMATS, LOG_LEVELS } from "./log";

// Options as commander collects them (camelCased long flags). The schema is
// the single source of truth for defaults and allowed values.

export const CliOptionsSchema = z.object({
	template: z.string({ error: "a template path is required" }).min(1, "a template path is required"),
	input: z.string().optional(),
	output: z.string().optional(),
	format: z.enum(INPUT_FORMATS).default("auto"),
	useEnvKey: z.boolean().default(false),
	includeEnv: z.boolean().default(false),
	tar: z.string().optional(),
	enableFilters: z.string().optional(),
	enableNoopFilters: z.boolean().default(false),
	autoescape: z.boolean().default(false),
	strictVariables: z.boolean().default(false),
	directoryMode: z.boolean().default(false),
	directoryModeFilenameSubstrDel: z.string().optional(),
	logLevel: z.enum(LOG_LEVELS).default("warn"),
	logFormat: z.enum(LOG_FORMATS).default("console"),
	debug: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

function toFlag(key: PropertyKey): string {
	return `--${String(key).replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

export function parseCliOptions(raw: unknown): CliOptions {
	const result = CliOptionsSchema.safeParse(raw);
	if (result.success) return result.data;
	const problems = result.error.issues.map((issue) => {
		const key = issue.path[0];
		return key === undefined ? issue.message : `${toFlag(key)}: ${issue.message}`;
	});
	throw new ConfigurationError(`Invalid options: ${problems.join("; ")}`);
}
