import { resolve } from "node:path";
import type { Command } from "commander";
import { runBatch } from "../lib/batch";
import { fromEnvironment } from "../lib/envutil";
import { INPUT_FORMATS, type InputSelection, loadInputData, selectInput } from "../lib/input-data";
import { LOG_FORMATS, LOG_LEVELS, configureLogger, logDebug } from "../lib/log";
import { type CliOptions, parseCliOptions } from "../lib/options";
import { SCRIPTING_FILTERS, type ScriptingMode, parseEnabledFilters } from "../lib/scripting-filters";
import type { Launch } from "../lib/types";

export function registerRenderOptions(program: Command, launch: Launch, onDone: (exitCode: number) => void): void {
	program
		.option("-t, --template <path>", "Template file, or template directory with --directory-mode")
		.option("-i, --input <path>", "Input data file, or the variable holding the data with --use-env-key")
		.option("-o, --output <path>", "Output file, or output directory with --directory-mode (default: stdout)")
		.option("-f, --format <format>", `Input data format: ${INPUT_FORMATS.join(", ")} (default: auto)`)
		.option("--use-env-key", "Read input data from the environment variable named by --input")
		.option("--include-env", "Merge environment variables over the input data")
		.option("--tar <file>", "Write output as entries of a tar archive ('-' for stdout)")
		.option("--enable-filters <list>", `Enable filters with side effects (comma-separated: ${SCRIPTING_FILTERS.join(", ")})`)
		.option("--enable-noop-filters", "Register every filter with side effects as a pass-through")
		.option("--autoescape", "HTML-escape rendered values")
		.option("--strict-variables", "Fail on undefined variables")
		.option("--directory-mode", "Render every file under the template directory into the output directory")
		.option("--directory-mode-filename-substr-del <substr>", "Remove a substring from output file names in directory mode")
		.option("--log-level <level>", `Log level: ${LOG_LEVELS.join(", ")} (env: P2_LOG_LEVEL, default: warn)`)
		.option("--log-format <format>", `Log format: ${LOG_FORMATS.join(", ")} (env: P2_LOG_FORMAT, default: console)`)
		.option("--debug", "Print the input data to stderr before rendering")
		.action(async (opts: Record<string, unknown>) => {
			onDone(await runRender(opts, launch));
		});
}

function scriptingMode(options: CliOptions): ScriptingMode {
	// The enable list is validated even when no-op mode supersedes it.
	const filters = options.enableFilters === undefined ? undefined : parseEnabledFilters(options.enableFilters);
	if (options.enableNoopFilters) return { kind: "noop" };
	if (filters) return { kind: "enabled", filters };
	return { kind: "disabled" };
}

function resolveSelection(selection: InputSelection, cwd: string): InputSelection {
	const { source } = selection;
	if (source.kind !== "file") return selection;
	return { ...selection, source: { kind: "file", path: resolve(cwd, source.path) } };
}

/** Validate options, assemble input data and render. Resolves to the exit code. */
export async function runRender(rawOptions: Record<string, unknown>, launch: Launch): Promise<number> {
	const options = parseCliOptions({
		logLevel: launch.env.P2_LOG_LEVEL || undefined,
		logFormat: launch.env.P2_LOG_FORMAT || undefined,
		...rawOptions,
	});
	configureLogger({ level: options.logLevel, format: options.logFormat });

	const cwd = launch.cwd ?? process.cwd();
	const scripting = scriptingMode(options);
	const selection = resolveSelection(
		selectInput({ format: options.format, input: options.input, useEnvKey: options.useEnvKey }),
		cwd,
	);
	logDebug("Input selected", { format: selection.format, source: selection.source.kind });

	const inputData = await loadInputData(
		selection,
		{ env: fromEnvironment(launch.env), stdin: launch.stdin },
		options.includeEnv,
	);
	if (options.debug) {
		launch.stderr.write(`Input data:\n${JSON.stringify(inputData, null, 2)}\n`);
	}

	const result = await runBatch(
		{
			templatePath: options.template,
			outputPath: options.output || undefined,
			directoryMode: options.directoryMode,
			filenameSubstrDel: options.directoryModeFilenameSubstrDel,
			tarFile: options.tar,
			cwd,
		},
		inputData,
		{ scripting, autoescape: options.autoescape, strictVariables: options.strictVariables },
		launch.stdout,
	);
	return result.failed > 0 ? 1 : 0;
}
