import { createWriteStream, lstatSync, openSync, readdirSync, statSync } from "node:fs";
import { basename, dirname, join, relative, resolve } from "node:path";
import type { Writable } from "node:stream";
import { type InputData, TemplateEngine } from "./engine";
import { ConfigurationError, P2Error, describeError } from "./errors";
import { logDebug, logError } from "./log";
import { plural } from "./output";
import { DirectoryTreeSink, FileSink, type OutputSink, StdoutSink, TarSink } from "./output-sinks";
import { type PathMetadata, fileMetadata, stdoutMetadata } from "./path-metadata";
import { STDOUT_SENTINEL } from "./render-context";
import { type EnvironmentOptions, createEnvironment, loadTemplate } from "./template-loader";

export interface BatchOptions {
	templatePath: string;
	/** `-o`: output file, or output directory in directory mode. */
	outputPath?: string;
	directoryMode: boolean;
	/** Substring removed from output file names in directory mode. */
	filenameSubstrDel?: string;
	/** Tar archive to write, `-` for stdout. */
	tarFile?: string;
	cwd: string;
}

export interface PlannedRender {
	templatePath: string;
	outputPath: string;
	metadata: PathMetadata;
}

export interface RenderPlan {
	rootDir: string;
	renders: PlannedRender[];
}

export interface BatchResult {
	rendered: number;
	failed: number;
}

function writesToStdout(outputPath: string | undefined): boolean {
	return !outputPath || outputPath === "-";
}

/** Remove a substring from the file name (not the directories) of a relative path. */
export function transformFileName(relPath: string, substr: string | undefined): string {
	if (!substr) return relPath;
	return join(dirname(relPath), basename(relPath).split(substr).join(""));
}

/** Every file under `dir`, as sorted relative paths. Symlinked directories are not followed. */
export function discoverTemplates(dir: string): string[] {
	const found: string[] = [];

	function walk(current: string): void {
		for (const entry of readdirSync(current)) {
			const path = join(current, entry);
			const stat = lstatSync(path);
			if (stat.isDirectory()) {
				walk(path);
			} else if (stat.isFile() || (stat.isSymbolicLink() && statSync(path, { throwIfNoEntry: false })?.isFile())) {
				found.push(relative(dir, path));
			}
		}
	}

	walk(dir);
	return found.sort();
}

function checkPaths(options: BatchOptions): void {
	const templateStat = statSync(resolve(options.cwd, options.templatePath), { throwIfNoEntry: false });
	if (!templateStat) {
		throw new ConfigurationError(`Template path does not exist: ${options.templatePath}`);
	}
	if (!options.directoryMode) {
		if (!templateStat.isFile()) throw new ConfigurationError(`Template path is not a file: ${options.templatePath}`);
		return;
	}
	if (!templateStat.isDirectory()) {
		throw new ConfigurationError(`Template path must be a directory in directory mode: ${options.templatePath}`);
	}
	// A tar archive does not need the output directory to exist.
	if (options.tarFile) return;
	if (!options.outputPath) {
		throw new ConfigurationError("An output directory is required in directory mode");
	}
	const outputStat = statSync(resolve(options.cwd, options.outputPath), { throwIfNoEntry: false });
	if (!outputStat?.isDirectory()) {
		throw new ConfigurationError(`Output path must be an existing directory in directory mode: ${options.outputPath}`);
	}
}

export function planRenders(options: BatchOptions): RenderPlan {
	const templatePath = resolve(options.cwd, options.templatePath);

	if (options.directoryMode) {
		const rootDir = resolve(options.cwd, options.outputPath ?? "");
		const renders = discoverTemplates(templatePath).map((rel) => {
			const outputPath = resolve(rootDir, transformFileName(rel, options.filenameSubstrDel));
			logDebug("Template file", { template_file: rel });
			return { templatePath: join(templatePath, rel), outputPath, metadata: fileMetadata(outputPath, rootDir) };
		});
		return { rootDir, renders };
	}

	const rootDir = resolve(options.cwd);
	if (!writesToStdout(options.outputPath)) {
		const outputPath = resolve(rootDir, options.outputPath ?? "");
		return { rootDir, renders: [{ templatePath, outputPath, metadata: fileMetadata(outputPath, rootDir) }] };
	}
	if (options.tarFile) {
		// Without -o a single template becomes an entry named after itself.
		const outputPath = resolve(rootDir, basename(templatePath));
		return { rootDir, renders: [{ templatePath, outputPath, metadata: fileMetadata(outputPath, rootDir) }] };
	}
	return { rootDir, renders: [{ templatePath, outputPath: STDOUT_SENTINEL, metadata: stdoutMetadata(rootDir) }] };
}

function openTarDestination(tarFile: string, cwd: string, stdout: Writable): { stream: Writable; owned: boolean } {
	if (tarFile === "-") return { stream: stdout, owned: false };
	const path = resolve(cwd, tarFile);
	try {
		return { stream: createWriteStream(path, { fd: openSync(path, "w") }), owned: true };
	} catch (e) {
		throw new ConfigurationError(`Error opening tar file for output ${tarFile}: ${describeError(e)}`);
	}
}

export function createSink(options: BatchOptions, plan: RenderPlan, stdout: Writable): OutputSink {
	if (options.tarFile) {
		const { stream, owned } = openTarDestination(options.tarFile, options.cwd, stdout);
		return new TarSink({
			destination: stream,
			ownsDestination: owned,
			rootDir: plan.rootDir,
			prefix: options.directoryMode ? options.outputPath : undefined,
			baseDir: options.cwd,
		});
	}
	if (options.directoryMode) return new DirectoryTreeSink();
	if (!writesToStdout(options.outputPath)) return new FileSink(options.cwd);
	return new StdoutSink(stdout, options.cwd);
}

/**
 * Render every planned template, continuing past failures. Templates render
 * one after another; the sink is closed once after the last one.
 */
export async function runBatch(
	options: BatchOptions,
	inputData: InputData,
	environment: Omit<EnvironmentOptions, "root">,
	stdout: Writable,
): Promise<BatchResult> {
	checkPaths(options);
	const plan = planRenders(options);
	const templateRoot = options.directoryMode
		? resolve(options.cwd, options.templatePath)
		: dirname(resolve(options.cwd, options.templatePath));
	const liquid = createEnvironment({ ...environment, root: templateRoot });
	const sink = createSink(options, plan, stdout);
	const engine = new TemplateEngine(sink);

	const result: BatchResult = { rendered: 0, failed: 0 };
	try {
		for (const render of plan.renders) {
			try {
				const template = loadTemplate(liquid, render.templatePath, render.metadata);
				engine.execute(template, inputData, render.outputPath);
				result.rendered++;
			} catch (e) {
				if (!(e instanceof P2Error)) throw e;
				logError("Failed to execute template", {
					error: e.message,
					template_path: render.templatePath,
					output_path: render.outputPath,
				});
				result.failed++;
			}
		}
	} finally {
		try {
			await sink.close();
		} catch (e) {
			logError("Could not complete output", { error: describeError(e) });
			result.failed++;
		}
	}

	if (result.failed > 0) {
		logError(`Errors encountered during template processing (${plural(result.failed, "failure")})`);
	}
	return result;
}
