import { FinalizationError, OutputPreparationError, RenderError, describeError } from "./errors";
import { logDebug, logError, logWarn } from "./log";
import type { OutputSink, PreparedOutput } from "./output-sinks";
import { toScope } from "./path-metadata";
import { RenderContext, renderGlobals } from "./render-context";
import type { LoadedTemplate } from "./template-loader";

export type InputData = Record<string, unknown>;

/** Reserved context key holding the template's path metadata. */
export const METADATA_KEY = "p2";

export function buildScope(template: LoadedTemplate, inputData: InputData): Record<string, unknown> {
	if (Object.hasOwn(inputData, METADATA_KEY)) {
		logWarn(`Input data key '${METADATA_KEY}' is reserved and was ignored`, { template: template.path });
	}
	return { ...inputData, [METADATA_KEY]: toScope(template.metadata) };
}

/**
 * Runs one render at a time: prepare the destination, render the template
 * against its scope, write the text, finalize. Nothing is shared between
 * renders except the sink itself.
 */
export class TemplateEngine {
	constructor(private readonly sink: OutputSink) {}

	execute(template: LoadedTemplate, inputData: InputData, outputPath: string): void {
		let prepared: PreparedOutput;
		try {
			prepared = this.sink.prepare(outputPath);
		} catch (e) {
			throw new OutputPreparationError(template.path, outputPath, e);
		}

		const ctx = new RenderContext(prepared.target, prepared.baseDir, prepared.ownership);
		let renderError: RenderError | undefined;
		try {
			logDebug("Rendering template", { template: template.path, output: prepared.target });
			const text: unknown = template.liquid.renderSync(template.templates, buildScope(template, inputData), {
				globals: renderGlobals(ctx),
			});
			prepared.write(String(text));
		} catch (e) {
			renderError = new RenderError(template.path, prepared.target, e);
		}

		try {
			prepared.finalize?.();
		} catch (e) {
			if (renderError) {
				logError("Could not finalize output after failed render", {
					template: template.path,
					output: prepared.target,
					error: describeError(e),
				});
			} else {
				throw new FinalizationError(template.path, prepared.target, e);
			}
		}

		if (renderError) throw renderError;
	}
}
