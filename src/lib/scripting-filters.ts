import { mkdirSync, writeFileSync } from "node:fs";
import { ConfigurationError, FilterError, describeError } from "./errors";
import type { FilterFunction } from "./filters";
import { type RenderContext, renderContextOf } from "./render-context";

// These filters give templates filesystem-write capability, so they are only
// registered when named on the command line. The no-op variants pass their
// input through untouched for dry runs.

export const SCRIPTING_FILTERS = ["write_file", "make_dirs"] as const;
export type ScriptingFilterName = (typeof SCRIPTING_FILTERS)[number];

export type ScriptingMode =
	| { kind: "disabled" }
	| { kind: "noop" }
	| { kind: "enabled"; filters: ScriptingFilterName[] };

function isScriptingFilter(name: string): name is ScriptingFilterName {
	return SCRIPTING_FILTERS.some((f) => f === name);
}

/** Parse a comma-separated enable list, rejecting names p2 does not implement. */
export function parseEnabledFilters(list: string): ScriptingFilterName[] {
	const names = list
		.split(",")
		.map((s) => s.trim())
		.filter(Boolean);
	const enabled: ScriptingFilterName[] = [];
	for (const name of names) {
		if (!isScriptingFilter(name)) {
			throw new ConfigurationError(
				`This version of p2 does not support the custom filter '${name}' (available: ${SCRIPTING_FILTERS.join(", ")})`,
			);
		}
		if (!enabled.includes(name)) enabled.push(name);
	}
	return enabled;
}

export function writeFile(ctx: RenderContext, content: unknown, filename: unknown): string {
	if (typeof content !== "string") {
		throw new FilterError("write_file", "validation", "Filter input must be of type 'string'.");
	}
	if (typeof filename !== "string") {
		throw new FilterError("write_file", "validation", "Filter parameter must be of type 'string'.");
	}
	try {
		writeFileSync(ctx.resolvePath(filename), content);
	} catch (e) {
		throw new FilterError("write_file", "io", `Could not write file for output: ${describeError(e)}`, { cause: e });
	}
	return content;
}

export function makeDirs(ctx: RenderContext, content: unknown, dirname: unknown): unknown {
	if (typeof dirname !== "string") {
		throw new FilterError("make_dirs", "validation", "Filter parameter must be of type 'string'.");
	}
	try {
		mkdirSync(ctx.resolvePath(dirname), { recursive: true });
	} catch (e) {
		throw new FilterError("make_dirs", "io", `Could not create directories ${dirname}: ${describeError(e)}`, {
			cause: e,
		});
	}
	return content;
}

const noopPassthru: FilterFunction = (value) => value;

const REAL_FILTERS: Record<ScriptingFilterName, FilterFunction> = {
	write_file(value, filename) {
		return writeFile(renderContextOf(this.context.globals), value, filename);
	},
	make_dirs(value, dirname) {
		return makeDirs(renderContextOf(this.context.globals), value, dirname);
	},
};

/** The scripting filters to register for a mode. Disabled registers none. */
export function scriptingFilters(mode: ScriptingMode): Partial<Record<ScriptingFilterName, FilterFunction>> {
	const table: Partial<Record<ScriptingFilterName, FilterFunction>> = {};
	switch (mode.kind) {
		case "noop":
			for (const name of SCRIPTING_FILTERS) table[name] = noopPassthru;
			break;
		case "enabled":
			for (const name of mode.filters) table[name] = REAL_FILTERS[name];
			break;
		case "disabled":
			break;
	}
	return table;
}
