import { readFileSync } from "node:fs";
import { Liquid, type Template } from "liquidjs";
import { TemplateLoadError } from "./errors";
import { FilterSet } from "./filters";
import type { PathMetadata } from "./path-metadata";
import { type ScriptingMode, scriptingFilters } from "./scripting-filters";

export interface EnvironmentOptions {
	filterSet?: FilterSet;
	scripting?: ScriptingMode;
	/** Directory `{% include %}` and `{% render %}` resolve partials against. */
	root?: string;
	autoescape?: boolean;
	strictVariables?: boolean;
}

/** A parsed template, the environment that parsed it, and its `p2` metadata. */
export interface LoadedTemplate {
	path: string;
	templates: Template[];
	liquid: Liquid;
	metadata: PathMetadata;
}

export function createEnvironment(options: EnvironmentOptions = {}): Liquid {
	const liquid = new Liquid({
		root: options.root ?? process.cwd(),
		strictVariables: options.strictVariables ?? false,
		// Unregistered filters (including disabled scripting filters) fail at parse time.
		strictFilters: true,
		...(options.autoescape ? { outputEscape: "escape" as const } : {}),
	});

	const filterSet = options.filterSet ?? new FilterSet();
	for (const [name, filter] of Object.entries(filterSet.table())) {
		liquid.registerFilter(name, filter);
	}
	for (const [name, filter] of Object.entries(scriptingFilters(options.scripting ?? { kind: "disabled" }))) {
		if (filter) liquid.registerFilter(name, filter);
	}
	return liquid;
}

export function parseTemplate(liquid: Liquid, source: string, path: string, metadata: PathMetadata): LoadedTemplate {
	try {
		return { path, templates: liquid.parse(source, path), liquid, metadata };
	} catch (e) {
		throw new TemplateLoadError(path, e);
	}
}

export function loadTemplate(liquid: Liquid, templatePath: string, metadata: PathMetadata): LoadedTemplate {
	let source: string;
	try {
		source = readFileSync(templatePath, "utf-8");
	} catch (e) {
		throw new TemplateLoadError(templatePath, e);
	}
	return parseTemplate(liquid, source, templatePath, metadata);
}
