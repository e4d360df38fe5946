import { describe, expect, test } from "vitest";
import { ConfigurationError } from "./errors";
import { parseCliOptions } from "./options";

describe("parseCliOptions", () => {
	test("fills defaults", () => {
		expect(parseCliOptions({ template: "t.tmpl" })).toEqual({
			template: "t.tmpl",
			format: "auto",
			useEnvKey: false,
			includeEnv: false,
			enableNoopFilters: false,
			autoescape: false,
			strictVariables: false,
			directoryMode: false,
			logLevel: "warn",
			logFormat: "console",
			debug: false,
		});
	});

	test("keeps given values", () => {
		const options = parseCliOptions({
			template: "templates",
			output: "out",
			format: "yaml",
			directoryMode: true,
			directoryModeFilenameSubstrDel: ".tmpl",
			enableFilters: "write_file",
			logLevel: "debug",
		});
		expect(options).toMatchObject({
			output: "out",
			format: "yaml",
			directoryMode: true,
			directoryModeFilenameSubstrDel: ".tmpl",
			enableFilters: "write_file",
			logLevel: "debug",
		});
	});

	test("requires a template", () => {
		expect(() => parseCliOptions({})).toThrow("Invalid options: --template: a template path is required");
		expect(() => parseCliOptions({ template: "" })).toThrow(ConfigurationError);
	});

	test("names the offending flag", () => {
		expect(() => parseCliOptions({ template: "t", format: "xml" })).toThrow(/^Invalid options: --format: /);
		expect(() => parseCliOptions({ template: "t", logLevel: "loud" })).toThrow(/^Invalid options: --log-level: /);
	});
});
