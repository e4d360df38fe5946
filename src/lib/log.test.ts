import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { configureLogger, isLevelEnabled, logDebug, logError, logInfo, logWarn, resetLogger } from "./log";

describe("log", () => {
	let lines: string[];

	beforeEach(() => {
		lines = [];
		configureLogger({ write: (text) => lines.push(text), color: false });
	});

	afterEach(() => {
		resetLogger();
	});

	test("defaults to warn", () => {
		logDebug("hidden");
		logInfo("hidden");
		logWarn("shown");
		logError("shown too");
		expect(lines).toEqual(["[warn] shown\n", "[error] shown too\n"]);
	});

	test("respects the configured level", () => {
		configureLogger({ level: "debug" });
		expect(isLevelEnabled("debug")).toBe(true);
		configureLogger({ level: "error" });
		expect(isLevelEnabled("warn")).toBe(false);
	});

	test("console format appends key=value fields", () => {
		configureLogger({ level: "info" });
		logInfo("Rendering", { template: "a b", count: 2, path: "/tmp/x", empty: "" });
		expect(lines).toEqual(['[info] Rendering template="a b" count=2 path=/tmp/x empty=""\n']);
	});

	test("json format writes one object per line", () => {
		configureLogger({ format: "json" });
		logWarn("Failed", { error: new Error("boom"), template_path: "t" });
		expect(lines).toEqual(['{"level":"warn","msg":"Failed","error":"boom","template_path":"t"}\n']);
	});
});
