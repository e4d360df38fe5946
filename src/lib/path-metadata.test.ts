import { describe, expect, test } from "vitest";
import { fileMetadata, stdoutMetadata } from "./path-metadata";

describe("path metadata", () => {
	test("describes a nested output file", () => {
		expect(fileMetadata("/out/dir1/dir2/template2", "/out")).toEqual({
			OutputPath: "/out/dir1/dir2/template2",
			OutputName: "template2",
			OutputDir: "/out/dir1/dir2",
			OutputRelPath: "dir1/dir2/template2",
			OutputRelDir: "dir1/dir2",
		});
	});

	test("uses . for a file at the root", () => {
		expect(fileMetadata("/out/a.txt", "/out")).toMatchObject({ OutputRelPath: "a.txt", OutputRelDir: "." });
	});

	test("switches all path fields to the sentinel for stdout", () => {
		expect(stdoutMetadata("/work")).toEqual({
			OutputPath: "<stdout>",
			OutputName: "<stdout>",
			OutputDir: "/work",
			OutputRelPath: "<stdout>",
			OutputRelDir: ".",
		});
	});
});
