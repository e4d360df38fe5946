import { mkdirSync, mkdtempSync, readFileSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { discoverTemplates, planRenders, runBatch, transformFileName } from "./batch";
import { ConfigurationError } from "./errors";
import { configureLogger, resetLogger } from "./log";
import { collectingWritable, readTar } from "./test-helpers";

describe("batch", () => {
	let tmpDir: string;
	let logLines: string[];

	beforeEach(() => {
		tmpDir = mkdtempSync(join(tmpdir(), "p2-batch-test-"));
		logLines = [];
		configureLogger({ write: (text) => logLines.push(text), color: false });
	});

	afterEach(() => {
		resetLogger();
		rmSync(tmpDir, { recursive: true, force: true });
	});

	function writeTemplateTree(): void {
		mkdirSync(join(tmpDir, "templates", "dir1", "dir2"), { recursive: true });
		writeFileSync(join(tmpDir, "templates", "dir1", "template1"), "{{ p2.OutputRelPath }}");
		writeFileSync(join(tmpDir, "templates", "dir1", "dir2", "template2"), "{{ p2.OutputRelPath }}|{{ p2.OutputRelDir }}");
	}

	describe("transformFileName", () => {
		test("removes the substring from the file name only", () => {
			expect(transformFileName("a.tmpl/b.tmpl.conf", ".tmpl")).toBe("a.tmpl/b.conf");
			expect(transformFileName("x.tmpl.tmpl", ".tmpl")).toBe("x");
		});

		test("leaves the path alone without a substring", () => {
			expect(transformFileName("dir/a.txt", undefined)).toBe("dir/a.txt");
		});
	});

	test("discoverTemplates lists files in sorted order", () => {
		writeTemplateTree();
		writeFileSync(join(tmpDir, "templates", "top"), "");
		symlinkSync(join(tmpDir, "templates", "top"), join(tmpDir, "templates", "link"));
		expect(discoverTemplates(join(tmpDir, "templates"))).toEqual([
			"dir1/dir2/template2",
			"dir1/template1",
			"link",
			"top",
		]);
	});

	describe("planRenders", () => {
		test("single file to stdout uses stdout metadata", () => {
			const plan = planRenders({ templatePath: "t.tmpl", directoryMode: false, cwd: tmpDir });
			expect(plan.renders).toEqual([
				{
					templatePath: join(tmpDir, "t.tmpl"),
					outputPath: "<stdout>",
					metadata: {
						OutputPath: "<stdout>",
						OutputName: "<stdout>",
						OutputDir: tmpDir,
						OutputRelPath: "<stdout>",
						OutputRelDir: ".",
					},
				},
			]);
		});

		test("- also means stdout", () => {
			const plan = planRenders({ templatePath: "t.tmpl", outputPath: "-", directoryMode: false, cwd: tmpDir });
			expect(plan.renders[0]?.outputPath).toBe("<stdout>");
		});

		test("single file tar without -o is named after the template", () => {
			const plan = planRenders({ templatePath: "sub/t.tmpl", directoryMode: false, tarFile: "-", cwd: tmpDir });
			expect(plan.renders[0]?.outputPath).toBe(join(tmpDir, "t.tmpl"));
		});

		test("directory mode maps every template under the output root", () => {
			writeTemplateTree();
			const plan = planRenders({
				templatePath: "templates",
				outputPath: "out",
				directoryMode: true,
				cwd: tmpDir,
			});
			expect(plan.rootDir).toBe(join(tmpDir, "out"));
			expect(plan.renders.map((r) => r.outputPath)).toEqual([
				join(tmpDir, "out", "dir1", "dir2", "template2"),
				join(tmpDir, "out", "dir1", "template1"),
			]);
		});
	});

	describe("runBatch", () => {
		test("renders a directory tree", async () => {
			writeTemplateTree();
			mkdirSync(join(tmpDir, "out"));

			const result = await runBatch(
				{ templatePath: "templates", outputPath: "out", directoryMode: true, cwd: tmpDir },
				{},
				{},
				collectingWritable().stream,
			);

			expect(result).toEqual({ rendered: 2, failed: 0 });
			expect(readFileSync(join(tmpDir, "out", "dir1", "template1"), "utf-8")).toBe("dir1/template1");
			expect(readFileSync(join(tmpDir, "out", "dir1", "dir2", "template2"), "utf-8")).toBe("dir1/dir2/template2|dir1/dir2");
		});

		test("continues past a failing template", async () => {
			mkdirSync(join(tmpDir, "templates"));
			mkdirSync(join(tmpDir, "out"));
			writeFileSync(join(tmpDir, "templates", "bad"), "{{ 5 | indent: 2 }}");
			writeFileSync(join(tmpDir, "templates", "good"), "{{ NAME }}");

			const result = await runBatch(
				{ templatePath: "templates", outputPath: "out", directoryMode: true, cwd: tmpDir },
				{ NAME: "sally" },
				{},
				collectingWritable().stream,
			);

			expect(result).toEqual({ rendered: 1, failed: 1 });
			expect(readFileSync(join(tmpDir, "out", "good"), "utf-8")).toBe("sally");
			expect(readFileSync(join(tmpDir, "out", "bad"), "utf-8")).toBe("");
			expect(logLines.at(-1)).toBe("[error] Errors encountered during template processing (1 failure)\n");
		});

		test("writes a tar archive without directory entries", async () => {
			writeTemplateTree();
			const out = collectingWritable();

			const result = await runBatch(
				{ templatePath: "templates", directoryMode: true, tarFile: "-", cwd: tmpDir },
				{},
				{},
				out.stream,
			);

			expect(result).toEqual({ rendered: 2, failed: 0 });
			const entries = await readTar(out.buffer());
			expect(entries.map((e) => [e.header.name, e.body])).toEqual([
				["dir1/dir2/template2", "dir1/dir2/template2|dir1/dir2"],
				["dir1/template1", "dir1/template1"],
			]);
		});

		test("prefixes tar entries with the output directory", async () => {
			writeTemplateTree();
			const result = await runBatch(
				{ templatePath: "templates", outputPath: "site", directoryMode: true, tarFile: "site.tar", cwd: tmpDir },
				{},
				{},
				collectingWritable().stream,
			);

			expect(result.failed).toBe(0);
			const entries = await readTar(readFileSync(join(tmpDir, "site.tar")));
			expect(entries.map((e) => e.header.name)).toEqual(["site/dir1/dir2/template2", "site/dir1/template1"]);
			expect(entries[1]?.body).toBe("dir1/template1");
		});

		test("checks paths before rendering", async () => {
			const stdout = collectingWritable().stream;
			await expect(runBatch({ templatePath: "missing", directoryMode: false, cwd: tmpDir }, {}, {}, stdout)).rejects.toThrow(
				new ConfigurationError("Template path does not exist: missing"),
			);

			writeTemplateTree();
			await expect(
				runBatch({ templatePath: "templates", outputPath: "nope", directoryMode: true, cwd: tmpDir }, {}, {}, stdout),
			).rejects.toThrow("Output path must be an existing directory in directory mode: nope");
			await expect(
				runBatch({ templatePath: "templates", directoryMode: false, cwd: tmpDir }, {}, {}, stdout),
			).rejects.toThrow("Template path is not a file: templates");
		});

		test("resolves includes against the template directory", async () => {
			mkdirSync(join(tmpDir, "tpl"));
			writeFileSync(join(tmpDir, "tpl", "main.liquid"), "[{% include 'part.liquid' %}]");
			writeFileSync(join(tmpDir, "tpl", "part.liquid"), "{{ NAME }}");
			const out = collectingWritable();

			await runBatch({ templatePath: "tpl/main.liquid", directoryMode: false, cwd: tmpDir }, { NAME: "x" }, {}, out.stream);

			expect(out.text()).toBe("[x]");
		});
	});
});
