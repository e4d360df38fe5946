import { basename, dirname, relative, resolve } from "node:path";
import { STDOUT_SENTINEL } from "./render-context";

/** The `p2` namespace every template can read. */
export interface PathMetadata {
	OutputPath: string;
	OutputName: string;
	OutputDir: string;
	OutputRelPath: string;
	OutputRelDir: string;
}

function relativeOrDot(from: string, to: string): string {
	return relative(from, to) || ".";
}

export function fileMetadata(outputPath: string, rootDir: string): PathMetadata {
	const absPath = resolve(outputPath);
	const absRoot = resolve(rootDir);
	const absDir = dirname(absPath);
	return {
		OutputPath: absPath,
		OutputName: basename(absPath),
		OutputDir: absDir,
		OutputRelPath: relativeOrDot(absRoot, absPath),
		OutputRelDir: relativeOrDot(absRoot, absDir),
	};
}

export function stdoutMetadata(rootDir: string): PathMetadata {
	return {
		OutputPath: STDOUT_SENTINEL,
		OutputName: STDOUT_SENTINEL,
		OutputDir: resolve(rootDir),
		OutputRelPath: STDOUT_SENTINEL,
		OutputRelDir: ".",
	};
}

export function toScope(metadata: PathMetadata): Record<string, string> {
	return { ...metadata };
}
