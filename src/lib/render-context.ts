import { chmodSync, chownSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";

/** Marker used in place of a path when output goes to standard output. */
export const STDOUT_SENTINEL = "<stdout>";

/** Ownership and permission changes, applied to the current render target. */
export interface OwnershipOperations {
	chown(path: string, uid: number, gid: number): void;
	chmod(path: string, mode: number): void;
}

export const filesystemOwnership: OwnershipOperations = {
	chown: (path, uid, gid) => chownSync(path, uid, gid),
	chmod: (path, mode) => chmodSync(path, mode),
};

/**
 * Per-render capability handed to filters through the evaluator. Holds what
 * a filter may act on: the current target, the directory relative paths are
 * anchored to, and the ownership operations of the active output sink.
 */
export class RenderContext {
	constructor(
		readonly target: string,
		readonly baseDir: string,
		readonly ownership: OwnershipOperations = filesystemOwnership,
	) {}

	get writesToStdout(): boolean {
		return this.target === STDOUT_SENTINEL;
	}

	resolvePath(path: string): string {
		return isAbsolute(path) ? path : resolve(this.baseDir, path);
	}
}

// Symbol keys are unreachable from template expressions.
const RENDER_CONTEXT_KEY = Symbol("p2.renderContext");

export function renderGlobals(ctx: RenderContext): Record<symbol, RenderContext> {
	return { [RENDER_CONTEXT_KEY]: ctx };
}

/**
 * Recover the render context from an evaluator's globals. Filters called
 * outside an engine render (e.g. a bare parseAndRender) fall back to a
 * stdout-targeted context anchored at the working directory.
 */
export function renderContextOf(globals: object | undefined): RenderContext {
	const candidate: unknown = globals ? Reflect.get(globals, RENDER_CONTEXT_KEY) : undefined;
	if (candidate instanceof RenderContext) return candidate;
	return new RenderContext(STDOUT_SENTINEL, process.cwd());
}
