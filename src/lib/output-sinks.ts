import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { dirname, posix, relative, sep } from "node:path";
import { Readable, type Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { type Headers, type Pack, pack } from "tar-stream";
import { type OwnershipOperations, STDOUT_SENTINEL, filesystemOwnership } from "./render-context";

/** A destination for one render, as returned by an OutputSink. */
export interface PreparedOutput {
	/** What ownership filters act on: a path, or the stdout sentinel. */
	target: string;
	/** Directory relative scripting-filter paths resolve against. */
	baseDir: string;
	ownership: OwnershipOperations;
	write(text: string): void;
	finalize?(): void;
}

/**
 * Resolves a logical output path to somewhere rendered text can go. A sink is
 * created once per batch, prepared once per template and closed once at the
 * end.
 */
export interface OutputSink {
	prepare(outputPath: string): PreparedOutput;
	close(): Promise<void>;
}

export class StdoutSink implements OutputSink {
	constructor(
		private readonly stream: Writable,
		private readonly baseDir: string,
	) {}

	prepare(): PreparedOutput {
		return {
			target: STDOUT_SENTINEL,
			baseDir: this.baseDir,
			ownership: filesystemOwnership,
			write: (text) => {
				this.stream.write(text);
			},
		};
	}

	async close(): Promise<void> {}
}

function openForWrite(outputPath: string, baseDir: string): PreparedOutput {
	const fd = openSync(outputPath, "w");
	return {
		target: outputPath,
		baseDir,
		ownership: filesystemOwnership,
		write: (text) => {
			writeSync(fd, text);
		},
		finalize: () => closeSync(fd),
	};
}

export class FileSink implements OutputSink {
	constructor(private readonly baseDir: string) {}

	prepare(outputPath: string): PreparedOutput {
		return openForWrite(outputPath, this.baseDir);
	}

	async close(): Promise<void> {}
}

/**
 * Writes each template to its place in a replicated directory tree. Relative
 * paths used by scripting filters are anchored to the output file's directory.
 */
export class DirectoryTreeSink implements OutputSink {
	prepare(outputPath: string): PreparedOutput {
		const dir = dirname(outputPath);
		mkdirSync(dir, { recursive: true });
		return openForWrite(outputPath, dir);
	}

	async close(): Promise<void> {}
}

export const DEFAULT_TAR_MODE = 0o644;

export interface TarSinkOptions {
	destination: Writable;
	/** End the destination when the archive is complete (false for stdout). */
	ownsDestination: boolean;
	/** Entry names are output paths relative to this directory. */
	rootDir: string;
	/** Joined in front of every entry name. */
	prefix?: string;
	baseDir: string;
}

function toPosix(path: string): string {
	return sep === "/" ? path : path.split(sep).join("/");
}

/**
 * Buffers each render and appends it to one shared archive when the render is
 * finalized. Ownership filters edit the pending entry header, since there is
 * no file on disk to change.
 */
export class TarSink implements OutputSink {
	private readonly archive: Pack = pack();
	private failure: Error | undefined;
	private readonly flushed: Promise<void>;

	constructor(private readonly options: TarSinkOptions) {
		// Streams entries out as they are appended, pausing the archive while the
		// destination is full. Stdout is left open when the archive ends.
		this.flushed = pipeline(Readable.from(this.archive), options.destination, {
			end: options.ownsDestination,
		}).catch((err: unknown) => {
			this.failure = err instanceof Error ? err : new Error(String(err));
		});
	}

	entryName(outputPath: string): string {
		const rel = toPosix(relative(this.options.rootDir, outputPath));
		return this.options.prefix ? posix.join(toPosix(this.options.prefix), rel) : rel;
	}

	prepare(outputPath: string): PreparedOutput {
		const header: Headers = {
			name: this.entryName(outputPath),
			type: "file",
			mode: DEFAULT_TAR_MODE,
			uid: 0,
			gid: 0,
			mtime: new Date(0),
		};
		const chunks: string[] = [];

		return {
			target: outputPath,
			baseDir: this.options.baseDir,
			ownership: {
				chown: (_path, uid, gid) => {
					if (uid !== -1) header.uid = uid;
					if (gid !== -1) header.gid = gid;
				},
				chmod: (_path, mode) => {
					header.mode = mode;
				},
			},
			write: (text) => {
				chunks.push(text);
			},
			finalize: () => {
				if (this.failure) throw this.failure;
				const body = Buffer.from(chunks.join(""), "utf-8");
				this.archive.entry({ ...header, size: body.byteLength }, body);
			},
		};
	}

	async close(): Promise<void> {
		this.archive.finalize();
		await this.flushed;
		if (this.failure) throw this.failure;
	}
}
