import { Writable } from "node:stream";
import { type Headers, extract } from "tar-stream";
import type { OutputSink, PreparedOutput } from "./output-sinks";

export interface TarEntry {
	header: Headers;
	body: string;
}

export async function readTar(data: Buffer): Promise<TarEntry[]> {
	const entries: TarEntry[] = [];
	const extractor = extract();
	extractor.on("entry", (header, stream, next) => {
		const chunks: Buffer[] = [];
		stream.on("data", (chunk: Buffer) => chunks.push(chunk));
		stream.on("end", () => {
			entries.push({ header, body: Buffer.concat(chunks).toString("utf-8") });
			next();
		});
	});
	const done = new Promise<void>((resolve, reject) => {
		extractor.on("finish", () => resolve());
		extractor.on("error", reject);
	});
	extractor.end(data);
	await done;
	return entries;
}

/** A writable that keeps everything written to it. */
export function collectingWritable(): { stream: Writable; buffer(): Buffer; text(): string } {
	const chunks: Buffer[] = [];
	const stream = new Writable({
		write(chunk: Buffer, _encoding, callback) {
			chunks.push(Buffer.from(chunk));
			callback();
		},
	});
	return {
		stream,
		buffer: () => Buffer.concat(chunks),
		text: () => Buffer.concat(chunks).toString("utf-8"),
	};
}

/** Keeps rendered text in memory, keyed by output path. */
export class MemorySink implements OutputSink {
	readonly outputs = new Map<string, string>();
	readonly finalized: string[] = [];
	failPrepare = false;
	failFinalize = false;
	closed = false;

	prepare(outputPath: string): PreparedOutput {
		if (this.failPrepare) throw new Error("no space left on device");
		return {
			target: outputPath,
			baseDir: "/",
			ownership: { chown: () => {}, chmod: () => {} },
			write: (text) => {
				this.outputs.set(outputPath, (this.outputs.get(outputPath) ?? "") + text);
			},
			finalize: () => {
				this.finalized.push(outputPath);
				if (this.failFinalize) throw new Error("disk full");
			},
		};
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}
