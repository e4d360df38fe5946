import type { Readable, Writable } from "node:stream";

/** Everything one run of p2 reads from or writes to its host process. */
export interface Launch {
	/** Arguments after the program name. */
	args: string[];
	env: Record<string, string | undefined>;
	stdin: Readable;
	stdout: Writable;
	stderr: Writable;
	/** Directory relative paths resolve against. Defaults to the process's. */
	cwd?: string;
}
