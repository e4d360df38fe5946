import { entrypoint } from "./cli";
import { logWarn } from "./lib/log";

process.on("SIGINT", () => {
	logWarn("Aborted.");
	process.exit(130);
});

process.exitCode = await entrypoint({
	args: process.argv.slice(2),
	env: process.env,
	stdin: process.stdin,
	stdout: process.stdout,
	stderr: process.stderr,
});
