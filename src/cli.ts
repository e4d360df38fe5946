import { Command, CommanderError, type Help } from "commander";
import { registerHelpCommand } from "./commands/help";
import { registerRenderOptions } from "./commands/render";
import { P2Error } from "./lib/errors";
import { allTopics } from "./lib/help-topics";
import { configureLogger, logError, resetLogger } from "./lib/log";
import { bold, dim } from "./lib/output";
import type { Launch } from "./lib/types";
import { P2_VERSION } from "./version";

function p2FormatHelp(cmd: Command, helper: Help): string {
	const termWidth = helper.padWidth(cmd, helper);

	function callFormatItem(term: string, description: string): string {
		return helper.formatItem(term, termWidth, description, helper);
	}

	// Usage
	let output = [`${helper.styleTitle("Usage:")} ${helper.styleUsage(helper.commandUsage(cmd))}`, ""];

	// Description
	const commandDescription = helper.commandDescription(cmd);
	if (commandDescription.length > 0) {
		const helpWidth = helper.helpWidth ?? 80;
		output = output.concat([helper.boxWrap(helper.styleCommandDescription(commandDescription), helpWidth), ""]);
	}

	const commands = helper.visibleCommands(cmd);
	if (commands.length > 0) {
		const list = commands.map((subcommand) =>
			callFormatItem(
				helper.styleSubcommandTerm(helper.subcommandTerm(subcommand)),
				helper.styleSubcommandDescription(helper.subcommandDescription(subcommand)),
			),
		);
		output = output.concat([helper.styleTitle("Commands:"), ...list, ""]);
	}

	// Help Topics (root command only, before options)
	if (cmd.name() === "p2") {
		const topicList = allTopics().map((t) =>
			callFormatItem(helper.styleSubcommandTerm(t.name), helper.styleSubcommandDescription(t.summary)),
		);
		output = output.concat([
			helper.styleTitle("Help Topics:"),
			dim("  Run 'p2 help <topic>' to read about a topic."),
			"",
			...topicList,
			"",
		]);
	}

	const optionList = helper.visibleOptions(cmd).map((option) =>
		callFormatItem(
			helper.styleOptionTerm(helper.optionTerm(option)),
			helper.styleOptionDescription(helper.optionDescription(option)),
		),
	);
	if (optionList.length > 0) {
		output = output.concat([helper.styleTitle("Options:"), ...optionList, ""]);
	}

	return output.join("\n");
}

export function createProgram(launch: Launch, onDone: (exitCode: number) => void): Command {
	const program = new Command();
	program
		.name("p2")
		.description(
			"Render Jinja-like templates against data from the environment, an env file, JSON or YAML. Renders a single file, or a whole directory tree into a directory or a tar archive.",
		)
		.version(`p2 ${P2_VERSION}`, "-v, --version")
		.usage("[options] [command]")
		.configureHelp({ formatHelp: p2FormatHelp, styleTitle: (str) => bold(str) })
		.configureOutput({
			writeOut: (str) => {
				launch.stdout.write(str);
			},
			writeErr: (str) => {
				launch.stderr.write(str);
			},
			outputError: (str) => {
				logError(str.replace(/^error: /, "").trimEnd());
			},
		})
		.exitOverride()
		.showSuggestionAfterError();

	registerHelpCommand(program, (text) => {
		launch.stdout.write(text);
	});
	registerRenderOptions(program, launch, onDone);
	return program;
}

/** Run p2 against the given arguments and streams. Resolves to the exit code. */
export async function entrypoint(launch: Launch): Promise<number> {
	resetLogger();
	configureLogger({
		write: (text) => {
			launch.stderr.write(text);
		},
		color: Reflect.get(launch.stderr, "isTTY") === true,
	});

	let exitCode = 0;
	const program = createProgram(launch, (code) => {
		exitCode = code;
	});

	try {
		await program.parseAsync(launch.args, { from: "user" });
	} catch (err) {
		if (err instanceof CommanderError) return err.exitCode;
		if (err instanceof P2Error) {
			logError(err.message);
			return 1;
		}
		throw err;
	}
	return exitCode;
}
