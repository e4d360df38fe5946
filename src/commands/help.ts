import type { Command } from "commander";
import { ConfigurationError } from "../lib/errors";
import { findTopic } from "../lib/help-topics";

export function registerHelpCommand(program: Command, write: (text: string) => void): void {
	// Disable Commander's built-in help command so we can handle topics
	program.helpCommand(false);

	program
		.command("help [topic]")
		.description("Display help for p2 or a topic")
		.helpOption(false)
		.action((arg?: string) => {
			if (!arg) {
				program.help();
				return;
			}

			const topic = findTopic(arg);
			if (!topic) {
				throw new ConfigurationError(`Unknown help topic: '${arg}'. Run 'p2 help' for available topics.`);
			}
			topic.render((text) => write(`${text}\n`));
		});
}
