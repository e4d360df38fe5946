import { bold, dim } from "../output";
import type { HelpTopic } from "./index";

export const contextTopic: HelpTopic = {
	name: "context",
	summary: "Variables a template can read",
	render(out) {
		out(bold("TEMPLATE CONTEXT"));
		out("");
		out("  Every key of the input data is a variable. With no --input the");
		out("  data is the environment; --include-env merges it over a file.");
		out("");
		out(bold("OUTPUT METADATA"));
		out("");
		out(`  The ${bold("p2")} variable describes the file being written:`);
		out("");
		out(`    ${dim("p2.OutputPath")}      Absolute output path`);
		out(`    ${dim("p2.OutputName")}      File name`);
		out(`    ${dim("p2.OutputDir")}       Absolute directory`);
		out(`    ${dim("p2.OutputRelPath")}   Path relative to the output root`);
		out(`    ${dim("p2.OutputRelDir")}    Directory relative to the output root`);
		out("");
		out("  When rendering to stdout, OutputPath, OutputName and OutputRelPath");
		out("  are <stdout>. An input key named p2 is ignored.");
		out("");
	},
};
