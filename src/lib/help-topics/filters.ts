import { bold, dim } from "../output";
import type { HelpTopic } from "./index";

export const filtersTopic: HelpTopic = {
	name: "filters",
	summary: "Filters available to templates",
	render(out) {
		out(bold("FILTERS"));
		out("");
		out("  Filters take a value and an optional parameter:");
		out("");
		out(`  ${dim('{{ config | to_json: 2 }}')}`);
		out(`  ${dim('{{ text | replace: "old", "new", 1 }}')}`);
		out("");
		out(bold("TEXT"));
		out("");
		out(`    ${bold("indent")}         Prefix every line with a string, or with N spaces`);
		out(`    ${bold("replace")}        Replace the first N occurrences (or all) of a string`);
		out(`    ${bold("string")}         Convert bytes to a string`);
		out(`    ${bold("bytes")}          Convert a string to bytes`);
		out("");
		out(bold("SERIALIZATION"));
		out("");
		out(`    ${bold("to_json")}        JSON; parameter is the indent (N spaces, true, or a string)`);
		out(`    ${bold("to_yaml")}        YAML`);
		out(`    ${bold("to_toml")}        TOML; the value must be a mapping`);
		out(`    ${bold("to_base64")}      Base64-encode a string or bytes`);
		out(`    ${bold("from_base64")}    Decode base64 into bytes`);
		out(`    ${bold("to_gzip")}        Gzip bytes; parameter is the level (default 9)`);
		out(`    ${bold("from_gzip")}      Gunzip bytes`);
		out("");
		out(bold("OUTPUT FILE"));
		out("");
		out("  These act on the file being rendered and print nothing. They do");
		out("  nothing when rendering to stdout, and set the entry header in a tar.");
		out("");
		out(`    ${bold("SetOwner")}       Set the owner (user name or uid)`);
		out(`    ${bold("SetGroup")}       Set the group (group name or gid)`);
		out(`    ${bold("SetMode")}        Set the mode from an octal string, e.g. "0600"`);
		out("");
		out(bold("SIDE EFFECTS"));
		out("");
		out("  Registered only when enabled with --enable-filters, or as");
		out("  pass-throughs with --enable-noop-filters. Relative paths resolve");
		out("  against the output file's directory in directory mode.");
		out("");
		out(`    ${bold("write_file")}     Write the value to a file and pass it through`);
		out(`    ${bold("make_dirs")}      Create a directory (with parents) and pass the value through`);
		out("");
	},
};
