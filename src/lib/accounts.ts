import { readFileSync } from "node:fs";

/** Resolves account names to numeric ids for the ownership filters. */
export interface AccountLookup {
	userId(name: string): number;
	groupId(name: string): number;
}

export class AccountLookupError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "AccountLookupError";
	}
}

/**
 * Reads colon-separated account databases (passwd/group format), where the
 * third field is the numeric id.
 */
export class SystemAccounts implements AccountLookup {
	constructor(
		private readonly passwdFile = "/etc/passwd",
		private readonly groupFile = "/etc/group",
	) {}

	userId(name: string): number {
		return lookupId(this.passwdFile, name, "user");
	}

	groupId(name: string): number {
		return lookupId(this.groupFile, name, "group");
	}
}

function lookupId(file: string, name: string, what: "user" | "group"): number {
	let content: string;
	try {
		content = readFileSync(file, "utf-8");
	} catch (e) {
		throw new AccountLookupError(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
	}
	for (const line of content.split("\n")) {
		if (line === "" || line.startsWith("#")) continue;
		const fields = line.split(":");
		if (fields[0] !== name) continue;
		const raw = fields[2] ?? "";
		if (!/^\d+$/.test(raw)) {
			throw new AccountLookupError(`cannot convert ${what} id value to int: ${raw}`);
		}
		return Number.parseInt(raw, 10);
	}
	throw new AccountLookupError(`unknown ${what} ${name}`);
}
