import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { AccountLookupError, SystemAccounts } from "./accounts";

describe("SystemAccounts", () => {
	let tmpDir: string;
	let accounts: SystemAccounts;

	beforeEach(() => {
		tmpDir = mkdtempSync(join(tmpdir(), "p2-accounts-test-"));
		writeFileSync(
			join(tmpDir, "passwd"),
			"# comment\nroot:x:0:0:root:/root:/bin/sh\nalice:x:1001:1001::/home/alice:/bin/sh\nbroken:x:abc:1::/:/bin/sh\n",
		);
		writeFileSync(join(tmpDir, "group"), "root:x:0:\nstaff:x:50:alice\n");
		accounts = new SystemAccounts(join(tmpDir, "passwd"), join(tmpDir, "group"));
	});

	afterEach(() => {
		rmSync(tmpDir, { recursive: true, force: true });
	});

	test("resolves user and group names", () => {
		expect(accounts.userId("root")).toBe(0);
		expect(accounts.userId("alice")).toBe(1001);
		expect(accounts.groupId("staff")).toBe(50);
	});

	test("rejects unknown names", () => {
		expect(() => accounts.userId("bob")).toThrow(new AccountLookupError("unknown user bob"));
		expect(() => accounts.groupId("wheel")).toThrow("unknown group wheel");
	});

	test("rejects ids that are not integers", () => {
		expect(() => accounts.userId("broken")).toThrow("cannot convert user id value to int: abc");
	});

	test("reports an unreadable database", () => {
		const missing = new SystemAccounts(join(tmpDir, "nope"), join(tmpDir, "nope"));
		expect(() => missing.userId("root")).toThrow(AccountLookupError);
	});
});
