import { gunzipSync, gzipSync } from "node:zlib";
import type { Context } from "liquidjs";
import { stringify as stringifyToml } from "smol-toml";
import { stringify as stringifyYaml } from "yaml";
import { type AccountLookup, AccountLookupError, SystemAccounts } from "./accounts";
import { FilterError, describeError } from "./errors";
import { type RenderContext, renderContextOf } from "./render-context";

/** The `this` LiquidJS binds when it calls a filter. */
export interface FilterInvocation {
	context: Context;
}

export type FilterFunction = (this: FilterInvocation, value: unknown, ...args: unknown[]) => unknown;

const DEFAULT_GZIP_LEVEL = 9;
const JSON_BOOLEAN_INDENT = "    ";
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function isInteger(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value);
}

export function isBytes(value: unknown): value is Uint8Array {
	return value instanceof Uint8Array;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value) && !isBytes(value);
}

function toBuffer(value: Uint8Array): Buffer {
	return Buffer.isBuffer(value) ? value : Buffer.from(value.buffer, value.byteOffset, value.byteLength);
}

/**
 * The built-in p2 filters. Transform filters are pure; SetOwner, SetGroup and
 * SetMode act on the target of the render context they are invoked with.
 */
export class FilterSet {
	constructor(private readonly accounts: AccountLookup = new SystemAccounts()) {}

	// ── Ownership and permissions ────────────────────────────────────

	setOwner(ctx: RenderContext, value: unknown): string {
		if (ctx.writesToStdout) return "";
		const uid = this.resolveId("SetOwner", value, (name) => this.accounts.userId(name));
		this.applyOwnership("SetOwner", () => ctx.ownership.chown(ctx.target, uid, -1));
		return "";
	}

	setGroup(ctx: RenderContext, value: unknown): string {
		if (ctx.writesToStdout) return "";
		const gid = this.resolveId("SetGroup", value, (name) => this.accounts.groupId(name));
		this.applyOwnership("SetGroup", () => ctx.ownership.chown(ctx.target, -1, gid));
		return "";
	}

	setMode(ctx: RenderContext, value: unknown): string {
		if (ctx.writesToStdout) return "";
		if (typeof value !== "string") {
			throw new FilterError("SetMode", "validation", "Filter input must be of type 'string' in octal format.");
		}
		if (!/^[0-7]+$/.test(value)) {
			throw new FilterError("SetMode", "validation", `'${value}' is not an octal file mode`);
		}
		const mode = Number.parseInt(value, 8);
		this.applyOwnership("SetMode", () => ctx.ownership.chmod(ctx.target, mode));
		return "";
	}

	private resolveId(filter: string, value: unknown, lookup: (name: string) => number): number {
		if (isInteger(value)) return value;
		if (typeof value !== "string") {
			throw new FilterError(filter, "validation", "Filter input must be of type 'string' or 'integer'.");
		}
		try {
			return lookup(value);
		} catch (e) {
			if (e instanceof AccountLookupError) {
				throw new FilterError(filter, "lookup", e.message, { cause: e });
			}
			throw e;
		}
	}

	private applyOwnership(filter: string, apply: () => void): void {
		try {
			apply();
		} catch (e) {
			throw new FilterError(filter, "io", describeError(e), { cause: e });
		}
	}

	// ── Text ─────────────────────────────────────────────────────────

	indent(value: unknown, param: unknown): string {
		if (typeof value !== "string") {
			throw new FilterError("indent", "validation", "Filter input must be of type 'string'.");
		}
		let prefix: string;
		if (typeof param === "string") {
			prefix = param;
		} else if (isInteger(param) && param >= 0) {
			prefix = " ".repeat(param);
		} else {
			throw new FilterError("indent", "validation", "Filter param must be of type 'string' or 'integer'.");
		}
		return value
			.split("\n")
			.map((line) => `${prefix}${line}`)
			.join("\n");
	}

	/**
	 * Accepts the match/replacement/count triple either as one list argument
	 * or as positional arguments (`replace: "a", "b", 1`).
	 */
	replace(value: unknown, param: unknown, rest: unknown[] = []): string {
		if (typeof value !== "string") {
			throw new FilterError("replace", "validation", "Filter input must be of type 'string'.");
		}
		const parts: unknown[] = Array.isArray(param) ? param : [param, ...rest];
		if (parts.length !== 2 && parts.length !== 3) {
			throw new FilterError("replace", "validation", "Filter param must be a list of [match, replacement, count?].");
		}
		const [match, replacement, count] = parts.map((p) => (p === undefined || p === null ? "" : String(p)));
		if (match === "") {
			throw new FilterError("replace", "validation", "Match string must not be empty.");
		}
		if (count === undefined) return value.split(match).join(replacement);

		if (!/^-?\d+$/.test(count.trim())) {
			throw new FilterError("replace", "validation", `Replacement count '${count}' is not an integer.`);
		}
		const limit = Number.parseInt(count, 10);
		if (limit < 0) return value.split(match).join(replacement);

		let out = "";
		let pos = 0;
		for (let replaced = 0; replaced < limit; replaced++) {
			const idx = value.indexOf(match, pos);
			if (idx < 0) break;
			out += value.slice(pos, idx) + replacement;
			pos = idx + match.length;
		}
		return out + value.slice(pos);
	}

	// ── Structured serialisation ─────────────────────────────────────

	toJson(value: unknown, param: unknown): string {
		let indent: string | undefined;
		if (isInteger(param)) {
			indent = " ".repeat(Math.max(param, 0));
		} else if (typeof param === "boolean") {
			indent = JSON_BOOLEAN_INDENT;
		} else if (typeof param === "string") {
			indent = param;
		}
		let text: string | undefined;
		try {
			text = JSON.stringify(value, null, indent);
		} catch (e) {
			throw new FilterError("to_json", "serialization", describeError(e), { cause: e });
		}
		if (text === undefined) {
			throw new FilterError("to_json", "serialization", "Value is not JSON-serializable.");
		}
		return text;
	}

	toYaml(value: unknown): string {
		if (value === undefined) {
			throw new FilterError("to_yaml", "serialization", "Value is undefined.");
		}
		try {
			return stringifyYaml(value);
		} catch (e) {
			throw new FilterError("to_yaml", "serialization", describeError(e), { cause: e });
		}
	}

	toToml(value: unknown): string {
		if (!isRecord(value)) {
			throw new FilterError("to_toml", "validation", "Filter input must be a map at the top level.");
		}
		try {
			return stringifyToml(value);
		} catch (e) {
			throw new FilterError("to_toml", "serialization", describeError(e), { cause: e });
		}
	}

	// ── Encodings ────────────────────────────────────────────────────

	toBase64(value: unknown): string {
		if (typeof value === "string") return Buffer.from(value, "utf-8").toString("base64");
		if (isBytes(value)) return toBuffer(value).toString("base64");
		throw new FilterError("to_base64", "validation", "Filter requires a bytes or string input.");
	}

	fromBase64(value: unknown): Buffer {
		if (typeof value !== "string") {
			throw new FilterError("from_base64", "validation", "Filter input must be of type 'string'.");
		}
		const compact = value.replace(/[\r\n]/g, "");
		if (!BASE64_PATTERN.test(compact)) {
			throw new FilterError("from_base64", "validation", "Input is not valid base64.");
		}
		return Buffer.from(compact, "base64");
	}

	asString(value: unknown): string {
		if (typeof value === "string") return value;
		if (isBytes(value)) return toBuffer(value).toString("utf-8");
		throw new FilterError("string", "validation", "Filter requires a bytes or string input.");
	}

	asBytes(value: unknown): Buffer {
		if (typeof value === "string") return Buffer.from(value, "utf-8");
		if (isBytes(value)) return toBuffer(value);
		throw new FilterError("bytes", "validation", "Filter requires a bytes or string input.");
	}

	// ── Compression ──────────────────────────────────────────────────

	toGzip(value: unknown, param: unknown): Buffer {
		if (!isBytes(value)) {
			throw new FilterError("to_gzip", "validation", "Filter requires a bytes input.");
		}
		const level = isInteger(param) ? param : DEFAULT_GZIP_LEVEL;
		if (level < -1 || level > 9) {
			throw new FilterError("to_gzip", "validation", `Invalid compression level ${level}.`);
		}
		try {
			return gzipSync(value, { level });
		} catch (e) {
			throw new FilterError("to_gzip", "io", describeError(e), { cause: e });
		}
	}

	fromGzip(value: unknown): Buffer {
		if (!isBytes(value)) {
			throw new FilterError("from_gzip", "validation", "Filter requires a bytes input.");
		}
		try {
			return gunzipSync(value);
		} catch (e) {
			throw new FilterError("from_gzip", "serialization", describeError(e), { cause: e });
		}
	}

	// ── Registration ─────────────────────────────────────────────────

	/** Name → function bindings in the shape LiquidJS registers. */
	table(): Record<string, FilterFunction> {
		const set = this;
		return {
			SetOwner(value) {
				return set.setOwner(renderContextOf(this.context.globals), value);
			},
			SetGroup(value) {
				return set.setGroup(renderContextOf(this.context.globals), value);
			},
			SetMode(value) {
				return set.setMode(renderContextOf(this.context.globals), value);
			},
			indent: (value, param) => set.indent(value, param),
			replace: (value, param, ...rest) => set.replace(value, param, rest),
			to_json: (value, param) => set.toJson(value, param),
			to_yaml: (value) => set.toYaml(value),
			to_toml: (value) => set.toToml(value),
			to_base64: (value) => set.toBase64(value),
			from_base64: (value) => set.fromBase64(value),
			string: (value) => set.asString(value),
			bytes: (value) => set.asBytes(value),
			to_gzip: (value, param) => set.toGzip(value, param),
			from_gzip: (value) => set.fromGzip(value),
		};
	}
}
