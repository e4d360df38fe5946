/** Keys a template can address by name. */
const IDENTIFIER = /^[a-zA-Z0-9_]+$/;

export function isIdentifier(key: string): boolean {
	return IDENTIFIER.test(key);
}

/**
 * Convert a process environment into template data, dropping entries whose
 * names are not identifiers (e.g. exported shell functions like `BASH_FUNC_x%%`).
 */
export function fromEnvironment(env: Record<string, string | undefined>): Record<string, string> {
	const out: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value === undefined || !isIdentifier(key)) continue;
		out[key] = value;
	}
	return out;
}
