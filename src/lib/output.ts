import { isTTY } from "./tty";

const RED = "\x1b[0;31m";
const YELLOW = "\x1b[0;33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const NC = "\x1b[0m";

function color(code: string, text: string): string {
	if (!isTTY()) return text;
	return `${code}${text}${NC}`;
}

export function red(text: string): string {
	return color(RED, text);
}

export function yellow(text: string): string {
	return color(YELLOW, text);
}

export function bold(text: string): string {
	return color(BOLD, text);
}

export function dim(text: string): string {
	return color(DIM, text);
}

export function plural(count: number, singular: string, pluralForm?: string): string {
	return `${count} ${count === 1 ? singular : (pluralForm ?? `${singular}s`)}`;
}
