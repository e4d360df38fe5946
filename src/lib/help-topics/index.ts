import { contextTopic } from "./context";
import { filtersTopic } from "./filters";

export interface HelpTopic {
	name: string;
	summary: string;
	render(out: (text: string) => void): void;
}

const TOPICS: HelpTopic[] = [filtersTopic, contextTopic];

export function findTopic(name: string): HelpTopic | undefined {
	return TOPICS.find((t) => t.name === name);
}

export function allTopics(): HelpTopic[] {
	return TOPICS;
}
