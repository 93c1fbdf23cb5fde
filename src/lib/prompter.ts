import { input, password, select } from "@inquirer/prompts";

export interface TextOptions {
	/** Read without echo. */
	masked?: boolean;
	default?: string;
}

export interface Choice {
	name: string;
	value: string;
}

/**
 * Source of operator input. The terminal implementation is backed by
 * @inquirer/prompts; tests feed scripted answers instead.
 */
export interface Prompter {
	text(message: string, options?: TextOptions): Promise<string>;
	select(message: string, choices: Choice[], defaultValue?: string): Promise<string>;
}

export const terminalPrompter: Prompter = {
	text(message, options) {
		if (options?.masked) {
			return password({ message });
		}
		return input({ message, default: options?.default });
	},
	select(message, choices, defaultValue) {
		return select({ message, choices, default: defaultValue, pageSize: 12 });
	},
};
