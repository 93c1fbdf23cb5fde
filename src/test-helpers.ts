import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { PACKER_DIR, REPO_DIR, TERRAFORM_DIR } from "./config.js";
import type { Prompter } from "./lib/prompter.js";
import type { CommandRunner, ExecOptions, ExecResult } from "./lib/shell.js";
import type { SessionParams } from "./types.js";

export const testParams: SessionParams = Object.freeze({
	doApiToken: "test-do-token",
	doSpacesAccessKey: "test-access-key",
	doSpacesSecretKey: "test-secret-key",
	domainName: "example.com",
	sendgridApiKey: "test-sendgrid-key",
	tfCloudToken: "",
	doRegion: "nyc3",
	doImage: "ubuntu-22-04-x64",
	doSize: "s-2vcpu-4gb",
	sshUsername: "root",
});

export interface PromptCall {
	kind: "text" | "select";
	message: string;
	masked: boolean;
	choices: string[];
}

export interface ScriptedPrompter extends Prompter {
	calls: PromptCall[];
}

/**
 * Answers prompts from a queue, in order. An empty text answer takes the
 * prompt's default, as the terminal prompt would.
 */
export function createScriptedPrompter(answers: string[]): ScriptedPrompter {
	const queue = [...answers];
	const calls: PromptCall[] = [];

	const next = (message: string): string => {
		const answer = queue.shift();
		if (answer === undefined) {
			throw new Error(`No scripted answer for prompt: ${message}`);
		}
		return answer;
	};

	return {
		calls,
		async text(message, options) {
			calls.push({ kind: "text", message, masked: options?.masked ?? false, choices: [] });
			const answer = next(message);
			return answer === "" && options?.default !== undefined ? options.default : answer;
		},
		async select(message, choices) {
			calls.push({ kind: "select", message, masked: false, choices: choices.map((c) => c.value) });
			return next(message);
		},
	};
}

export interface RecordedCommand {
	mode: "run" | "capture";
	line: string;
	cwd: string | undefined;
	/** Only set for captured commands that pass them. */
	env?: ExecOptions["env"];
	timeout?: number;
}

export interface RecordingRunner extends CommandRunner {
	commands: RecordedCommand[];
}

/**
 * Stand-in for the real tools. `git clone` creates the checkout layout,
 * `doctl account get` and `terraform output` answer with canned text, and the
 * command line named in `exitCodes` exits with the given code.
 */
export function createRecordingRunner(exitCodes: Record<string, number> = {}): RecordingRunner {
	const commands: RecordedCommand[] = [];

	return {
		commands,
		async run(command, args, options) {
			const line = [command, ...args].join(" ");
			commands.push({ mode: "run", line, cwd: options?.cwd });
			const exitCode = exitCodes[line] ?? 0;
			if (command === "git" && exitCode === 0 && options?.cwd) {
				mkdirSync(join(options.cwd, REPO_DIR, PACKER_DIR), { recursive: true });
				mkdirSync(join(options.cwd, REPO_DIR, TERRAFORM_DIR), { recursive: true });
			}
			return exitCode;
		},
		async capture(command, args, options): Promise<ExecResult> {
			const line = [command, ...args].join(" ");
			commands.push({ mode: "capture", line, cwd: options?.cwd, env: options?.env, timeout: options?.timeout });
			const exitCode = exitCodes[line] ?? 0;
			if (exitCode !== 0) {
				return { stdout: "", stderr: `${command} failed`, exitCode };
			}
			if (command === "doctl") {
				return { stdout: "ops@example.com\tactive", stderr: "", exitCode };
			}
			if (command === "terraform" && args[0] === "output") {
				return { stdout: `value-of-${args[2]}`, stderr: "", exitCode };
			}
			return { stdout: "", stderr: "", exitCode };
		},
	};
}

/** Lay out an already-cloned repository under `workDir`. */
export function createCheckout(workDir: string): void {
	mkdirSync(join(workDir, REPO_DIR, PACKER_DIR), { recursive: true });
	mkdirSync(join(workDir, REPO_DIR, TERRAFORM_DIR), { recursive: true });
}
