import { execFile, spawn } from "node:child_process";

export interface ExecResult {
	stdout: string;
	stderr: string;
	exitCode: number;
}

export interface ExecOptions {
	cwd?: string;
	stdin?: string;
	/** Extra variables, layered over this process's environment. */
	env?: Record<string, string>;
	/** Milliseconds; 0 disables the limit. */
	timeout?: number;
}

/** A non-zero exit from an external command. */
export class CommandError extends Error {
	readonly command: string;
	readonly exitCode: number;

	constructor(message: string, command: string, exitCode: number) {
		super(message);
		this.name = "CommandError";
		this.command = command;
		this.exitCode = exitCode;
	}
}

/**
 * Execute a command and return stdout/stderr/exitCode.
 * Does NOT throw on non-zero exit — check exitCode yourself.
 */
export function exec(command: string, args: string[] = [], options?: ExecOptions): Promise<ExecResult> {
	return new Promise((resolve) => {
		const child = execFile(
			command,
			args,
			{
				cwd: options?.cwd,
				env: options?.env ? { ...process.env, ...options.env } : undefined,
				timeout: options?.timeout ?? 30_000,
				maxBuffer: 10 * 1024 * 1024,
			},
			(error, stdout, stderr) => {
				const err = stderr.toString().trim();
				resolve({
					stdout: stdout.toString().trim(),
					// A killed or unspawnable process leaves stderr empty; keep the reason
					stderr: err || (error ? error.message : ""),
					exitCode: error ? (typeof error.code === "number" ? error.code : 1) : 0,
				});
			},
		);

		if (options?.stdin && child.stdin) {
			child.stdin.write(options.stdin);
			child.stdin.end();
		}
	});
}

/**
 * Run a command attached to the terminal and resolve with its exit code.
 * No timeout: Packer builds and Terraform applies take as long as they take,
 * and `terraform apply` waits for the operator to type "yes".
 */
export function runInteractive(command: string, args: string[] = [], options?: { cwd?: string }): Promise<number> {
	return new Promise((resolve) => {
		const child = spawn(command, args, { cwd: options?.cwd, stdio: "inherit" });
		// Spawn failures (e.g. ENOENT) emit "error" instead of an exit code
		child.on("error", () => resolve(127));
		child.on("close", (code) => resolve(code ?? 1));
	});
}

/** How steps reach external tools; swapped for a recorder in tests. */
export interface CommandRunner {
	/** Run with inherited stdio and return the exit code. */
	run(command: string, args: string[], options?: { cwd?: string }): Promise<number>;

	/** Run with captured output. */
	capture(command: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
}

/** Options `systemRunner.capture` hands to `exec`: no time limit unless the caller sets one. */
export function captureOptions(options?: ExecOptions): ExecOptions {
	return { ...options, timeout: options?.timeout ?? 0 };
}

export const systemRunner: CommandRunner = {
	run: runInteractive,
	capture: (command, args, options) => exec(command, args, captureOptions(options)),
};

export function formatCommand(command: string, args: string[]): string {
	return [command, ...args].join(" ");
}

/**
 * Run an attached command through `runner` and throw `failure` if it exits non-zero.
 */
export async function runOrThrow(runner: CommandRunner, command: string, args: string[], options: { cwd?: string; failure: string }): Promise<void> {
	const exitCode = await runner.run(command, args, { cwd: options.cwd });
	if (exitCode !== 0) {
		throw new CommandError(`${options.failure} (${formatCommand(command, args)} exited with code ${exitCode})`, command, exitCode);
	}
}

/**
 * Check if a CLI tool is available on PATH.
 * Uses `where` on Windows, `which` on Unix/macOS.
 */
export async function commandExists(command: string): Promise<boolean> {
	const check = process.platform === "win32" ? "where" : "which";
	const result = await exec(check, [command]);
	return result.exitCode === 0;
}

const INSTALL_HINTS: Record<string, Partial<Record<NodeJS.Platform, string>>> = {
	git: {
		darwin: "brew install git",
		linux: "https://git-scm.com/book/en/v2/Getting-Started-Installing-Git",
		win32: "winget install Git.Git",
	},
	doctl: {
		darwin: "brew install doctl",
		linux: "snap install doctl",
		win32: "winget install DigitalOcean.Doctl",
	},
	packer: {
		darwin: "brew tap hashicorp/tap && brew install hashicorp/tap/packer",
		linux: "https://developer.hashicorp.com/packer/tutorials/docker-get-started/get-started-install-cli",
		win32: "winget install Hashicorp.Packer",
	},
	terraform: {
		darwin: "brew tap hashicorp/tap && brew install hashicorp/tap/terraform",
		linux: "https://developer.hashicorp.com/terraform/tutorials/aws-get-started/install-cli",
		win32: "winget install Hashicorp.Terraform",
	},
};

/**
 * Returns platform-aware install instructions for a CLI tool.
 */
export function installHint(tool: string, platform: NodeJS.Platform = process.platform): string {
	const hints = INSTALL_HINTS[tool];
	return hints?.[platform] ?? hints?.linux ?? `Install ${tool} from its official website`;
}
