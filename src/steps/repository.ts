import { existsSync, statSync } from "node:fs";
import { join } from "node:path";
import { REPO_DIR, REPO_URL } from "../config.js";
import { runOrThrow } from "../lib/shell.js";
import * as ui from "../lib/ui.js";
import type { StepContext } from "../types.js";

export function repoPath(ctx: StepContext): string {
	return join(ctx.workDir, REPO_DIR);
}

/**
 * Resolve a directory inside the cloned repository, failing the step if it is not there.
 */
export function toolDir(ctx: StepContext, name: string): string {
	const dir = join(repoPath(ctx), name);
	if (!existsSync(dir) || !statSync(dir).isDirectory()) {
		throw new Error(`Failed to change directory to '${name}' (${dir} does not exist)`);
	}
	return dir;
}

/**
 * Clone the supabase-on-do repository. An existing checkout is reused as-is.
 */
export async function run(ctx: StepContext): Promise<void> {
	const dir = repoPath(ctx);

	if (existsSync(dir)) {
		ui.skip(`Repository directory ${ui.cmd(REPO_DIR)} already exists. Skipping clone.`);
		ui.info("Please ensure it is a checkout of the supabase-on-do repository.");
		return;
	}

	ui.info(`Cloning ${ui.url(REPO_URL)}...`);
	await runOrThrow(ctx.shell, "git", ["clone", REPO_URL, REPO_DIR], { cwd: ctx.workDir, failure: "Failed to clone repository" });
	ui.success("Repository cloned");
}
