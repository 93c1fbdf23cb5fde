import { join } from "node:path";
import { PACKER_DIR, PACKER_VARS_FILE, REPO_DIR } from "../config.js";
import { runOrThrow } from "../lib/shell.js";
import * as ui from "../lib/ui.js";
import { renderPackerVars, writeVarFile } from "../lib/varfile.js";
import type { StepContext } from "../types.js";
import { repoPath, toolDir } from "./repository.js";

/**
 * Write packer/supabase.auto.pkrvars.hcl. Packer loads *.auto.pkrvars.hcl on its own.
 */
export async function writeVars(ctx: StepContext): Promise<void> {
	toolDir(ctx, PACKER_DIR);
	writeVarFile(join(repoPath(ctx), PACKER_VARS_FILE), renderPackerVars(ctx.params));
	ui.success(`Packer variables written to ${ui.cmd(join(REPO_DIR, PACKER_VARS_FILE))}`);
}

export async function init(ctx: StepContext): Promise<void> {
	await runOrThrow(ctx.shell, "packer", ["init", "."], { cwd: toolDir(ctx, PACKER_DIR), failure: "Packer initialization failed" });
	ui.success("Packer initialized");
}

export async function build(ctx: StepContext): Promise<void> {
	ui.info("Building the Supabase snapshot (this will take some time)...");
	await runOrThrow(ctx.shell, "packer", ["build", "."], { cwd: toolDir(ctx, PACKER_DIR), failure: "Packer build failed" });
	ui.success("Packer snapshot built");
}
