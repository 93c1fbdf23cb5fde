import { join } from "node:path";
import { REPO_DIR, TERRAFORM_DIR, TERRAFORM_VARS_FILE } from "../config.js";
import { runOrThrow } from "../lib/shell.js";
import * as ui from "../lib/ui.js";
import { renderTerraformVars, writeVarFile } from "../lib/varfile.js";
import type { StepContext } from "../types.js";
import { repoPath, toolDir } from "./repository.js";

export async function writeVars(ctx: StepContext): Promise<void> {
	toolDir(ctx, TERRAFORM_DIR);
	writeVarFile(join(repoPath(ctx), TERRAFORM_VARS_FILE), renderTerraformVars(ctx.params));
	ui.success(`Terraform variables written to ${ui.cmd(join(REPO_DIR, TERRAFORM_VARS_FILE))}`);
}

export async function init(ctx: StepContext): Promise<void> {
	await runOrThrow(ctx.shell, "terraform", ["init"], { cwd: toolDir(ctx, TERRAFORM_DIR), failure: "Terraform initialization failed" });
	ui.success("Terraform initialized");
}

/**
 * `terraform apply`, attached to the terminal so the operator confirms the plan.
 *
 * The plan runs twice: SendGrid sender/domain resources depend on DNS records
 * created in the same apply and only converge on the second pass.
 */
export function apply(pass: 1 | 2): (ctx: StepContext) => Promise<void> {
	const name = pass === 1 ? "first pass" : "second pass";
	return async (ctx) => {
		ui.info(`Applying Terraform plan (${name}). You will be prompted to confirm by typing ${ui.bold("yes")}.`);
		await runOrThrow(ctx.shell, "terraform", ["apply"], { cwd: toolDir(ctx, TERRAFORM_DIR), failure: `Terraform apply (${name}) failed` });
		ui.success(`Terraform apply (${name}) completed`);
	};
}
