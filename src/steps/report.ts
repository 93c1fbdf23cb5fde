import { join } from "node:path";
import { PACKER_VARS_FILE, REPO_DIR, STUDIO_SUBDOMAIN, STUDIO_USERNAME, TERRAFORM_DIR, TERRAFORM_OUTPUTS, TERRAFORM_VARS_FILE } from "../config.js";
import { CommandError, formatCommand } from "../lib/shell.js";
import * as ui from "../lib/ui.js";
import type { StepContext } from "../types.js";
import { toolDir } from "./repository.js";

/** Host Supabase Studio is served on, e.g. "supabase.example.com". */
export function studioHost(domainName: string): string {
	return `${STUDIO_SUBDOMAIN}.${domainName}`;
}

/**
 * Read the generated passwords and tokens from Terraform state and print them,
 * followed by what the operator does next.
 */
export async function run(ctx: StepContext): Promise<void> {
	const cwd = toolDir(ctx, TERRAFORM_DIR);
	const outputs: [string, string][] = [];

	for (const name of TERRAFORM_OUTPUTS) {
		const args = ["output", "-raw", name];
		const result = await ctx.shell.capture("terraform", args, { cwd });
		if (result.exitCode !== 0) {
			throw new CommandError(`Failed to read Terraform output '${name}': ${result.stderr || formatCommand("terraform", args)}`, "terraform", result.exitCode);
		}
		outputs.push([name, result.stdout]);
	}

	ui.info(ui.bold("Generated passwords and tokens") + ui.dim(" — keep these secure!"));
	for (const [name, value] of outputs) {
		ui.keyValue(ui.label(name), ui.magenta(value));
	}

	ui.complete("Setup Complete");
	ui.info("Please wait 5-10 minutes for everything to start up.");
	ui.info(`Then point your browser to: ${ui.host(studioHost(ctx.params.domainName))}`);
	ui.info(`When prompted for authentication, use the username ${ui.bold(STUDIO_USERNAME)} and the ${ui.label("htpasswd")} shown above.`);
	console.log("");
	ui.warn("Remember to secure the variable files created:");
	ui.info(ui.cmd(join(REPO_DIR, PACKER_VARS_FILE)));
	ui.info(ui.cmd(join(REPO_DIR, TERRAFORM_VARS_FILE)));
	console.log("");
	ui.info(`To destroy the created resources later, run ${ui.cmd("terraform destroy")} in ${ui.cmd(join(REPO_DIR, TERRAFORM_DIR))}.`);
}
