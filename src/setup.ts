import type { DropletCatalog } from "./lib/digitalocean.js";
import { runPipeline } from "./lib/pipeline.js";
import type { Prompter } from "./lib/prompter.js";
import type { CommandRunner } from "./lib/shell.js";
import * as ui from "./lib/ui.js";
import * as accountStep from "./steps/account.js";
import { collectParams } from "./steps/credentials.js";
import * as packerStep from "./steps/packer.js";
import { checkPrerequisites } from "./steps/prerequisites.js";
import * as reportStep from "./steps/report.js";
import * as repositoryStep from "./steps/repository.js";
import * as terraformStep from "./steps/terraform.js";
import type { Phase, StepDef, StepId } from "./types.js";

/** The provisioning sequence. Order is fixed; a failure stops everything after it. */
export const STEPS: readonly StepDef[] = [
	{ id: "account", label: "DigitalOcean Account", phase: "VerifyingAccount", run: accountStep.run },
	{ id: "clone", label: "Repository", phase: "WritingConfig", run: repositoryStep.run },
	{ id: "packer-vars", label: "Packer Variables", phase: "WritingConfig", run: packerStep.writeVars },
	{ id: "terraform-vars", label: "Terraform Variables", phase: "WritingConfig", run: terraformStep.writeVars },
	{ id: "packer-init", label: "Packer Init", phase: "BuildingImage", run: packerStep.init },
	{ id: "packer-build", label: "Packer Build", phase: "BuildingImage", run: packerStep.build },
	{ id: "terraform-init", label: "Terraform Init", phase: "ApplyingInfra1", run: terraformStep.init },
	{ id: "terraform-apply-1", label: "Terraform Apply (1/2)", phase: "ApplyingInfra1", run: terraformStep.apply(1) },
	{ id: "terraform-apply-2", label: "Terraform Apply (2/2)", phase: "ApplyingInfra2", run: terraformStep.apply(2) },
	{ id: "outputs", label: "Outputs", phase: "ReportingOutputs", run: reportStep.run },
];

export interface SetupDeps {
	prompter: Prompter;
	shell: CommandRunner;
	/** Directory the repository is cloned into. */
	workDir: string;
	commandExists?: (tool: string) => Promise<boolean>;
	platform?: NodeJS.Platform;
	loadCatalog?: (token: string) => Promise<DropletCatalog>;
}

export interface SetupResult {
	exitCode: 0 | 1;
	/** "Done" or "Failed". */
	phase: Phase;
	/** Where the workflow stopped, when it failed. */
	failedIn?: Phase;
	completed: StepId[];
}

/**
 * Check tools, collect parameters, then run every step in order.
 * Prompt cancellation propagates as the prompt library's error.
 */
export async function runSetup(deps: SetupDeps): Promise<SetupResult> {
	ui.banner();
	printChecklist();

	const missing = await checkPrerequisites({ exists: deps.commandExists, platform: deps.platform });
	if (missing.length > 0) {
		ui.error(`Please install ${missing.map((t) => ui.cmd(t)).join(", ")} and run the script again.`);
		return { exitCode: 1, phase: "Failed", failedIn: "CheckingPrereqs", completed: [] };
	}
	console.log("");

	const params = await collectParams({ prompter: deps.prompter, loadCatalog: deps.loadCatalog });

	const result = await runPipeline(STEPS, { params, workDir: deps.workDir, shell: deps.shell });
	if (!result.ok) {
		return { exitCode: 1, phase: "Failed", failedIn: result.error.phase, completed: result.completed };
	}
	return { exitCode: 0, phase: "Done", completed: result.completed };
}

function printChecklist(): void {
	ui.warn("Before running this, make sure you have:");
	ui.info("1. DigitalOcean and SendGrid accounts");
	ui.info("2. A DigitalOcean API token (read/write)");
	ui.info("3. A DO Spaces access key and secret");
	ui.info("4. Your domain added to DigitalOcean DNS, with nameservers pointed at DigitalOcean");
	ui.info("5. A SendGrid admin API token");
	ui.info(`6. ${ui.dim("(optional)")} A Terraform Cloud user API token`);
	ui.info(`Secrets are written to local variable files. ${ui.bold("Run this in a secure environment.")}`);
	console.log("");
}
