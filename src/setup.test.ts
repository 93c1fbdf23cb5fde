import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { renderPackerVars, renderTerraformVars } from "./lib/varfile.js";
import { runSetup, STEPS } from "./setup.js";
import { createCheckout, createRecordingRunner, createScriptedPrompter, testParams } from "./test-helpers.js";

const ANSWERS = ["test-do-token", "test-access-key", "test-secret-key", "example.com", "test-sendgrid-key", "no", "nyc3", "ubuntu-22-04-x64", "s-2vcpu-4gb", "root"];

const ACCOUNT = "doctl account get --format Email,Status --no-header";
const CLONE = "git clone https://github.com/digitalocean/supabase-on-do.git supabase-on-do";
const OUTPUTS = ["htpasswd", "psql_pass", "jwt", "jwt_anon", "jwt_service_role"].map((name) => `terraform output -raw ${name}`);

describe("runSetup", () => {
	let workDir: string;
	const allTools = async () => true;

	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		workDir = mkdtempSync(join(tmpdir(), "sbdo-setup-"));
	});

	afterEach(() => {
		vi.restoreAllMocks();
		rmSync(workDir, { recursive: true, force: true });
	});

	it("should run the fixed sequence, applying Terraform twice", async () => {
		const shell = createRecordingRunner();

		const result = await runSetup({ prompter: createScriptedPrompter(ANSWERS), shell, workDir, commandExists: allTools });

		expect(result).toEqual({ exitCode: 0, phase: "Done", completed: STEPS.map((s) => s.id) });
		expect(shell.commands.map((c) => c.line)).toEqual([
			ACCOUNT,
			CLONE,
			"packer init .",
			"packer build .",
			"terraform init",
			"terraform apply",
			"terraform apply",
			...OUTPUTS,
		]);

		const packerDir = join(workDir, "supabase-on-do", "packer");
		const terraformDir = join(workDir, "supabase-on-do", "terraform");
		expect(shell.commands.find((c) => c.line === "packer build .")?.cwd).toBe(packerDir);
		expect(shell.commands.find((c) => c.line === "terraform init")?.cwd).toBe(terraformDir);
	});

	it("should write both variable files from the answers", async () => {
		await runSetup({ prompter: createScriptedPrompter(ANSWERS), shell: createRecordingRunner(), workDir, commandExists: allTools });

		expect(readFileSync(join(workDir, "supabase-on-do", "packer", "supabase.auto.pkrvars.hcl"), "utf-8")).toBe(renderPackerVars(testParams));
		expect(readFileSync(join(workDir, "supabase-on-do", "terraform", "terraform.tfvars"), "utf-8")).toBe(renderTerraformVars(testParams));
	});

	it("should add tf_cloud_token to terraform.tfvars after a yes", async () => {
		const answers = [...ANSWERS.slice(0, 5), "Yes", "test-tf-token", ...ANSWERS.slice(6)];

		await runSetup({ prompter: createScriptedPrompter(answers), shell: createRecordingRunner(), workDir, commandExists: allTools });

		const tfvars = readFileSync(join(workDir, "supabase-on-do", "terraform", "terraform.tfvars"), "utf-8");
		expect(tfvars.endsWith('sendgrid_api_key     = "test-sendgrid-key"\ntf_cloud_token       = "test-tf-token"\n')).toBe(true);
	});

	it("should exit non-zero before prompting when a tool is missing", async () => {
		const prompter = createScriptedPrompter([]);
		const shell = createRecordingRunner();

		const result = await runSetup({ prompter, shell, workDir, commandExists: async (tool) => tool !== "terraform" });

		expect(result).toEqual({ exitCode: 1, phase: "Failed", failedIn: "CheckingPrereqs", completed: [] });
		expect(prompter.calls).toEqual([]);
		expect(shell.commands).toEqual([]);
	});

	it("should stop everything after a failed Packer build", async () => {
		const shell = createRecordingRunner({ "packer build .": 1 });

		const result = await runSetup({ prompter: createScriptedPrompter(ANSWERS), shell, workDir, commandExists: allTools });

		expect(result).toEqual({
			exitCode: 1,
			phase: "Failed",
			failedIn: "BuildingImage",
			completed: ["account", "clone", "packer-vars", "terraform-vars", "packer-init"],
		});
		expect(shell.commands.at(-1)?.line).toBe("packer build .");
		expect(shell.commands.some((c) => c.line.startsWith("terraform"))).toBe(false);
	});

	it("should skip the second apply and the outputs when the first apply fails", async () => {
		const shell = createRecordingRunner({ "terraform apply": 1 });

		const result = await runSetup({ prompter: createScriptedPrompter(ANSWERS), shell, workDir, commandExists: allTools });

		expect(result).toEqual({
			exitCode: 1,
			phase: "Failed",
			failedIn: "ApplyingInfra1",
			completed: ["account", "clone", "packer-vars", "terraform-vars", "packer-init", "packer-build", "terraform-init"],
		});
		expect(shell.commands.filter((c) => c.line === "terraform apply")).toHaveLength(1);
		expect(shell.commands.at(-1)?.line).toBe("terraform apply");
	});

	it("should hand the API token to doctl through its environment", async () => {
		const shell = createRecordingRunner();

		await runSetup({ prompter: createScriptedPrompter(ANSWERS), shell, workDir, commandExists: allTools });

		const account = shell.commands.find((c) => c.line === ACCOUNT);
		expect(account?.env).toEqual({ DIGITALOCEAN_ACCESS_TOKEN: "test-do-token" });
		expect(account?.timeout).toBeUndefined();
		expect(shell.commands.some((c) => c.line.includes("test-do-token"))).toBe(false);
	});

	it("should stop before cloning when the API token is rejected", async () => {
		const shell = createRecordingRunner({ [ACCOUNT]: 1 });

		const result = await runSetup({ prompter: createScriptedPrompter(ANSWERS), shell, workDir, commandExists: allTools });

		expect(result.failedIn).toBe("VerifyingAccount");
		expect(shell.commands.map((c) => c.line)).toEqual([ACCOUNT]);
	});

	it("should reuse an existing checkout without cloning", async () => {
		createCheckout(workDir);
		const shell = createRecordingRunner();

		const result = await runSetup({ prompter: createScriptedPrompter(ANSWERS), shell, workDir, commandExists: allTools });

		expect(result.exitCode).toBe(0);
		expect(shell.commands.map((c) => c.line)).not.toContain(CLONE);
		expect(shell.commands[1]?.line).toBe("packer init .");
	});
});
