import type { CommandRunner } from "./lib/shell.js";

/** Workflow states, in the order the setup moves through them. */
export type Phase =
	| "CheckingPrereqs"
	| "CollectingInputs"
	| "VerifyingAccount"
	| "WritingConfig"
	| "BuildingImage"
	| "ApplyingInfra1"
	| "ApplyingInfra2"
	| "ReportingOutputs"
	| "Done"
	| "Failed";

/** Steps of the provisioning sequence, in execution order. */
export type StepId =
	| "account"
	| "clone"
	| "packer-vars"
	| "terraform-vars"
	| "packer-init"
	| "packer-build"
	| "terraform-init"
	| "terraform-apply-1"
	| "terraform-apply-2"
	| "outputs";

/** Everything the operator entered. Collected once, never mutated afterwards. */
export interface SessionParams {
	/** DigitalOcean API token (read/write). */
	readonly doApiToken: string;

	/** DO Spaces access key, used for the Terraform state bucket and storage. */
	readonly doSpacesAccessKey: string;

	readonly doSpacesSecretKey: string;

	/** Apex domain already delegated to DigitalOcean DNS (e.g. "example.com"). */
	readonly domainName: string;

	/** SendGrid admin API token. */
	readonly sendgridApiKey: string;

	/** Terraform Cloud user token; empty when state is kept locally. */
	readonly tfCloudToken: string;

	readonly doRegion: string;
	readonly doImage: string;
	readonly doSize: string;

	/** User Packer connects as while baking the snapshot. */
	readonly sshUsername: string;
}

/** What a step gets to work with. */
export interface StepContext {
	readonly params: SessionParams;

	/** Directory the upstream repository is (or will be) cloned into. */
	readonly workDir: string;

	readonly shell: CommandRunner;
}

export interface StepDef {
	id: StepId;
	label: string;
	phase: Phase;
	run: (ctx: StepContext) => Promise<void>;
}
