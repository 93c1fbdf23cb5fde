import { renameSync, writeFileSync } from "node:fs";
import type { SessionParams } from "../types.js";

/** One `key = "value"` line of a Packer or Terraform variable file. */
export interface VarField {
	key: string;
	value: string;
}

/**
 * Render fields as HCL assignments, keys padded to `padTo` (default: the longest key).
 *
 * Values go in verbatim. A value holding `"` or a newline produces invalid HCL;
 * see {@link unsafeFields}.
 */
export function renderVarFile(fields: VarField[], padTo = Math.max(0, ...fields.map((f) => f.key.length))): string {
	return fields.map((f) => `${f.key.padEnd(padTo)} = "${f.value}"\n`).join("");
}

export function packerFields(params: SessionParams): VarField[] {
	return [
		{ key: "do_api_token", value: params.doApiToken },
		{ key: "do_region", value: params.doRegion },
		{ key: "do_image", value: params.doImage },
		{ key: "do_size", value: params.doSize },
		{ key: "ssh_username", value: params.sshUsername },
	];
}

/** Longest key a terraform.tfvars can hold, so the optional token line lines up. */
const TERRAFORM_KEY_WIDTH = "do_spaces_access_key".length;

export function terraformFields(params: SessionParams): VarField[] {
	const fields: VarField[] = [
		{ key: "do_api_token", value: params.doApiToken },
		{ key: "do_spaces_access_key", value: params.doSpacesAccessKey },
		{ key: "do_spaces_secret_key", value: params.doSpacesSecretKey },
		{ key: "do_region", value: params.doRegion },
		{ key: "domain_name", value: params.domainName },
		{ key: "sendgrid_api_key", value: params.sendgridApiKey },
	];
	if (params.tfCloudToken) {
		fields.push({ key: "tf_cloud_token", value: params.tfCloudToken });
	}
	return fields;
}

export function renderPackerVars(params: SessionParams): string {
	return renderVarFile(packerFields(params));
}

export function renderTerraformVars(params: SessionParams): string {
	return renderVarFile(terraformFields(params), TERRAFORM_KEY_WIDTH);
}

/** Keys whose values would break out of their HCL string literal. */
export function unsafeFields(fields: VarField[]): string[] {
	return fields.filter((f) => /["\\\r\n]/.test(f.value)).map((f) => f.key);
}

/**
 * Overwrite `path` with `content`. The content lands in a sibling temp file first
 * and is renamed over the target, so readers see the old file or the whole new one.
 */
export function writeVarFile(path: string, content: string): void {
	const tmp = `${path}.${process.pid}.tmp`;
	writeFileSync(tmp, content, { encoding: "utf-8", mode: 0o600 });
	renameSync(tmp, path);
}
