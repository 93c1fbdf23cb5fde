import { REQUIRED_TOOLS } from "../config.js";
import { commandExists, installHint } from "../lib/shell.js";
import * as ui from "../lib/ui.js";

export interface PrerequisiteOptions {
	tools?: readonly string[];
	exists?: (tool: string) => Promise<boolean>;
	platform?: NodeJS.Platform;
}

/**
 * Check every required CLI is on PATH, printing an install hint for each one
 * that is not. Returns the missing tools; the caller decides to stop.
 */
export async function checkPrerequisites(options: PrerequisiteOptions = {}): Promise<string[]> {
	const tools = options.tools ?? REQUIRED_TOOLS;
	const exists = options.exists ?? commandExists;
	const platform = options.platform ?? process.platform;

	ui.info("Checking for required tools...");
	const missing: string[] = [];
	for (const tool of tools) {
		if (await exists(tool)) {
			ui.success(`${ui.cmd(tool)} found`);
			continue;
		}
		missing.push(tool);
		ui.error(`Required command '${tool}' not found`);
		ui.info(`Install: ${ui.cmd(installHint(tool, platform))}`);
	}

	if (missing.length === 0) {
		ui.success("All required tools found");
	}
	return missing;
}
