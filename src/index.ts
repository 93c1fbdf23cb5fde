#!/usr/bin/env node

import { fetchCatalog } from "./lib/digitalocean.js";
import { terminalPrompter } from "./lib/prompter.js";
import { systemRunner } from "./lib/shell.js";
import * as ui from "./lib/ui.js";
import { runSetup } from "./setup.js";

async function main(): Promise<void> {
	const result = await runSetup({
		prompter: terminalPrompter,
		shell: systemRunner,
		workDir: process.cwd(),
		loadCatalog: fetchCatalog,
	});
	process.exit(result.exitCode);
}

// Run
main().catch((err: unknown) => {
	if (err instanceof Error && err.name === "ExitPromptError") {
		// User pressed Ctrl+C
		console.log("\n");
		ui.info("Setup cancelled.");
		process.exit(1);
	}
	ui.error(err instanceof Error ? err.message : String(err));
	process.exit(1);
});
