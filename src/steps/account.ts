import * as ui from "../lib/ui.js";
import type { StepContext } from "../types.js";

/**
 * Confirm the API token works before anything is written or built.
 * The token goes through doctl's environment variable so it stays out of the process list.
 */
export async function run(ctx: StepContext): Promise<void> {
	const result = await ctx.shell.capture("doctl", ["account", "get", "--format", "Email,Status", "--no-header"], {
		env: { DIGITALOCEAN_ACCESS_TOKEN: ctx.params.doApiToken },
	});

	if (result.exitCode !== 0) {
		throw new Error(`DigitalOcean rejected the API token: ${result.stderr || result.stdout || `doctl exited with code ${result.exitCode}`}`);
	}

	const [email = "", status = ""] = result.stdout.split(/\s+/);
	ui.success(`Authenticated as ${ui.bold(email)}${status ? ` ${ui.dim(`(${status})`)}` : ""}`);
}
