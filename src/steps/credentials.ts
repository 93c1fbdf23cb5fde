import { DEFAULT_IMAGE, DEFAULT_REGION, DEFAULT_SIZE, DEFAULT_SSH_USERNAME } from "../config.js";
import type { DropletCatalog } from "../lib/digitalocean.js";
import type { Choice, Prompter } from "../lib/prompter.js";
import * as ui from "../lib/ui.js";
import { packerFields, terraformFields, unsafeFields } from "../lib/varfile.js";
import type { SessionParams } from "../types.js";

/** "y", "ye", "yes" and "ys", any case. */
const AFFIRMATIVE = /^y(e)?(s)?$/i;

export function isAffirmative(answer: string): boolean {
	return AFFIRMATIVE.test(answer.trim());
}

export interface CollectOptions {
	prompter: Prompter;
	/** Offers region/image/size as lists when given and it succeeds; free text otherwise. */
	loadCatalog?: (token: string) => Promise<DropletCatalog>;
}

/**
 * Ask for every value the Packer and Terraform variable files need, in a fixed order.
 * Secrets are read without echo.
 */
export async function collectParams({ prompter, loadCatalog }: CollectOptions): Promise<SessionParams> {
	ui.info("Collecting required parameters:");

	const doApiToken = await prompter.text(`${ui.cyan("DigitalOcean API token")} ${ui.dim("(read/write)")}:`, { masked: true });
	const doSpacesAccessKey = await prompter.text(`${ui.cyan("DO Spaces access key")}:`, { masked: true });
	const doSpacesSecretKey = await prompter.text(`${ui.cyan("DO Spaces secret key")}:`, { masked: true });
	const domainName = await prompter.text(`${ui.cyan("Domain name")} ${ui.dim("(e.g. example.com)")}:`);
	const sendgridApiKey = await prompter.text(`${ui.cyan("SendGrid admin API token")}:`, { masked: true });

	const useTfCloud = await prompter.text(`Are you using ${ui.bold("Terraform Cloud")} for state management? ${ui.dim("(yes/no)")}:`);
	const tfCloudToken = isAffirmative(useTfCloud) ? await prompter.text(`${ui.cyan("Terraform Cloud user API token")}:`, { masked: true }) : "";

	console.log("");
	ui.info(ui.bold("Droplet image parameters"));

	const catalog = await tryLoadCatalog(doApiToken, loadCatalog);

	let doRegion: string;
	let doImage: string;
	let doSize: string;

	if (catalog) {
		doRegion = await choose(
			prompter,
			`${ui.cyan("Region")}:`,
			catalog.regions.map((r) => ({ name: `${ui.bold(r.slug)} ${ui.dim("—")} ${ui.dim(r.name)}`, value: r.slug })),
			DEFAULT_REGION,
		);

		const images = catalog.images.filter((img) => img.regions.length === 0 || img.regions.includes(doRegion));
		doImage = await choose(
			prompter,
			`${ui.cyan("Base image")}:`,
			images.map((img) => ({ name: `${ui.bold(img.slug)} ${ui.dim(`${img.distribution} ${img.name}`)}`, value: img.slug })),
			DEFAULT_IMAGE,
		);

		const formatMem = (mb: number) => (mb >= 1024 ? `${mb / 1024}GB` : `${mb}MB`);
		const sizes = catalog.sizes.filter((s) => s.regions.length === 0 || s.regions.includes(doRegion));
		doSize = await choose(
			prompter,
			`${ui.cyan("Droplet size")}:`,
			sizes.map((s) => ({
				name: `${ui.bold(s.slug)}  ${ui.dim(`${s.vcpus} vCPU / ${formatMem(s.memory)} RAM / ${s.disk}GB disk`)}  $${s.priceMonthly}/mo`,
				value: s.slug,
			})),
			DEFAULT_SIZE,
		);
	} else {
		doRegion = await prompter.text(`${ui.cyan("Region slug")} ${ui.dim(`(e.g. ${DEFAULT_REGION})`)}:`);
		doImage = await prompter.text(`${ui.cyan("Image slug")} ${ui.dim(`(e.g. ${DEFAULT_IMAGE})`)}:`);
		doSize = await prompter.text(`${ui.cyan("Droplet size slug")} ${ui.dim(`(e.g. ${DEFAULT_SIZE})`)}:`);
	}

	const sshUsername = await prompter.text(`${ui.cyan("SSH username")} for the build Droplet:`, { default: DEFAULT_SSH_USERNAME });

	const params: SessionParams = Object.freeze({
		doApiToken,
		doSpacesAccessKey,
		doSpacesSecretKey,
		domainName,
		sendgridApiKey,
		tfCloudToken,
		doRegion,
		doImage,
		doSize,
		sshUsername,
	});

	// Values are written verbatim; a quote or newline will corrupt the variable file
	const unsafe = new Set([...unsafeFields(packerFields(params)), ...unsafeFields(terraformFields(params))]);
	for (const key of unsafe) {
		ui.warn(`${key} contains a quote, backslash or line break; the generated variable file will not parse`);
	}

	console.log("");
	ui.table(
		["Parameter", "Value"],
		[
			["Domain", domainName],
			["Region", doRegion],
			["Image", doImage],
			["Size", doSize],
			["SSH user", sshUsername],
			["Terraform Cloud", tfCloudToken ? "yes" : "no"],
		],
	);

	return params;
}

async function tryLoadCatalog(token: string, loadCatalog: CollectOptions["loadCatalog"]): Promise<DropletCatalog | null> {
	if (!loadCatalog) return null;

	ui.info("Fetching available regions, images and sizes...");
	try {
		const catalog = await loadCatalog(token);
		if (catalog.regions.length > 0 && catalog.images.length > 0 && catalog.sizes.length > 0) {
			return catalog;
		}
		ui.warn("DigitalOcean returned an empty catalogue — enter slugs manually");
	} catch (err) {
		ui.warn(`Could not list DigitalOcean options (${err instanceof Error ? err.message : String(err)}) — enter slugs manually`);
	}
	return null;
}

/**
 * Ask until the answer is one of `choices`. A terminal select cannot go out of
 * range, but scripted or piped answers can.
 */
export async function choose(prompter: Prompter, message: string, choices: Choice[], preferred?: string): Promise<string> {
	if (choices.length === 0) {
		return prompter.text(message);
	}

	const defaultValue = choices.some((ch) => ch.value === preferred) ? preferred : undefined;
	for (;;) {
		const answer = await prompter.select(message, choices, defaultValue);
		if (choices.some((ch) => ch.value === answer)) {
			return answer;
		}
		ui.error(`"${answer}" is not one of the listed options`);
	}
}
