import { DO_API } from "../config.js";

export interface Region {
	slug: string;
	name: string;
}

export interface DropletSize {
	slug: string;
	vcpus: number;
	memory: number; // MB
	disk: number; // GB
	priceMonthly: number;
	regions: string[];
}

export interface DistroImage {
	slug: string;
	distribution: string;
	name: string;
	regions: string[];
}

/** What the account can deploy, used to offer region/image/size as lists. */
export interface DropletCatalog {
	regions: Region[];
	sizes: DropletSize[];
	images: DistroImage[];
}

type JsonObject = Record<string, unknown>;

const isObject = (v: unknown): v is JsonObject => typeof v === "object" && v !== null && !Array.isArray(v);
const str = (v: unknown): string => (typeof v === "string" ? v : "");
const num = (v: unknown): number => (typeof v === "number" ? v : 0);
const strings = (v: unknown): string[] => (Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : []);

/** GET a collection endpoint and return the objects under `key`. */
async function getList(token: string, path: string, key: string): Promise<JsonObject[]> {
	const res = await fetch(`${DO_API}${path}`, {
		headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
	});

	if (!res.ok) {
		const body = await res.text();
		throw new Error(`DigitalOcean API error (${res.status}): ${body}`);
	}

	const data: unknown = await res.json();
	const items = isObject(data) ? data[key] : undefined;
	return Array.isArray(items) ? items.filter(isObject) : [];
}

/**
 * List available regions.
 */
export async function listRegions(token: string): Promise<Region[]> {
	const regions = await getList(token, "/regions?per_page=200", "regions");
	return regions.filter((r) => r.available === true).map((r) => ({ slug: str(r.slug), name: str(r.name) }));
}

/**
 * List available Droplet sizes with pricing, cheapest first.
 * Filters to shared CPU sizes only (s- prefix) for simplicity.
 */
export async function listSizes(token: string): Promise<DropletSize[]> {
	const sizes = await getList(token, "/sizes?per_page=200", "sizes");
	return sizes
		.filter((s) => s.available === true && str(s.slug).startsWith("s-"))
		.map((s) => ({
			slug: str(s.slug),
			vcpus: num(s.vcpus),
			memory: num(s.memory),
			disk: num(s.disk),
			priceMonthly: num(s.price_monthly),
			regions: strings(s.regions),
		}))
		.sort((a, b) => a.priceMonthly - b.priceMonthly);
}

/**
 * List public distribution images. Only images with a slug are kept,
 * since that is what the Packer template takes.
 */
export async function listImages(token: string): Promise<DistroImage[]> {
	const images = await getList(token, "/images?type=distribution&per_page=200", "images");
	return images
		.filter((img) => str(img.slug) !== "")
		.map((img) => ({
			slug: str(img.slug),
			distribution: str(img.distribution),
			name: str(img.name),
			regions: strings(img.regions),
		}));
}

export async function fetchCatalog(token: string): Promise<DropletCatalog> {
	const [regions, sizes, images] = await Promise.all([listRegions(token), listSizes(token), listImages(token)]);
	return { regions, sizes, images };
}
