import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchCatalog, listImages, listRegions, listSizes } from "./digitalocean.js";

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

const API_DATA: Record<string, unknown> = {
	"/regions": {
		regions: [
			{ slug: "nyc3", name: "New York 3", available: true },
			{ slug: "nyc2", name: "New York 2", available: false },
			{ slug: "fra1", name: "Frankfurt 1", available: true },
		],
	},
	"/sizes": {
		sizes: [
			{ slug: "s-2vcpu-4gb", vcpus: 2, memory: 4096, disk: 80, price_monthly: 24, available: true, regions: ["nyc3"] },
			{ slug: "s-1vcpu-1gb", vcpus: 1, memory: 1024, disk: 25, price_monthly: 6, available: true, regions: ["nyc3", "fra1"] },
			{ slug: "c-2", vcpus: 2, memory: 4096, disk: 25, price_monthly: 42, available: true, regions: ["nyc3"] },
			{ slug: "s-8vcpu-16gb", vcpus: 8, memory: 16384, disk: 320, price_monthly: 96, available: false, regions: ["nyc3"] },
		],
	},
	"/images": {
		images: [
			{ slug: "ubuntu-22-04-x64", distribution: "Ubuntu", name: "22.04 (LTS) x64", regions: ["nyc3", "fra1"] },
			{ slug: null, distribution: "Ubuntu", name: "custom snapshot", regions: ["nyc3"] },
			{ slug: "debian-12-x64", distribution: "Debian", name: "12 x64" },
		],
	},
};

function stubApi() {
	const fetchMock = vi.fn(async (input: string | URL | Request) => {
		const path = new URL(String(input)).pathname.replace("/v2", "");
		const body = API_DATA[path];
		return body ? json(body) : json({ message: "not found" }, 404);
	});
	vi.stubGlobal("fetch", fetchMock);
	return fetchMock;
}

describe("digitalocean", () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it("should send the token as a bearer header", async () => {
		const fetchMock = stubApi();

		await listRegions("test-do-token");

		expect(fetchMock).toHaveBeenCalledWith("https://api.digitalocean.com/v2/regions?per_page=200", {
			headers: { Authorization: "Bearer test-do-token", "Content-Type": "application/json" },
		});
	});

	it("should list only available regions", async () => {
		stubApi();

		expect(await listRegions("test-do-token")).toEqual([
			{ slug: "nyc3", name: "New York 3" },
			{ slug: "fra1", name: "Frankfurt 1" },
		]);
	});

	it("should list available shared-CPU sizes cheapest first", async () => {
		stubApi();

		const sizes = await listSizes("test-do-token");

		expect(sizes.map((s) => s.slug)).toEqual(["s-1vcpu-1gb", "s-2vcpu-4gb"]);
		expect(sizes[1]).toEqual({ slug: "s-2vcpu-4gb", vcpus: 2, memory: 4096, disk: 80, priceMonthly: 24, regions: ["nyc3"] });
	});

	it("should skip images without a slug", async () => {
		stubApi();

		expect(await listImages("test-do-token")).toEqual([
			{ slug: "ubuntu-22-04-x64", distribution: "Ubuntu", name: "22.04 (LTS) x64", regions: ["nyc3", "fra1"] },
			{ slug: "debian-12-x64", distribution: "Debian", name: "12 x64", regions: [] },
		]);
	});

	it("should combine the three listings into a catalogue", async () => {
		stubApi();

		const catalog = await fetchCatalog("test-do-token");

		expect(catalog.regions).toHaveLength(2);
		expect(catalog.sizes).toHaveLength(2);
		expect(catalog.images).toHaveLength(2);
	});

	it("should throw with the status and body on an API error", async () => {
		vi.stubGlobal(
			"fetch",
			vi.fn(async () => new Response("Unable to authenticate you", { status: 401 })),
		);

		await expect(listRegions("test-do-token")).rejects.toThrow("DigitalOcean API error (401): Unable to authenticate you");
	});
});
