import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { complete, keyValue, table } from "./ui.js";

describe("ui", () => {
	let log: MockInstance<typeof console.log>;

	const lines = () => log.mock.calls.map((call) => call.join(" "));

	beforeEach(() => {
		log = vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe("table", () => {
		it("should pad each column to its widest cell", () => {
			table(
				["Parameter", "Value"],
				[
					["Domain", "example.com"],
					["Region", "nyc3"],
				],
			);

			expect(lines()).toEqual(["  Parameter   Value", `  ${"─".repeat(9)}   ${"─".repeat(11)}`, "  Domain      example.com", "  Region      nyc3"]);
		});

		it("should widen a column for a header longer than its cells", () => {
			table(["Terraform Cloud"], [["no"]]);

			expect(lines()).toEqual(["  Terraform Cloud", `  ${"─".repeat(15)}`, "  no"]);
		});
	});

	describe("complete", () => {
		it("should underline the title with its checkmark", () => {
			complete("Setup Complete");

			expect(lines()).toEqual(["", "  ✔ Setup Complete", `  ${"═".repeat(16)}`, ""]);
		});
	});

	describe("keyValue", () => {
		it("should print the key and value on one line", () => {
			keyValue("jwt", "value-of-jwt");

			expect(lines()).toEqual(["  jwt: value-of-jwt"]);
		});
	});
});
