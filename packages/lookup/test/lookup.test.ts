import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { createLookup, createLookupFromConfig, ItemNotFoundError, SuggestionError } from "../src/index.js";

const tempDirs: string[] = [];

function captureError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error("Expected function to throw");
}

afterEach(() => {
	for (const dir of tempDirs.splice(0, tempDirs.length)) {
		rmSync(dir, { recursive: true, force: true });
	}
});

describe("configured lookup", () => {
	it("uses the default threshold when none is configured", () => {
		const lookup = createLookup();
		expect(lookup.threshold).toBe(0.6);
		expect(() => lookup.findSimilarOne("abcd", ["bcde"])).toThrow(SuggestionError);
	});

	it("applies the configured threshold to fuzzy lookups", () => {
		const lookup = createLookup({ threshold: 0.8 });

		const single = captureError(() => lookup.findSimilarOne("abcd", ["bcde"]));
		expect(single).toBeInstanceOf(ItemNotFoundError);
		expect(single).not.toBeInstanceOf(SuggestionError);

		const multi = captureError(() => lookup.findSimilarOneMultiKeys({ a: "abcd" }, [{ a: "bcde" }]));
		expect(multi).toBeInstanceOf(ItemNotFoundError);
		expect(multi).not.toBeInstanceOf(SuggestionError);
	});

	it("lets a call override the configured threshold", () => {
		const lookup = createLookup({ threshold: 0.8 });

		expect(() => lookup.findSimilarOne("abcd", ["bcde"], { threshold: 0.5 })).toThrow(SuggestionError);
		expect(() => lookup.findSimilarOneMultiKeys({ a: "abcd" }, [{ a: "bcde" }], { threshold: 0.5 })).toThrow(
			SuggestionError,
		);
	});

	it("keeps key extractors and exact lookups working", () => {
		const lookup = createLookup({ threshold: 0.9 });
		const items = [{ name: "alpha" }, { name: "beta" }];

		expect(lookup.findSimilarOne("beta", items, { key: (item) => item.name })).toBe(items[1]);
		expect(lookup.findOne((item) => item.name === "alpha", items)).toBe(items[0]);
	});

	it("rejects thresholds outside [0, 1]", () => {
		expect(() => createLookup({ threshold: 1.5 })).toThrow(RangeError);
		expect(() => createLookup({ threshold: -0.1 })).toThrow(RangeError);
		expect(() => createLookup({ threshold: Number.NaN })).toThrow(RangeError);
	});

	it("binds the threshold resolved from config files", () => {
		const cwd = mkdtempSync(join(tmpdir(), "lookup-cwd-"));
		const home = mkdtempSync(join(tmpdir(), "lookup-home-"));
		tempDirs.push(cwd, home);
		mkdirSync(join(cwd, ".lookup"), { recursive: true });
		writeFileSync(join(cwd, ".lookup", "lookup.yaml"), "threshold: 0.8\n");

		const lookup = createLookupFromConfig({ cwd, homeDir: home, env: {}, warn: () => {} });

		expect(lookup.threshold).toBe(0.8);
	});
});
