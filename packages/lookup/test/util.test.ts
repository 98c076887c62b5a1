import { describe, expect, it } from "vitest";
import { ext, flatten, getExt, nsToMs, numDigit, toNsAndName } from "../src/index.js";

describe("lookup utilities", () => {
	it("flattens one level of nesting", () => {
		expect(flatten([[1, 2], [3], []])).toEqual([1, 2, 3]);
		expect(flatten(new Set([["a"], ["b", "c"]]))).toEqual(["a", "b", "c"]);
	});

	it("counts decimal digits of the absolute value", () => {
		expect(numDigit(0)).toBe(1);
		expect(numDigit(7)).toBe(1);
		expect(numDigit(-12345)).toBe(5);
		expect(() => numDigit(1.5)).toThrow(RangeError);
	});

	it("extracts the extension of the final path segment", () => {
		expect(ext("traces/run.tar.gz")).toBe("gz");
		expect(ext("traces/architecture.yaml")).toBe("yaml");
		expect(ext(".bashrc")).toBe("");
		expect(ext("dir.d/README")).toBe("");
		expect(ext("file.")).toBe("");
	});

	it("returns the base name when it has no dot", () => {
		expect(getExt("traces/run.tar.gz")).toBe("gz");
		expect(getExt("dir.d/README")).toBe("README");
	});

	it("converts nanoseconds to milliseconds", () => {
		expect(nsToMs(2_500_000)).toBeCloseTo(2.5, 12);
		expect(nsToMs(0)).toBe(0);
	});

	it("splits a node path into namespace and name", () => {
		expect(toNsAndName("/ns/sub/node")).toEqual(["/ns/sub/", "node"]);
		expect(toNsAndName("/node")).toEqual(["/", "node"]);
		expect(toNsAndName("node")).toEqual(["/", "node"]);
	});
});
