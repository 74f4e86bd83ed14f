import { describe, expect, it } from "vitest";
import { ensureWithinBase, sanitizePathSegment } from "../src/utils/path-safety.js";

describe("path safety", () => {
	it("blocks traversal outside base", () => {
		expect(() => ensureWithinBase("/tmp/runlane", "../etc/passwd", "test")).toThrow(
			"Invalid test: path escapes base directory",
		);
		expect(() => ensureWithinBase("/tmp/runlane", "/etc/passwd", "test")).toThrow(/escapes base directory/);
	});

	it("resolves paths that stay inside base", () => {
		expect(ensureWithinBase("/tmp/runlane", "runs/a/../b", "test")).toBe("/tmp/runlane/runs/b");
	});

	it("normalizes path segments", () => {
		expect(sanitizePathSegment("Job: Build/Release", "fallback")).toBe("Job-Build-Release");
		expect(sanitizePathSegment("build (ubuntu-latest, 20)", "fallback")).toBe("build-ubuntu-latest-20");
		expect(sanitizePathSegment("   ", "fallback")).toBe("fallback");
	});
});
