import { describe, expect, it } from "vitest";
import { collectSecretValues, createSecretMasker } from "../src/utils/redact.js";

describe("secret masking", () => {
	it("masks every occurrence of a secret value", () => {
		const mask = createSecretMasker({ GITHUB_TOKEN: "test-secret" });
		expect(mask("token=test-secret; again test-secret")).toBe("token=***; again ***");
	});

	it("masks each line of multi-line secrets and prefers longer values", () => {
		expect(collectSecretValues({ KEY: "first-line\nsecond", SHORT: "ab" })).toEqual([
			"first-line\nsecond",
			"first-line",
			"second",
		]);
		const mask = createSecretMasker({ KEY: "first-line\nsecond" });
		expect(mask("got second and first-line")).toBe("got *** and ***");
	});

	it("ignores values too short to mask safely", () => {
		const mask = createSecretMasker({ PIN: "ab", EMPTY: "" });
		expect(mask("ab cd")).toBe("ab cd");
	});

	it("escapes regular expression characters", () => {
		const mask = createSecretMasker({ PATTERN: "a.b*c" });
		expect(mask("a.b*c axbbc")).toBe("*** axbbc");
	});
});
