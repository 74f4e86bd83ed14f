import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/load-config.js";
import { ConfigSchema } from "../src/config/schema.js";

describe("config schema", () => {
	it("applies defaults", () => {
		const parsed = ConfigSchema.parse({});
		expect(parsed).toEqual({
			engine: "local",
			runtime: { keepWorkspaces: false },
			env: {},
			vars: {},
			secrets: {},
			presets: {},
			actions: {},
			release: { provider: "local", remote: "origin", push: false },
		});
	});

	it("rejects invalid runtime and release values", () => {
		expect(() => ConfigSchema.parse({ runtime: { maxParallel: 0 } })).toThrow();
		expect(() => ConfigSchema.parse({ release: { provider: "gitlab" } })).toThrow();
	});
});

describe("load config", () => {
	it("returns defaults when .runlane.yml does not exist", () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "runlane-config-empty-"));
		const loaded = loadConfig(repoRoot);

		expect(loaded.path).toBeUndefined();
		expect(loaded.config.engine).toBe("local");
		expect(loaded.config.release.push).toBe(false);
	});

	it("loads and validates .runlane.yml", () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "runlane-config-ok-"));
		const configPath = path.join(repoRoot, ".runlane.yml");
		fs.writeFileSync(
			configPath,
			[
				"runtime:",
				"  shell: sh",
				"  maxParallel: 2",
				"presets:",
				"  ship:",
				"    jobs: [build, release]",
				"    event:",
				"      name: push",
				"      branch: main",
				"release:",
				"  provider: github",
				"  push: true",
				"actions:",
				"  acme/publish: runlane/release",
			].join("\n"),
		);

		const loaded = loadConfig(repoRoot);
		expect(loaded.path).toBe(configPath);
		expect(loaded.config.runtime).toEqual({ shell: "sh", maxParallel: 2, keepWorkspaces: false });
		expect(loaded.config.presets.ship).toEqual({
			jobs: ["build", "release"],
			event: { name: "push", branch: "main" },
		});
		expect(loaded.config.release).toEqual({ provider: "github", remote: "origin", push: true });
		expect(loaded.config.actions).toEqual({ "acme/publish": "runlane/release" });
	});

	it("reports every invalid field", () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "runlane-config-invalid-"));
		fs.writeFileSync(
			path.join(repoRoot, ".runlane.yml"),
			["runtime:", "  keepWorkspaces: sometimes", "release:", "  push: maybe"].join("\n"),
		);

		expect(() => loadConfig(repoRoot)).toThrowError(
			"Invalid .runlane.yml: runtime.keepWorkspaces: Expected boolean, received string; release.push: Expected boolean, received string",
		);
	});

	it("treats an empty file as defaults", () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "runlane-config-blank-"));
		fs.writeFileSync(path.join(repoRoot, ".runlane.yml"), "");
		expect(loadConfig(repoRoot).config.engine).toBe("local");
	});
});
