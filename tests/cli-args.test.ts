import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/cli/args.js";

describe("cli args", () => {
	it("parses run options and repeatable matrix flags", () => {
		const parsed = parseArgs([
			"run",
			"--workflow",
			"ci.yml",
			"--job",
			"build,release",
			"--event",
			"pull_request",
			"--branch",
			"develop",
			"--event-path",
			"payload.json",
			"--matrix",
			"node:20",
			"--matrix",
			"os:ubuntu-latest",
			"--run-number",
			"42",
			"--keep-workspaces",
			"--json",
		]);

		expect(parsed).toEqual({
			command: "run",
			workflow: "ci.yml",
			jobs: ["build", "release"],
			event: "pull_request",
			branch: "develop",
			eventPath: "payload.json",
			matrix: ["node:20", "os:ubuntu-latest"],
			runNumber: 42,
			keepWorkspaces: true,
			json: true,
			unknown: [],
			errors: [],
		});
	});

	it("captures unknown options", () => {
		const parsed = parseArgs(["--wat", "--all"]);
		expect(parsed.unknown).toEqual(["--wat"]);
		expect(parsed.all).toBe(true);
	});

	it("reports missing values for valued flags", () => {
		const parsed = parseArgs(["--workflow", "--event", "push"]);
		expect(parsed.errors).toEqual(["Missing value for --workflow"]);
		expect(parsed.event).toBe("push");
	});

	it("validates integer flags", () => {
		const parsed = parseArgs(["--run-number", "0", "--keep", "x"]);
		expect(parsed.runNumber).toBeUndefined();
		expect(parsed.errors).toEqual([
			"Invalid value for --run-number: 0 (expected an integer >= 1)",
			"Invalid value for --keep: x (expected an integer >= 0)",
		]);
	});

	it("parses other subcommands", () => {
		expect(parseArgs(["init"]).command).toBe("init");
		expect(parseArgs(["cleanup", "--keep", "3"])).toMatchObject({ command: "cleanup", keep: 3 });
		expect(parseArgs(["deploy"]).errors).toEqual(["Unknown command: deploy"]);
	});
});
