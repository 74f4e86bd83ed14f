import { describe, expect, it } from "vitest";
import { MatrixError } from "../src/core/errors.js";
import {
	createExecutionContexts,
	expandMatrix,
	filterAssignments,
	parseMatrixOverrides,
	resolveRunnerOs,
} from "../src/core/matrix.js";
import type { Job, MatrixStrategy } from "../src/core/types.js";

const twoByTwo: MatrixStrategy = {
	axes: [
		["os", ["linux", "windows"]],
		["node", [18, 20]],
	],
	include: [],
	exclude: [],
};

describe("matrix expansion", () => {
	it("builds the cross product with the first axis outermost", () => {
		expect(expandMatrix("build", twoByTwo)).toEqual([
			{ os: "linux", node: 18 },
			{ os: "linux", node: 20 },
			{ os: "windows", node: 18 },
			{ os: "windows", node: 20 },
		]);
	});

	it("is deterministic across calls", () => {
		expect(expandMatrix("build", twoByTwo)).toEqual(expandMatrix("build", twoByTwo));
	});

	it("drops combinations matched by exclude", () => {
		const strategy: MatrixStrategy = { ...twoByTwo, exclude: [{ os: "windows", node: 18 }] };
		expect(expandMatrix("build", strategy)).toEqual([
			{ os: "linux", node: 18 },
			{ os: "linux", node: 20 },
			{ os: "windows", node: 20 },
		]);
	});

	it("extends matching combinations with include and appends the rest", () => {
		const strategy: MatrixStrategy = {
			...twoByTwo,
			include: [
				{ os: "linux", node: 20, coverage: true },
				{ os: "macos", node: 20 },
			],
		};
		expect(expandMatrix("build", strategy)).toEqual([
			{ os: "linux", node: 18 },
			{ os: "linux", node: 20, coverage: true },
			{ os: "windows", node: 18 },
			{ os: "windows", node: 20 },
			{ os: "macos", node: 20 },
		]);
	});

	it("adds include keys without original axes to every combination", () => {
		const strategy: MatrixStrategy = {
			axes: [["os", ["linux", "windows"]]],
			include: [{ label: "nightly" }],
			exclude: [],
		};
		expect(expandMatrix("build", strategy)).toEqual([
			{ os: "linux", label: "nightly" },
			{ os: "windows", label: "nightly" },
		]);
	});

	it("expands an include-only matrix", () => {
		const strategy: MatrixStrategy = {
			axes: [],
			include: [{ target: "x86" }, { target: "arm" }],
			exclude: [],
		};
		expect(expandMatrix("build", strategy)).toEqual([{ target: "x86" }, { target: "arm" }]);
	});

	it("rejects empty axes and matrices without combinations", () => {
		expect(() =>
			expandMatrix("build", { axes: [["os", []]], include: [], exclude: [] }),
		).toThrowError(new MatrixError("build", 'matrix axis "os" has no values'));
		expect(() =>
			expandMatrix("build", {
				axes: [["os", ["linux"]]],
				include: [],
				exclude: [{ os: "linux" }],
			}),
		).toThrowError('Job "build": matrix produced no combinations');
	});
});

describe("execution contexts", () => {
	const job: Job = { id: "build", name: "Build", needs: [], steps: [], runsOn: "${{ matrix.os }}" };

	it("creates one context per assignment with readable ids", () => {
		const contexts = createExecutionContexts(
			job,
			[
				{ os: "ubuntu-latest", node: 20 },
				{ os: "windows-latest", node: 20 },
			],
			(matrix) => (matrix ? String(matrix.os) : undefined),
		);
		expect(contexts).toEqual([
			{
				id: "build (ubuntu-latest, 20)",
				jobId: "build",
				name: "Build (ubuntu-latest, 20)",
				matrix: { os: "ubuntu-latest", node: 20 },
				runsOn: "ubuntu-latest",
				runnerOs: "Linux",
			},
			{
				id: "build (windows-latest, 20)",
				jobId: "build",
				name: "Build (windows-latest, 20)",
				matrix: { os: "windows-latest", node: 20 },
				runsOn: "windows-latest",
				runnerOs: "Windows",
			},
		]);
	});

	it("numbers duplicate labels", () => {
		const contexts = createExecutionContexts(job, [{ os: "linux" }, { os: "linux" }], () => "linux");
		expect(contexts.map((item) => item.id)).toEqual(["build (linux)", "build (linux) #2"]);
	});

	it("creates a single context for jobs without a matrix", () => {
		const plain: Job = { ...job, runsOn: "ubuntu-latest" };
		expect(createExecutionContexts(plain, null)).toEqual([
			{
				id: "build",
				jobId: "build",
				name: "Build",
				matrix: null,
				runsOn: "ubuntu-latest",
				runnerOs: "Linux",
			},
		]);
	});
});

describe("matrix filters", () => {
	it("parses key:value overrides and ignores malformed ones", () => {
		expect(parseMatrixOverrides(["node:20", "os: linux", "bad", ":x"])).toEqual([
			["node", "20"],
			["os", "linux"],
		]);
	});

	it("keeps assignments that match every filter", () => {
		const assignments = expandMatrix("build", twoByTwo);
		expect(filterAssignments(assignments, ["node:20"])).toEqual([
			{ os: "linux", node: 20 },
			{ os: "windows", node: 20 },
		]);
		expect(filterAssignments(assignments, ["node:20", "os:windows"])).toEqual([{ os: "windows", node: 20 }]);
		expect(filterAssignments(assignments, undefined)).toBe(assignments);
	});
});

describe("runner os", () => {
	it("derives the os from runs-on labels, then the host", () => {
		expect(resolveRunnerOs("windows-2022")).toBe("Windows");
		expect(resolveRunnerOs("macos-14")).toBe("macOS");
		expect(resolveRunnerOs("ubuntu-22.04", "win32")).toBe("Linux");
		expect(resolveRunnerOs("self-hosted", "darwin")).toBe("macOS");
		expect(resolveRunnerOs(undefined, "linux")).toBe("Linux");
	});
});
