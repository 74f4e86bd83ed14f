import { describe, expect, it } from "vitest";
import { buildTriggerScope } from "../src/core/context.js";
import {
	buildRunPlan,
	expandJobIdsWithNeeds,
	filterJobsForEvent,
	sortJobsByNeeds,
} from "../src/core/plan.js";
import type { EventSpec, Workflow } from "../src/core/types.js";

const workflow: Workflow = {
	id: "wf-1",
	name: "CI",
	path: ".github/workflows/ci.yml",
	events: ["push", "pull_request"],
	triggers: [{ event: "push" }, { event: "pull_request" }],
	jobs: [
		{
			id: "build",
			name: "Build",
			needs: [],
			steps: [],
			runsOn: "${{ matrix.os }}",
			strategy: {
				axes: [["os", ["ubuntu-latest", "windows-latest", "macos-latest"]]],
				include: [],
				exclude: [],
			},
		},
		{ id: "test", name: "Test", needs: ["build"], steps: [] },
		{
			id: "release",
			name: "Release",
			needs: ["build"],
			steps: [],
			if: "github.event_name == 'push'",
		},
		{
			id: "pr-only",
			name: "PR only",
			needs: [],
			steps: [],
			if: "github.event_name == 'pull_request'",
		},
	],
};

function scopeFor(event: EventSpec, runNumber = 42) {
	return buildTriggerScope({
		event,
		payload: {},
		runId: "run-1",
		runNumber,
		repository: "acme/app",
		workspace: "/tmp/ws",
	});
}

const push: EventSpec = { name: "push", branch: "main" };
const pullRequest: EventSpec = { name: "pull_request", branch: "main" };

describe("core plan", () => {
	it("expands selected jobs with transitive needs", () => {
		expect(expandJobIdsWithNeeds(workflow, ["release"])).toEqual(["build", "release"]);
	});

	it("sorts selected jobs topologically by needs", () => {
		expect(sortJobsByNeeds(workflow, ["release", "test", "build"])).toEqual(["build", "release", "test"]);
	});

	it("keeps deterministic fallback order when a cycle exists", () => {
		const cyclical: Workflow = {
			...workflow,
			jobs: [
				{ id: "a", name: "A", needs: ["b"], steps: [] },
				{ id: "b", name: "B", needs: ["a"], steps: [] },
				{ id: "c", name: "C", needs: [], steps: [] },
			],
		};

		expect(sortJobsByNeeds(cyclical, ["a", "b", "c"])).toEqual(["c", "a", "b"]);
	});

	it("filters jobs whose condition does not hold for the event", () => {
		expect(filterJobsForEvent(workflow, push, scopeFor(push)).map((job) => job.id)).toEqual([
			"build",
			"test",
			"release",
		]);
		expect(filterJobsForEvent(workflow, pullRequest, scopeFor(pullRequest)).map((job) => job.id)).toEqual([
			"build",
			"test",
			"pr-only",
		]);
	});

	it("plans one context per matrix combination with rendered runs-on", () => {
		const plan = buildRunPlan({
			workflow,
			jobIds: ["build", "release"],
			event: push,
			runNumber: 42,
			scope: scopeFor(push),
			runId: "run-1",
		});

		expect(plan.runId).toBe("run-1");
		expect(plan.runNumber).toBe(42);
		expect(plan.jobs.map((job) => job.jobId)).toEqual(["build", "release"]);
		expect(plan.jobs[0]?.contexts.map((item) => [item.id, item.runsOn, item.runnerOs])).toEqual([
			["build (ubuntu-latest)", "ubuntu-latest", "Linux"],
			["build (windows-latest)", "windows-latest", "Windows"],
			["build (macos-latest)", "macos-latest", "macOS"],
		]);
		expect(plan.jobs[1]).toMatchObject({
			jobId: "release",
			needs: ["build"],
			trigger: { admitted: true },
		});
	});

	it("records why the release job is skipped on pull requests", () => {
		const plan = buildRunPlan({
			workflow,
			jobIds: ["build", "release"],
			event: pullRequest,
			runNumber: 7,
			scope: scopeFor(pullRequest, 7),
		});
		expect(plan.jobs[0]?.trigger).toEqual({ admitted: true });
		expect(plan.jobs[1]?.trigger).toEqual({
			admitted: false,
			reason: "condition is false: github.event_name == 'push'",
		});
	});

	it("drops needs that were not selected", () => {
		const plan = buildRunPlan({
			workflow,
			jobIds: ["test"],
			event: push,
			runNumber: 1,
			scope: scopeFor(push, 1),
		});
		expect(plan.jobs[0]?.needs).toEqual([]);
	});

	it("applies matrix overrides and rejects overrides that match nothing", () => {
		const filtered = buildRunPlan({
			workflow,
			jobIds: ["build"],
			event: push,
			runNumber: 1,
			scope: scopeFor(push, 1),
			matrixOverride: ["os:macos-latest"],
		});
		expect(filtered.jobs[0]?.contexts.map((item) => item.id)).toEqual(["build (macos-latest)"]);

		const empty = buildRunPlan({
			workflow,
			jobIds: ["build"],
			event: push,
			runNumber: 1,
			scope: scopeFor(push, 1),
			matrixOverride: ["os:solaris"],
		});
		expect(empty.jobs[0]?.trigger).toEqual({
			admitted: false,
			reason: "no matrix combination matches os:solaris",
		});
	});
});
