import { describe, expect, it } from "vitest";
import { buildTriggerScope } from "../src/core/context.js";
import { evaluateJobTrigger, evaluateWorkflowTrigger } from "../src/core/trigger.js";
import type { EventSpec, Job, Workflow } from "../src/core/types.js";

const release: Job = {
	id: "release",
	name: "Release",
	needs: ["build"],
	steps: [],
	if: "github.event_name == 'push'",
};

const workflow: Workflow = {
	id: "ci.yml",
	name: "CI",
	path: ".github/workflows/ci.yml",
	events: ["push", "pull_request"],
	triggers: [
		{ event: "push", branches: ["main", "release/**"], branchesIgnore: ["release/old-*"] },
		{ event: "pull_request" },
	],
	jobs: [{ id: "build", name: "Build", needs: [], steps: [] }, release],
};

function scopeFor(event: EventSpec) {
	return buildTriggerScope({
		event,
		payload: {},
		runId: "run-1",
		runNumber: 42,
		repository: "acme/app",
		workspace: "/tmp/ws",
	});
}

describe("workflow trigger", () => {
	it("admits pushes to matching branches", () => {
		expect(evaluateWorkflowTrigger(workflow, { name: "push", branch: "main" })).toEqual({ admitted: true });
		expect(evaluateWorkflowTrigger(workflow, { name: "push", branch: "release/2.0" })).toEqual({
			admitted: true,
		});
	});

	it("rejects pushes to other branches with a reason", () => {
		expect(evaluateWorkflowTrigger(workflow, { name: "push", branch: "feature/x" })).toEqual({
			admitted: false,
			reason: 'branch "feature/x" does not match push branches (main, release/**)',
		});
		expect(evaluateWorkflowTrigger(workflow, { name: "push", branch: "release/old-1" })).toEqual({
			admitted: false,
			reason: 'branch "release/old-1" is ignored for push',
		});
	});

	it("admits pull requests without a branch filter", () => {
		expect(evaluateWorkflowTrigger(workflow, { name: "pull_request", branch: "anything" })).toEqual({
			admitted: true,
		});
	});

	it("rejects events the workflow does not list", () => {
		expect(evaluateWorkflowTrigger(workflow, { name: "workflow_dispatch", branch: "main" })).toEqual({
			admitted: false,
			reason: "workflow does not run on workflow_dispatch",
		});
	});

	it("fails closed on unrecognized events", () => {
		expect(evaluateWorkflowTrigger(workflow, { name: "schedule", branch: "main" })).toEqual({
			admitted: false,
			reason: 'unrecognized event "schedule"',
		});
	});

	it("admits every recognized event when the workflow has no triggers", () => {
		const open: Workflow = { ...workflow, events: [], triggers: [] };
		expect(evaluateWorkflowTrigger(open, { name: "workflow_dispatch", branch: "main" })).toEqual({
			admitted: true,
		});
	});

	it("applies negated branch patterns in order", () => {
		const negated: Workflow = {
			...workflow,
			triggers: [{ event: "push", branches: ["**", "!docs/*"] }],
		};
		expect(evaluateWorkflowTrigger(negated, { name: "push", branch: "docs/readme" }).admitted).toBe(false);
		expect(evaluateWorkflowTrigger(negated, { name: "push", branch: "feature/a" }).admitted).toBe(true);
	});
});

describe("job trigger", () => {
	it("skips the release job on pull requests", () => {
		const event: EventSpec = { name: "pull_request", branch: "main" };
		expect(evaluateJobTrigger(workflow, release, event, scopeFor(event))).toEqual({
			admitted: false,
			reason: "condition is false: github.event_name == 'push'",
		});
	});

	it("admits the release job on pushes to main", () => {
		const event: EventSpec = { name: "push", branch: "main" };
		expect(evaluateJobTrigger(workflow, release, event, scopeFor(event))).toEqual({ admitted: true });
	});

	it("turns expression errors into a rejection", () => {
		const broken: Job = { ...release, if: "nope.value" };
		const event: EventSpec = { name: "push", branch: "main" };
		expect(evaluateJobTrigger(workflow, broken, event, scopeFor(event))).toEqual({
			admitted: false,
			reason: 'Unrecognized named-value "nope" in expression: nope.value',
		});
	});
});
