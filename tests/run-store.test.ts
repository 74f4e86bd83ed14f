import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { EngineRuntimeEvent } from "../src/core/engine.js";
import type { RunRecord } from "../src/core/types.js";
import {
	createRunEventPersister,
	getContextDirectoryName,
	getContextLogFileName,
	reduceRunEvent,
	RunStore,
} from "../src/store/run-store.js";

const started: EngineRuntimeEvent = {
	type: "run-started",
	runId: "run-1",
	runNumber: 3,
	workflowId: "ci.yml",
	event: { name: "push", branch: "main" },
	contexts: [
		{
			contextId: "build (linux)",
			jobId: "build",
			name: "Build (linux)",
			matrix: { os: "linux" },
			steps: [{ stepId: "build-step-1", name: "Compile" }],
		},
		{ contextId: "release", jobId: "release", name: "Release", matrix: null, steps: [] },
	],
	createdAt: "2024-01-01T00:00:00.000Z",
};

function createStore(): RunStore {
	return new RunStore(path.join(fs.mkdtempSync(path.join(os.tmpdir(), "runlane-store-")), "runs"));
}

describe("run record reducer", () => {
	it("starts every context pending", () => {
		const record = reduceRunEvent(null, started);
		expect(record).toMatchObject({
			schemaVersion: 2,
			id: "run-1",
			runNumber: 3,
			status: "running",
			jobs: [
				{ contextId: "build (linux)", status: "pending", steps: [{ stepId: "build-step-1", status: "pending" }] },
				{ contextId: "release", status: "pending", steps: [] },
			],
		});
	});

	it("tracks steps, contexts and the run outcome", () => {
		const events: EngineRuntimeEvent[] = [
			started,
			{ type: "context-started", runId: "run-1", contextId: "build (linux)", startedAt: "2024-01-01T00:00:01.000Z" },
			{ type: "step-started", runId: "run-1", contextId: "build (linux)", stepId: "build-step-1" },
			{
				type: "step-finished",
				runId: "run-1",
				contextId: "build (linux)",
				stepId: "build-step-1",
				status: "failed",
				exitCode: 2,
				error: 'Step "Compile" exited with code 2',
			},
			{
				type: "context-finished",
				runId: "run-1",
				contextId: "build (linux)",
				status: "failed",
				exitCode: 2,
				finishedAt: "2024-01-01T00:00:03.000Z",
				durationMs: 2000,
			},
			{
				type: "contexts-blocked",
				runId: "run-1",
				contextIds: ["release"],
				reason: "waiting on failed dependency: build",
			},
			{ type: "run-finished", runId: "run-1", status: "failed", finishedAt: "2024-01-01T00:00:04.000Z" },
		];
		const record = events.reduce<RunRecord | null>(reduceRunEvent, null);

		expect(record?.status).toBe("failed");
		expect(record?.finishedAt).toBe("2024-01-01T00:00:04.000Z");
		expect(record?.jobs[0]).toMatchObject({
			status: "failed",
			exitCode: 2,
			startedAt: "2024-01-01T00:00:01.000Z",
			durationMs: 2000,
			steps: [{ status: "failed", exitCode: 2 }],
		});
		expect(record?.jobs[1]).toMatchObject({ status: "pending", reason: "waiting on failed dependency: build" });
	});

	it("marks skipped contexts with their steps and cancels only pending ones", () => {
		const skipped = reduceRunEvent(reduceRunEvent(null, started), {
			type: "contexts-skipped",
			runId: "run-1",
			contextIds: ["build (linux)"],
			reason: "condition is false",
		});
		expect(skipped?.jobs[0]).toMatchObject({ status: "skipped", steps: [{ status: "skipped" }] });

		const canceled = reduceRunEvent(skipped, {
			type: "contexts-canceled",
			runId: "run-1",
			contextIds: ["build (linux)", "release"],
		});
		expect(canceled?.jobs.map((item) => item.status)).toEqual(["skipped", "canceled"]);
	});

	it("ignores events from another run", () => {
		const record = reduceRunEvent(null, started);
		const next = reduceRunEvent(record, { type: "run-finished", runId: "other", status: "success", finishedAt: "x" });
		expect(next).toBe(record);
	});
});

describe("run store", () => {
	it("persists records through the event persister", () => {
		const store = createStore();
		const persist = createRunEventPersister(store);
		persist(started);
		persist({ type: "run-finished", runId: "run-1", status: "success", finishedAt: "2024-01-01T00:00:02.000Z" });

		expect(store.readRun("run-1")).toMatchObject({ id: "run-1", status: "success" });
		expect(store.readRun("missing")).toBeUndefined();
	});

	it("counts run numbers per workflow", () => {
		const store = createStore();
		expect(store.nextRunNumber("ci.yml")).toBe(1);
		expect(store.nextRunNumber("ci.yml")).toBe(2);
		expect(store.nextRunNumber("release.yml")).toBe(1);

		store.recordRunNumber("ci.yml", 41);
		expect(store.nextRunNumber("ci.yml")).toBe(42);
		store.recordRunNumber("ci.yml", 5);
		expect(store.nextRunNumber("ci.yml")).toBe(43);
	});

	it("prunes the oldest runs", () => {
		const store = createStore();
		for (const runId of ["20240101-a", "20240102-b", "20240103-c"]) {
			store.createLogsDir(runId);
		}
		expect(store.prune(1)).toEqual(["20240101-a", "20240102-b"]);
		expect(store.listRunIds()).toEqual(["20240103-c"]);
	});

	it("rejects run ids outside the store", () => {
		expect(() => createStore().runDir("../escape")).toThrowError("Invalid run id: path escapes base directory");
	});

	it("derives stable directory and log names for contexts", () => {
		const name = getContextDirectoryName("build (ubuntu-latest)");
		expect(name).toMatch(/^build-ubuntu-latest-[0-9a-f]{8}$/);
		expect(getContextDirectoryName("build (ubuntu-latest)")).toBe(name);
		expect(getContextDirectoryName("Build (ubuntu-latest)")).not.toBe(name);
		expect(getContextLogFileName("build (ubuntu-latest)")).toBe(`${name}.log`);
	});
});
