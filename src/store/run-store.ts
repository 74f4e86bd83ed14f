import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { EngineRuntimeEvent } from "../core/engine.js";
import type { ContextRun, RunRecord, StepRun } from "../core/types.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export const RUN_RECORD_SCHEMA_VERSION = 2;

const COUNTERS_FILE = "counters.json";
const CountersSchema = z.record(z.number().int().nonnegative());

export class RunStore {
	constructor(private readonly baseDir: string) {}

	get root(): string {
		return this.baseDir;
	}

	ensureBaseDir(): void {
		fs.mkdirSync(this.baseDir, { recursive: true });
	}

	runDir(runId: string): string {
		return ensureWithinBase(this.baseDir, runId, "run id");
	}

	createRunDir(runId: string): string {
		this.ensureBaseDir();
		const runDir = this.runDir(runId);
		fs.mkdirSync(runDir, { recursive: true });
		return runDir;
	}

	createLogsDir(runId: string): string {
		const logsDir = path.join(this.createRunDir(runId), "logs");
		fs.mkdirSync(logsDir, { recursive: true });
		return logsDir;
	}

	createArtifactsDir(runId: string): string {
		const artifactsDir = path.join(this.createRunDir(runId), "artifacts");
		fs.mkdirSync(artifactsDir, { recursive: true });
		return artifactsDir;
	}

	createWorkspacesDir(runId: string): string {
		const workspacesDir = path.join(this.createRunDir(runId), "workspaces");
		fs.mkdirSync(workspacesDir, { recursive: true });
		return workspacesDir;
	}

	writeRun(run: RunRecord): void {
		const recordPath = path.join(this.createRunDir(run.id), "run.json");
		fs.writeFileSync(recordPath, JSON.stringify(run, null, 2));
	}

	readRun(runId: string): RunRecord | undefined {
		const recordPath = path.join(this.runDir(runId), "run.json");
		if (!fs.existsSync(recordPath)) {
			return undefined;
		}
		const parsed: RunRecord = JSON.parse(fs.readFileSync(recordPath, "utf-8"));
		return parsed;
	}

	/** Returns the next run number of a workflow and persists it. */
	nextRunNumber(workflowId: string): number {
		const counters = this.readCounters();
		const next = (counters[workflowId] ?? 0) + 1;
		this.writeCounters({ ...counters, [workflowId]: next });
		return next;
	}

	/** Keeps a counter at least as high as a run number chosen on the command line. */
	recordRunNumber(workflowId: string, runNumber: number): void {
		const counters = this.readCounters();
		if ((counters[workflowId] ?? 0) < runNumber) {
			this.writeCounters({ ...counters, [workflowId]: runNumber });
		}
	}

	listRunIds(): string[] {
		if (!fs.existsSync(this.baseDir)) {
			return [];
		}
		return fs
			.readdirSync(this.baseDir, { withFileTypes: true })
			.filter((entry) => entry.isDirectory())
			.map((entry) => entry.name)
			.sort();
	}

	/** Removes all but the newest `keep` run directories; run ids sort by creation time. */
	prune(keep: number): string[] {
		const runIds = this.listRunIds();
		const removed = runIds.slice(0, Math.max(0, runIds.length - keep));
		for (const runId of removed) {
			fs.rmSync(this.runDir(runId), { recursive: true, force: true });
		}
		return removed;
	}

	private readCounters(): Record<string, number> {
		const countersPath = path.join(this.baseDir, COUNTERS_FILE);
		if (!fs.existsSync(countersPath)) {
			return {};
		}
		const parsed = CountersSchema.safeParse(JSON.parse(fs.readFileSync(countersPath, "utf-8")));
		return parsed.success ? parsed.data : {};
	}

	private writeCounters(counters: Record<string, number>): void {
		this.ensureBaseDir();
		fs.writeFileSync(path.join(this.baseDir, COUNTERS_FILE), JSON.stringify(counters, null, 2));
	}
}

export function getContextDirectoryName(contextId: string): string {
	const normalized = sanitizePathSegment(contextId.toLowerCase(), "context");
	const hash = crypto.createHash("sha1").update(contextId).digest("hex").slice(0, 8);
	return `${normalized}-${hash}`;
}

export function getContextLogFileName(contextId: string): string {
	return `${getContextDirectoryName(contextId)}.log`;
}

/** Applies one runtime event to a run record without mutating it. */
export function reduceRunEvent(run: RunRecord | null, event: EngineRuntimeEvent): RunRecord | null {
	if (event.type === "run-started") {
		return {
			schemaVersion: RUN_RECORD_SCHEMA_VERSION,
			id: event.runId,
			runNumber: event.runNumber,
			workflowId: event.workflowId,
			event: event.event,
			status: "running",
			createdAt: event.createdAt,
			jobs: event.contexts.map(
				(item): ContextRun => ({
					contextId: item.contextId,
					jobId: item.jobId,
					name: item.name,
					status: "pending",
					matrix: item.matrix,
					steps: item.steps.map((step): StepRun => ({ ...step, status: "pending" })),
				}),
			),
			artifactDir: event.artifactDir,
			logDir: event.logDir,
		};
	}
	if (!run || run.id !== event.runId) {
		return run;
	}

	switch (event.type) {
		case "context-started":
			return updateContexts(run, [event.contextId], (item) => ({
				...item,
				status: "running",
				startedAt: event.startedAt,
			}));
		case "step-started":
			return updateContexts(run, [event.contextId], (item) => ({
				...item,
				steps: item.steps.map((step): StepRun =>
					step.stepId === event.stepId ? { ...step, status: "running" } : step,
				),
			}));
		case "step-finished":
			return updateContexts(run, [event.contextId], (item) => ({
				...item,
				steps: item.steps.map((step): StepRun =>
					step.stepId === event.stepId
						? { ...step, status: event.status, exitCode: event.exitCode, error: event.error }
						: step,
				),
			}));
		case "context-finished":
			return updateContexts(run, [event.contextId], (item) => ({
				...item,
				status: event.status,
				exitCode: event.exitCode,
				startedAt: event.startedAt ?? item.startedAt,
				finishedAt: event.finishedAt,
				durationMs: event.durationMs,
			}));
		case "contexts-skipped":
			return updateContexts(run, event.contextIds, (item) => ({
				...item,
				status: "skipped",
				reason: event.reason,
				steps: item.steps.map((step): StepRun => ({ ...step, status: "skipped" })),
			}));
		case "contexts-blocked":
			return updateContexts(run, event.contextIds, (item) => ({ ...item, reason: event.reason }));
		case "contexts-canceled":
			return updateContexts(run, event.contextIds, (item) =>
				item.status === "pending" ? { ...item, status: "canceled" } : item,
			);
		case "run-finished":
			return { ...run, status: event.status, finishedAt: event.finishedAt };
	}
}

function updateContexts(
	run: RunRecord,
	contextIds: string[],
	update: (item: ContextRun) => ContextRun,
): RunRecord {
	const targets = new Set(contextIds);
	return {
		...run,
		jobs: run.jobs.map((item) => (targets.has(item.contextId) ? update(item) : item)),
	};
}

export function createRunEventPersister(runStore: RunStore): (event: EngineRuntimeEvent) => void {
	let run: RunRecord | null = null;
	return (event) => {
		const next = reduceRunEvent(run, event);
		if (next && next !== run) {
			runStore.writeRun(next);
		}
		run = next;
	};
}
