import crypto from "node:crypto";
import { interpolate, type ExpressionScope } from "./expression.js";
import { createExecutionContexts, expandMatrix, filterAssignments } from "./matrix.js";
import { evaluateJobTrigger } from "./trigger.js";
import type {
	EventSpec,
	Job,
	MatrixAssignment,
	PlannedJob,
	RunPlan,
	RunPreset,
	Workflow,
} from "./types.js";

export type PlanInput = {
	workflow: Workflow;
	jobIds: string[];
	event: EventSpec;
	runNumber: number;
	scope: ExpressionScope;
	runId?: string;
	preset?: RunPreset;
	matrixOverride?: string[];
};

export function buildRunPlan(input: PlanInput): RunPlan {
	const runId = input.runId ?? createRunId();
	const jobMap = new Map(input.workflow.jobs.map((job) => [job.id, job]));
	const selected = new Set(input.jobIds);

	const jobs: PlannedJob[] = [];
	for (const jobId of input.jobIds) {
		const job = jobMap.get(jobId);
		if (!job) {
			continue;
		}
		jobs.push(planJob(input, job, selected));
	}

	return {
		runId,
		runNumber: input.runNumber,
		workflow: input.workflow,
		jobs,
		event: input.event,
		preset: input.preset,
	};
}

function planJob(input: PlanInput, job: Job, selected: Set<string>): PlannedJob {
	let trigger = evaluateJobTrigger(input.workflow, job, input.event, input.scope);
	const renderRunsOn = (matrix: MatrixAssignment | null): string | undefined => {
		if (!job.runsOn) {
			return undefined;
		}
		return interpolate(job.runsOn, {
			contexts: { ...input.scope.contexts, matrix: matrix ? { ...matrix } : {} },
		});
	};

	let assignments = job.strategy ? expandMatrix(job.id, job.strategy) : null;
	if (assignments && input.matrixOverride?.length) {
		const filtered = filterAssignments(assignments, input.matrixOverride);
		if (filtered.length === 0 && trigger.admitted) {
			trigger = {
				admitted: false,
				reason: `no matrix combination matches ${input.matrixOverride.join(", ")}`,
			};
		} else {
			assignments = filtered;
		}
	}

	return {
		jobId: job.id,
		needs: job.needs.filter((need) => selected.has(need)),
		trigger,
		contexts: createExecutionContexts(job, assignments, renderRunsOn),
	};
}

export function expandJobIdsWithNeeds(workflow: Workflow, selected: string[]): string[] {
	const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
	const expanded = new Set<string>();

	const visit = (jobId: string): void => {
		if (expanded.has(jobId)) {
			return;
		}
		const job = jobMap.get(jobId);
		if (!job) {
			return;
		}
		job.needs.forEach(visit);
		expanded.add(jobId);
	};

	selected.forEach(visit);
	return Array.from(expanded);
}

export function sortJobsByNeeds(workflow: Workflow, jobIds: string[]): string[] {
	const jobMap = new Map(workflow.jobs.map((job) => [job.id, job]));
	const inDegree = new Map<string, number>();
	const edges = new Map<string, Set<string>>();

	jobIds.forEach((jobId) => {
		inDegree.set(jobId, 0);
		edges.set(jobId, new Set());
	});

	jobIds.forEach((jobId) => {
		const job = jobMap.get(jobId);
		if (!job) {
			return;
		}
		job.needs.forEach((need) => {
			if (!inDegree.has(need)) {
				return;
			}
			inDegree.set(jobId, (inDegree.get(jobId) ?? 0) + 1);
			edges.get(need)?.add(jobId);
		});
	});

	const queue: string[] = [];
	for (const [jobId, degree] of inDegree.entries()) {
		if (degree === 0) {
			queue.push(jobId);
		}
	}

	const ordered: string[] = [];
	while (queue.length > 0) {
		const jobId = queue.shift();
		if (!jobId) {
			continue;
		}
		ordered.push(jobId);
		for (const next of edges.get(jobId) ?? []) {
			const degree = (inDegree.get(next) ?? 0) - 1;
			inDegree.set(next, degree);
			if (degree === 0) {
				queue.push(next);
			}
		}
	}

	const missing = jobIds.filter((jobId) => !ordered.includes(jobId));
	return ordered.concat(missing);
}

export function filterJobsForEvent(
	workflow: Workflow,
	event: EventSpec,
	scope: ExpressionScope,
): Job[] {
	return workflow.jobs.filter(
		(job) => evaluateJobTrigger(workflow, job, event, scope).admitted,
	);
}

function createRunId(): string {
	const now = new Date();
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}
