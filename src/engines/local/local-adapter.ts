import fs from "node:fs";
import path from "node:path";
import type { RunContextInput } from "../../core/context.js";
import type {
	EngineAdapter,
	EngineContext,
	EngineRunResult,
	EngineRuntimeEvent,
	PlannedContextSummary,
} from "../../core/engine.js";
import type { ExecutionContext, Job, PlannedJob, RunPlan } from "../../core/types.js";
import { mapWithLimit } from "../../utils/concurrency.js";
import { EXIT_CANCELED } from "../../utils/process.js";
import { getContextDirectoryName, getContextLogFileName } from "../../store/run-store.js";
import { type ContextOutcome, StepExecutor } from "./step-executor.js";

type JobOutcome = "success" | "failed" | "skipped" | "blocked" | "canceled";

/**
 * Runs plans on the host. Jobs start once every dependency settles; the contexts of a
 * job run in parallel. A failed dependency leaves its dependents pending.
 */
export class LocalAdapter implements EngineAdapter {
	readonly id = "local";

	async run(plan: RunPlan, context: EngineContext): Promise<EngineRunResult> {
		const emit = (event: EngineRuntimeEvent): void => context.onEvent?.(event);
		const jobMap = new Map(plan.workflow.jobs.map((job) => [job.id, job]));
		const plannedMap = new Map(plan.jobs.map((job) => [job.jobId, job]));
		const eventPath = path.join(context.runDir, "event.json");
		fs.mkdirSync(context.runDir, { recursive: true });
		fs.writeFileSync(eventPath, JSON.stringify(context.payload, null, 2));

		emit({
			type: "run-started",
			runId: plan.runId,
			runNumber: plan.runNumber,
			workflowId: plan.workflow.id,
			event: plan.event,
			contexts: summarizeContexts(plan, jobMap),
			artifactDir: path.join(context.runDir, "artifacts"),
			logDir: context.logsDir,
			createdAt: new Date().toISOString(),
		});

		const base: RunContextInput = {
			event: plan.event,
			payload: context.payload,
			runId: plan.runId,
			runNumber: plan.runNumber,
			repository: context.repository,
			workspace: context.workspacesDir,
			env: context.env,
			vars: context.vars,
			secrets: context.secrets,
		};

		const outcomes = new Map<string, Promise<JobOutcome>>();
		const runJob = (jobId: string): Promise<JobOutcome> => {
			const existing = outcomes.get(jobId);
			if (existing) {
				return existing;
			}
			const planned = plannedMap.get(jobId);
			const job = jobMap.get(jobId);
			const promise =
				planned && job
					? this.runPlannedJob(planned, job, plan, base, context, runJob)
					: Promise.resolve<JobOutcome>("skipped");
			outcomes.set(jobId, promise);
			return promise;
		};

		const results = await Promise.all(plan.jobs.map((job) => runJob(job.jobId)));

		const status: EngineRunResult["status"] = context.signal?.aborted
			? "canceled"
			: results.some((result) => result === "failed" || result === "blocked" || result === "canceled")
				? "failed"
				: "success";
		emit({ type: "run-finished", runId: plan.runId, status, finishedAt: new Date().toISOString() });

		return {
			exitCode: status === "success" ? 0 : status === "canceled" ? EXIT_CANCELED : 1,
			status,
			logsPath: context.logsDir,
		};
	}

	private async runPlannedJob(
		planned: PlannedJob,
		job: Job,
		plan: RunPlan,
		base: RunContextInput,
		context: EngineContext,
		runJob: (jobId: string) => Promise<JobOutcome>,
	): Promise<JobOutcome> {
		const emit = (event: EngineRuntimeEvent): void => context.onEvent?.(event);
		const contextIds = planned.contexts.map((item) => item.id);

		if (!planned.trigger.admitted) {
			emit({ type: "contexts-skipped", runId: plan.runId, contextIds, reason: planned.trigger.reason });
			return "skipped";
		}

		const dependencies = await Promise.all(
			planned.needs.map(async (need) => ({ need, outcome: await runJob(need) })),
		);
		const unmet = dependencies.filter(({ outcome }) => outcome === "failed" || outcome === "blocked");
		if (unmet.length > 0) {
			const names = unmet.map(({ need }) => need).join(", ");
			emit({
				type: "contexts-blocked",
				runId: plan.runId,
				contextIds,
				reason: `waiting on failed dependency: ${names}`,
			});
			return "blocked";
		}
		if (context.signal?.aborted || dependencies.some(({ outcome }) => outcome === "canceled")) {
			emit({ type: "contexts-canceled", runId: plan.runId, contextIds });
			return "canceled";
		}
		const skipped = dependencies.filter(({ outcome }) => outcome === "skipped");
		if (skipped.length > 0) {
			emit({
				type: "contexts-skipped",
				runId: plan.runId,
				contextIds,
				reason: `dependency skipped: ${skipped.map(({ need }) => need).join(", ")}`,
			});
			return "skipped";
		}

		const limit = job.strategy?.maxParallel ?? context.maxParallel;
		const results = await mapWithLimit(planned.contexts, limit, (execution) =>
			this.runContext(execution, job, plan, base, context),
		);

		if (results.some((result) => result.status === "failed")) {
			return "failed";
		}
		if (results.some((result) => result.status === "canceled")) {
			return "canceled";
		}
		return "success";
	}

	private async runContext(
		execution: ExecutionContext,
		job: Job,
		plan: RunPlan,
		base: RunContextInput,
		context: EngineContext,
	): Promise<ContextOutcome> {
		const emit = (event: EngineRuntimeEvent): void => context.onEvent?.(event);
		if (context.signal?.aborted) {
			emit({ type: "contexts-canceled", runId: plan.runId, contextIds: [execution.id] });
			return { status: "canceled", exitCode: EXIT_CANCELED };
		}

		const directoryName = getContextDirectoryName(execution.id);
		const workspace = path.join(context.workspacesDir, directoryName);
		const tempDir = path.join(context.runDir, "temp", directoryName);
		fs.mkdirSync(workspace, { recursive: true });
		fs.mkdirSync(tempDir, { recursive: true });

		const startedAt = new Date().toISOString();
		emit({ type: "context-started", runId: plan.runId, contextId: execution.id, startedAt });

		let outcome: ContextOutcome;
		try {
			outcome = await new StepExecutor({
				base: { ...base, workspace },
				workflowEnv: plan.workflow.env,
				job,
				execution,
				workspace,
				tempDir,
				logPath: path.join(context.logsDir, getContextLogFileName(execution.id)),
				engine: context,
			}).run();
		} finally {
			fs.rmSync(tempDir, { recursive: true, force: true });
			if (!context.keepWorkspaces) {
				fs.rmSync(workspace, { recursive: true, force: true });
			}
		}

		const finishedAt = new Date().toISOString();
		emit({
			type: "context-finished",
			runId: plan.runId,
			contextId: execution.id,
			status: outcome.status,
			exitCode: outcome.exitCode,
			startedAt,
			finishedAt,
			durationMs: new Date(finishedAt).getTime() - new Date(startedAt).getTime(),
		});
		return outcome;
	}
}

function summarizeContexts(plan: RunPlan, jobMap: Map<string, Job>): PlannedContextSummary[] {
	return plan.jobs.flatMap((planned) => {
		const steps = (jobMap.get(planned.jobId)?.steps ?? []).map((step) => ({
			stepId: step.id,
			name: step.name,
		}));
		return planned.contexts.map((execution) => ({
			contextId: execution.id,
			jobId: execution.jobId,
			name: execution.name,
			matrix: execution.matrix,
			steps,
		}));
	});
}
