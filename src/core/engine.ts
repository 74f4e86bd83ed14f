import type { ActionRegistry } from "../actions/registry.js";
import type { ArtifactStore } from "../artifacts/artifact-store.js";
import type { FileSystem } from "../artifacts/file-system.js";
import type { TagWriter } from "../release/git-tagger.js";
import type { ReleasePublisher } from "../release/publisher.js";
import type { CommandRunner } from "../utils/process.js";
import type { ExpressionValue } from "./expression.js";
import type { EventSpec, MatrixAssignment, RunPlan, RunStatus, StepStatus } from "./types.js";

export type ReleaseServices = {
	tagger: TagWriter;
	createPublisher: (options: { token?: string }) => ReleasePublisher;
	remote: string;
	push: boolean;
};

export type EngineContext = {
	repoRoot: string;
	runDir: string;
	logsDir: string;
	workspacesDir: string;
	repository: string;
	payload: Record<string, ExpressionValue>;
	env: Record<string, string>;
	vars: Record<string, string>;
	secrets: Record<string, string>;
	artifacts: ArtifactStore;
	actions: ActionRegistry;
	release: ReleaseServices;
	fileSystem: FileSystem;
	runCommand: CommandRunner;
	shell?: string;
	maxParallel?: number;
	keepWorkspaces?: boolean;
	signal?: AbortSignal;
	onOutput?: (chunk: string, source: "stdout" | "stderr", contextId?: string) => void;
	onEvent?: (event: EngineRuntimeEvent) => void;
};

export type EngineRunResult = {
	exitCode: number;
	status: Extract<RunStatus, "success" | "failed" | "canceled">;
	logsPath: string;
};

export type PlannedContextSummary = {
	contextId: string;
	jobId: string;
	name: string;
	matrix: MatrixAssignment | null;
	steps: { stepId: string; name: string }[];
};

export type EngineRuntimeEvent =
	| {
			type: "run-started";
			runId: string;
			runNumber: number;
			workflowId: string;
			event: EventSpec;
			contexts: PlannedContextSummary[];
			artifactDir?: string;
			logDir?: string;
			createdAt: string;
	  }
	| {
			type: "context-started";
			runId: string;
			contextId: string;
			startedAt: string;
	  }
	| {
			type: "step-started";
			runId: string;
			contextId: string;
			stepId: string;
	  }
	| {
			type: "step-finished";
			runId: string;
			contextId: string;
			stepId: string;
			status: Extract<StepStatus, "success" | "failed" | "skipped">;
			exitCode?: number;
			error?: string;
	  }
	| {
			type: "context-finished";
			runId: string;
			contextId: string;
			status: Extract<RunStatus, "success" | "failed" | "canceled">;
			exitCode: number;
			startedAt?: string;
			finishedAt: string;
			durationMs: number;
	  }
	| {
			type: "contexts-skipped";
			runId: string;
			contextIds: string[];
			reason: string;
	  }
	| {
			type: "contexts-blocked";
			runId: string;
			contextIds: string[];
			reason: string;
	  }
	| {
			type: "contexts-canceled";
			runId: string;
			contextIds: string[];
	  }
	| {
			type: "run-finished";
			runId: string;
			status: Extract<RunStatus, "success" | "failed" | "canceled">;
			finishedAt: string;
	  };

export interface EngineAdapter {
	readonly id: string;
	run(plan: RunPlan, context: EngineContext): Promise<EngineRunResult>;
}
