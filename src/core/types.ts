export type Workflow = {
	id: string;
	name: string;
	path: string;
	events: string[];
	triggers: WorkflowTrigger[];
	env?: Record<string, string>;
	jobs: Job[];
};

export type WorkflowTrigger = {
	event: string;
	branches?: string[];
	branchesIgnore?: string[];
};

export type Job = {
	id: string;
	name: string;
	needs: string[];
	runsOn?: string;
	steps: Step[];
	if?: string;
	strategy?: MatrixStrategy;
	env?: Record<string, string>;
};

type StepBase = {
	id: string;
	name: string;
	if?: string;
	env?: Record<string, string>;
	workingDirectory?: string;
	continueOnError: boolean;
};

export type RunStep = StepBase & {
	kind: "run";
	run: string;
	shell?: string;
};

export type UsesStep = StepBase & {
	kind: "uses";
	uses: string;
	with: Record<string, string>;
};

export type Step = RunStep | UsesStep;

export type MatrixValue =
	| string
	| number
	| boolean
	| null
	| MatrixValue[]
	| { [key: string]: MatrixValue };

export type MatrixAssignment = Record<string, MatrixValue>;

export type MatrixStrategy = {
	axes: [string, MatrixValue[]][];
	include: MatrixAssignment[];
	exclude: MatrixAssignment[];
	maxParallel?: number;
};

export type EventSpec = {
	name: "push" | "pull_request" | "workflow_dispatch" | string;
	branch: string;
	payloadPath?: string;
};

export type TriggerDecision = { admitted: true } | { admitted: false; reason: string };

export type RunnerOs = "Linux" | "macOS" | "Windows";

export type ExecutionContext = {
	id: string;
	jobId: string;
	name: string;
	matrix: MatrixAssignment | null;
	runsOn?: string;
	runnerOs: RunnerOs;
};

export type RunPreset = {
	id: string;
	label: string;
	jobIds: string[];
	event?: { name: string; branch?: string; payloadPath?: string };
	matrixOverride?: string[];
};

export type RunPlan = {
	runId: string;
	runNumber: number;
	workflow: Workflow;
	jobs: PlannedJob[];
	event: EventSpec;
	preset?: RunPreset;
};

export type PlannedJob = {
	jobId: string;
	needs: string[];
	trigger: TriggerDecision;
	contexts: ExecutionContext[];
};

export type RunStatus = "pending" | "running" | "success" | "failed" | "skipped" | "canceled";

export type StepStatus = "pending" | "running" | "success" | "failed" | "skipped";

export type StepRun = {
	stepId: string;
	name: string;
	status: StepStatus;
	exitCode?: number;
	error?: string;
};

export type ContextRun = {
	contextId: string;
	jobId: string;
	name: string;
	status: RunStatus;
	reason?: string;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
	exitCode?: number;
	matrix?: MatrixAssignment | null;
	steps: StepRun[];
};

export type RunRecord = {
	schemaVersion?: number;
	id: string;
	runNumber: number;
	workflowId: string;
	event: EventSpec;
	status: RunStatus;
	createdAt: string;
	finishedAt?: string;
	jobs: ContextRun[];
	artifactDir?: string;
	logDir?: string;
};
