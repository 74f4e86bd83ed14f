import { type ExpressionScope, type ExpressionValue, type JobStatusFlags, toExpressionValue } from "./expression.js";
import type { EventSpec, ExecutionContext } from "./types.js";

export type RunContextInput = {
	event: EventSpec;
	payload: Record<string, ExpressionValue>;
	runId: string;
	runNumber: number;
	repository: string;
	workspace: string;
	env?: Record<string, string>;
	vars?: Record<string, string>;
	secrets?: Record<string, string>;
};

export type StepOutcome = {
	outputs: Record<string, string>;
	outcome: "success" | "failure" | "skipped";
	conclusion: "success" | "failure" | "skipped";
};

export function buildGithubContext(input: RunContextInput): Record<string, ExpressionValue> {
	const { event, payload } = input;
	const isPullRequest = event.name === "pull_request";
	const headRef = readPath(payload, ["pull_request", "head", "ref"]);
	return {
		event_name: event.name,
		event: payload,
		ref: isPullRequest ? "refs/pull/1/merge" : `refs/heads/${event.branch}`,
		ref_name: isPullRequest ? "1/merge" : event.branch,
		base_ref: isPullRequest ? event.branch : "",
		head_ref: isPullRequest && typeof headRef === "string" ? headRef : "",
		run_id: input.runId,
		run_number: input.runNumber,
		repository: input.repository,
		repository_owner: input.repository.split("/")[0] ?? "",
		workspace: input.workspace,
		actor: "runlane",
	};
}

export function buildTriggerScope(input: RunContextInput): ExpressionScope {
	return {
		contexts: {
			github: buildGithubContext(input),
			env: { ...(input.env ?? {}) },
			vars: { ...(input.vars ?? {}) },
			inputs: {},
		},
	};
}

export function buildStepScope(
	base: RunContextInput,
	context: ExecutionContext,
	options: {
		env: Record<string, string>;
		workspace: string;
		steps: Record<string, StepOutcome>;
		status: JobStatusFlags;
	},
): ExpressionScope {
	const github = buildGithubContext({ ...base, workspace: options.workspace });
	return {
		contexts: {
			github,
			env: { ...options.env },
			vars: { ...(base.vars ?? {}) },
			secrets: { ...(base.secrets ?? {}) },
			matrix: context.matrix ? { ...context.matrix } : {},
			runner: {
				os: context.runnerOs,
				name: context.runsOn ?? "local",
			},
			job: { status: options.status.failure ? "failure" : "success" },
			steps: Object.fromEntries(
				Object.entries(options.steps).map(([id, outcome]) => [
					id,
					{ outputs: { ...outcome.outputs }, outcome: outcome.outcome, conclusion: outcome.conclusion },
				]),
			),
			inputs: {},
		},
		status: options.status,
	};
}

export function buildEventPayload(event: EventSpec, repository: string): Record<string, ExpressionValue> {
	const [owner = "local", name = "local"] = repository.split("/");
	const repo = { full_name: repository, name, owner: { login: owner } };
	switch (event.name) {
		case "pull_request":
			return {
				action: "opened",
				number: 1,
				repository: repo,
				pull_request: {
					number: 1,
					head: { ref: "local" },
					base: { ref: event.branch },
				},
			};
		case "workflow_dispatch":
			return { ref: `refs/heads/${event.branch}`, repository: repo, inputs: {} };
		default:
			return { ref: `refs/heads/${event.branch}`, repository: repo };
	}
}

function readPath(value: ExpressionValue, keys: string[]): ExpressionValue {
	let current: ExpressionValue = value;
	for (const key of keys) {
		if (!current || typeof current !== "object" || Array.isArray(current)) {
			return undefined;
		}
		current = current[key];
	}
	return current;
}

/** Parses a JSON event payload; the top level must be an object. */
export function parseEventPayload(raw: string, source: string): Record<string, ExpressionValue> {
	const value = toExpressionValue(JSON.parse(raw));
	if (!value || typeof value !== "object" || Array.isArray(value)) {
		throw new Error(`Event payload ${source} must be a JSON object`);
	}
	return value;
}
