import { matchesPatternList } from "../utils/glob.js";
import { ExpressionError } from "./errors.js";
import { evaluateCondition, type ExpressionScope } from "./expression.js";
import type { EventSpec, Job, TriggerDecision, Workflow } from "./types.js";

export const RECOGNIZED_EVENTS = ["push", "pull_request", "workflow_dispatch"] as const;

const ADMITTED: TriggerDecision = { admitted: true };

export function isRecognizedEvent(name: string): boolean {
	return RECOGNIZED_EVENTS.some((event) => event === name);
}

/**
 * Decides whether a workflow's `on` block admits the event. Unrecognized event kinds
 * are rejected rather than raised so the run reports its jobs as skipped.
 */
export function evaluateWorkflowTrigger(workflow: Workflow, event: EventSpec): TriggerDecision {
	if (!isRecognizedEvent(event.name)) {
		return { admitted: false, reason: `unrecognized event "${event.name}"` };
	}
	if (workflow.triggers.length === 0) {
		return ADMITTED;
	}

	const trigger = workflow.triggers.find((item) => item.event === event.name);
	if (!trigger) {
		return { admitted: false, reason: `workflow does not run on ${event.name}` };
	}
	if (trigger.branches && !matchesPatternList(event.branch, trigger.branches)) {
		return {
			admitted: false,
			reason: `branch "${event.branch}" does not match ${event.name} branches (${trigger.branches.join(", ")})`,
		};
	}
	if (trigger.branchesIgnore && matchesPatternList(event.branch, trigger.branchesIgnore)) {
		return {
			admitted: false,
			reason: `branch "${event.branch}" is ignored for ${event.name}`,
		};
	}
	return ADMITTED;
}

export function evaluateJobCondition(job: Job, scope: ExpressionScope): TriggerDecision {
	if (!job.if) {
		return ADMITTED;
	}
	try {
		return evaluateCondition(job.if, scope)
			? ADMITTED
			: { admitted: false, reason: `condition is false: ${job.if}` };
	} catch (error) {
		if (error instanceof ExpressionError) {
			return { admitted: false, reason: error.message };
		}
		throw error;
	}
}

export function evaluateJobTrigger(
	workflow: Workflow,
	job: Job,
	event: EventSpec,
	scope: ExpressionScope,
): TriggerDecision {
	const workflowDecision = evaluateWorkflowTrigger(workflow, event);
	if (!workflowDecision.admitted) {
		return workflowDecision;
	}
	return evaluateJobCondition(job, scope);
}
