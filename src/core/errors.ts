export type RunlaneErrorCode =
	| "WORKFLOW_PARSE"
	| "EXPRESSION"
	| "MATRIX"
	| "STEP_EXECUTION"
	| "ARTIFACT_NOT_FOUND"
	| "ARTIFACT_CONFLICT"
	| "TAG_CONFLICT"
	| "RELEASE";

export class RunlaneError extends Error {
	constructor(
		readonly code: RunlaneErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class WorkflowParseError extends RunlaneError {
	constructor(message: string) {
		super("WORKFLOW_PARSE", message);
	}
}

export class ExpressionError extends RunlaneError {
	constructor(
		message: string,
		readonly expression: string,
	) {
		super("EXPRESSION", `${message} in expression: ${expression}`);
	}
}

export class MatrixError extends RunlaneError {
	constructor(jobId: string, message: string) {
		super("MATRIX", `Job "${jobId}": ${message}`);
	}
}

export class StepExecutionError extends RunlaneError {
	constructor(
		readonly stepName: string,
		readonly exitCode: number,
		message?: string,
	) {
		super("STEP_EXECUTION", message ?? `Step "${stepName}" exited with code ${exitCode}`);
	}
}

export class ArtifactNotFoundError extends RunlaneError {
	constructor(readonly artifactName: string) {
		super("ARTIFACT_NOT_FOUND", `Artifact not found for this run: ${artifactName}`);
	}
}

export class ArtifactConflictError extends RunlaneError {
	constructor(readonly artifactName: string) {
		super("ARTIFACT_CONFLICT", `Artifact already uploaded in this run: ${artifactName}`);
	}
}

export class TagConflictError extends RunlaneError {
	constructor(
		readonly tag: string,
		detail?: string,
	) {
		super("TAG_CONFLICT", `Tag ${tag} already exists${detail ? `: ${detail}` : ""}`);
	}
}

export class ReleaseError extends RunlaneError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("RELEASE", message, options);
	}
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
	return error instanceof Error ? error.message : fallback;
}
