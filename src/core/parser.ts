import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { WorkflowParseError } from "./errors.js";
import type {
	Job,
	MatrixAssignment,
	MatrixStrategy,
	MatrixValue,
	Step,
	Workflow,
	WorkflowTrigger,
} from "./types.js";

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));
const stringMap = z.record(scalar);
const stringList = z
	.union([z.string(), z.array(z.string())])
	.transform((value) => (Array.isArray(value) ? value : [value]));

const matrixValueSchema: z.ZodType<MatrixValue> = z.lazy(() =>
	z.union([
		z.string(),
		z.number(),
		z.boolean(),
		z.null(),
		z.array(matrixValueSchema),
		z.record(matrixValueSchema),
	]),
);

const TriggerFilterSchema = z
	.object({
		branches: stringList.optional(),
		"branches-ignore": stringList.optional(),
	})
	.passthrough();

const OnSchema = z.union([
	z.string(),
	z.array(z.string()),
	z.record(z.union([TriggerFilterSchema, z.null()])),
]);

const StepYamlSchema = z.object({
	id: z.string().optional(),
	name: z.string().optional(),
	uses: z.string().optional(),
	run: z.string().optional(),
	if: scalar.optional(),
	env: stringMap.optional(),
	with: stringMap.optional(),
	shell: z.string().optional(),
	"working-directory": z.string().optional(),
	"continue-on-error": z.union([z.boolean(), z.string()]).optional(),
});

const JobYamlSchema = z.object({
	name: z.string().optional(),
	needs: stringList.optional(),
	"runs-on": stringList.optional(),
	steps: z.array(StepYamlSchema).optional(),
	if: scalar.optional(),
	env: stringMap.optional(),
	strategy: z
		.object({
			matrix: z.record(z.unknown()).optional(),
			"max-parallel": z.number().int().positive().optional(),
			"fail-fast": z.boolean().optional(),
		})
		.optional(),
});

const WorkflowYamlSchema = z.object({
	name: z.string().optional(),
	on: OnSchema.optional(),
	env: stringMap.optional(),
	jobs: z.record(JobYamlSchema).optional(),
});

type StepYaml = z.infer<typeof StepYamlSchema>;
type JobYaml = z.infer<typeof JobYamlSchema>;

export function parseWorkflow(workflowPath: string): Workflow {
	const raw = fs.readFileSync(workflowPath, "utf-8");
	return parseWorkflowSource(raw, workflowPath);
}

export function parseWorkflowSource(raw: string, workflowPath: string): Workflow {
	const doc = YAML.parseDocument(raw);
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw new WorkflowParseError(`${workflowPath}:${line}:${col} ${error.message}`);
	}

	const result = WorkflowYamlSchema.safeParse(doc.toJSON() ?? {});
	if (!result.success) {
		const issue = result.error.issues[0];
		const location = issue?.path.join(".") || "<root>";
		throw new WorkflowParseError(`${workflowPath}: ${location}: ${issue?.message ?? "invalid workflow"}`);
	}
	const parsed = result.data;

	const jobs = Object.entries(parsed.jobs ?? {}).map(([jobId, job]) =>
		parseJob(workflowPath, jobId, job),
	);
	validateNeeds(workflowPath, jobs);

	const triggers = parseTriggers(parsed.on);
	return {
		id: workflowPath,
		name: parsed.name ?? path.basename(workflowPath),
		path: workflowPath,
		events: triggers.map((trigger) => trigger.event),
		triggers,
		env: parsed.env,
		jobs,
	};
}

function parseJob(workflowPath: string, jobId: string, job: JobYaml): Job {
	const steps = (job.steps ?? []).map((step, index) =>
		parseStep(workflowPath, jobId, step, index),
	);

	return {
		id: jobId,
		name: job.name ?? jobId,
		needs: job.needs ?? [],
		runsOn: job["runs-on"]?.join(", "),
		steps,
		if: job.if,
		strategy: job.strategy?.matrix
			? parseMatrix(workflowPath, jobId, job.strategy.matrix, job.strategy["max-parallel"])
			: undefined,
		env: job.env,
	};
}

function parseStep(workflowPath: string, jobId: string, step: StepYaml, index: number): Step {
	const base = {
		id: step.id ?? `${jobId}-step-${index + 1}`,
		if: step.if,
		env: step.env,
		workingDirectory: step["working-directory"],
		continueOnError: step["continue-on-error"] === true || step["continue-on-error"] === "true",
	};

	if (step.uses && step.run) {
		throw new WorkflowParseError(
			`${workflowPath}: jobs.${jobId}.steps.${index}: a step cannot declare both uses and run`,
		);
	}
	if (step.uses) {
		return {
			...base,
			kind: "uses",
			name: step.name ?? step.uses,
			uses: step.uses,
			with: step.with ?? {},
		};
	}
	if (step.run !== undefined) {
		return {
			...base,
			kind: "run",
			name: step.name ?? firstLine(step.run),
			run: step.run,
			shell: step.shell,
		};
	}
	throw new WorkflowParseError(
		`${workflowPath}: jobs.${jobId}.steps.${index}: a step needs either uses or run`,
	);
}

function parseMatrix(
	workflowPath: string,
	jobId: string,
	matrix: Record<string, unknown>,
	maxParallel?: number,
): MatrixStrategy {
	const axes: [string, MatrixValue[]][] = [];
	let include: MatrixAssignment[] = [];
	let exclude: MatrixAssignment[] = [];
	const assignmentList = z.array(z.record(matrixValueSchema));

	for (const [key, value] of Object.entries(matrix)) {
		const where = `${workflowPath}: jobs.${jobId}.strategy.matrix.${key}`;
		if (key === "include" || key === "exclude") {
			const entries = assignmentList.safeParse(value);
			if (!entries.success) {
				throw new WorkflowParseError(`${where}: expected a list of mappings`);
			}
			if (key === "include") {
				include = entries.data;
			} else {
				exclude = entries.data;
			}
			continue;
		}
		const values = z.array(matrixValueSchema).safeParse(value);
		if (!values.success) {
			throw new WorkflowParseError(`${where}: expected a list of values`);
		}
		axes.push([key, values.data]);
	}

	return { axes, include, exclude, maxParallel };
}

function parseTriggers(trigger: z.infer<typeof OnSchema> | undefined): WorkflowTrigger[] {
	if (!trigger) {
		return [];
	}
	if (typeof trigger === "string") {
		return [{ event: trigger }];
	}
	if (Array.isArray(trigger)) {
		return trigger.map((event) => ({ event }));
	}
	return Object.entries(trigger).map(([event, filter]) => ({
		event,
		branches: filter?.branches,
		branchesIgnore: filter?.["branches-ignore"],
	}));
}

function validateNeeds(workflowPath: string, jobs: Job[]): void {
	const ids = new Set(jobs.map((job) => job.id));
	for (const job of jobs) {
		for (const need of job.needs) {
			if (!ids.has(need)) {
				throw new WorkflowParseError(
					`${workflowPath}: job "${job.id}" needs unknown job "${need}"`,
				);
			}
		}
	}

	const jobMap = new Map(jobs.map((job) => [job.id, job]));
	const visiting = new Set<string>();
	const done = new Set<string>();
	const visit = (jobId: string, trail: string[]): void => {
		if (done.has(jobId)) {
			return;
		}
		if (visiting.has(jobId)) {
			throw new WorkflowParseError(
				`${workflowPath}: dependency cycle: ${[...trail, jobId].join(" -> ")}`,
			);
		}
		visiting.add(jobId);
		for (const need of jobMap.get(jobId)?.needs ?? []) {
			visit(need, [...trail, jobId]);
		}
		visiting.delete(jobId);
		done.add(jobId);
	};
	jobs.forEach((job) => visit(job.id, []));
}

function firstLine(script: string): string {
	return script.trim().split("\n")[0] ?? script;
}
