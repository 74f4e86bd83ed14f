import fs from "node:fs";
import path from "node:path";
import type { EngineContext } from "../../core/engine.js";
import { buildStepScope, type RunContextInput, type StepOutcome } from "../../core/context.js";
import { errorMessage, StepExecutionError } from "../../core/errors.js";
import {
	evaluateCondition,
	type ExpressionScope,
	interpolate,
	interpolateRecord,
} from "../../core/expression.js";
import type { ExecutionContext, Job, RunStep, Step, UsesStep } from "../../core/types.js";
import { ensureWithinBase } from "../../utils/path-safety.js";
import { EXIT_CANCELED } from "../../utils/process.js";
import { createSecretMasker, type SecretMasker } from "../../utils/redact.js";
import { readFileCommand } from "./file-commands.js";
import { buildShellCommand, defaultShell, scriptExtension } from "./shell.js";

export type StepExecutorInput = {
	base: RunContextInput;
	workflowEnv?: Record<string, string>;
	job: Job;
	execution: ExecutionContext;
	workspace: string;
	tempDir: string;
	logPath: string;
	engine: EngineContext;
};

export type ContextOutcome = {
	status: "success" | "failed" | "canceled";
	exitCode: number;
};

type StepResult = {
	exitCode: number;
	outputs: Record<string, string>;
	env: Record<string, string>;
	error?: string;
};

const RUNNING = { success: true, failure: false, cancelled: false };

type OutputSource = "stdout" | "stderr";

/**
 * Writes masked output to the context log file and forwards it to the run's output sink.
 * Output is masked a whole line at a time, so a secret split across chunks is still caught;
 * a trailing partial line waits for `flush()`.
 */
export class ContextLog {
	private readonly stream: fs.WriteStream;
	private readonly pending: Record<OutputSource, string> = { stdout: "", stderr: "" };
	private streamError?: Error;

	constructor(
		private readonly logPath: string,
		private readonly contextId: string,
		private readonly mask: SecretMasker,
		private readonly onOutput?: EngineContext["onOutput"],
	) {
		fs.mkdirSync(path.dirname(logPath), { recursive: true });
		this.stream = fs.createWriteStream(logPath, { flags: "a" });
		this.stream.on("error", (error) => {
			if (!this.streamError) {
				this.streamError = error;
				this.emit(`Warning: could not write log ${this.logPath}: ${error.message}\n`, "stderr");
			}
		});
	}

	write(text: string, source: OutputSource = "stdout"): void {
		const buffered = this.pending[source] + text;
		const end = buffered.lastIndexOf("\n") + 1;
		this.pending[source] = buffered.slice(end);
		if (end > 0) {
			this.emit(this.mask(buffered.slice(0, end)), source);
		}
	}

	line(text: string, source: OutputSource = "stdout"): void {
		this.write(`${text}\n`, source);
	}

	/** Writes out any partial lines still held back. */
	flush(): void {
		for (const source of ["stdout", "stderr"] as const) {
			const rest = this.pending[source];
			this.pending[source] = "";
			if (rest) {
				this.emit(this.mask(rest), source);
			}
		}
	}

	close(): Promise<void> {
		this.flush();
		return new Promise((resolve) => {
			if (this.stream.closed) {
				resolve();
				return;
			}
			this.stream.once("close", () => resolve());
			this.stream.end();
		});
	}

	private emit(masked: string, source: OutputSource): void {
		if (!this.streamError) {
			this.stream.write(masked);
		}
		if (this.onOutput) {
			this.onOutput(masked, source, this.contextId);
			return;
		}
		const target = source === "stdout" ? process.stdout : process.stderr;
		target.write(prefixLines(masked, `[${this.contextId}] `));
	}
}

/**
 * Runs the steps of one execution context in order. The first failing step ends the
 * context unless it sets `continue-on-error`; later steps are reported as skipped.
 */
export class StepExecutor {
	private readonly outcomes: Record<string, StepOutcome> = {};
	private readonly log: ContextLog;
	private env: Record<string, string> = {};

	constructor(private readonly input: StepExecutorInput) {
		const masker = createSecretMasker(input.engine.secrets);
		this.log = new ContextLog(input.logPath, input.execution.id, masker, input.engine.onOutput);
	}

	async run(): Promise<ContextOutcome> {
		try {
			return await this.runSteps();
		} finally {
			await this.log.close();
		}
	}

	private async runSteps(): Promise<ContextOutcome> {
		const { job, base } = this.input;
		try {
			this.env = { ...(base.env ?? {}) };
			this.env = { ...this.env, ...interpolateRecord(this.input.workflowEnv, this.scope()) };
			this.env = { ...this.env, ...interpolateRecord(job.env, this.scope()) };
		} catch (error) {
			this.log.line(`Error: ${errorMessage(error)}`, "stderr");
			return this.fail(0, 1);
		}

		for (const [index, step] of job.steps.entries()) {
			if (this.input.engine.signal?.aborted) {
				this.skipFrom(index);
				return { status: "canceled", exitCode: EXIT_CANCELED };
			}

			const scope = this.scope();
			let shouldRun: boolean;
			try {
				shouldRun = evaluateCondition(step.if, scope);
			} catch (error) {
				const message = errorMessage(error);
				this.log.line(`Error: ${message}`, "stderr");
				this.emitStepFinished(step, "failed", 1, message);
				return this.fail(index + 1, 1);
			}

			if (!shouldRun) {
				this.outcomes[step.id] = { outputs: {}, outcome: "skipped", conclusion: "skipped" };
				this.log.line(`○ ${step.name} (skipped: condition is false)`);
				this.emitStepFinished(step, "skipped");
				continue;
			}

			this.emit({ type: "step-started", stepId: step.id });
			this.log.line(`▾ ${step.name}`);
			const result = await this.executeStep(step, index, scope);
			this.env = { ...this.env, ...result.env };

			if (result.exitCode === 0) {
				this.outcomes[step.id] = { outputs: result.outputs, outcome: "success", conclusion: "success" };
				this.log.line(`✓ ${step.name}`);
				this.emitStepFinished(step, "success", 0);
				continue;
			}

			if (this.input.engine.signal?.aborted) {
				this.log.line(`◌ ${step.name} (canceled)`, "stderr");
				this.emitStepFinished(step, "failed", EXIT_CANCELED, "canceled");
				this.skipFrom(index + 1);
				return { status: "canceled", exitCode: EXIT_CANCELED };
			}

			const failure = new StepExecutionError(step.name, result.exitCode, result.error);
			this.log.line(`✗ ${failure.message}`, "stderr");
			this.emitStepFinished(step, "failed", result.exitCode, failure.message);

			if (step.continueOnError) {
				this.outcomes[step.id] = { outputs: result.outputs, outcome: "failure", conclusion: "success" };
				this.log.line(`  continue-on-error is set; continuing`);
				continue;
			}

			this.outcomes[step.id] = { outputs: result.outputs, outcome: "failure", conclusion: "failure" };
			return this.fail(index + 1, result.exitCode);
		}

		return { status: "success", exitCode: 0 };
	}

	private async executeStep(step: Step, index: number, scope: ExpressionScope): Promise<StepResult> {
		const { tempDir, workspace } = this.input;
		const envFile = path.join(tempDir, `env-${index + 1}`);
		const outputFile = path.join(tempDir, `output-${index + 1}`);
		fs.writeFileSync(envFile, "");
		fs.writeFileSync(outputFile, "");

		try {
			const stepEnv = {
				...this.env,
				...interpolateRecord(step.env, scope),
			};
			const cwd = step.workingDirectory
				? ensureWithinBase(workspace, interpolate(step.workingDirectory, scope), "working-directory")
				: workspace;
			fs.mkdirSync(cwd, { recursive: true });
			const fileCommands = { GITHUB_ENV: envFile, GITHUB_OUTPUT: outputFile };

			let exitCode = 0;
			let actionOutputs: Record<string, string> = {};
			if (step.kind === "run") {
				exitCode = await this.runScript(step, index, scope, cwd, {
					...process.env,
					...this.runnerEnv(),
					...stepEnv,
					...fileCommands,
				});
			} else {
				actionOutputs = await this.runAction(step, scope, cwd, {
					...this.runnerEnv(),
					...stepEnv,
					...fileCommands,
				});
			}

			return {
				exitCode,
				outputs: { ...readFileCommand(outputFile), ...actionOutputs },
				env: readFileCommand(envFile),
			};
		} catch (error) {
			return { exitCode: 1, outputs: {}, env: {}, error: errorMessage(error) };
		}
	}

	private async runScript(
		step: RunStep,
		index: number,
		scope: ExpressionScope,
		cwd: string,
		env: NodeJS.ProcessEnv,
	): Promise<number> {
		const shell = step.shell ?? this.input.engine.shell ?? defaultShell();
		const script = interpolate(step.run, scope);
		const scriptPath = path.join(this.input.tempDir, `step-${index + 1}${scriptExtension(shell)}`);
		fs.writeFileSync(scriptPath, script);
		const { command, args } = buildShellCommand(shell, scriptPath);

		this.log.line(`$ ${[command, ...args].map(quoteArg).join(" ")}`);
		for (const line of script.trimEnd().split("\n")) {
			this.log.line(`  ${line}`);
		}

		const result = await this.input.engine.runCommand(command, args, {
			cwd,
			env,
			signal: this.input.engine.signal,
			onStdout: (text) => this.log.write(text, "stdout"),
			onStderr: (text) => this.log.write(text, "stderr"),
		});
		this.log.flush();
		return result.exitCode;
	}

	private async runAction(
		step: UsesStep,
		scope: ExpressionScope,
		cwd: string,
		env: Record<string, string>,
	): Promise<Record<string, string>> {
		const { engine, base, execution, workspace } = this.input;
		const handler = engine.actions.resolve(step.uses);
		if (!handler) {
			throw new Error(`Unsupported action: ${step.uses}`);
		}
		const inputs = interpolateRecord(step.with, scope);
		this.log.line(`$ uses ${step.uses}`);
		for (const [key, value] of Object.entries(inputs)) {
			this.log.line(`  ${key}: ${value}`);
		}

		const result = await handler.run({
			inputs,
			env,
			workspace,
			cwd,
			repoRoot: engine.repoRoot,
			runId: base.runId,
			runNumber: base.runNumber,
			execution,
			artifacts: engine.artifacts,
			fileSystem: engine.fileSystem,
			release: engine.release,
			runCommand: engine.runCommand,
			signal: engine.signal,
			log: (line) => this.log.line(line),
			warn: (line) => this.log.line(`Warning: ${line}`, "stderr"),
		});
		return result.outputs ?? {};
	}

	private scope(): ExpressionScope {
		return buildStepScope(this.input.base, this.input.execution, {
			env: this.env,
			workspace: this.input.workspace,
			steps: this.outcomes,
			status: RUNNING,
		});
	}

	private runnerEnv(): Record<string, string> {
		const { base, execution, workspace, tempDir } = this.input;
		return {
			CI: "true",
			RUNLANE: "true",
			GITHUB_WORKSPACE: workspace,
			GITHUB_RUN_ID: base.runId,
			GITHUB_RUN_NUMBER: String(base.runNumber),
			GITHUB_EVENT_NAME: base.event.name,
			GITHUB_REPOSITORY: base.repository,
			GITHUB_JOB: execution.jobId,
			RUNNER_OS: execution.runnerOs,
			RUNNER_TEMP: tempDir,
		};
	}

	private fail(nextIndex: number, exitCode: number): ContextOutcome {
		this.skipFrom(nextIndex);
		return { status: "failed", exitCode: exitCode === 0 ? 1 : exitCode };
	}

	private skipFrom(index: number): void {
		for (const step of this.input.job.steps.slice(index)) {
			this.emitStepFinished(step, "skipped");
		}
	}

	private emitStepFinished(
		step: Step,
		status: "success" | "failed" | "skipped",
		exitCode?: number,
		error?: string,
	): void {
		this.emit({ type: "step-finished", stepId: step.id, status, exitCode, error });
	}

	private emit(
		event:
			| { type: "step-started"; stepId: string }
			| {
					type: "step-finished";
					stepId: string;
					status: "success" | "failed" | "skipped";
					exitCode?: number;
					error?: string;
			  },
	): void {
		this.input.engine.onEvent?.({
			...event,
			runId: this.input.base.runId,
			contextId: this.input.execution.id,
		});
	}
}

function prefixLines(text: string, prefix: string): string {
	return text
		.split("\n")
		.map((line, index, lines) => (index === lines.length - 1 && line === "" ? line : `${prefix}${line}`))
		.join("\n");
}

function quoteArg(value: string): string {
	if (/[\s"'\\]/.test(value)) {
		return JSON.stringify(value);
	}
	return value;
}
