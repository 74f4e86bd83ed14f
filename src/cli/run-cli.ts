import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { cancel, intro, isCancel, select } from "@clack/prompts";
import { createDefaultActionRegistry } from "../actions/index.js";
import { FileArtifactStore } from "../artifacts/artifact-store.js";
import { nodeFileSystem } from "../artifacts/file-system.js";
import type { ReleaseConfig, RunlaneConfig } from "../config/schema.js";
import { loadConfig } from "../config/load-config.js";
import {
	buildEventPayload,
	buildTriggerScope,
	parseEventPayload,
	type RunContextInput,
} from "../core/context.js";
import { discoverWorkflows } from "../core/discovery.js";
import type { EngineAdapter, EngineContext, EngineRunResult, EngineRuntimeEvent } from "../core/engine.js";
import { errorMessage } from "../core/errors.js";
import type { ExpressionValue } from "../core/expression.js";
import { buildRunPlan, expandJobIdsWithNeeds, filterJobsForEvent, sortJobsByNeeds } from "../core/plan.js";
import { isRecognizedEvent, RECOGNIZED_EVENTS } from "../core/trigger.js";
import type { EventSpec, RunPlan, Workflow } from "../core/types.js";
import { createEngineAdapter } from "../engines/factory.js";
import { GitTagger } from "../release/git-tagger.js";
import { GitHubReleasePublisher, LocalReleasePublisher, type ReleasePublisher } from "../release/publisher.js";
import { resolveRepository } from "../release/repository.js";
import { createRunEventPersister, RunStore } from "../store/run-store.js";
import { type CommandRunner, EXIT_CANCELED, runCommand } from "../utils/process.js";
import { DEFAULT_KEEP_RUNS, parseArgs, printHelp, readPackageVersion } from "./args.js";
import { cleanupRuns, printCleanupSummary } from "./cleanup.js";
import { executeRun } from "./execute-run.js";
import { runInit } from "./init.js";
import { resolveRunInputs } from "./inputs.js";
import { buildJsonSummary, formatRunSummary } from "./output.js";
import { resolvePresets, resolveSupportedEvents } from "./plan-run.js";
import { collectRequiredShells, runPreflightChecks } from "./preflight.js";
import {
	collectMatrixKeys,
	promptMatrix,
	resolveJobsFromArgs,
	resolveWorkflow,
	selectEvent,
	selectJobs,
	selectPreset,
} from "./select.js";

export const STATE_DIR = ".runlane";
const EXIT_USAGE = 2;

/** Seams the tests replace; production uses the host's processes, network and terminal. */
export type CliDependencies = {
	runCommand?: CommandRunner;
	processEnv?: NodeJS.ProcessEnv;
	isTty?: boolean;
	preflight?: (shells: string[]) => boolean;
	fetch?: typeof fetch;
};

export async function runCli(
	argv: string[] = process.argv.slice(2),
	cwd: string = process.cwd(),
	deps: CliDependencies = {},
): Promise<number> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return 0;
	}
	if (args.version) {
		process.stdout.write(`runlane ${readPackageVersion()}\n`);
		return 0;
	}
	if (args.unknown?.length) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `runlane --help` for usage.\n");
		return EXIT_USAGE;
	}
	if (args.errors?.length) {
		process.stderr.write(`${args.errors.join("\n")}\n`);
		return EXIT_USAGE;
	}

	const repoRoot = cwd;
	const runStore = new RunStore(path.join(repoRoot, STATE_DIR, "runs"));
	if (args.command === "init") {
		runInit(repoRoot);
		return 0;
	}
	if (args.command === "cleanup") {
		printCleanupSummary(cleanupRuns(runStore, args.keep ?? DEFAULT_KEEP_RUNS));
		return 0;
	}

	let workflows: Workflow[] = [];
	try {
		workflows = discoverWorkflows(repoRoot);
	} catch (error) {
		process.stderr.write(`Workflow parse error: ${errorMessage(error)}\n`);
		return 1;
	}
	if (workflows.length === 0) {
		process.stderr.write("No workflows found in .github/workflows.\n");
		return 1;
	}

	let config: RunlaneConfig;
	try {
		config = loadConfig(repoRoot).config;
	} catch (error) {
		process.stderr.write(`${errorMessage(error)}\n`);
		return EXIT_USAGE;
	}
	const processEnv = deps.processEnv ?? process.env;
	const inputs = resolveRunInputs(repoRoot, config, processEnv);
	if (!inputs.ok) {
		process.stderr.write(`${inputs.error}\n`);
		return EXIT_USAGE;
	}

	const isTty = deps.isTty ?? Boolean(process.stdout.isTTY);
	const interactive = isTty && !args.json;

	let workflow = resolveWorkflow(workflows, args.workflow);
	if (!workflow && args.workflow) {
		process.stderr.write(`Workflow not found: ${args.workflow}\n`);
		return EXIT_USAGE;
	}
	if (!workflow && interactive) {
		intro("runlane");
		const selected = await select({
			message: "Select a workflow",
			options: workflows.map((wf) => ({ value: wf.id, label: wf.name })),
		});
		if (isCancel(selected)) {
			cancel("Canceled.");
			return EXIT_CANCELED;
		}
		workflow = workflows.find((wf) => wf.id === selected) ?? workflows[0];
	}
	if (!workflow) {
		process.stderr.write("No workflow selected. Use --workflow.\n");
		return EXIT_USAGE;
	}

	const presets = resolvePresets(config.presets, workflow.jobs, config.defaultPreset);
	const presetId = args.preset ?? config.defaultPreset ?? "quick";
	const preset = presets.find((item) => item.id === presetId) ?? presets[0];
	if (args.preset && preset?.id !== args.preset) {
		process.stderr.write(`Unknown preset: ${args.preset}\n`);
		return EXIT_USAGE;
	}

	const supportedEvents = resolveSupportedEvents(workflow);
	let eventName = args.event ?? preset?.event?.name ?? supportedEvents[0] ?? "push";
	if (interactive && !args.event) {
		const choices = [...new Set([...supportedEvents.filter(isRecognizedEvent), ...RECOGNIZED_EVENTS])];
		const event = await selectEvent(eventName, choices);
		if (!event) {
			return EXIT_CANCELED;
		}
		eventName = event;
	}
	if (!isRecognizedEvent(eventName)) {
		process.stderr.write(
			`Unsupported event "${eventName}". Use --event with one of: ${RECOGNIZED_EVENTS.join(", ")}.\n`,
		);
		return EXIT_USAGE;
	}

	const event: EventSpec = {
		name: eventName,
		branch: args.branch ?? preset?.event?.branch ?? "main",
		payloadPath: args.eventPath ?? preset?.event?.payloadPath,
	};

	let adapter: EngineAdapter;
	try {
		adapter = createEngineAdapter(config.engine);
	} catch (error) {
		process.stderr.write(`${errorMessage(error)}\n`);
		return EXIT_USAGE;
	}

	const run = deps.runCommand ?? runCommand;
	const repository = await resolveRepository(repoRoot, config.release.remote, config.release.repository, run);
	let payload: Record<string, ExpressionValue>;
	try {
		payload = event.payloadPath
			? parseEventPayload(fs.readFileSync(path.resolve(repoRoot, event.payloadPath), "utf-8"), event.payloadPath)
			: buildEventPayload(event, repository);
	} catch (error) {
		process.stderr.write(`Invalid event payload: ${errorMessage(error)}\n`);
		return EXIT_USAGE;
	}
	const contextInput: RunContextInput = {
		event,
		payload,
		runId: "",
		runNumber: 0,
		repository,
		workspace: repoRoot,
		env: inputs.env,
		vars: inputs.vars,
		secrets: inputs.secrets,
	};

	let selectedJobs = resolveJobsFromArgs(args, preset);
	let matrixOverride = args.matrix ?? preset?.matrixOverride;
	if (args.all) {
		selectedJobs = workflow.jobs.map((job) => job.id);
	}
	if (interactive && !selectedJobs) {
		const presetChoice = await selectPreset(presets, preset?.id ?? presetId);
		if (!presetChoice) {
			return EXIT_CANCELED;
		}
		const availableJobs = filterJobsForEvent(workflow, event, buildTriggerScope(contextInput));
		const jobChoice = await selectJobs(availableJobs, presetChoice.jobIds);
		if (!jobChoice) {
			return EXIT_CANCELED;
		}
		const matrixChoice = await promptMatrix(collectMatrixKeys(workflow, jobChoice));
		if (matrixChoice === null) {
			return EXIT_CANCELED;
		}
		selectedJobs = jobChoice;
		matrixOverride = matrixChoice ?? matrixOverride;
	}
	if (!selectedJobs) {
		const presetChosen = Boolean(args.preset ?? config.defaultPreset);
		selectedJobs =
			presetChosen && preset?.jobIds.length ? preset.jobIds : workflow.jobs.map((job) => job.id);
	}
	const knownJobs = new Set(workflow.jobs.map((job) => job.id));
	const unknownJobs = selectedJobs.filter((jobId) => !knownJobs.has(jobId));
	if (unknownJobs.length > 0) {
		process.stderr.write(`Unknown job(s): ${unknownJobs.join(", ")}\n`);
		return EXIT_USAGE;
	}
	const jobIds = sortJobsByNeeds(workflow, expandJobIdsWithNeeds(workflow, selectedJobs));

	let runNumber: number;
	if (args.runNumber !== undefined) {
		runStore.recordRunNumber(workflow.id, args.runNumber);
		runNumber = args.runNumber;
	} else {
		runNumber = runStore.nextRunNumber(workflow.id);
	}

	const scope = buildTriggerScope({ ...contextInput, runNumber });
	let plan: RunPlan;
	try {
		plan = buildRunPlan({ workflow, jobIds, event, runNumber, scope, preset, matrixOverride });
	} catch (error) {
		process.stderr.write(`${errorMessage(error)}\n`);
		return 1;
	}

	const shells = collectRequiredShells(workflow, jobIds, config.runtime.shell);
	if (!(deps.preflight ?? runPreflightChecks)(shells)) {
		return 1;
	}

	const runDir = runStore.createRunDir(plan.runId);
	const logsDir = runStore.createLogsDir(plan.runId);
	const artifactsDir = runStore.createArtifactsDir(plan.runId);
	const workspacesDir = runStore.createWorkspacesDir(plan.runId);
	const releasesDir = path.join(repoRoot, STATE_DIR, "releases");
	const releaseToken = inputs.secrets.GITHUB_TOKEN;
	const abortController = new AbortController();
	const persist = createRunEventPersister(runStore);

	const engineContext: EngineContext = {
		repoRoot,
		runDir,
		logsDir,
		workspacesDir,
		repository,
		payload,
		env: inputs.env,
		vars: inputs.vars,
		secrets: inputs.secrets,
		artifacts: new FileArtifactStore(plan.runId, artifactsDir),
		actions: createDefaultActionRegistry(config.actions),
		release: {
			tagger: new GitTagger(repoRoot, run),
			createPublisher: ({ token }) =>
				createPublisher(config.release, releasesDir, repository, token ?? releaseToken, deps.fetch),
			remote: config.release.remote,
			push: config.release.push,
		},
		fileSystem: nodeFileSystem,
		runCommand: run,
		shell: config.runtime.shell,
		maxParallel: config.runtime.maxParallel,
		keepWorkspaces: args.keepWorkspaces ?? config.runtime.keepWorkspaces,
		signal: abortController.signal,
		onEvent: (runtimeEvent: EngineRuntimeEvent) => persist(runtimeEvent),
	};

	const onSigint = (): void => abortController.abort();
	process.once("SIGINT", onSigint);
	let result: EngineRunResult;
	try {
		result = await executeRun({
			adapter,
			plan,
			context: engineContext,
			workflow,
			abortController,
			isTty,
			json: Boolean(args.json),
		});
	} finally {
		process.off("SIGINT", onSigint);
	}

	const record = runStore.readRun(plan.runId);
	if (record) {
		if (args.json) {
			process.stdout.write(`${JSON.stringify(buildJsonSummary(record, workflow))}\n`);
		} else {
			process.stdout.write(`${formatRunSummary(record)}\n`);
		}
	}
	return result.exitCode;
}

function createPublisher(
	config: ReleaseConfig,
	releasesDir: string,
	repository: string,
	token: string | undefined,
	fetchImpl?: typeof fetch,
): ReleasePublisher {
	if (config.provider === "github") {
		return new GitHubReleasePublisher({
			repository,
			token: token ?? "",
			apiUrl: config.apiUrl,
			fetch: fetchImpl,
		});
	}
	return new LocalReleasePublisher(releasesDir);
}
