import React from "react";
import { outro } from "@clack/prompts";
import { render } from "ink";
import type { EngineAdapter, EngineContext, EngineRunResult } from "../core/engine.js";
import type { RunPlan, Workflow } from "../core/types.js";
import { RunView } from "../tui/run-view/run-view.js";

export type ExecuteRunInput = {
	adapter: EngineAdapter;
	plan: RunPlan;
	context: EngineContext;
	workflow: Workflow;
	abortController: AbortController;
	isTty: boolean;
	json: boolean;
};

export async function executeRun({
	adapter,
	plan,
	context,
	workflow,
	abortController,
	isTty,
	json,
}: ExecuteRunInput): Promise<EngineRunResult> {
	if (isTty && !json) {
		const result = await runWithInk(adapter, plan, context, workflow, abortController);
		outro(`Logs: ${result.logsPath}`);
		return result;
	}

	const contextCount = plan.jobs.reduce((total, job) => total + job.contexts.length, 0);
	if (!json) {
		process.stdout.write(
			`Running ${plan.jobs.length} job(s), ${contextCount} context(s) with ${adapter.id}...\n`,
		);
	}
	const result = await adapter.run(plan, json ? { ...context, onOutput: () => undefined } : context);
	if (!json) {
		process.stdout.write(`Finished with exit code ${result.exitCode}\n`);
		process.stdout.write(`Logs: ${result.logsPath}\n`);
	}
	return result;
}

async function runWithInk(
	adapter: EngineAdapter,
	plan: RunPlan,
	context: EngineContext,
	workflow: Workflow,
	abortController: AbortController,
): Promise<EngineRunResult> {
	let finalResult: EngineRunResult | null = null;
	const { waitUntilExit, unmount } = render(
		React.createElement(RunView, {
			adapter,
			context,
			plan,
			workflow,
			onComplete: (result: EngineRunResult) => {
				finalResult = result;
			},
			onCancel: () => abortController.abort(),
		}),
		{ exitOnCtrlC: false },
	);

	await waitUntilExit();
	unmount();
	return finalResult ?? { exitCode: 1, status: "failed", logsPath: context.logsDir };
}
