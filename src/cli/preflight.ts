import { spawnSync } from "node:child_process";
import process from "node:process";
import { defaultShell } from "../engines/local/shell.js";
import type { Workflow } from "../core/types.js";

const VERSION_ARGS: Record<string, string[]> = {
	bash: ["--version"],
	sh: ["-c", "exit 0"],
	pwsh: ["-Version"],
	powershell: ["-Command", "exit 0"],
	python: ["--version"],
	cmd: ["/C", "exit 0"],
};

/** Shell programs the selected jobs' `run` steps will start. */
export function collectRequiredShells(
	workflow: Workflow,
	jobIds: string[],
	configuredShell?: string,
): string[] {
	const fallback = configuredShell ?? defaultShell();
	const selected = new Set(jobIds);
	const shells = new Set<string>();
	for (const job of workflow.jobs) {
		if (!selected.has(job.id)) {
			continue;
		}
		for (const step of job.steps) {
			if (step.kind === "run") {
				shells.add(step.shell ?? fallback);
			}
		}
	}
	return [...shells].sort();
}

export function runPreflightChecks(shells: string[]): boolean {
	let ok = true;
	for (const shell of shells) {
		const args = VERSION_ARGS[shell];
		if (!args) {
			continue;
		}
		const result = spawnSync(shell, args, { stdio: "ignore" });
		if (result.status !== 0) {
			process.stderr.write(`${shell} is not available. Install it or set runtime.shell in .runlane.yml.\n`);
			ok = false;
		}
	}
	return ok;
}
