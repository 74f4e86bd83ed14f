import type { RunStore } from "../store/run-store.js";

export type CleanupSummary = {
	kept: number;
	removed: string[];
};

export function cleanupRuns(runStore: RunStore, keep: number): CleanupSummary {
	const removed = runStore.prune(keep);
	return { kept: runStore.listRunIds().length, removed };
}

export function printCleanupSummary(summary: CleanupSummary): void {
	if (summary.removed.length === 0) {
		process.stdout.write(`Nothing to remove (${summary.kept} run(s) kept).\n`);
		return;
	}
	process.stdout.write(
		`Removed ${summary.removed.length} run(s); ${summary.kept} run(s) kept.\n`,
	);
}
