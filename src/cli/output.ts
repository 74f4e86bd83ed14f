import type { RunRecord, Workflow } from "../core/types.js";
import { formatDuration } from "../tui/run-view/utils/format.js";

export type JsonSummary = {
	runId: string;
	runNumber: number;
	status: string;
	workflow: { id: string; name: string; path: string };
	event: RunRecord["event"];
	contexts: {
		contextId: string;
		jobId: string;
		status: string;
		reason?: string;
		exitCode?: number;
		durationMs?: number;
	}[];
	logsDir?: string;
	artifactsDir?: string;
};

export function buildJsonSummary(run: RunRecord, workflow: Workflow): JsonSummary {
	return {
		runId: run.id,
		runNumber: run.runNumber,
		status: run.status,
		workflow: {
			id: workflow.id,
			name: workflow.name,
			path: workflow.path,
		},
		event: run.event,
		contexts: run.jobs.map((item) => ({
			contextId: item.contextId,
			jobId: item.jobId,
			status: item.status,
			reason: item.reason,
			exitCode: item.exitCode,
			durationMs: item.durationMs,
		})),
		logsDir: run.logDir,
		artifactsDir: run.artifactDir,
	};
}

export function formatRunSummary(run: RunRecord): string {
	const lines = run.jobs.map((item) => {
		const duration = item.durationMs !== undefined ? ` ${formatDuration(item.durationMs)}` : "";
		const reason = item.reason ? ` (${item.reason})` : "";
		return `  ${item.status.padEnd(8)} ${item.contextId}${duration}${reason}`;
	});
	return [`Run #${run.runNumber} ${run.status}`, ...lines].join("\n");
}
