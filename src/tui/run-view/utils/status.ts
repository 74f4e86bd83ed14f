import type { RunStatus, StepStatus } from "../../../core/types.js";
import { SPINNER_FRAMES } from "../constants.js";

export type DisplayStatus = RunStatus | StepStatus;

export const STATUS_LABELS: Record<DisplayStatus, string> = {
	pending: "queued",
	running: "running",
	success: "success",
	failed: "failed",
	skipped: "skipped",
	canceled: "canceled",
};

export function formatStatusText(status: DisplayStatus, spinnerIndex: number): string {
	switch (status) {
		case "success":
			return "●";
		case "failed":
			return "✕";
		case "running":
			return SPINNER_FRAMES[spinnerIndex % SPINNER_FRAMES.length] ?? "⠋";
		case "skipped":
			return "⊘";
		case "canceled":
			return "◌";
		default:
			return "○";
	}
}

export function colorForStatus(status: DisplayStatus): "green" | "red" | "yellow" | "gray" | undefined {
	switch (status) {
		case "success":
			return "green";
		case "failed":
			return "red";
		case "running":
			return "yellow";
		case "skipped":
		case "canceled":
			return "gray";
		default:
			return undefined;
	}
}
