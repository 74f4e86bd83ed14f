import type { RunlaneConfig } from "../config/schema.js";
import { RECOGNIZED_EVENTS } from "../core/trigger.js";
import type { RunPreset, Workflow } from "../core/types.js";

export function resolvePresets(
	presets: RunlaneConfig["presets"],
	allJobs: { id: string }[],
	defaultPreset?: string,
): RunPreset[] {
	const resolved: RunPreset[] = Object.entries(presets).map(([id, preset]) => ({
		id,
		label: id,
		jobIds: preset.jobs,
		event: preset.event,
		matrixOverride: preset.matrix,
	}));

	if (!resolved.some((preset) => preset.id === "quick")) {
		resolved.push({
			id: "quick",
			label: "quick",
			jobIds: allJobs.slice(0, 2).map((job) => job.id),
		});
	}

	if (!resolved.some((preset) => preset.id === "full")) {
		resolved.push({
			id: "full",
			label: "full",
			jobIds: allJobs.map((job) => job.id),
		});
	}

	if (defaultPreset && !resolved.some((preset) => preset.id === defaultPreset)) {
		resolved.unshift({
			id: defaultPreset,
			label: defaultPreset,
			jobIds: allJobs.map((job) => job.id),
		});
	}

	return resolved;
}

export function resolveSupportedEvents(workflow: Workflow): string[] {
	if (workflow.events.length > 0) {
		return workflow.events;
	}
	return [...RECOGNIZED_EVENTS];
}
