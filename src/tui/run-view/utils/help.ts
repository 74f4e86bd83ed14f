import type { RunStatus } from "../../../core/types.js";

export type RunViewMode = "summary" | "details";
export type RunViewFocus = "contexts" | "steps";

export type HelpTextInput = {
	viewMode: RunViewMode;
	focusedPane: RunViewFocus;
	quitPromptVisible: boolean;
	statusText: RunStatus;
};

export function formatHelpText({
	viewMode,
	focusedPane,
	quitPromptVisible,
	statusText,
}: HelpTextInput): string {
	if (quitPromptVisible) {
		return "Y: confirm cancel · N/Enter/Esc: continue run";
	}
	const exitHint = statusText === "running" ? "Q: cancel run" : "Q: exit";
	if (viewMode === "summary") {
		return `Tab: switch view · D: details · S: summary · ${exitHint}`;
	}
	const paneHint =
		focusedPane === "contexts"
			? "Left/Right: focus pane (contexts)"
			: "Left/Right: focus pane (steps)";
	return `${paneHint} · Up/Down: move · Space/Enter: toggle step · Tab: switch view · S: summary · ${exitHint}`;
}
