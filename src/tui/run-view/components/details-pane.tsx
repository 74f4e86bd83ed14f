import { Box, Text } from "ink";
import type { ContextRun } from "../../../core/types.js";
import { formatDuration } from "../utils/format.js";
import type { RunViewFocus } from "../utils/help.js";
import { colorForStatus, formatStatusText, STATUS_LABELS } from "../utils/status.js";

export type DetailsPaneProps = {
	focusedPane: RunViewFocus;
	contexts: ContextRun[];
	selectedContextIndex: number;
	selectedStepIndex: number;
	expandedSteps: Record<string, boolean>;
	readOutput: (contextId: string, stepId: string) => string[];
	maxDetailsLogLines: number;
	spinnerIndex: number;
};

const ROW_PADDING_X = 2;
const CONTEXT_ROW_WIDTH = 34;
const STEP_ROW_WIDTH = 40;

export function DetailsPane({
	focusedPane,
	contexts,
	selectedContextIndex,
	selectedStepIndex,
	expandedSteps,
	readOutput,
	maxDetailsLogLines,
	spinnerIndex,
}: DetailsPaneProps): JSX.Element {
	const selected = contexts[selectedContextIndex];
	const steps = selected?.steps ?? [];
	return (
		<Box flexDirection="row">
			<Box flexDirection="column" width={CONTEXT_ROW_WIDTH + 4}>
				<Text dimColor>Contexts {focusedPane === "contexts" ? "•" : ""}</Text>
				{contexts.map((item, index) => {
					const isSelected = index === selectedContextIndex;
					const glyph = formatStatusText(item.status, spinnerIndex);
					return (
						<Text
							key={item.contextId}
							color={colorForStatus(item.status)}
							backgroundColor={isSelected ? "gray" : undefined}
							bold={isSelected && focusedPane === "contexts"}
							dimColor={isSelected && focusedPane !== "contexts"}
						>
							{formatRowText(`${glyph} ${item.contextId}`, CONTEXT_ROW_WIDTH, ROW_PADDING_X)}
						</Text>
					);
				})}
			</Box>
			<Box flexDirection="column" marginLeft={1} flexGrow={1}>
				<Text dimColor>Steps {focusedPane === "steps" ? "•" : ""}</Text>
				<Text>{selected?.name ?? "No context selected"}</Text>
				{selected ? (
					<Text dimColor>
						{STATUS_LABELS[selected.status]}
						{selected.durationMs ? ` · ${formatDuration(selected.durationMs)}` : ""}
						{selected.reason ? ` · ${selected.reason}` : ""}
					</Text>
				) : null}
				<Box flexDirection="column" marginTop={1}>
					{steps.length === 0 ? (
						<Text dimColor>No steps found.</Text>
					) : (
						steps.map((step, index) => {
							const isSelected = index === selectedStepIndex;
							const isExpanded = Boolean(expandedSteps[step.stepId]);
							const output = selected ? readOutput(selected.contextId, step.stepId) : [];
							const caret = isExpanded ? "▾" : "▸";
							const glyph = formatStatusText(step.status, spinnerIndex);
							return (
								<Box flexDirection="column" key={step.stepId}>
									<Text
										color={colorForStatus(step.status)}
										backgroundColor={isSelected ? "gray" : undefined}
										bold={isSelected && focusedPane === "steps"}
										dimColor={isSelected && focusedPane !== "steps"}
									>
										{formatRowText(`${glyph} ${caret} ${step.name}`, STEP_ROW_WIDTH, ROW_PADDING_X)}
									</Text>
									{isExpanded ? (
										<Box flexDirection="column" paddingLeft={2}>
											{output.length === 0 ? (
												<Text dimColor>{step.error ?? "Waiting for output..."}</Text>
											) : (
												<>
													{output.slice(-maxDetailsLogLines).map((line, lineIndex) => (
														<Text key={`${step.stepId}-${lineIndex}`} dimColor>
															{line}
														</Text>
													))}
													{output.length > maxDetailsLogLines ? (
														<Text dimColor>… {output.length - maxDetailsLogLines} more line(s)</Text>
													) : null}
												</>
											)}
										</Box>
									) : null}
								</Box>
							);
						})
					)}
				</Box>
			</Box>
		</Box>
	);
}

export function formatRowText(value: string, width: number, paddingX: number): string {
	const innerWidth = Math.max(0, width - paddingX * 2);
	const clipped =
		value.length <= innerWidth
			? value
			: innerWidth > 1
				? `${value.slice(0, innerWidth - 1)}…`
				: value.slice(0, innerWidth);
	return `${" ".repeat(paddingX)}${clipped.padEnd(innerWidth, " ")}${" ".repeat(paddingX)}`;
}
