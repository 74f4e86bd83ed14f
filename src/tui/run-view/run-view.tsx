import { Box, Text, useApp, useInput, useStdout } from "ink";
import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import type {
	EngineAdapter,
	EngineContext,
	EngineRunResult,
	EngineRuntimeEvent,
} from "../../core/engine.js";
import { errorMessage } from "../../core/errors.js";
import type { RunPlan, RunRecord, RunStatus, Workflow } from "../../core/types.js";
import { reduceRunEvent } from "../../store/run-store.js";
import { DetailsPane } from "./components/details-pane.js";
import { SummaryPane } from "./components/summary-pane.js";
import { DEFAULT_VIEW, LOG_TAIL_LINES, SPINNER_FRAMES, SPINNER_INTERVAL_MS } from "./constants.js";
import { appendStepOutput, type OutputBuffer, readStepLines } from "./output-buffer.js";
import { buildDiagramLines, type DiagramLine } from "./render/diagram.js";
import { formatHelpText, type RunViewFocus, type RunViewMode } from "./utils/help.js";
import { colorForStatus, formatStatusText, STATUS_LABELS } from "./utils/status.js";

export type RunViewProps = {
	adapter: EngineAdapter;
	context: EngineContext;
	plan: RunPlan;
	workflow: Workflow;
	onComplete: (result: EngineRunResult) => void;
	onCancel: () => void;
};

/** Output written outside any step, such as setup and teardown messages. */
export const CONTEXT_OUTPUT_STEP = "__context__";

const DETAILS_VIEW_RESERVED_ROWS = 18;

export function RunView({
	adapter,
	context,
	plan,
	workflow,
	onComplete,
	onCancel,
}: RunViewProps): JSX.Element {
	const { exit } = useApp();
	const { stdout } = useStdout();
	const [runRecord, setRunRecord] = useState<RunRecord | null>(null);
	const [statusText, setStatusText] = useState<RunStatus>("pending");
	const [runError, setRunError] = useState<string | null>(null);
	const [viewMode, setViewMode] = useState<RunViewMode>(DEFAULT_VIEW);
	const [focusedPane, setFocusedPane] = useState<RunViewFocus>("contexts");
	const [selectedContextIndex, setSelectedContextIndex] = useState(0);
	const [selectedStepIndex, setSelectedStepIndex] = useState(0);
	const [expandedSteps, setExpandedSteps] = useState<Record<string, boolean>>({});
	const [outputs, setOutputs] = useState<OutputBuffer>({});
	const [spinnerIndex, setSpinnerIndex] = useState(0);
	const [quitPromptVisible, setQuitPromptVisible] = useState(false);
	const [terminalHeight, setTerminalHeight] = useState<number>(stdout.rows ?? 40);
	const started = useRef(false);
	const runningSteps = useRef(new Map<string, string>());

	const handleEvent = useCallback(
		(event: EngineRuntimeEvent) => {
			context.onEvent?.(event);
			if (event.type === "step-started") {
				runningSteps.current.set(event.contextId, event.stepId);
			} else if (event.type === "step-finished" || event.type === "context-finished") {
				runningSteps.current.delete(event.contextId);
			}
			setRunRecord((prev) => reduceRunEvent(prev, event));
		},
		[context],
	);

	const handleOutput = useCallback((chunk: string, _source: "stdout" | "stderr", contextId?: string) => {
		if (!contextId) {
			return;
		}
		const stepId = runningSteps.current.get(contextId) ?? CONTEXT_OUTPUT_STEP;
		setOutputs((prev) => appendStepOutput(prev, contextId, stepId, chunk));
	}, []);

	useEffect(() => {
		if (started.current) {
			return;
		}
		started.current = true;
		setStatusText("running");
		adapter
			.run(plan, { ...context, onEvent: handleEvent, onOutput: handleOutput })
			.then((result) => {
				setStatusText(result.status);
				onComplete(result);
			})
			.catch((error: unknown) => {
				setStatusText("failed");
				setRunError(errorMessage(error));
				onComplete({ exitCode: 1, status: "failed", logsPath: context.logsDir });
			});
	}, [adapter, context, handleEvent, handleOutput, onComplete, plan]);

	useEffect(() => {
		const interval = setInterval(() => {
			setSpinnerIndex((prev) => (prev + 1) % SPINNER_FRAMES.length);
		}, SPINNER_INTERVAL_MS);
		return () => clearInterval(interval);
	}, []);

	useEffect(() => {
		const handleResize = (): void => {
			setTerminalHeight(stdout.rows ?? 40);
		};
		stdout.on("resize", handleResize);
		return () => {
			stdout.off("resize", handleResize);
		};
	}, [stdout]);

	const contexts = useMemo(() => runRecord?.jobs ?? [], [runRecord]);
	const selectedContext = contexts[selectedContextIndex];
	const selectedSteps = useMemo(() => selectedContext?.steps ?? [], [selectedContext]);

	useEffect(() => {
		setSelectedStepIndex((prev) => (selectedSteps.length === 0 ? 0 : Math.min(prev, selectedSteps.length - 1)));
	}, [selectedSteps.length]);

	const diagramLines = useMemo<DiagramLine[]>(
		() => buildDiagramLines(workflow, contexts, spinnerIndex),
		[contexts, spinnerIndex, workflow],
	);
	const blockedReasons = useMemo(
		() =>
			contexts
				.filter((item) => item.status === "pending" && item.reason)
				.map((item) => `${item.contextId}: ${item.reason}`),
		[contexts],
	);
	const maxDetailsLogLines = Math.max(2, Math.min(LOG_TAIL_LINES, terminalHeight - DETAILS_VIEW_RESERVED_ROWS));
	const readOutput = useCallback(
		(contextId: string, stepId: string) => readStepLines(outputs, contextId, stepId),
		[outputs],
	);

	useInput((input, key) => {
		if (quitPromptVisible) {
			if (input === "y" || input === "Y") {
				setQuitPromptVisible(false);
				onCancel();
				return;
			}
			if (input === "n" || input === "N" || key.return || key.escape) {
				setQuitPromptVisible(false);
			}
			return;
		}
		if (input === "q" || (key.ctrl && input === "c")) {
			if (statusText === "running") {
				setQuitPromptVisible(true);
			} else {
				exit();
			}
			return;
		}
		if (key.tab || input === "\t") {
			setViewMode((prev) => (prev === "summary" ? "details" : "summary"));
			return;
		}
		if (input === "s") {
			setViewMode("summary");
			return;
		}
		if (input === "d") {
			setViewMode("details");
			return;
		}
		if (viewMode !== "details") {
			return;
		}
		if (key.leftArrow) {
			setFocusedPane("contexts");
			return;
		}
		if (key.rightArrow) {
			setFocusedPane("steps");
			return;
		}
		if (key.upArrow) {
			if (focusedPane === "contexts") {
				setSelectedContextIndex((prev) => Math.max(0, prev - 1));
				setSelectedStepIndex(0);
			} else {
				setSelectedStepIndex((prev) => Math.max(0, prev - 1));
			}
			return;
		}
		if (key.downArrow) {
			if (focusedPane === "contexts") {
				setSelectedContextIndex((prev) => Math.max(0, Math.min(contexts.length - 1, prev + 1)));
				setSelectedStepIndex(0);
			} else {
				setSelectedStepIndex((prev) => Math.max(0, Math.min(selectedSteps.length - 1, prev + 1)));
			}
			return;
		}
		if ((input === " " || key.return) && focusedPane === "steps") {
			const step = selectedSteps[selectedStepIndex];
			if (step) {
				setExpandedSteps((prev) => (prev[step.stepId] ? {} : { [step.stepId]: true }));
			}
		}
	});

	return (
		<Box flexDirection="column" padding={1}>
			<Box flexDirection="column" marginBottom={1}>
				<Text>
					{workflow.name} · {plan.event.name} · #{plan.runNumber} · {plan.runId}
				</Text>
				<Text color={colorForStatus(statusText)} dimColor={statusText === "pending"}>
					{formatStatusText(statusText, spinnerIndex)} {STATUS_LABELS[statusText]}
				</Text>
			</Box>

			{viewMode === "summary" ? (
				<SummaryPane diagramLines={diagramLines} blockedReasons={blockedReasons} />
			) : (
				<DetailsPane
					focusedPane={focusedPane}
					contexts={contexts}
					selectedContextIndex={selectedContextIndex}
					selectedStepIndex={selectedStepIndex}
					expandedSteps={expandedSteps}
					readOutput={readOutput}
					maxDetailsLogLines={maxDetailsLogLines}
					spinnerIndex={spinnerIndex}
				/>
			)}

			<Box marginTop={1}>
				<Text dimColor={!quitPromptVisible} color={quitPromptVisible ? "yellow" : undefined}>
					{quitPromptVisible ? "Cancel the run? " : ""}
					{formatHelpText({ viewMode, focusedPane, quitPromptVisible, statusText })}
				</Text>
			</Box>
			{statusText !== "running" && statusText !== "pending" ? (
				<Box marginTop={1}>
					<Text dimColor>Run finished. Press q to exit.</Text>
				</Box>
			) : null}
			{runError ? (
				<Box marginTop={1}>
					<Text color="red">{runError}</Text>
				</Box>
			) : null}
		</Box>
	);
}
