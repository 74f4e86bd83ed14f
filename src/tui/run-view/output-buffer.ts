import { MAX_BUFFERED_LINES } from "./constants.js";

const ESCAPE = String.fromCharCode(27);
const ANSI_PATTERN = new RegExp(`${ESCAPE}\\[[0-9;]*m`, "g");

export type StepOutput = {
	lines: string[];
	partial: string;
};

/** Output lines per step, keyed `contextId` → `stepId`. */
export type OutputBuffer = Record<string, Record<string, StepOutput>>;

/**
 * Appends a chunk to the step that is currently running in a context. Incomplete lines
 * are held back until their newline arrives.
 */
export function appendStepOutput(
	buffer: OutputBuffer,
	contextId: string,
	stepId: string,
	chunk: string,
): OutputBuffer {
	const contextOutput = buffer[contextId] ?? {};
	const current = contextOutput[stepId] ?? { lines: [], partial: "" };
	const text = `${current.partial}${stripAnsi(chunk).replace(/\r/g, "")}`;
	const parts = text.split("\n");
	const partial = parts.pop() ?? "";
	const lines = [...current.lines, ...parts].slice(-MAX_BUFFERED_LINES);
	return {
		...buffer,
		[contextId]: { ...contextOutput, [stepId]: { lines, partial } },
	};
}

export function readStepLines(buffer: OutputBuffer, contextId: string, stepId: string): string[] {
	const output = buffer[contextId]?.[stepId];
	if (!output) {
		return [];
	}
	return output.partial ? [...output.lines, output.partial] : output.lines;
}

function stripAnsi(input: string): string {
	return input.replace(ANSI_PATTERN, "");
}
