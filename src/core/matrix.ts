import { MatrixError } from "./errors.js";
import type {
	ExecutionContext,
	Job,
	MatrixAssignment,
	MatrixStrategy,
	MatrixValue,
	RunnerOs,
} from "./types.js";

/**
 * Expands a matrix strategy into concrete assignments.
 *
 * The cross product keeps declaration order with the first axis outermost, so
 * `{ os: [a, b], node: [1, 2] }` yields a/1, a/2, b/1, b/2. `exclude` entries drop
 * every combination they match; `include` entries extend the combinations whose
 * original axis values agree with them, or are appended when none agree.
 */
export function expandMatrix(jobId: string, strategy: MatrixStrategy): MatrixAssignment[] {
	const axisNames = strategy.axes.map(([name]) => name);
	let combinations: MatrixAssignment[] = [];

	if (strategy.axes.length > 0) {
		combinations = [{}];
		for (const [axis, values] of strategy.axes) {
			if (values.length === 0) {
				throw new MatrixError(jobId, `matrix axis "${axis}" has no values`);
			}
			const next: MatrixAssignment[] = [];
			for (const combination of combinations) {
				for (const value of values) {
					next.push({ ...combination, [axis]: value });
				}
			}
			combinations = next;
		}
	}

	combinations = combinations.filter(
		(combination) => !strategy.exclude.some((entry) => matchesEntry(combination, entry, Object.keys(entry))),
	);

	const appended: MatrixAssignment[] = [];
	for (const entry of strategy.include) {
		const originalKeys = Object.keys(entry).filter((key) => axisNames.includes(key));
		let extended = false;
		combinations = combinations.map((combination) => {
			if (!matchesEntry(combination, entry, originalKeys)) {
				return combination;
			}
			extended = true;
			return { ...combination, ...entry };
		});
		if (!extended) {
			appended.push({ ...entry });
		}
	}

	const result = [...combinations, ...appended];
	if (result.length === 0) {
		throw new MatrixError(jobId, "matrix produced no combinations");
	}
	return result;
}

export function createExecutionContexts(
	job: Job,
	assignments: MatrixAssignment[] | null,
	renderRunsOn: (matrix: MatrixAssignment | null) => string | undefined = () => job.runsOn,
): ExecutionContext[] {
	if (!assignments) {
		const runsOn = renderRunsOn(null);
		return [
			{
				id: job.id,
				jobId: job.id,
				name: job.name,
				matrix: null,
				runsOn,
				runnerOs: resolveRunnerOs(runsOn),
			},
		];
	}

	const seen = new Map<string, number>();
	return assignments.map((matrix) => {
		const label = Object.values(matrix).map(formatMatrixValue).join(", ");
		const baseId = `${job.id} (${label})`;
		const count = (seen.get(baseId) ?? 0) + 1;
		seen.set(baseId, count);
		const runsOn = renderRunsOn(matrix);
		return {
			id: count === 1 ? baseId : `${baseId} #${count}`,
			jobId: job.id,
			name: `${job.name} (${label})`,
			matrix,
			runsOn,
			runnerOs: resolveRunnerOs(runsOn),
		};
	});
}

export function filterAssignments(
	assignments: MatrixAssignment[],
	overrides: string[] | undefined,
): MatrixAssignment[] {
	const filters = parseMatrixOverrides(overrides);
	if (filters.length === 0) {
		return assignments;
	}
	return assignments.filter((assignment) =>
		filters.every(
			([key, value]) => !(key in assignment) || formatMatrixValue(assignment[key]) === value,
		),
	);
}

export function parseMatrixOverrides(overrides: string[] | undefined): [string, string][] {
	return (overrides ?? [])
		.map((item): [string, string] | null => {
			const separator = item.indexOf(":");
			if (separator <= 0) {
				return null;
			}
			return [item.slice(0, separator).trim(), item.slice(separator + 1).trim()];
		})
		.filter((item): item is [string, string] => item !== null);
}

export function resolveRunnerOs(
	runsOn: string | undefined,
	platform: NodeJS.Platform = process.platform,
): RunnerOs {
	const label = runsOn?.toLowerCase() ?? "";
	if (label.includes("windows")) {
		return "Windows";
	}
	if (label.includes("macos") || label.includes("mac-")) {
		return "macOS";
	}
	if (label.includes("ubuntu") || label.includes("linux")) {
		return "Linux";
	}
	switch (platform) {
		case "win32":
			return "Windows";
		case "darwin":
			return "macOS";
		default:
			return "Linux";
	}
}

export function formatMatrixValue(value: MatrixValue): string {
	if (value === null) {
		return "null";
	}
	return typeof value === "object" ? JSON.stringify(value) : String(value);
}

function matchesEntry(combination: MatrixAssignment, entry: MatrixAssignment, keys: string[]): boolean {
	return keys.every(
		(key) => key in combination && formatMatrixValue(combination[key]) === formatMatrixValue(entry[key]),
	);
}
