import type { ActionHandler, ActionResult, ActionRunContext } from "./registry.js";

type ToolSpec = {
	tool: string;
	versionInput: string;
	candidates: string[][];
};

const VERSION_PATTERN = /(\d+\.\d+(?:\.\d+)?)/;

/**
 * Interpreters are not installed by runlane: the host's tool is located, its version
 * reported, and a mismatch with the requested version is a warning.
 */
export function createSetupToolAction(id: string, definition: ToolSpec): ActionHandler {
	return {
		id,
		async run(context: ActionRunContext): Promise<ActionResult> {
			const requested = context.inputs[definition.versionInput]?.trim();
			for (const [command, ...args] of definition.candidates) {
				const result = await context.runCommand(command, args, {
					cwd: context.cwd,
					env: { ...process.env, ...context.env },
					signal: context.signal,
				});
				if (result.exitCode !== 0) {
					continue;
				}
				const version = VERSION_PATTERN.exec(`${result.stdout}\n${result.stderr}`)?.[1] ?? "unknown";
				context.log(`Using ${definition.tool} ${version} (${command})`);
				if (requested && !matchesRequestedVersion(version, requested)) {
					context.warn(`Requested ${definition.tool} ${requested} but the host provides ${version}`);
				}
				return { outputs: { [definition.versionInput]: version } };
			}
			throw new Error(`${definition.tool} is not available on this host`);
		},
	};
}

export function matchesRequestedVersion(actual: string, requested: string): boolean {
	const wanted = requested.replace(/^v/, "").replace(/\.x$/, "");
	return actual === wanted || actual.startsWith(`${wanted}.`);
}

export const setupPythonAction = createSetupToolAction("actions/setup-python", {
	tool: "python",
	versionInput: "python-version",
	candidates: [
		["python3", "--version"],
		["python", "--version"],
	],
});

export const setupNodeAction = createSetupToolAction("actions/setup-node", {
	tool: "node",
	versionInput: "node-version",
	candidates: [["node", "--version"]],
});

export const setupGoAction = createSetupToolAction("actions/setup-go", {
	tool: "go",
	versionInput: "go-version",
	candidates: [["go", "version"]],
});
