import type { ArtifactStore } from "../artifacts/artifact-store.js";
import type { FileSystem } from "../artifacts/file-system.js";
import type { ReleaseServices } from "../core/engine.js";
import type { ExecutionContext } from "../core/types.js";
import type { CommandRunner } from "../utils/process.js";

export type ActionRunContext = {
	inputs: Record<string, string>;
	env: Record<string, string>;
	workspace: string;
	cwd: string;
	repoRoot: string;
	runId: string;
	runNumber: number;
	execution: ExecutionContext;
	artifacts: ArtifactStore;
	fileSystem: FileSystem;
	release: ReleaseServices;
	runCommand: CommandRunner;
	signal?: AbortSignal;
	log: (line: string) => void;
	warn: (line: string) => void;
};

export type ActionResult = {
	outputs?: Record<string, string>;
};

export interface ActionHandler {
	readonly id: string;
	run(context: ActionRunContext): Promise<ActionResult>;
}

/** Built-in actions keyed by `owner/name`; refs are matched without their `@version`. */
export class ActionRegistry {
	private readonly handlers = new Map<string, ActionHandler>();

	register(handler: ActionHandler, aliases: string[] = []): this {
		for (const name of [handler.id, ...aliases]) {
			this.handlers.set(normalizeActionRef(name), handler);
		}
		return this;
	}

	alias(from: string, to: string): this {
		const handler = this.resolve(to);
		if (!handler) {
			throw new Error(`Cannot alias "${from}": unknown action "${to}"`);
		}
		this.handlers.set(normalizeActionRef(from), handler);
		return this;
	}

	resolve(uses: string): ActionHandler | undefined {
		return this.handlers.get(normalizeActionRef(uses));
	}

	list(): string[] {
		return [...this.handlers.keys()].sort();
	}
}

export function normalizeActionRef(uses: string): string {
	const at = uses.indexOf("@");
	const ref = at === -1 ? uses : uses.slice(0, at);
	return ref.trim().toLowerCase();
}

export function requireInput(context: ActionRunContext, name: string): string {
	const value = context.inputs[name]?.trim();
	if (!value) {
		throw new Error(`Input required and not supplied: ${name}`);
	}
	return value;
}
