import path from "node:path";
import type { FileSystem } from "./file-system.js";

/** Relative posix path → entry kind, captured below one root directory. */
export type FsSnapshot = ReadonlyMap<string, "file" | "directory">;

export type FlattenOperation =
	| { op: "move"; from: string; to: string }
	| { op: "remove"; path: string };

export type FlattenPlan = FlattenOperation[];

const STAGING_SUFFIX = ".flatten-staging";

export function snapshotDirectory(fileSystem: FileSystem, root: string): FsSnapshot {
	const snapshot = new Map<string, "file" | "directory">();
	const walk = (relative: string): void => {
		const absolute = relative ? path.join(root, ...relative.split("/")) : root;
		for (const name of fileSystem.readdir(absolute)) {
			const child = relative ? `${relative}/${name}` : name;
			if (fileSystem.isDirectory(path.join(absolute, name))) {
				snapshot.set(child, "directory");
				walk(child);
			} else {
				snapshot.set(child, "file");
			}
		}
	};
	if (fileSystem.isDirectory(root)) {
		walk("");
	}
	return snapshot;
}

/**
 * Plans moving the contents of `folder` up one level and removing the folder.
 * Directories that already exist at the top level are merged; files are replaced.
 * A snapshot without `folder` produces an empty plan.
 */
export function planFlatten(snapshot: FsSnapshot, folder: string): FlattenPlan {
	if (snapshot.get(folder) !== "directory") {
		return [];
	}

	const state = new Map(snapshot);
	const plan: FlattenPlan = [];
	let source = folder;

	if (childrenOf(state, folder).includes(folder)) {
		const staging = uniqueName(state, `${folder}${STAGING_SUFFIX}`);
		plan.push({ op: "move", from: folder, to: staging });
		renameInState(state, folder, staging);
		source = staging;
	}

	mergeInto(state, plan, source, "");
	plan.push({ op: "remove", path: source });
	removeFromState(state, source);
	return plan;
}

export function applyFlatten(fileSystem: FileSystem, root: string, plan: FlattenPlan): void {
	const resolve = (relative: string): string => path.join(root, ...relative.split("/"));
	for (const operation of plan) {
		if (operation.op === "move") {
			fileSystem.rename(resolve(operation.from), resolve(operation.to));
		} else {
			fileSystem.remove(resolve(operation.path));
		}
	}
}

export function flattenDirectory(fileSystem: FileSystem, root: string, folder: string): FlattenPlan {
	const plan = planFlatten(snapshotDirectory(fileSystem, root), folder);
	applyFlatten(fileSystem, root, plan);
	return plan;
}

function mergeInto(
	state: Map<string, "file" | "directory">,
	plan: FlattenPlan,
	sourceDir: string,
	targetDir: string,
): void {
	for (const name of childrenOf(state, sourceDir)) {
		const from = `${sourceDir}/${name}`;
		const to = targetDir ? `${targetDir}/${name}` : name;
		const sourceKind = state.get(from);
		const targetKind = state.get(to);
		if (sourceKind === "directory" && targetKind === "directory") {
			mergeInto(state, plan, from, to);
			plan.push({ op: "remove", path: from });
			removeFromState(state, from);
			continue;
		}
		if (targetKind) {
			plan.push({ op: "remove", path: to });
			removeFromState(state, to);
		}
		plan.push({ op: "move", from, to });
		renameInState(state, from, to);
	}
}

function childrenOf(state: ReadonlyMap<string, "file" | "directory">, dir: string): string[] {
	const prefix = dir ? `${dir}/` : "";
	const names: string[] = [];
	for (const key of state.keys()) {
		if (key.startsWith(prefix) && !key.slice(prefix.length).includes("/")) {
			names.push(key.slice(prefix.length));
		}
	}
	return names.sort();
}

function renameInState(state: Map<string, "file" | "directory">, from: string, to: string): void {
	for (const [key, kind] of [...state.entries()]) {
		if (key === from || key.startsWith(`${from}/`)) {
			state.delete(key);
			state.set(`${to}${key.slice(from.length)}`, kind);
		}
	}
}

function removeFromState(state: Map<string, "file" | "directory">, target: string): void {
	for (const key of [...state.keys()]) {
		if (key === target || key.startsWith(`${target}/`)) {
			state.delete(key);
		}
	}
}

function uniqueName(state: ReadonlyMap<string, "file" | "directory">, base: string): string {
	let candidate = base;
	let counter = 1;
	while (state.has(candidate)) {
		counter += 1;
		candidate = `${base}-${counter}`;
	}
	return candidate;
}
