import path from "node:path";
import { globToRegExp, hasGlobMagic } from "../utils/glob.js";
import type { ArtifactFile } from "./artifact-store.js";
import { type FileSystem, listFilesRecursive } from "./file-system.js";

export type UploadSearchResult = {
	rootDir: string;
	files: ArtifactFile[];
};

export function parsePathInput(input: string): string[] {
	return input
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter(Boolean);
}

/**
 * Resolves upload patterns against the workspace. Files keep their path relative to the
 * least common ancestor of every search root, so `dist/*` stores `dist/a.whl` as `a.whl`.
 */
export function resolveUploadFiles(
	fileSystem: FileSystem,
	workspace: string,
	patterns: string[],
): UploadSearchResult {
	const includes = patterns.filter((pattern) => !pattern.startsWith("!"));
	const excludes = patterns
		.filter((pattern) => pattern.startsWith("!"))
		.map((pattern) => toMatcher(workspace, pattern.slice(1)));

	const searchRoots: string[] = [];
	const matched = new Set<string>();

	for (const pattern of includes) {
		const absolute = path.resolve(workspace, pattern);
		if (!hasGlobMagic(pattern)) {
			if (!fileSystem.exists(absolute)) {
				continue;
			}
			const isDir = fileSystem.isDirectory(absolute);
			searchRoots.push(isDir ? absolute : path.dirname(absolute));
			listFilesRecursive(fileSystem, absolute).forEach((file) => matched.add(file));
			continue;
		}

		const root = literalPrefix(absolute);
		searchRoots.push(root);
		const matcher = toMatcher(workspace, pattern);
		for (const file of listFilesRecursive(fileSystem, root)) {
			if (matcher(file) || ancestorsWithin(root, file).some(matcher)) {
				matched.add(file);
			}
		}
	}

	const files = [...matched]
		.filter((file) => !excludes.some((exclude) => exclude(file) || ancestorsWithin(workspace, file).some(exclude)))
		.sort();
	const rootDir = leastCommonAncestor(searchRoots) ?? workspace;

	return {
		rootDir,
		files: files.map((file) => ({
			source: file,
			relativePath: toPosix(path.relative(rootDir, file)),
		})),
	};
}

function toMatcher(workspace: string, pattern: string): (file: string) => boolean {
	const regex = globToRegExp(toPosix(path.resolve(workspace, pattern)));
	return (file) => regex.test(toPosix(file));
}

function literalPrefix(absolutePattern: string): string {
	const segments = absolutePattern.split(path.sep);
	const literal: string[] = [];
	for (const segment of segments) {
		if (hasGlobMagic(segment)) {
			break;
		}
		literal.push(segment);
	}
	return literal.join(path.sep) || path.sep;
}

function ancestorsWithin(root: string, file: string): string[] {
	const ancestors: string[] = [];
	let current = path.dirname(file);
	while (current.startsWith(root) && current !== root) {
		ancestors.push(current);
		current = path.dirname(current);
	}
	return ancestors;
}

export function leastCommonAncestor(paths: string[]): string | undefined {
	if (paths.length === 0) {
		return undefined;
	}
	const split = paths.map((item) => path.resolve(item).split(path.sep));
	const common: string[] = [];
	for (let index = 0; index < split[0].length; index += 1) {
		const segment = split[0][index];
		if (split.every((parts) => parts[index] === segment)) {
			common.push(segment);
		} else {
			break;
		}
	}
	return common.join(path.sep) || path.sep;
}

function toPosix(value: string): string {
	return value.split(path.sep).join("/");
}
