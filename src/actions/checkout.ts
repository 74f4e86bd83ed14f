import path from "node:path";
import type { FileSystem } from "../artifacts/file-system.js";
import type { ActionHandler, ActionResult, ActionRunContext } from "./registry.js";

const SKIPPED_ENTRIES = new Set([".git", ".runlane"]);

/**
 * Copies the working tree into the context workspace. Inside a git repository the file
 * list comes from `git ls-files` (tracked plus untracked, minus ignored files).
 */
export const checkoutAction: ActionHandler = {
	id: "actions/checkout",
	async run(context: ActionRunContext): Promise<ActionResult> {
		const target = context.inputs.path
			? path.resolve(context.workspace, context.inputs.path)
			: context.workspace;
		const files = await listCheckoutFiles(context);
		for (const relative of files) {
			context.fileSystem.copyFile(path.join(context.repoRoot, relative), path.join(target, relative));
		}
		context.log(`Checked out ${files.length} file(s) into ${target}`);
		return {};
	},
};

async function listCheckoutFiles(context: ActionRunContext): Promise<string[]> {
	const result = await context.runCommand(
		"git",
		["ls-files", "--cached", "--others", "--exclude-standard", "-z"],
		{ cwd: context.repoRoot, signal: context.signal },
	);
	if (result.exitCode === 0) {
		return result.stdout
			.split("\0")
			.filter(Boolean)
			.filter((file) => !SKIPPED_ENTRIES.has(file.split("/")[0]))
			.filter((file) => context.fileSystem.exists(path.join(context.repoRoot, file)))
			.filter((file) => !context.fileSystem.isDirectory(path.join(context.repoRoot, file)));
	}
	context.warn("Not a git repository; copying the working tree as is");
	return walkTree(context.fileSystem, context.repoRoot, "");
}

function walkTree(fileSystem: FileSystem, root: string, relative: string): string[] {
	const dir = relative ? path.join(root, relative) : root;
	return fileSystem.readdir(dir).flatMap((name) => {
		if (!relative && SKIPPED_ENTRIES.has(name)) {
			return [];
		}
		const child = relative ? `${relative}/${name}` : name;
		return fileSystem.isDirectory(path.join(root, child)) ? walkTree(fileSystem, root, child) : [child];
	});
}
