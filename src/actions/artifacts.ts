import path from "node:path";
import { flattenDirectory } from "../artifacts/flatten.js";
import { parsePathInput, resolveUploadFiles } from "../artifacts/upload-paths.js";
import { ensureWithinBase } from "../utils/path-safety.js";
import { type ActionHandler, type ActionRunContext, requireInput } from "./registry.js";

type NoFilesBehavior = "warn" | "error" | "ignore";

export const uploadArtifactAction: ActionHandler = {
	id: "actions/upload-artifact",
	async run(context) {
		const name = context.inputs.name?.trim() || "artifact";
		const patterns = parsePathInput(requireInput(context, "path"));
		const behavior = parseNoFilesBehavior(context.inputs["if-no-files-found"]);
		const { files } = resolveUploadFiles(context.fileSystem, context.workspace, patterns);

		if (files.length === 0) {
			const message = `No files were found with the provided path: ${patterns.join(", ")}. No artifacts will be uploaded.`;
			if (behavior === "error") {
				throw new Error(message);
			}
			if (behavior === "warn") {
				context.warn(message);
			}
			return {};
		}

		const record = context.artifacts.upload(name, files, context.execution.id);
		context.log(`Uploaded artifact "${record.name}" (${record.files.length} file(s))`);
		return { outputs: { "artifact-id": record.name } };
	},
};

export const downloadArtifactAction: ActionHandler = {
	id: "actions/download-artifact",
	async run(context) {
		const target = resolveTarget(context, context.inputs.path);
		const name = context.inputs.name?.trim();

		if (name) {
			const record = context.artifacts.download(name, target);
			context.log(`Downloaded artifact "${record.name}" to ${target}`);
			return { outputs: { "download-path": target } };
		}

		const mergeMultiple = context.inputs["merge-multiple"]?.trim().toLowerCase() === "true";
		for (const record of context.artifacts.list()) {
			const artifactDir = ensureWithinBase(target, record.name, "artifact name");
			context.artifacts.download(record.name, artifactDir);
			if (mergeMultiple) {
				flattenDirectory(context.fileSystem, target, record.name);
			}
			context.log(`Downloaded artifact "${record.name}"`);
		}
		return { outputs: { "download-path": target } };
	},
};

export const flattenAction: ActionHandler = {
	id: "runlane/flatten",
	async run(context) {
		const root = resolveTarget(context, context.inputs.path);
		const folder = requireInput(context, "folder");
		const plan = flattenDirectory(context.fileSystem, root, folder);
		if (plan.length === 0) {
			context.log(`Nothing to flatten: ${folder} is not a directory under ${root}`);
		} else {
			context.log(`Flattened ${folder} into ${root} (${plan.length} operation(s))`);
		}
		return { outputs: { changed: String(plan.length > 0) } };
	},
};

function resolveTarget(context: ActionRunContext, input: string | undefined): string {
	const value = input?.trim();
	if (!value) {
		return context.workspace;
	}
	return path.isAbsolute(value) ? value : path.resolve(context.workspace, value);
}

function parseNoFilesBehavior(value: string | undefined): NoFilesBehavior {
	const normalized = value?.trim().toLowerCase() || "warn";
	if (normalized === "warn" || normalized === "error" || normalized === "ignore") {
		return normalized;
	}
	throw new Error(`Invalid if-no-files-found value: ${value}`);
}
