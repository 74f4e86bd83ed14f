import path from "node:path";
import { TagConflictError } from "../core/errors.js";
import { resolveUploadFiles } from "../artifacts/upload-paths.js";
import type { ReleaseAsset } from "../release/publisher.js";
import { formatReleaseTitle, parseBooleanInput, publishRelease } from "../release/release.js";
import { type ActionHandler, type ActionRunContext, requireInput } from "./registry.js";

export const RELEASE_ACTION_ALIASES = ["elgohr/github-release-action", "softprops/action-gh-release"];

/**
 * Tags the repository and records a release. A tag that already exists is a conflict,
 * unless it points at HEAD: an earlier step of the same run created it.
 */
export const releaseAction: ActionHandler = {
	id: "runlane/release",
	async run(context) {
		const tag = context.inputs.tag?.trim() || context.inputs.tag_name?.trim() || requireInput(context, "tag");
		const title = context.inputs.title?.trim() || context.inputs.name?.trim() || formatReleaseTitle(tag);
		const prerelease = parseBooleanInput(context.inputs.prerelease, false);
		const body = context.inputs.body ?? "";
		let createTag = parseBooleanInput(context.inputs["create-tag"], true);

		if (createTag) {
			const existing = await context.release.tagger.readTag(tag);
			if (existing) {
				const head = await context.release.tagger.headCommit();
				if (existing !== head) {
					throw new TagConflictError(tag, `points at ${existing.slice(0, 12)}, not HEAD`);
				}
				context.log(`Tag ${tag} already points at HEAD`);
				createTag = false;
			}
		}

		const publisher = context.release.createPublisher({
			token: context.inputs.token?.trim() || context.env.GITHUB_TOKEN,
		});
		const record = await publishRelease({
			request: { tag, title, body, prerelease, assets: collectAssets(context) },
			tagger: context.release.tagger,
			publisher,
			createTag,
			push: context.release.push,
			remote: context.release.remote,
			log: context.log,
		});

		return {
			outputs: {
				tag: record.tag,
				title: record.title,
				...(record.url ? { url: record.url } : {}),
			},
		};
	},
};

function collectAssets(context: ActionRunContext): ReleaseAsset[] {
	const patterns = (context.inputs.files ?? "")
		.split(/[\r\n,]+/)
		.map((item) => item.trim())
		.filter(Boolean);
	if (patterns.length === 0) {
		return [];
	}
	const { files } = resolveUploadFiles(context.fileSystem, context.workspace, patterns);
	return files.map((file) => ({ path: file.source, name: path.basename(file.source) }));
}
