import { ReleaseError, TagConflictError } from "../core/errors.js";
import { type CommandRunner, runCommand } from "../utils/process.js";

export interface TagWriter {
	createTag(tag: string): Promise<void>;
	pushTag(tag: string, remote: string): Promise<void>;
	readTag(tag: string): Promise<string | undefined>;
	headCommit(): Promise<string | undefined>;
}

/** Creates lightweight tags in the repository root and pushes them to a remote. */
export class GitTagger implements TagWriter {
	constructor(
		private readonly repoRoot: string,
		private readonly run: CommandRunner = runCommand,
	) {}

	async createTag(tag: string): Promise<void> {
		const result = await this.run("git", ["tag", tag], { cwd: this.repoRoot });
		if (result.exitCode === 0) {
			return;
		}
		const detail = result.stderr.trim();
		if (isTagConflict(detail)) {
			throw new TagConflictError(tag, detail);
		}
		throw new ReleaseError(`git tag ${tag} failed (exit ${result.exitCode}): ${detail}`);
	}

	async pushTag(tag: string, remote: string): Promise<void> {
		const result = await this.run("git", ["push", remote, `refs/tags/${tag}`], {
			cwd: this.repoRoot,
		});
		if (result.exitCode === 0) {
			return;
		}
		const detail = result.stderr.trim();
		if (isTagConflict(detail)) {
			throw new TagConflictError(tag, `remote ${remote} rejected the tag`);
		}
		throw new ReleaseError(`git push ${remote} ${tag} failed (exit ${result.exitCode}): ${detail}`);
	}

	async readTag(tag: string): Promise<string | undefined> {
		return this.revParse(["-q", "--verify", `refs/tags/${tag}^{commit}`]);
	}

	async headCommit(): Promise<string | undefined> {
		return this.revParse(["-q", "--verify", "HEAD"]);
	}

	private async revParse(args: string[]): Promise<string | undefined> {
		const result = await this.run("git", ["rev-parse", ...args], { cwd: this.repoRoot });
		const value = result.stdout.trim();
		return result.exitCode === 0 && value ? value : undefined;
	}
}

export function isTagConflict(stderr: string): boolean {
	return /already exists/i.test(stderr) || /\[rejected\]/.test(stderr);
}
