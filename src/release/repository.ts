import path from "node:path";
import { type CommandRunner, runCommand } from "../utils/process.js";

const REMOTE_PATTERNS = [
	/^git@[^:]+:([^/]+\/[^/]+?)(?:\.git)?$/,
	/^(?:https?|ssh|git):\/\/(?:[^@/]+@)?[^/]+\/([^/]+\/[^/]+?)(?:\.git)?\/?$/,
];

export function parseRepositoryFromRemote(remoteUrl: string): string | undefined {
	const trimmed = remoteUrl.trim();
	for (const pattern of REMOTE_PATTERNS) {
		const match = pattern.exec(trimmed);
		if (match?.[1]) {
			return match[1];
		}
	}
	return undefined;
}

export async function resolveRepository(
	repoRoot: string,
	remote: string,
	configured?: string,
	run: CommandRunner = runCommand,
): Promise<string> {
	if (configured) {
		return configured;
	}
	const result = await run("git", ["remote", "get-url", remote], { cwd: repoRoot });
	const parsed = result.exitCode === 0 ? parseRepositoryFromRemote(result.stdout) : undefined;
	return parsed ?? `local/${path.basename(path.resolve(repoRoot))}`;
}
