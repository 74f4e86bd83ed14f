import type { ActionRunContext } from "../../src/actions/registry.js";
import { FileArtifactStore } from "../../src/artifacts/artifact-store.js";
import { MemoryFileSystem } from "../../src/artifacts/file-system.js";
import type { ReleaseServices } from "../../src/core/engine.js";
import type { TagWriter } from "../../src/release/git-tagger.js";
import type { ReleasePublisher, ReleaseRecord, ReleaseRequest } from "../../src/release/publisher.js";
import type { CommandOptions, CommandResult, CommandRunner } from "../../src/utils/process.js";

export const HEAD_COMMIT = "0123456789abcdef0123456789abcdef01234567";

export class FakeTagger implements TagWriter {
	readonly tags = new Map<string, string>();
	readonly pushed: { tag: string; remote: string }[] = [];
	createError?: Error;

	async createTag(tag: string): Promise<void> {
		if (this.createError) {
			throw this.createError;
		}
		this.tags.set(tag, HEAD_COMMIT);
	}

	async pushTag(tag: string, remote: string): Promise<void> {
		this.pushed.push({ tag, remote });
	}

	async readTag(tag: string): Promise<string | undefined> {
		return this.tags.get(tag);
	}

	async headCommit(): Promise<string | undefined> {
		return HEAD_COMMIT;
	}
}

export class RecordingPublisher implements ReleasePublisher {
	readonly id = "recording";
	readonly requests: ReleaseRequest[] = [];

	async createRelease(request: ReleaseRequest): Promise<ReleaseRecord> {
		this.requests.push(request);
		return {
			provider: this.id,
			tag: request.tag,
			title: request.title,
			body: request.body,
			prerelease: request.prerelease,
			assets: request.assets.map((asset) => asset.name),
			createdAt: "2024-01-01T00:00:00.000Z",
		};
	}
}

export type RecordedCommand = { command: string; args: string[]; options: CommandOptions };

/** Records every call and answers with the first matching handler, or exit 0. */
export function createFakeRunner(
	handler: (command: string, args: string[], options: CommandOptions) => Partial<CommandResult> | undefined = () =>
		undefined,
): { run: CommandRunner; calls: RecordedCommand[] } {
	const calls: RecordedCommand[] = [];
	const run: CommandRunner = async (command, args, options) => {
		calls.push({ command, args, options });
		const result = handler(command, args, options);
		return { exitCode: 0, stdout: "", stderr: "", ...result };
	};
	return { run, calls };
}

export function createReleaseServices(
	tagger: TagWriter = new FakeTagger(),
	publisher: ReleasePublisher = new RecordingPublisher(),
	push = false,
): ReleaseServices {
	return { tagger, createPublisher: () => publisher, remote: "origin", push };
}

export type ActionContextOverrides = Partial<ActionRunContext> & { fileSystem?: MemoryFileSystem };

export function createActionContext(overrides: ActionContextOverrides = {}): ActionRunContext & {
	logs: string[];
	warnings: string[];
} {
	const fileSystem = overrides.fileSystem ?? new MemoryFileSystem();
	const logs: string[] = [];
	const warnings: string[] = [];
	const { run } = createFakeRunner();
	return {
		inputs: {},
		env: {},
		workspace: "/ws",
		cwd: "/ws",
		repoRoot: "/repo",
		runId: "run-1",
		runNumber: 42,
		execution: {
			id: "build (linux)",
			jobId: "build",
			name: "Build (linux)",
			matrix: { os: "linux" },
			runsOn: "ubuntu-latest",
			runnerOs: "Linux",
		},
		artifacts: new FileArtifactStore("run-1", "/run/artifacts", fileSystem),
		release: createReleaseServices(),
		runCommand: run,
		log: (line) => logs.push(line),
		warn: (line) => warnings.push(line),
		...overrides,
		fileSystem,
		logs,
		warnings,
	};
}
