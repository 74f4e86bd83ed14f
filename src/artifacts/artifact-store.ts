import path from "node:path";
import { ArtifactConflictError, ArtifactNotFoundError } from "../core/errors.js";
import { ensureWithinBase } from "../utils/path-safety.js";
import { type FileSystem, nodeFileSystem } from "./file-system.js";

export type ArtifactFile = {
	source: string;
	relativePath: string;
};

export type ArtifactRecord = {
	name: string;
	owner: string;
	files: string[];
	createdAt: string;
};

/**
 * Named outputs of one run. Each name can be written once; later jobs read them back
 * by name.
 */
export interface ArtifactStore {
	readonly runId: string;
	upload(name: string, files: ArtifactFile[], owner: string): ArtifactRecord;
	download(name: string, targetDir: string): ArtifactRecord;
	has(name: string): boolean;
	list(): ArtifactRecord[];
}

const INVALID_NAME = /[":<>|*?\\/\r\n]/;
const MANIFEST_FILE = "manifest.json";

export class FileArtifactStore implements ArtifactStore {
	private readonly records = new Map<string, ArtifactRecord>();

	constructor(
		readonly runId: string,
		private readonly baseDir: string,
		private readonly fileSystem: FileSystem = nodeFileSystem,
	) {
		this.fileSystem.mkdir(this.baseDir);
	}

	upload(name: string, files: ArtifactFile[], owner: string): ArtifactRecord {
		validateArtifactName(name);
		const artifactDir = this.artifactDir(name);
		if (this.records.has(name) || this.fileSystem.exists(artifactDir)) {
			throw new ArtifactConflictError(name);
		}

		this.fileSystem.mkdir(artifactDir);
		try {
			for (const file of files) {
				const target = ensureWithinBase(artifactDir, file.relativePath, "artifact file");
				this.fileSystem.copyFile(file.source, target);
			}
		} catch (error) {
			// A partial upload must not claim the name.
			this.fileSystem.remove(artifactDir);
			throw error;
		}

		const record: ArtifactRecord = {
			name,
			owner,
			files: files.map((file) => file.relativePath),
			createdAt: new Date().toISOString(),
		};
		this.records.set(name, record);
		this.writeManifest();
		return record;
	}

	download(name: string, targetDir: string): ArtifactRecord {
		const record = this.records.get(name);
		if (!record) {
			throw new ArtifactNotFoundError(name);
		}
		const artifactDir = this.artifactDir(name);
		this.fileSystem.mkdir(targetDir);
		for (const relativePath of record.files) {
			const target = ensureWithinBase(targetDir, relativePath, "artifact file");
			this.fileSystem.copyFile(path.join(artifactDir, ...relativePath.split("/")), target);
		}
		return record;
	}

	has(name: string): boolean {
		return this.records.has(name);
	}

	list(): ArtifactRecord[] {
		return [...this.records.values()].sort((a, b) => a.name.localeCompare(b.name));
	}

	private artifactDir(name: string): string {
		return ensureWithinBase(path.join(this.baseDir, "files"), name, "artifact name");
	}

	private writeManifest(): void {
		this.fileSystem.writeFile(
			path.join(this.baseDir, MANIFEST_FILE),
			JSON.stringify({ runId: this.runId, artifacts: this.list() }, null, 2),
		);
	}
}

export function validateArtifactName(name: string): void {
	if (name.trim().length === 0 || INVALID_NAME.test(name) || name === "." || name === "..") {
		throw new Error(`Invalid artifact name: ${JSON.stringify(name)}`);
	}
}
