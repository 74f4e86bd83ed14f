import fs from "node:fs";
import path from "node:path";

/** Synchronous filesystem surface used by the artifact store and the flatten step. */
export interface FileSystem {
	exists(target: string): boolean;
	isDirectory(target: string): boolean;
	readdir(dir: string): string[];
	mkdir(dir: string): void;
	rename(from: string, to: string): void;
	remove(target: string): void;
	copyFile(from: string, to: string): void;
	readFile(target: string): string;
	writeFile(target: string, data: string): void;
}

export const nodeFileSystem: FileSystem = {
	exists: (target) => fs.existsSync(target),
	isDirectory: (target) => fs.existsSync(target) && fs.statSync(target).isDirectory(),
	readdir: (dir) => fs.readdirSync(dir).sort(),
	mkdir: (dir) => {
		fs.mkdirSync(dir, { recursive: true });
	},
	rename: (from, to) => {
		fs.mkdirSync(path.dirname(to), { recursive: true });
		fs.renameSync(from, to);
	},
	remove: (target) => {
		fs.rmSync(target, { recursive: true, force: true });
	},
	copyFile: (from, to) => {
		fs.mkdirSync(path.dirname(to), { recursive: true });
		fs.copyFileSync(from, to);
	},
	readFile: (target) => fs.readFileSync(target, "utf-8"),
	writeFile: (target, data) => {
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.writeFileSync(target, data);
	},
};

type MemoryEntry = { type: "directory" } | { type: "file"; data: string };

/** In-process filesystem for tests; paths are normalized with `path.resolve`. */
export class MemoryFileSystem implements FileSystem {
	private readonly entries = new Map<string, MemoryEntry>();

	constructor(files: Record<string, string> = {}) {
		for (const [target, data] of Object.entries(files)) {
			this.writeFile(target, data);
		}
	}

	exists(target: string): boolean {
		return this.entries.has(normalize(target));
	}

	isDirectory(target: string): boolean {
		return this.entries.get(normalize(target))?.type === "directory";
	}

	readdir(dir: string): string[] {
		const base = normalize(dir);
		if (!this.isDirectory(base)) {
			throw new Error(`ENOTDIR: not a directory, scandir '${dir}'`);
		}
		const names = new Set<string>();
		for (const key of this.entries.keys()) {
			if (key !== base && path.dirname(key) === base) {
				names.add(path.basename(key));
			}
		}
		return [...names].sort();
	}

	mkdir(dir: string): void {
		let current = normalize(dir);
		const missing: string[] = [];
		while (!this.entries.has(current)) {
			missing.push(current);
			const parent = path.dirname(current);
			if (parent === current) {
				break;
			}
			current = parent;
		}
		for (const target of missing) {
			this.entries.set(target, { type: "directory" });
		}
	}

	rename(from: string, to: string): void {
		const source = normalize(from);
		const target = normalize(to);
		if (!this.entries.has(source)) {
			throw new Error(`ENOENT: no such file or directory, rename '${from}'`);
		}
		this.mkdir(path.dirname(target));
		this.remove(target);
		const moved: [string, MemoryEntry][] = [];
		for (const [key, entry] of this.entries) {
			if (key === source || key.startsWith(`${source}${path.sep}`)) {
				moved.push([key, entry]);
			}
		}
		for (const [key, entry] of moved) {
			this.entries.delete(key);
			this.entries.set(`${target}${key.slice(source.length)}`, entry);
		}
	}

	remove(target: string): void {
		const base = normalize(target);
		for (const key of [...this.entries.keys()]) {
			if (key === base || key.startsWith(`${base}${path.sep}`)) {
				this.entries.delete(key);
			}
		}
	}

	copyFile(from: string, to: string): void {
		this.writeFile(to, this.readFile(from));
	}

	readFile(target: string): string {
		const entry = this.entries.get(normalize(target));
		if (entry?.type !== "file") {
			throw new Error(`ENOENT: no such file, open '${target}'`);
		}
		return entry.data;
	}

	writeFile(target: string, data: string): void {
		const file = normalize(target);
		this.mkdir(path.dirname(file));
		this.entries.set(file, { type: "file", data });
	}

	listFiles(): string[] {
		return [...this.entries.entries()]
			.filter(([, entry]) => entry.type === "file")
			.map(([key]) => key)
			.sort();
	}
}

export function listFilesRecursive(fileSystem: FileSystem, dir: string): string[] {
	if (!fileSystem.isDirectory(dir)) {
		return fileSystem.exists(dir) ? [dir] : [];
	}
	return fileSystem
		.readdir(dir)
		.flatMap((name) => listFilesRecursive(fileSystem, path.join(dir, name)));
}

function normalize(target: string): string {
	return path.resolve(target);
}
