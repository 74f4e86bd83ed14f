import { describe, expect, it } from "vitest";
import { MemoryFileSystem } from "../src/artifacts/file-system.js";
import { leastCommonAncestor, parsePathInput, resolveUploadFiles } from "../src/artifacts/upload-paths.js";

const fileSystem = new MemoryFileSystem({
	"/ws/README.md": "readme",
	"/ws/dist/a.whl": "a",
	"/ws/dist/b.tar.gz": "b",
	"/ws/dist/sub/c.whl": "c",
});

describe("upload paths", () => {
	it("splits the path input into trimmed lines", () => {
		expect(parsePathInput("dist/*.whl\n\n  docs/ \r\n!dist/*.tmp")).toEqual(["dist/*.whl", "docs/", "!dist/*.tmp"]);
	});

	it("keeps paths relative to the wildcard's literal prefix", () => {
		const result = resolveUploadFiles(fileSystem, "/ws", ["dist/*.whl"]);
		expect(result.rootDir).toBe("/ws/dist");
		expect(result.files).toEqual([{ source: "/ws/dist/a.whl", relativePath: "a.whl" }]);
	});

	it("matches nested files with **", () => {
		const result = resolveUploadFiles(fileSystem, "/ws", ["dist/**/*.whl"]);
		expect(result.files.map((file) => file.relativePath)).toEqual(["a.whl", "sub/c.whl"]);
	});

	it("uploads whole directories and applies excludes", () => {
		const result = resolveUploadFiles(fileSystem, "/ws", ["dist", "!dist/*.tar.gz"]);
		expect(result.rootDir).toBe("/ws/dist");
		expect(result.files.map((file) => file.relativePath)).toEqual(["a.whl", "sub/c.whl"]);
	});

	it("uses the least common ancestor of several search roots", () => {
		const result = resolveUploadFiles(fileSystem, "/ws", ["README.md", "dist/a.whl"]);
		expect(result.rootDir).toBe("/ws");
		expect(result.files.map((file) => file.relativePath)).toEqual(["README.md", "dist/a.whl"]);
	});

	it("returns no files when nothing matches", () => {
		expect(resolveUploadFiles(fileSystem, "/ws", ["nothing/*.zip"]).files).toEqual([]);
		expect(resolveUploadFiles(fileSystem, "/ws", ["missing.txt"]).files).toEqual([]);
	});

	it("computes the least common ancestor", () => {
		expect(leastCommonAncestor(["/a/b/c", "/a/b/d"])).toBe("/a/b");
		expect(leastCommonAncestor(["/a/b/c"])).toBe("/a/b/c");
		expect(leastCommonAncestor([])).toBeUndefined();
	});
});
