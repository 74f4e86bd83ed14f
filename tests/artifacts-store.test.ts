import { describe, expect, it } from "vitest";
import { FileArtifactStore, validateArtifactName } from "../src/artifacts/artifact-store.js";
import { MemoryFileSystem } from "../src/artifacts/file-system.js";
import { ArtifactConflictError, ArtifactNotFoundError } from "../src/core/errors.js";

function createStore(): { store: FileArtifactStore; fileSystem: MemoryFileSystem } {
	const fileSystem = new MemoryFileSystem({
		"/ws/dist/app.whl": "wheel",
		"/ws/dist/docs/index.html": "<html>",
	});
	return { store: new FileArtifactStore("run-1", "/run/artifacts", fileSystem), fileSystem };
}

describe("artifact store", () => {
	it("uploads files once and downloads them into another directory", () => {
		const { store, fileSystem } = createStore();
		const record = store.upload(
			"wheels",
			[
				{ source: "/ws/dist/app.whl", relativePath: "app.whl" },
				{ source: "/ws/dist/docs/index.html", relativePath: "docs/index.html" },
			],
			"build (linux)",
		);

		expect(record).toMatchObject({ name: "wheels", owner: "build (linux)", files: ["app.whl", "docs/index.html"] });
		expect(store.has("wheels")).toBe(true);

		store.download("wheels", "/other/in");
		expect(fileSystem.readFile("/other/in/app.whl")).toBe("wheel");
		expect(fileSystem.readFile("/other/in/docs/index.html")).toBe("<html>");
	});

	it("rejects a second upload under the same name", () => {
		const { store } = createStore();
		store.upload("wheels", [{ source: "/ws/dist/app.whl", relativePath: "app.whl" }], "a");
		expect(() =>
			store.upload("wheels", [{ source: "/ws/dist/app.whl", relativePath: "app.whl" }], "b"),
		).toThrowError(ArtifactConflictError);
	});

	it("fails to download unknown artifacts", () => {
		const { store } = createStore();
		expect(() => store.download("missing", "/other")).toThrowError(ArtifactNotFoundError);
		expect(() => store.download("missing", "/other")).toThrowError("Artifact not found for this run: missing");
	});

	it("writes a manifest of the run's artifacts", () => {
		const { store, fileSystem } = createStore();
		store.upload("b-docs", [{ source: "/ws/dist/docs/index.html", relativePath: "index.html" }], "docs");
		store.upload("a-wheels", [{ source: "/ws/dist/app.whl", relativePath: "app.whl" }], "build");

		const manifest: unknown = JSON.parse(fileSystem.readFile("/run/artifacts/manifest.json"));
		expect(manifest).toMatchObject({
			runId: "run-1",
			artifacts: [{ name: "a-wheels" }, { name: "b-docs" }],
		});
		expect(store.list().map((item) => item.name)).toEqual(["a-wheels", "b-docs"]);
	});

	it("releases the name when an upload fails partway", () => {
		const { store, fileSystem } = createStore();
		expect(() =>
			store.upload(
				"dist",
				[
					{ source: "/ws/dist/app.whl", relativePath: "app.whl" },
					{ source: "/ws/dist/missing.whl", relativePath: "missing.whl" },
				],
				"build",
			),
		).toThrowError();

		expect(store.has("dist")).toBe(false);
		expect(fileSystem.exists("/run/artifacts/files/dist")).toBe(false);
		expect(() => store.download("dist", "/other")).toThrowError(ArtifactNotFoundError);

		store.upload("dist", [{ source: "/ws/dist/app.whl", relativePath: "app.whl" }], "build");
		store.download("dist", "/other");
		expect(fileSystem.readFile("/other/app.whl")).toBe("wheel");
	});

	it("validates artifact names", () => {
		expect(() => validateArtifactName("dist/app")).toThrowError('Invalid artifact name: "dist/app"');
		expect(() => validateArtifactName("  ")).toThrowError();
		expect(() => validateArtifactName("..")).toThrowError();
		expect(() => validateArtifactName("python-wheels")).not.toThrow();
	});

	it("keeps files inside the artifact directory", () => {
		const { store } = createStore();
		expect(() =>
			store.upload("escape", [{ source: "/ws/dist/app.whl", relativePath: "../../outside.whl" }], "a"),
		).toThrowError("Invalid artifact file: path escapes base directory");
	});
});
