import { describe, expect, it } from "vitest";
import { MemoryFileSystem } from "../src/artifacts/file-system.js";
import { ReleaseError } from "../src/core/errors.js";
import { GitHubReleasePublisher, LocalReleasePublisher } from "../src/release/publisher.js";

const request = {
	tag: "v42",
	title: "Release v42",
	body: "",
	prerelease: false,
	assets: [{ path: "/ws/dist/app.whl", name: "app.whl" }],
};

describe("local release publisher", () => {
	it("records the release and copies its assets", async () => {
		const fileSystem = new MemoryFileSystem({ "/ws/dist/app.whl": "wheel" });
		const publisher = new LocalReleasePublisher("/state/releases", fileSystem);

		const record = await publisher.createRelease(request);

		expect(record).toMatchObject({
			provider: "local",
			tag: "v42",
			title: "Release v42",
			prerelease: false,
			assets: ["app.whl"],
		});
		expect(fileSystem.readFile("/state/releases/v42/app.whl")).toBe("wheel");
		expect(JSON.parse(fileSystem.readFile("/state/releases/v42.json"))).toMatchObject({ tag: "v42" });
	});

	it("refuses a second release for the same tag", async () => {
		const fileSystem = new MemoryFileSystem({ "/ws/dist/app.whl": "wheel" });
		const publisher = new LocalReleasePublisher("/state/releases", fileSystem);
		await publisher.createRelease(request);
		await expect(publisher.createRelease(request)).rejects.toThrowError("Release for v42 already exists");
	});
});

type RecordedRequest = { url: string; init?: RequestInit };

function fakeFetch(responses: Response[]): { fetch: typeof fetch; requests: RecordedRequest[] } {
	const requests: RecordedRequest[] = [];
	const impl: typeof fetch = async (input, init) => {
		requests.push({ url: String(input), init });
		const response = responses.shift();
		if (!response) {
			throw new Error("unexpected request");
		}
		return response;
	};
	return { fetch: impl, requests };
}

describe("github release publisher", () => {
	it("creates the release and uploads assets", async () => {
		const { fetch, requests } = fakeFetch([
			Response.json(
				{
					html_url: "https://github.example/acme/app/releases/tag/v42",
					upload_url: "https://uploads.example/repos/acme/app/releases/1/assets{?name,label}",
				},
				{ status: 201 },
			),
			new Response("{}", { status: 201 }),
		]);
		const publisher = new GitHubReleasePublisher({
			repository: "acme/app",
			token: "test-secret",
			apiUrl: "https://api.example/",
			fetch,
			readAsset: () => new Uint8Array([1, 2, 3]),
		});

		const record = await publisher.createRelease(request);

		expect(record.url).toBe("https://github.example/acme/app/releases/tag/v42");
		expect(requests.map((item) => item.url)).toEqual([
			"https://api.example/repos/acme/app/releases",
			"https://uploads.example/repos/acme/app/releases/1/assets?name=app.whl",
		]);
		expect(JSON.parse(String(requests[0]?.init?.body))).toEqual({
			tag_name: "v42",
			name: "Release v42",
			body: "",
			draft: false,
			prerelease: false,
		});
		expect(requests[0]?.init?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
	});

	it("surfaces rejected releases", async () => {
		const { fetch } = fakeFetch([new Response("Validation Failed", { status: 422 })]);
		const publisher = new GitHubReleasePublisher({ repository: "acme/app", token: "test-secret", fetch });
		await expect(publisher.createRelease({ ...request, assets: [] })).rejects.toThrowError(
			"GitHub rejected release v42 (422): Validation Failed",
		);
	});

	it("validates the repository and token", () => {
		expect(() => new GitHubReleasePublisher({ repository: "acme", token: "test-secret" })).toThrowError(
			ReleaseError,
		);
		expect(() => new GitHubReleasePublisher({ repository: "acme/app", token: "" })).toThrowError(
			"A token is required to publish GitHub releases",
		);
	});
});
