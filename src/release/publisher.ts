import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { type FileSystem, nodeFileSystem } from "../artifacts/file-system.js";
import { ReleaseError } from "../core/errors.js";
import { ensureWithinBase } from "../utils/path-safety.js";

export type ReleaseAsset = {
	path: string;
	name: string;
};

export type ReleaseRequest = {
	tag: string;
	title: string;
	body: string;
	prerelease: boolean;
	assets: ReleaseAsset[];
};

export type ReleaseRecord = {
	provider: string;
	tag: string;
	title: string;
	body: string;
	prerelease: boolean;
	assets: string[];
	createdAt: string;
	url?: string;
};

export interface ReleasePublisher {
	readonly id: string;
	createRelease(request: ReleaseRequest): Promise<ReleaseRecord>;
}

/** Keeps release records beside the run store; one record per tag. */
export class LocalReleasePublisher implements ReleasePublisher {
	readonly id = "local";

	constructor(
		private readonly releasesDir: string,
		private readonly fileSystem: FileSystem = nodeFileSystem,
	) {}

	async createRelease(request: ReleaseRequest): Promise<ReleaseRecord> {
		const recordPath = ensureWithinBase(this.releasesDir, `${request.tag}.json`, "release tag");
		if (this.fileSystem.exists(recordPath)) {
			throw new ReleaseError(`Release for ${request.tag} already exists`);
		}
		const assetsDir = ensureWithinBase(this.releasesDir, request.tag, "release tag");
		for (const asset of request.assets) {
			this.fileSystem.copyFile(asset.path, ensureWithinBase(assetsDir, asset.name, "release asset"));
		}
		const record: ReleaseRecord = {
			provider: this.id,
			tag: request.tag,
			title: request.title,
			body: request.body,
			prerelease: request.prerelease,
			assets: request.assets.map((asset) => asset.name),
			createdAt: new Date().toISOString(),
		};
		this.fileSystem.writeFile(recordPath, JSON.stringify(record, null, 2));
		return record;
	}
}

export type GitHubPublisherOptions = {
	repository: string;
	token: string;
	apiUrl?: string;
	fetch?: typeof fetch;
	readAsset?: (assetPath: string) => Uint8Array;
};

const CreatedReleaseSchema = z.object({
	html_url: z.string(),
	upload_url: z.string(),
});

/** Creates releases through the GitHub REST API and uploads assets to them. */
export class GitHubReleasePublisher implements ReleasePublisher {
	readonly id = "github";
	private readonly apiUrl: string;
	private readonly fetchImpl: typeof fetch;
	private readonly readAsset: (assetPath: string) => Uint8Array;

	constructor(private readonly options: GitHubPublisherOptions) {
		if (!/^[^/\s]+\/[^/\s]+$/.test(options.repository)) {
			throw new ReleaseError(`Invalid repository "${options.repository}" (expected owner/name)`);
		}
		if (!options.token) {
			throw new ReleaseError("A token is required to publish GitHub releases");
		}
		this.apiUrl = (options.apiUrl ?? "https://api.github.com").replace(/\/+$/, "");
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
		this.readAsset = options.readAsset ?? ((assetPath) => fs.readFileSync(assetPath));
	}

	async createRelease(request: ReleaseRequest): Promise<ReleaseRecord> {
		const response = await this.fetchImpl(`${this.apiUrl}/repos/${this.options.repository}/releases`, {
			method: "POST",
			headers: this.headers({ "Content-Type": "application/json" }),
			body: JSON.stringify({
				tag_name: request.tag,
				name: request.title,
				body: request.body,
				draft: false,
				prerelease: request.prerelease,
			}),
		});
		if (!response.ok) {
			const detail = await response.text();
			throw new ReleaseError(
				`GitHub rejected release ${request.tag} (${response.status}): ${detail.slice(0, 500)}`,
			);
		}
		const created = CreatedReleaseSchema.safeParse(await response.json());
		if (!created.success) {
			throw new ReleaseError(`Unexpected response creating release ${request.tag}`);
		}

		const uploadBase = created.data.upload_url.replace(/\{[^}]*\}$/, "");
		for (const asset of request.assets) {
			const upload = await this.fetchImpl(`${uploadBase}?name=${encodeURIComponent(asset.name)}`, {
				method: "POST",
				headers: this.headers({ "Content-Type": "application/octet-stream" }),
				body: Uint8Array.from(this.readAsset(asset.path)),
			});
			if (!upload.ok) {
				throw new ReleaseError(
					`Uploading ${path.basename(asset.path)} to release ${request.tag} failed (${upload.status})`,
				);
			}
		}

		return {
			provider: this.id,
			tag: request.tag,
			title: request.title,
			body: request.body,
			prerelease: request.prerelease,
			assets: request.assets.map((asset) => asset.name),
			createdAt: new Date().toISOString(),
			url: created.data.html_url,
		};
	}

	private headers(extra: Record<string, string>): Record<string, string> {
		return {
			Accept: "application/vnd.github+json",
			Authorization: `Bearer ${this.options.token}`,
			"X-GitHub-Api-Version": "2022-11-28",
			"User-Agent": "runlane",
			...extra,
		};
	}
}
