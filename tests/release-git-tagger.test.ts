import { describe, expect, it } from "vitest";
import { ReleaseError, TagConflictError } from "../src/core/errors.js";
import { GitTagger, isTagConflict } from "../src/release/git-tagger.js";
import { createFakeRunner } from "./support/fakes.js";

describe("git tagger", () => {
	it("creates and pushes tags in the repository root", async () => {
		const { run, calls } = createFakeRunner();
		const tagger = new GitTagger("/repo", run);

		await tagger.createTag("v42");
		await tagger.pushTag("v42", "origin");

		expect(calls.map((call) => [call.command, ...call.args])).toEqual([
			["git", "tag", "v42"],
			["git", "push", "origin", "refs/tags/v42"],
		]);
		expect(calls.every((call) => call.options.cwd === "/repo")).toBe(true);
	});

	it("reports an existing tag as a conflict", async () => {
		const { run } = createFakeRunner(() => ({
			exitCode: 128,
			stderr: "fatal: tag 'v42' already exists\n",
		}));
		const tagger = new GitTagger("/repo", run);

		await expect(tagger.createTag("v42")).rejects.toThrowError(TagConflictError);
		await expect(tagger.createTag("v42")).rejects.toThrowError(
			"Tag v42 already exists: fatal: tag 'v42' already exists",
		);
	});

	it("reports rejected pushes as conflicts and other failures as release errors", async () => {
		const rejected = new GitTagger(
			"/repo",
			createFakeRunner(() => ({ exitCode: 1, stderr: " ! [rejected]        v42 -> v42 (already exists)" })).run,
		);
		await expect(rejected.pushTag("v42", "origin")).rejects.toThrowError(
			"Tag v42 already exists: remote origin rejected the tag",
		);

		const offline = new GitTagger(
			"/repo",
			createFakeRunner(() => ({ exitCode: 128, stderr: "fatal: unable to access remote" })).run,
		);
		await expect(offline.pushTag("v42", "origin")).rejects.toThrowError(ReleaseError);
		await expect(offline.pushTag("v42", "origin")).rejects.toThrowError(
			"git push origin v42 failed (exit 128): fatal: unable to access remote",
		);
	});

	it("reads tag and HEAD commits", async () => {
		const { run, calls } = createFakeRunner((_command, args) =>
			args.includes("HEAD") ? { stdout: "abc123\n" } : { exitCode: 1 },
		);
		const tagger = new GitTagger("/repo", run);

		expect(await tagger.headCommit()).toBe("abc123");
		expect(await tagger.readTag("v1")).toBeUndefined();
		expect(calls[1]?.args).toEqual(["rev-parse", "-q", "--verify", "refs/tags/v1^{commit}"]);
	});

	it("recognizes conflict messages", () => {
		expect(isTagConflict("fatal: tag 'v1' already exists")).toBe(true);
		expect(isTagConflict("! [rejected] v1 -> v1")).toBe(true);
		expect(isTagConflict("fatal: not a git repository")).toBe(false);
	});
});
