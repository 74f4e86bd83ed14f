import type { ReleasePublisher, ReleaseRecord, ReleaseRequest } from "./publisher.js";
import type { TagWriter } from "./git-tagger.js";

export type PublishReleaseInput = {
	request: ReleaseRequest;
	tagger: TagWriter;
	publisher: ReleasePublisher;
	createTag: boolean;
	push: boolean;
	remote: string;
	log?: (line: string) => void;
};

/**
 * Tags, pushes, then records the release. A failed tag stops the release: nothing is
 * retried, so a rerun cannot produce a second release record for the same tag.
 */
export async function publishRelease(input: PublishReleaseInput): Promise<ReleaseRecord> {
	const { request, tagger, publisher, log } = input;
	if (input.createTag) {
		log?.(`Creating tag ${request.tag}`);
		await tagger.createTag(request.tag);
		if (input.push) {
			log?.(`Pushing tag ${request.tag} to ${input.remote}`);
			await tagger.pushTag(request.tag, input.remote);
		}
	}
	log?.(`Creating ${publisher.id} release "${request.title}" for ${request.tag}`);
	const record = await publisher.createRelease(request);
	if (record.url) {
		log?.(`Release published: ${record.url}`);
	}
	return record;
}

export function formatReleaseTag(runNumber: number, prefix = "v"): string {
	return `${prefix}${runNumber}`;
}

export function formatReleaseTitle(tag: string): string {
	return `Release ${tag}`;
}

export function parseBooleanInput(value: string | undefined, fallback: boolean): boolean {
	if (value === undefined || value.trim() === "") {
		return fallback;
	}
	return ["true", "yes", "1", "on"].includes(value.trim().toLowerCase());
}
