import dayjs from "dayjs";
import { COMMIT_PATH, DATE_FORMAT, SHORT_SHA_LENGTH } from "./defaults";
import type { CommitRecord } from "./repository";

export interface Change {
	sha: string;
	title: string;
	/** Empty when commit links are disabled */
	url: string;
}

export interface Release {
	version: string;
	/** YYYY-MM-DD, local time */
	date: string;
	changes: Change[];
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface AssembleReleaseOptions {
	version: string;
	commits: Iterable<CommitRecord> | AsyncIterable<CommitRecord>;
	/** Web URL of the repository; commit links are omitted without it */
	remoteBaseUrl?: string | null;
	clock?: Clock;
}

export function commitTitle(message: string): string {
	const newline = message.indexOf("\n");
	return newline === -1 ? message : message.slice(0, newline);
}

export function toChange(commit: CommitRecord, remoteBaseUrl?: string | null): Change {
	return {
		sha: commit.hash.slice(0, SHORT_SHA_LENGTH),
		title: commitTitle(commit.message),
		url: remoteBaseUrl ? `${remoteBaseUrl}${COMMIT_PATH}${commit.hash}` : "",
	};
}

export function formatReleaseDate(date: Date): string {
	return dayjs(date).format(DATE_FORMAT);
}

/**
 * Build the release record, consuming the commit sequence to the end.
 * The date is read from the clock once, before the first commit.
 */
export async function assembleRelease(options: AssembleReleaseOptions): Promise<Release> {
	const { version, commits, remoteBaseUrl, clock = systemClock } = options;
	const release: Release = {
		version,
		date: formatReleaseDate(clock()),
		changes: [],
	};

	for await (const commit of commits) {
		release.changes.push(toChange(commit, remoteBaseUrl));
	}

	return release;
}
