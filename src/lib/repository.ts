/**
 * Read-only access to a local git repository.
 *
 * Everything goes through the git binary; nothing here mutates the repository.
 */

import { realpath } from "node:fs/promises";
import { resolve } from "node:path";
import {
	HeadResolutionError,
	LogTraversalError,
	RepositoryNotFoundError,
} from "./errors";
import {
	type CommitRecord,
	getHeadHash,
	getRemoteUrl,
	getRepositoryRoot,
	streamLog,
} from "../utils/git";

export type { CommitRecord } from "../utils/git";

export interface Repository {
	/** Absolute path the repository was opened at */
	readonly dir: string;
	/** First URL of the named remote, or null if it is not configured */
	remoteUrl(name: string): Promise<string | null>;
	/** Full hash of the commit HEAD points at */
	head(): Promise<string>;
	/** Commits reachable from `from`, newest first. Single pass. */
	log(from: string): AsyncIterable<CommitRecord>;
}

export type OpenRepository = (dir: string) => Promise<Repository>;

export class GitRepository implements Repository {
	constructor(readonly dir: string) {}

	async remoteUrl(name: string): Promise<string | null> {
		return getRemoteUrl(name, this.dir);
	}

	async head(): Promise<string> {
		try {
			return await getHeadHash(this.dir);
		} catch (error) {
			throw new HeadResolutionError(error);
		}
	}

	async *log(from: string): AsyncGenerator<CommitRecord> {
		try {
			yield* streamLog(from, this.dir);
		} catch (error) {
			throw new LogTraversalError(error);
		}
	}
}

/**
 * Open the repository whose top level is `dir`. Parent directories are not
 * searched: a subfolder of a work tree is not a repository.
 */
export async function openRepository(dir: string): Promise<Repository> {
	let path: string;
	try {
		path = await realpath(resolve(dir));
	} catch (error) {
		throw new RepositoryNotFoundError(dir, error);
	}

	const root = await getRepositoryRoot(path);
	if (root !== path) {
		throw new RepositoryNotFoundError(dir);
	}
	return new GitRepository(path);
}

/**
 * Open the repository at `dir` and stream its history from HEAD
 */
export async function readCommits(
	dir: string,
	open: OpenRepository = openRepository,
): Promise<AsyncIterable<CommitRecord>> {
	const repo = await open(dir);
	const head = await repo.head();
	return repo.log(head);
}
