import type { ChangelogConfig } from "../lib/config";
import { ORIGIN_REMOTE } from "../lib/defaults";
import { assembleRelease, type Clock, systemClock } from "../lib/release";
import { normalizeRemoteUrl } from "../lib/remote";
import { type OpenRepository, openRepository } from "../lib/repository";
import { renderRelease } from "../lib/template";
import { type Logger, logStep } from "../utils/ui";

export interface ChangelogDeps {
	openRepository?: OpenRepository;
	clock?: Clock;
	log?: Logger;
}

/**
 * Changelog command
 * - Opens the repository and looks up the origin remote for commit links
 * - Walks the history from HEAD
 * - Returns the rendered entry; nothing is printed until all commits are read
 */
export async function changelogCommand(
	config: ChangelogConfig,
	deps: ChangelogDeps = {},
): Promise<string> {
	const {
		openRepository: open = openRepository,
		clock = systemClock,
		log = logStep,
	} = deps;

	const repo = await open(config.dir);
	log(`Opened repository at ${repo.dir}`);

	// A missing origin only disables links; a malformed one is fatal
	const remote = await repo.remoteUrl(ORIGIN_REMOTE);
	const remoteBaseUrl = remote === null ? null : normalizeRemoteUrl(remote);
	if (remoteBaseUrl) {
		log(`Linking commits to ${remoteBaseUrl}`);
	} else {
		log(`No ${ORIGIN_REMOTE} remote, commit links disabled`);
	}

	const head = await repo.head();
	log(`HEAD is ${head}`);

	const release = await assembleRelease({
		version: config.version,
		commits: repo.log(head),
		remoteBaseUrl,
		clock,
	});
	log(`Collected ${release.changes.length} commits`);

	return renderRelease(release);
}
