import { InvalidRemoteUrlError, UnsupportedRemoteUrlError } from "./errors";

const HTTPS_PREFIX = "https://";
const SSH_PREFIX = "git@";

function stripGitSuffix(name: string): string {
	return name.endsWith(".git") ? name.slice(0, -".git".length) : name;
}

/**
 * Turn a remote fetch URL into the web URL of the repository.
 *
 * Accepts `https://host/workspace/repo[.git]` and `git@host:workspace/repo[.git]`,
 * and always answers `https://host/workspace/repo`. Nothing is fetched.
 */
export function normalizeRemoteUrl(url: string): string {
	if (url.startsWith(HTTPS_PREFIX)) {
		const parts = url.slice(HTTPS_PREFIX.length).split("/");
		if (parts.length < 3) {
			throw new InvalidRemoteUrlError(url);
		}
		const [host, workspace, repo] = parts;
		return `${HTTPS_PREFIX}${host}/${workspace}/${stripGitSuffix(repo)}`;
	}

	if (url.startsWith(SSH_PREFIX)) {
		// git@bitbucket.org:username/repo.git
		const rest = url.slice(SSH_PREFIX.length);
		const colon = rest.indexOf(":");
		if (colon === -1) {
			throw new InvalidRemoteUrlError(url);
		}
		const host = rest.slice(0, colon);
		const pathParts = rest.slice(colon + 1).split("/");
		if (pathParts.length < 2) {
			throw new InvalidRemoteUrlError(url);
		}
		const [workspace, repo] = pathParts;
		return `${HTTPS_PREFIX}${host}/${workspace}/${stripGitSuffix(repo)}`;
	}

	throw new UnsupportedRemoteUrlError(url);
}
