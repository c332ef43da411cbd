import type { Change, Release } from "./release";

function formatChange(change: Change): string {
	const link = change.url ? `[${change.sha}](${change.url})` : `[${change.sha}]`;
	return `\n- ${change.title} ${link}`;
}

/**
 * Render a release as a markdown changelog fragment.
 *
 * Titles are written verbatim, markdown included.
 */
export function renderRelease(release: Release): string {
	const header = `\n## [${release.version}] - ${release.date}\n`;
	return `${header}${release.changes.map(formatChange).join("")}\n`;
}
