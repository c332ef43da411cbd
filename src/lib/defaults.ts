/**
 * Fixed values shared by the changelog pipeline
 */

/** The only remote consulted when building commit links */
export const ORIGIN_REMOTE = "origin";

export const SHORT_SHA_LENGTH = 7;

/** dayjs format string for the release date */
export const DATE_FORMAT = "YYYY-MM-DD";

/** Path segment between the repository web URL and a commit hash */
export const COMMIT_PATH = "/commits/";
