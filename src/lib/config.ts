/**
 * Run configuration for sumit
 *
 * Built once from the command line and passed explicitly to the command.
 */

export interface ChangelogConfig {
	/** Version heading for the entry, used verbatim */
	version: string;
	/** Directory holding the git repository */
	dir: string;
	/** Write progress diagnostics to stderr */
	verbose: boolean;
}

export interface ChangelogCliOptions {
	dir?: string;
	verbose?: boolean;
}

export const DEFAULT_CONFIG: Omit<ChangelogConfig, "version"> = {
	dir: ".",
	verbose: false,
};

export function resolveConfig(
	version: string,
	options: ChangelogCliOptions = {},
): ChangelogConfig {
	return {
		version,
		// an explicitly empty --dir means the current directory
		dir: options.dir || DEFAULT_CONFIG.dir,
		verbose: options.verbose ?? DEFAULT_CONFIG.verbose,
	};
}
