import color from "picocolors";
import { formatError } from "../lib/errors";

let verboseMode = false;

export function setVerboseMode(verbose: boolean) {
	verboseMode = verbose;
}

export type Logger = (message: string) => void;

/**
 * Progress line on stderr, shown only with --verbose.
 * stdout carries nothing but the changelog.
 */
export const logStep: Logger = (message) => {
	if (verboseMode) {
		process.stderr.write(`${color.dim(`› ${message}`)}\n`);
	}
};

export function highlightError(text: string): string {
	return color.bold(color.red(text));
}

/**
 * Print the error in bold red and exit with status 1
 */
export function bail(error: unknown): never {
	process.stderr.write(`\n${highlightError(formatError(error))}\n`);
	process.exit(1);
}
