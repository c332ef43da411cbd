import { Command } from "commander";
import { type ChangelogCliOptions, type ChangelogConfig, resolveConfig } from "./lib/config";
import { highlightError } from "./utils/ui";

export type ChangelogAction = (config: ChangelogConfig) => Promise<void>;

export function createProgram(action: ChangelogAction): Command {
	const program = new Command();

	program
		.name("sumit")
		.description("Generate a changelog from the git history")
		.version("1.0.0")
		.argument("<version>", "Version the changelog entry is written for")
		.allowExcessArguments(true)
		.option("-d, --dir <path>", "Set the working directory", ".")
		.option("--verbose", "Print progress to stderr")
		.configureOutput({
			outputError: (str, write) => write(highlightError(str)),
		})
		.action(async (version: string, options: ChangelogCliOptions) => {
			await action(resolveConfig(version, options));
		});

	return program;
}
