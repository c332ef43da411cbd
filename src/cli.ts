#!/usr/bin/env node

import { changelogCommand } from "./commands/changelog";
import { createProgram } from "./program";
import { bail, setVerboseMode } from "./utils/ui";

const program = createProgram(async (config) => {
	setVerboseMode(config.verbose);
	const changelog = await changelogCommand(config);
	process.stdout.write(changelog);
});

program.parseAsync().catch(bail);
