// Main exports for programmatic usage

export { changelogCommand, type ChangelogDeps } from "./commands/changelog";
export { createProgram } from "./program";
export * from "./lib/config";
export * from "./lib/errors";
export * from "./lib/release";
export * from "./lib/remote";
export * from "./lib/repository";
export * from "./lib/template";
