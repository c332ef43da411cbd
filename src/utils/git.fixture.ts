import { execFileSync } from "child_process";
import { mkdtemp, realpath, rm } from "node:fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { git } from "./git";

// Commits must not depend on the user's global identity or signing setup
const COMMIT_FLAGS = '-c user.name="Test" -c user.email=test@example.com -c commit.gpgsign=false';

export function hasGit(): boolean {
	try {
		execFileSync("git", ["--version"], { stdio: "ignore" });
		return true;
	} catch {
		return false;
	}
}

/**
 * Fresh directory under the system temp dir, symlinks resolved
 */
export async function createTempDir(): Promise<string> {
	return realpath(await mkdtemp(join(tmpdir(), "sumit-")));
}

export async function createTempRepo(options: { bare?: boolean } = {}): Promise<string> {
	const dir = await createTempDir();
	await git(options.bare ? "init -q --bare" : "init -q", { cwd: dir });
	return dir;
}

/**
 * Empty commit whose message is the paragraphs joined by blank lines.
 * Returns the new HEAD hash.
 */
export async function commitEmpty(dir: string, ...paragraphs: string[]): Promise<string> {
	const messages = paragraphs.map((paragraph) => `-m "${paragraph}"`).join(" ");
	await git(`${COMMIT_FLAGS} commit -q --allow-empty ${messages}`, { cwd: dir });
	return git("rev-parse HEAD", { cwd: dir });
}

export async function removeTempDir(dir: string): Promise<void> {
	await rm(dir, { recursive: true, force: true });
}
