import { exec, spawn } from "child_process";
import { promisify } from "util";

const execAsync = promisify(exec);

export interface GitOptions {
  /** Directory git runs in (defaults to the process cwd) */
  cwd?: string;
}

export interface CommitRecord {
  hash: string;
  message: string;
}

// One record per commit: full hash, NUL, raw message, record separator.
const FIELD_SEPARATOR = "\x00";
const RECORD_SEPARATOR = "\x1e";
const LOG_FORMAT = "--format=%H%x00%B%x1e";

export async function git(args: string, options: GitOptions = {}): Promise<string> {
  try {
    const { stdout } = await execAsync(`git ${args}`, { cwd: options.cwd });
    return stdout.trim();
  } catch (error) {
    throw new Error(`Git command failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Top of the repository `cwd` belongs to: the work tree root, or the git
 * directory itself for a bare repository. Null outside any repository.
 */
export async function getRepositoryRoot(cwd?: string): Promise<string | null> {
  try {
    if ((await git("rev-parse --is-bare-repository", { cwd })) === "true") {
      return await git("rev-parse --absolute-git-dir", { cwd });
    }
    return await git("rev-parse --show-toplevel", { cwd });
  } catch {
    return null;
  }
}

/**
 * First configured URL of a remote, or null when no such remote exists
 */
export async function getRemoteUrl(name: string, cwd?: string): Promise<string | null> {
  try {
    const url = await git(`remote get-url ${name}`, { cwd });
    return url || null;
  } catch {
    return null;
  }
}

/**
 * Full hash of the commit HEAD points at. Throws on an unborn or missing HEAD.
 */
export async function getHeadHash(cwd?: string): Promise<string> {
  return git('rev-parse --verify "HEAD^{commit}"', { cwd });
}

/**
 * Incremental parser for `git log` output written with LOG_FORMAT.
 * Chunks may split a record anywhere; complete records come out in order.
 */
export class LogRecordParser {
  private buffer = "";

  push(chunk: string): CommitRecord[] {
    this.buffer += chunk;
    const records: CommitRecord[] = [];

    let end = this.buffer.indexOf(RECORD_SEPARATOR);
    while (end !== -1) {
      const record = this.buffer.slice(0, end);
      this.buffer = this.buffer.slice(end + RECORD_SEPARATOR.length);
      records.push(parseRecord(record));
      end = this.buffer.indexOf(RECORD_SEPARATOR);
    }

    return records;
  }

  /**
   * Signal end of input. Anything but the newline git writes after the
   * last record means the output was cut short.
   */
  end(): void {
    const rest = this.buffer.trim();
    this.buffer = "";
    if (rest.length > 0) {
      throw new Error(`Truncated git log record: ${rest.slice(0, 40)}`);
    }
  }
}

function parseRecord(record: string): CommitRecord {
  // git terminates every formatted entry with a newline, which lands in
  // front of the next record
  const text = record.startsWith("\n") ? record.slice(1) : record;
  const split = text.indexOf(FIELD_SEPARATOR);
  if (split === -1) {
    throw new Error(`Malformed git log record: ${text.slice(0, 40)}`);
  }
  return {
    hash: text.slice(0, split),
    message: text.slice(split + FIELD_SEPARATOR.length),
  };
}

/**
 * Stream the commits reachable from `from` in git's default order.
 * The returned generator is single-pass; breaking out of it stops git.
 */
export async function* streamLog(from: string, cwd?: string): AsyncGenerator<CommitRecord> {
  const child = spawn("git", ["log", LOG_FORMAT, from], { cwd });

  const exited = new Promise<number | null>((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (code) => resolve(code));
  });
  // a spawn error may arrive while stdout is still being read
  exited.catch(() => undefined);

  let stderr = "";
  child.stderr.setEncoding("utf8");
  child.stderr.on("data", (chunk: string) => {
    stderr += chunk;
  });

  const parser = new LogRecordParser();
  let finished = false;

  try {
    child.stdout.setEncoding("utf8");
    for await (const chunk of child.stdout) {
      yield* parser.push(String(chunk));
    }
    parser.end();

    const code = await exited;
    finished = true;
    if (code !== 0) {
      throw new Error(`Git command failed: git log exited with ${code}: ${stderr.trim()}`);
    }
  } finally {
    if (!finished) {
      child.kill();
      // exit status is irrelevant once iteration stopped early or already failed
      await exited.catch(() => null);
    }
  }
}
