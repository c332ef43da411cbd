import { describe, it, expect, vi } from "vitest";
import { changelogCommand } from "./changelog";
import { resolveConfig } from "../lib/config";
import {
	HeadResolutionError,
	InvalidRemoteUrlError,
	LogTraversalError,
	RepositoryNotFoundError,
	UnsupportedRemoteUrlError,
} from "../lib/errors";
import type { CommitRecord, Repository } from "../lib/repository";

const HASH = "abcdef1234567890abcdef1234567890abcdef12";

const fixedClock = () => new Date(2024, 2, 5, 12, 0);

interface FakeRepoOptions {
	remotes?: Record<string, string>;
	head?: string | null;
	commits?: CommitRecord[];
	failAfter?: number;
}

/** In-memory repository, newest commit first */
function fakeRepository(options: FakeRepoOptions = {}): Repository {
	const { remotes = {}, head = HASH, commits = [], failAfter } = options;
	return {
		dir: "/work/widget",
		async remoteUrl(name) {
			return remotes[name] ?? null;
		},
		async head() {
			if (head === null) throw new HeadResolutionError(new Error("unborn HEAD"));
			return head;
		},
		async *log() {
			for (const [index, commit] of commits.entries()) {
				if (index === failAfter) throw new LogTraversalError(new Error("bad object"));
				yield commit;
			}
		},
	};
}

function run(repo: Repository, version = "1.2.0") {
	return changelogCommand(resolveConfig(version), {
		openRepository: async () => repo,
		clock: fixedClock,
		log: () => {},
	});
}

describe("changelogCommand", () => {
	it("renders commits without links when there is no origin", async () => {
		const repo = fakeRepository({
			commits: [
				{ hash: "3333333333", message: "Fix bug\n\ndetails\n" },
				{ hash: "2222222222", message: "Add feature\n" },
				{ hash: "1111111111", message: "Initial commit\n" },
			],
		});

		const output = await run(repo);

		expect(output).toBe(
			"\n## [1.2.0] - 2024-03-05\n" +
				"\n- Fix bug [3333333]" +
				"\n- Add feature [2222222]" +
				"\n- Initial commit [1111111]" +
				"\n",
		);
	});

	it("links commits to an ssh origin", async () => {
		const repo = fakeRepository({
			remotes: { origin: "git@github.com:acme/widget.git" },
			commits: [{ hash: HASH, message: "Ship it\n" }],
		});

		const output = await run(repo);

		expect(output).toContain(`- Ship it [abcdef1](https://github.com/acme/widget/commits/${HASH})`);
	});

	it("only consults the origin remote", async () => {
		const repo = fakeRepository({
			remotes: { upstream: "https://github.com/acme/widget.git" },
			commits: [{ hash: HASH, message: "Ship it\n" }],
		});

		expect(await run(repo)).toContain("- Ship it [abcdef1]\n");
	});

	it("fails on a malformed origin url", async () => {
		const repo = fakeRepository({ remotes: { origin: "git@github.com:widget" } });
		await expect(run(repo)).rejects.toBeInstanceOf(InvalidRemoteUrlError);
	});

	it("fails on an unsupported origin url", async () => {
		const repo = fakeRepository({ remotes: { origin: "ftp://example.com/repo" } });
		await expect(run(repo)).rejects.toBeInstanceOf(UnsupportedRemoteUrlError);
	});

	it("fails when HEAD cannot be resolved", async () => {
		const repo = fakeRepository({ head: null });
		await expect(run(repo)).rejects.toThrow("failed to get head ref: unborn HEAD");
	});

	it("fails when the history cannot be walked", async () => {
		const repo = fakeRepository({
			commits: [
				{ hash: "2222222222", message: "Second\n" },
				{ hash: "1111111111", message: "First\n" },
			],
			failAfter: 1,
		});
		await expect(run(repo)).rejects.toThrow("failed to get commit log: bad object");
	});

	it("propagates a missing repository", async () => {
		const output = changelogCommand(resolveConfig("1.0.0", { dir: "/missing" }), {
			openRepository: async (dir) => {
				throw new RepositoryNotFoundError(dir);
			},
			log: () => {},
		});
		await expect(output).rejects.toThrow("failed to open git repository at /missing");
	});

	it("opens the configured directory", async () => {
		const open = vi.fn(async () => fakeRepository());
		await changelogCommand(resolveConfig("1.0.0", { dir: "" }), {
			openRepository: open,
			clock: fixedClock,
			log: () => {},
		});
		expect(open).toHaveBeenCalledWith(".");
	});

	it("gives identical output for identical input", async () => {
		const commits = [{ hash: HASH, message: "Same\n" }];
		const first = await run(fakeRepository({ commits }));
		const second = await run(fakeRepository({ commits }));
		expect(second).toBe(first);
	});

	it("reports progress through the logger", async () => {
		const log = vi.fn();
		await changelogCommand(resolveConfig("1.0.0"), {
			openRepository: async () =>
				fakeRepository({ remotes: { origin: "https://github.com/acme/widget.git" } }),
			clock: fixedClock,
			log,
		});
		expect(log).toHaveBeenCalledWith("Linking commits to https://github.com/acme/widget");
		expect(log).toHaveBeenCalledWith("Collected 0 commits");
	});
});
