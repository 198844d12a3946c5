import { describe, it, expect, vi, beforeEach } from "vitest";
import { CONFIG_BUDGET, README_BUDGET, RepoAnalyzer, truncate, type RepoSource } from "./repo-analyzer";
import { ContributionAnalyzer, type ContributionSource } from "./contribution-analyzer";
import { Summarizer } from "./summarizer";
import { CONTRIBUTION_SYSTEM_PROMPT, REPO_SYSTEM_PROMPT } from "./prompts";
import { PromptCache } from "@/lib/cache/prompt-cache";
import { MemoryKvStore } from "@/lib/cache/store";
import { NotFoundError } from "@/lib/errors";
import type { DirectoryEntry, FileContent, RepositoryDetails, UserContributions, UserProfile } from "@/types/github";

function details(over: Partial<RepositoryDetails> = {}): RepositoryDetails {
  return {
    name: "demo",
    nameWithOwner: "octo/demo",
    description: null,
    url: "https://github.com/octo/demo",
    homepageUrl: null,
    isPrivate: false,
    isFork: false,
    isArchived: false,
    stargazerCount: 1,
    forkCount: 0,
    createdAt: "2024-01-01T00:00:00Z",
    updatedAt: "2024-01-01T00:00:00Z",
    pushedAt: null,
    owner: { login: "octo", avatarUrl: null },
    primaryLanguage: null,
    languages: [],
    totalLanguagesSize: 0,
    topics: [],
    defaultBranch: "main",
    readme: null,
    ...over,
  };
}

const MODEL_REPLY = '{"description":"A demo","technologies":["TypeScript"]}';

function setup(opts: {
  repo?: RepositoryDetails;
  tree?: DirectoryEntry[];
  file?: () => Promise<FileContent | null>;
}) {
  const github = {
    getRepositoryDetails: vi.fn(async (_owner: string, _name: string) => opts.repo ?? details()),
    getDirectoryTree: vi.fn(async (_owner: string, _name: string) => opts.tree ?? []),
    getFileContent: vi.fn(
      async (_owner: string, _name: string, _expression: string) => (opts.file ? opts.file() : null)
    ),
  } satisfies RepoSource;

  const complete = vi.fn(async (_system: string, _user: string) => MODEL_REPLY);
  const summarizer = new Summarizer(new PromptCache(new MemoryKvStore(), { complete }));

  const contributionSource: ContributionSource = {
    getUserProfile: vi.fn(async (): Promise<UserProfile> => {
      throw new Error("not used");
    }),
    getUserContributions: vi.fn(async (): Promise<UserContributions> => {
      throw new Error("not used");
    }),
  };
  const analyzer = new RepoAnalyzer(
    github,
    summarizer,
    new ContributionAnalyzer(contributionSource, summarizer)
  );

  return { analyzer, github, complete };
}

describe("truncate", () => {
  it("keeps the prefix up to the budget", () => {
    expect(truncate("abcdef", 4)).toBe("abcd");
    expect(truncate("abc", 4)).toBe("abc");
    expect(truncate(null, 4)).toBe("");
  });

  it("never splits a character outside the BMP", () => {
    const cut = truncate("a".repeat(1999) + "\u{1F600}tail", 2000);
    expect(cut).toBe("a".repeat(1999) + "\u{1F600}");
    expect(truncate("h\u00e9llo \u{1F600} w\u00f6rld", 7)).toBe("h\u00e9llo \u{1F600}");
  });
});

describe("RepoAnalyzer", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("assembles the context from metadata, tree and config", async () => {
    const config = "c".repeat(CONFIG_BUDGET + 500);
    const { analyzer, github } = setup({
      repo: details({
        description: "Demo app",
        topics: ["cli"],
        languages: [
          { name: "TypeScript", color: "#3178c6", size: 900 },
          { name: "Shell", color: null, size: 100 },
        ],
        readme: "r".repeat(README_BUDGET + 100),
      }),
      tree: [
        { name: "src", type: "directory", children: [{ name: "index.ts", type: "file" }] },
        { name: "package.json", type: "file" },
      ],
      file: async () => ({ text: config, isBinary: false, byteSize: config.length }),
    });

    const { context } = await analyzer.buildContext("octo", "demo");

    expect(context).toEqual({
      name: "demo",
      description: "Demo app",
      topics: ["cli"],
      languages: ["TypeScript", "Shell"],
      files: ["src/", "src/index.ts", "package.json"],
      readme: "r".repeat(README_BUDGET),
      configFile: "package.json",
      configContent: "c".repeat(CONFIG_BUDGET),
    });
    expect(context.configContent).toHaveLength(2000);
    expect(github.getFileContent).toHaveBeenCalledWith("octo", "demo", "HEAD:package.json");
  });

  it("sends the config section to the model", async () => {
    const { analyzer, complete } = setup({
      tree: [{ name: "go.mod", type: "file" }],
      file: async () => ({ text: "module example.test/demo", isBinary: false, byteSize: 24 }),
    });

    const result = await analyzer.analyze("octo", "demo");

    expect(result.analysis).toEqual({ description: "A demo", technologies: ["TypeScript"] });
    expect(complete.mock.calls[0][1]).toBe(
      [
        "Repo: demo",
        "Desc: None",
        "Topics: None",
        "Langs: Unknown",
        "Files:",
        "go.mod",
        "README:",
        "None",
        "Config (go.mod):",
        "module example.test/demo",
      ].join("\n")
    );
  });

  it("still summarizes when the config fetch fails", async () => {
    const { analyzer, complete } = setup({
      tree: [{ name: "package.json", type: "file" }],
      file: async () => {
        throw new Error("socket hang up");
      },
    });

    const { context } = await analyzer.buildContext("octo", "demo");
    expect(context.configFile).toBe("package.json");
    expect(context.configContent).toBe("");

    const result = await analyzer.analyze("octo", "demo");
    expect(result.analysis.description).toBe("A demo");
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("reports why a config could not be read", async () => {
    const missing = setup({ file: async () => null });
    expect(await missing.analyzer.fetchConfig("octo", "demo", "pom.xml")).toEqual({ kind: "missing" });

    const binary = setup({ file: async () => ({ text: null, isBinary: true, byteSize: 10 }) });
    expect(await binary.analyzer.fetchConfig("octo", "demo", "pom.xml")).toEqual({ kind: "missing" });

    const gone = setup({
      file: async () => {
        throw new NotFoundError("Repository octo/demo not found");
      },
    });
    expect(await gone.analyzer.fetchConfig("octo", "demo", "pom.xml")).toEqual({ kind: "missing" });

    const failed = setup({
      file: async () => {
        throw new Error("timeout");
      },
    });
    expect(await failed.analyzer.fetchConfig("octo", "demo", "pom.xml")).toEqual({
      kind: "failed",
      error: "timeout",
    });
  });

  it("handles an empty repository without a config section", async () => {
    const { analyzer, github, complete } = setup({ tree: [] });

    const result = await analyzer.analyze("octo", "demo");

    expect(github.getFileContent).not.toHaveBeenCalled();
    expect(complete.mock.calls[0][1]).toBe(
      "Repo: demo\nDesc: None\nTopics: None\nLangs: Unknown\nFiles:\nREADME:\nNone"
    );
    expect(result).toEqual({
      repository: details(),
      analysis: { description: "A demo", technologies: ["TypeScript"] },
      contributions: null,
      contributionSummary: null,
    });
  });

  it("adds the contribution summary when a username is given", async () => {
    const github = {
      getRepositoryDetails: vi.fn(async (_owner: string, _name: string) => details()),
      getDirectoryTree: vi.fn(async (_owner: string, _name: string): Promise<DirectoryEntry[]> => []),
      getFileContent: vi.fn(async (_owner: string, _name: string, _expression: string) => null),
    } satisfies RepoSource;

    const contributions: UserContributions = {
      repository: "octo/demo",
      username: "octo",
      totalCommits: 1,
      commits: [
        {
          message: "Initial commit",
          committedDate: "2024-01-01T00:00:00Z",
          additions: 5,
          deletions: 0,
          changedFiles: 1,
        },
      ],
      totalAdditions: 5,
      totalDeletions: 0,
      totalPullRequests: 0,
      pullRequests: [],
      mergedPullRequests: 0,
      totalIssues: 0,
      issues: [],
    };
    const source = {
      getUserProfile: vi.fn(async (_username: string): Promise<UserProfile> => ({
        id: "U_7",
        login: "octo",
        name: null,
        avatarUrl: "https://avatars.example/octo.png",
        bio: null,
        company: null,
        location: null,
        email: null,
        websiteUrl: null,
        createdAt: "2020-01-01T00:00:00Z",
        followersCount: 0,
        followingCount: 0,
        repositoriesCount: 1,
        contributionStats: {
          totalCommits: 1,
          totalPullRequests: 0,
          totalIssues: 0,
          totalRepositories: 1,
          totalContributions: 1,
        },
      })),
      getUserContributions: vi.fn(
        async (_owner: string, _name: string, _user: { id: string; login: string }) => contributions
      ),
    } satisfies ContributionSource;

    const contributionReply = {
      relationship: "Owner",
      primaryAreas: ["Setup"],
      summary: "Created the project.",
      notableContributions: ["Initial commit"],
    };
    const complete = vi.fn(async (system: string, _user: string) =>
      system === CONTRIBUTION_SYSTEM_PROMPT ? JSON.stringify(contributionReply) : MODEL_REPLY
    );
    const summarizer = new Summarizer(new PromptCache(new MemoryKvStore(), { complete }));
    const analyzer = new RepoAnalyzer(github, summarizer, new ContributionAnalyzer(source, summarizer));

    const result = await analyzer.analyze("octo", "demo", "octo");

    expect(source.getUserContributions).toHaveBeenCalledWith("octo", "demo", { id: "U_7", login: "octo" });
    expect(result).toEqual({
      repository: details(),
      analysis: { description: "A demo", technologies: ["TypeScript"] },
      contributions,
      contributionSummary: contributionReply,
    });
    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls.map((call) => call[0])).toEqual([
      REPO_SYSTEM_PROMPT,
      CONTRIBUTION_SYSTEM_PROMPT,
    ]);
  });

  it("serves a repeated analysis from the prompt cache", async () => {
    const { analyzer, complete } = setup({ tree: [{ name: "README.md", type: "file" }] });

    await analyzer.analyze("octo", "demo");
    await analyzer.analyze("octo", "demo");

    expect(complete).toHaveBeenCalledTimes(1);
  });
});
