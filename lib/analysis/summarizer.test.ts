import { describe, it, expect, vi } from "vitest";
import { Summarizer } from "./summarizer";
import { CONTRIBUTION_SYSTEM_PROMPT, REPO_SYSTEM_PROMPT, contributionUserPrompt } from "./prompts";
import { PromptCache } from "@/lib/cache/prompt-cache";
import { MemoryKvStore } from "@/lib/cache/store";
import { UpstreamError } from "@/lib/errors";
import type { AnalysisContext, ContributionContext } from "@/types/analysis";

const ctx: AnalysisContext = {
  name: "demo",
  description: "",
  topics: [],
  languages: [],
  files: [],
  readme: "",
  configFile: null,
  configContent: "",
};

function summarizerReplying(reply: string) {
  const complete = vi.fn(async (_system: string, _user: string) => reply);
  return { complete, summarizer: new Summarizer(new PromptCache(new MemoryKvStore(), { complete })) };
}

describe("Summarizer", () => {
  it("uses the repository system prompt and fills defaults", async () => {
    const { complete, summarizer } = summarizerReplying('{"description":"Tiny CLI"}');

    expect(await summarizer.analyzeRepository(ctx)).toEqual({ description: "Tiny CLI", technologies: [] });
    expect(complete.mock.calls[0][0]).toBe(REPO_SYSTEM_PROMPT);
  });

  it("rejects replies of the wrong shape", async () => {
    const { summarizer } = summarizerReplying('{"summary":"wrong keys"}');
    await expect(summarizer.analyzeRepository(ctx)).rejects.toBeInstanceOf(UpstreamError);
  });

  it("uses the contribution system prompt", async () => {
    const { complete, summarizer } = summarizerReplying(
      '{"relationship":"Contributor","summary":"Fixed docs."}'
    );
    const contribution: ContributionContext = {
      repository: "acme/demo",
      username: "octo",
      totalCommits: 0,
      commitMessages: [],
      totalPullRequests: 0,
      mergedPullRequests: 0,
      pullRequests: [],
      totalIssues: 0,
      issues: [],
      totalAdditions: 0,
      totalDeletions: 0,
    };

    expect(await summarizer.summarizeContributions(contribution)).toEqual({
      relationship: "Contributor",
      primaryAreas: [],
      summary: "Fixed docs.",
      notableContributions: [],
    });
    expect(complete.mock.calls[0][0]).toBe(CONTRIBUTION_SYSTEM_PROMPT);
    expect(complete.mock.calls[0][1]).toBe(contributionUserPrompt(contribution));
  });
});

describe("contributionUserPrompt", () => {
  it("lists pull request files and issue labels inline", () => {
    const text = contributionUserPrompt({
      repository: "acme/demo",
      username: "octo",
      totalCommits: 1,
      commitMessages: ["Init"],
      totalPullRequests: 1,
      mergedPullRequests: 0,
      pullRequests: [{ title: "Docs", state: "OPEN", files: ["README.md", "docs/a.md"] }],
      totalIssues: 1,
      issues: [{ title: "Typo", state: "CLOSED", labels: ["docs"] }],
      totalAdditions: 5,
      totalDeletions: 0,
    });

    expect(text).toBe(
      [
        "Repo: acme/demo",
        "User: octo",
        "Commits: 1 (+5 / -0)",
        "- Init",
        "Pull requests: 1 (0 merged)",
        "- [OPEN] Docs (README.md, docs/a.md)",
        "Issues: 1",
        "- [CLOSED] Typo {docs}",
      ].join("\n")
    );
  });
});
