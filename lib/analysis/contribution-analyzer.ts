import type { GitHubClient } from "@/lib/github/client";
import type { Summarizer } from "@/lib/analysis/summarizer";
import type { ContributionAnalysis, ContributionContext } from "@/types/analysis";
import type { UserContributions } from "@/types/github";

export const MAX_PR_FILES = 10;

export type ContributionSource = Pick<GitHubClient, "getUserProfile" | "getUserContributions">;

export function firstLine(message: string) {
  return message.split("\n", 1)[0].trim();
}

export function toContributionContext(c: UserContributions): ContributionContext {
  return {
    repository: c.repository,
    username: c.username,
    totalCommits: c.totalCommits,
    commitMessages: c.commits.map((commit) => firstLine(commit.message)).filter(Boolean),
    totalPullRequests: c.totalPullRequests,
    mergedPullRequests: c.mergedPullRequests,
    pullRequests: c.pullRequests.map((p) => ({
      title: p.title,
      state: p.state,
      files: p.files.slice(0, MAX_PR_FILES),
    })),
    totalIssues: c.totalIssues,
    issues: c.issues.map((i) => ({ title: i.title, state: i.state, labels: i.labels })),
    totalAdditions: c.totalAdditions,
    totalDeletions: c.totalDeletions,
  };
}

export class ContributionAnalyzer {
  constructor(
    private readonly github: ContributionSource,
    private readonly summarizer: Summarizer
  ) {}

  async collect(owner: string, repo: string, username: string): Promise<UserContributions> {
    const user = await this.github.getUserProfile(username);
    return this.github.getUserContributions(owner, repo, { id: user.id, login: user.login });
  }

  async analyze(owner: string, repo: string, username: string): Promise<ContributionAnalysis> {
    const contributions = await this.collect(owner, repo, username);
    const summary = await this.summarizer.summarizeContributions(toContributionContext(contributions));
    return { contributions, summary };
  }
}
