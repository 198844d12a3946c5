import { flattenTree } from "@/lib/analysis/tree";
import { detectConfigFile } from "@/lib/analysis/config-detect";
import type { ContributionAnalyzer } from "@/lib/analysis/contribution-analyzer";
import type { Summarizer } from "@/lib/analysis/summarizer";
import type { GitHubClient } from "@/lib/github/client";
import { NotFoundError, toMsg } from "@/lib/errors";
import type { AnalysisContext, RepositoryAnalysis } from "@/types/analysis";
import type { RepositoryDetails } from "@/types/github";

export const README_BUDGET = 500;
export const CONFIG_BUDGET = 2000;

export type RepoSource = Pick<
  GitHubClient,
  "getRepositoryDetails" | "getDirectoryTree" | "getFileContent"
>;

export type ConfigFetchResult =
  | { kind: "ok"; text: string }
  | { kind: "missing" }
  | { kind: "failed"; error: string };

/** Hard prefix cut to bound prompt size. Counts code points, so a surrogate pair is never split. */
export function truncate(text: string | null | undefined, budget: number) {
  const value = text ?? "";
  if (value.length <= budget) return value;
  return Array.from(value).slice(0, budget).join("");
}

export class RepoAnalyzer {
  constructor(
    private readonly github: RepoSource,
    private readonly summarizer: Summarizer,
    private readonly contributions: ContributionAnalyzer
  ) {}

  async fetchConfig(owner: string, repo: string, file: string): Promise<ConfigFetchResult> {
    try {
      const blob = await this.github.getFileContent(owner, repo, `HEAD:${file}`);
      if (!blob || blob.isBinary || blob.text === null) return { kind: "missing" };
      return { kind: "ok", text: blob.text };
    } catch (err) {
      if (err instanceof NotFoundError) return { kind: "missing" };
      return { kind: "failed", error: toMsg(err) };
    }
  }

  async buildContext(
    owner: string,
    repo: string
  ): Promise<{ details: RepositoryDetails; context: AnalysisContext }> {
    const [details, tree] = await Promise.all([
      this.github.getRepositoryDetails(owner, repo),
      this.github.getDirectoryTree(owner, repo),
    ]);

    const files = flattenTree(tree);
    const configFile = detectConfigFile(files);

    let configContent = "";
    if (configFile) {
      const config = await this.fetchConfig(owner, repo, configFile);
      if (config.kind === "ok") {
        configContent = truncate(config.text, CONFIG_BUDGET);
      } else {
        console.warn("[repo-analyzer] config unavailable, continuing without it", {
          repo: `${owner}/${repo}`,
          configFile,
          ...config,
        });
      }
    }

    const context: AnalysisContext = {
      name: details.name,
      description: details.description ?? "",
      topics: details.topics,
      languages: details.languages.map((l) => l.name),
      files,
      readme: truncate(details.readme, README_BUDGET),
      configFile,
      configContent,
    };

    return { details, context };
  }

  async analyze(owner: string, repo: string, username?: string): Promise<RepositoryAnalysis> {
    const { details, context } = await this.buildContext(owner, repo);
    const analysis = await this.summarizer.analyzeRepository(context);

    if (!username) {
      return { repository: details, analysis, contributions: null, contributionSummary: null };
    }

    const { contributions, summary } = await this.contributions.analyze(owner, repo, username);
    return { repository: details, analysis, contributions, contributionSummary: summary };
  }
}
