import { env } from "@/lib/env";
import { MODELS } from "@/lib/genai/models";
import { GeminiCompleter, makeGenAI } from "@/lib/genai/client";
import { createKvStore } from "@/lib/cache/store";
import { PromptCache } from "@/lib/cache/prompt-cache";
import { GitHubClient } from "@/lib/github/client";
import { Summarizer } from "@/lib/analysis/summarizer";
import { ContributionAnalyzer } from "@/lib/analysis/contribution-analyzer";
import { RepoAnalyzer } from "@/lib/analysis/repo-analyzer";

export type Services = {
  github: GitHubClient;
  repoAnalyzer: RepoAnalyzer;
  contributionAnalyzer: ContributionAnalyzer;
};

let services: Services | null = null;

export function createServices(): Services {
  const github = new GitHubClient({ token: env.GITHUB_TOKEN, url: env.GITHUB_GRAPHQL_URL });
  const completer = new GeminiCompleter(makeGenAI(env.GEMINI_API_KEY).models, MODELS.summary);
  const summarizer = new Summarizer(new PromptCache(createKvStore(), completer));
  const contributionAnalyzer = new ContributionAnalyzer(github, summarizer);
  const repoAnalyzer = new RepoAnalyzer(github, summarizer, contributionAnalyzer);
  return { github, repoAnalyzer, contributionAnalyzer };
}

/** Clients are built once per process and shared by every request. */
export function getServices(): Services {
  services ??= createServices();
  return services;
}
