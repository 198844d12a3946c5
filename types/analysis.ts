import type { RepositoryDetails, UserContributions } from "@/types/github";

/** Everything the model sees about one repository. */
export type AnalysisContext = {
  name: string;
  description: string;
  topics: string[];
  languages: string[];
  files: string[];
  readme: string; // first 500 chars
  configFile: string | null;
  configContent: string; // first 2000 chars, "" when absent
};

export type ContributionContext = {
  repository: string;
  username: string;
  totalCommits: number;
  commitMessages: string[]; // first line only
  totalPullRequests: number;
  mergedPullRequests: number;
  pullRequests: { title: string; state: string; files: string[] }[];
  totalIssues: number;
  issues: { title: string; state: string; labels: string[] }[];
  totalAdditions: number;
  totalDeletions: number;
};

export type ProjectAnalysis = {
  description: string;
  technologies: string[];
};

export type ContributionSummary = {
  relationship: string;
  primaryAreas: string[];
  summary: string;
  notableContributions: string[];
};

export type RepositoryAnalysis = {
  repository: RepositoryDetails;
  analysis: ProjectAnalysis;
  contributions: UserContributions | null;
  contributionSummary: ContributionSummary | null;
};

export type ContributionAnalysis = {
  contributions: UserContributions;
  summary: ContributionSummary;
};
