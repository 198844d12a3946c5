export type DirectoryEntry = {
  name: string;
  type: "file" | "directory";
  children?: DirectoryEntry[];
};

export type Language = { name: string; color: string | null };

export type Owner = { login: string; avatarUrl: string | null };

export type ContributionStats = {
  totalCommits: number;
  totalPullRequests: number;
  totalIssues: number;
  totalRepositories: number;
  totalContributions: number; // from the contribution calendar
};

export type UserProfile = {
  id: string; // GitHub node id, used to filter commit history
  login: string;
  name: string | null;
  avatarUrl: string;
  bio: string | null;
  company: string | null;
  location: string | null;
  email: string | null;
  websiteUrl: string | null;
  createdAt: string;
  followersCount: number;
  followingCount: number;
  repositoriesCount: number;
  contributionStats: ContributionStats;
};

export type UserRelationship = "Owner" | "Contributor";

export type RepositorySummary = {
  name: string;
  nameWithOwner: string;
  description: string | null;
  url: string;
  isPrivate: boolean;
  isFork: boolean;
  stargazerCount: number;
  forkCount: number;
  primaryLanguage: Language | null;
  createdAt: string;
  updatedAt: string;
  pushedAt: string | null;
  owner: Owner;
  userRelationship: UserRelationship;
};

export type RepositoryPage = {
  login: string;
  avatarUrl: string;
  totalCount: number;
  repositories: RepositorySummary[];
  hasNextPage: boolean;
  endCursor: string | null;
};

export type RepositoryDetails = {
  name: string;
  nameWithOwner: string;
  description: string | null;
  url: string;
  homepageUrl: string | null;
  isPrivate: boolean;
  isFork: boolean;
  isArchived: boolean;
  stargazerCount: number;
  forkCount: number;
  createdAt: string;
  updatedAt: string;
  pushedAt: string | null;
  owner: Owner;
  primaryLanguage: Language | null;
  languages: { name: string; color: string | null; size: number }[];
  totalLanguagesSize: number;
  topics: string[];
  defaultBranch: string | null;
  readme: string | null;
};

export type Commit = {
  message: string;
  committedDate: string;
  additions: number;
  deletions: number;
  changedFiles: number | null;
};

export type PullRequestState = "OPEN" | "CLOSED" | "MERGED";

export type PullRequest = {
  title: string;
  state: PullRequestState;
  createdAt: string;
  mergedAt: string | null;
  closedAt: string | null;
  additions: number;
  deletions: number;
  changedFiles: number;
  files: string[];
};

export type Issue = {
  title: string;
  state: "OPEN" | "CLOSED";
  createdAt: string;
  closedAt: string | null;
  labels: string[];
};

export type UserContributions = {
  repository: string;
  username: string;
  totalCommits: number;
  commits: Commit[];
  totalAdditions: number;
  totalDeletions: number;
  totalPullRequests: number;
  pullRequests: PullRequest[];
  mergedPullRequests: number;
  totalIssues: number;
  issues: Issue[];
};

export type FileContent = { text: string | null; isBinary: boolean; byteSize: number };
