import type {
  RawTreeEntry,
  RepositoryDetailsData,
  UserContributionsData,
  UserProfileData,
  UserRepositoriesData,
} from "@/lib/github/schemas";
import type {
  DirectoryEntry,
  RepositoryDetails,
  RepositoryPage,
  RepositorySummary,
  UserContributions,
  UserProfile,
} from "@/types/github";

type Present<T> = Exclude<T, null | undefined>;

export function toUserProfile(u: Present<UserProfileData["user"]>): UserProfile {
  const c = u.contributionsCollection;
  return {
    id: u.id,
    login: u.login,
    name: u.name ?? null,
    avatarUrl: u.avatarUrl,
    bio: u.bio ?? null,
    company: u.company ?? null,
    location: u.location ?? null,
    email: u.email || null, // GitHub sends "" when the email is private
    websiteUrl: u.websiteUrl ?? null,
    createdAt: u.createdAt,
    followersCount: u.followers.totalCount,
    followingCount: u.following.totalCount,
    repositoriesCount: u.repositories.totalCount,
    contributionStats: {
      totalCommits: c.totalCommitContributions,
      totalPullRequests: c.totalPullRequestContributions,
      totalIssues: c.totalIssueContributions,
      totalRepositories: c.totalRepositoryContributions,
      totalContributions: c.contributionCalendar.totalContributions,
    },
  };
}

export function toRepositoryPage(u: Present<UserRepositoriesData["user"]>): RepositoryPage {
  const { repositories } = u;
  const login = u.login.toLowerCase();
  return {
    login: u.login,
    avatarUrl: u.avatarUrl,
    totalCount: repositories.totalCount,
    hasNextPage: repositories.pageInfo.hasNextPage,
    endCursor: repositories.pageInfo.endCursor ?? null,
    repositories: repositories.nodes.map((r): RepositorySummary => ({
      name: r.name,
      nameWithOwner: r.nameWithOwner,
      description: r.description ?? null,
      url: r.url,
      isPrivate: r.isPrivate,
      isFork: r.isFork,
      stargazerCount: r.stargazerCount,
      forkCount: r.forkCount,
      primaryLanguage: r.primaryLanguage
        ? { name: r.primaryLanguage.name, color: r.primaryLanguage.color ?? null }
        : null,
      createdAt: r.createdAt,
      updatedAt: r.updatedAt,
      pushedAt: r.pushedAt ?? null,
      owner: { login: r.owner.login, avatarUrl: r.owner.avatarUrl ?? null },
      userRelationship: r.owner.login.toLowerCase() === login ? "Owner" : "Contributor",
    })),
  };
}

export function toRepositoryDetails(r: Present<RepositoryDetailsData["repository"]>): RepositoryDetails {
  return {
    name: r.name,
    nameWithOwner: r.nameWithOwner,
    description: r.description ?? null,
    url: r.url,
    homepageUrl: r.homepageUrl || null,
    isPrivate: r.isPrivate,
    isFork: r.isFork,
    isArchived: r.isArchived,
    stargazerCount: r.stargazerCount,
    forkCount: r.forkCount,
    createdAt: r.createdAt,
    updatedAt: r.updatedAt,
    pushedAt: r.pushedAt ?? null,
    owner: { login: r.owner.login, avatarUrl: r.owner.avatarUrl ?? null },
    primaryLanguage: r.primaryLanguage
      ? { name: r.primaryLanguage.name, color: r.primaryLanguage.color ?? null }
      : null,
    languages: (r.languages?.edges ?? []).map((e) => ({
      name: e.node.name,
      color: e.node.color ?? null,
      size: e.size,
    })),
    totalLanguagesSize: r.languages?.totalSize ?? 0,
    topics: (r.repositoryTopics?.nodes ?? []).map((n) => n.topic.name),
    defaultBranch: r.defaultBranchRef?.name ?? null,
    readme: r.readme?.text ?? null,
  };
}

export function toDirectoryEntries(entries: RawTreeEntry[] | null | undefined): DirectoryEntry[] {
  return (entries ?? []).map((e): DirectoryEntry => {
    if (e.type !== "tree") return { name: e.name, type: "file" };
    return { name: e.name, type: "directory", children: toDirectoryEntries(e.object?.entries) };
  });
}

export function toContributions(
  username: string,
  repository: Present<UserContributionsData["repository"]>,
  pullRequests: UserContributionsData["pullRequests"],
  issues: UserContributionsData["issues"]
): UserContributions {
  const history = repository.defaultBranchRef?.target?.history;
  const commits = (history?.nodes ?? []).map((c) => ({
    message: c.message,
    committedDate: c.committedDate,
    additions: c.additions,
    deletions: c.deletions,
    changedFiles: c.changedFilesIfAvailable ?? null,
  }));

  const prs = pullRequests.nodes.map((p) => ({
    title: p.title,
    state: p.state,
    createdAt: p.createdAt,
    mergedAt: p.mergedAt ?? null,
    closedAt: p.closedAt ?? null,
    additions: p.additions,
    deletions: p.deletions,
    changedFiles: p.changedFiles,
    files: (p.files?.nodes ?? []).map((f) => f.path),
  }));

  return {
    repository: repository.nameWithOwner,
    username,
    totalCommits: history?.totalCount ?? 0,
    commits,
    totalAdditions: commits.reduce((s, c) => s + c.additions, 0),
    totalDeletions: commits.reduce((s, c) => s + c.deletions, 0),
    totalPullRequests: pullRequests.issueCount,
    pullRequests: prs,
    mergedPullRequests: prs.filter((p) => p.state === "MERGED").length,
    totalIssues: issues.issueCount,
    issues: issues.nodes.map((i) => ({
      title: i.title,
      state: i.state,
      createdAt: i.createdAt,
      closedAt: i.closedAt ?? null,
      labels: (i.labels?.nodes ?? []).map((l) => l.name),
    })),
  };
}
