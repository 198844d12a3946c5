import { z } from "zod";

const LanguageSchema = z.object({ name: z.string(), color: z.string().nullish() });
const OwnerSchema = z.object({ login: z.string(), avatarUrl: z.string().nullish() });
const Count = z.object({ totalCount: z.number().int() });

export const UserProfileData = z.object({
  user: z
    .object({
      id: z.string(),
      login: z.string(),
      name: z.string().nullish(),
      avatarUrl: z.string(),
      bio: z.string().nullish(),
      company: z.string().nullish(),
      location: z.string().nullish(),
      email: z.string().nullish(),
      websiteUrl: z.string().nullish(),
      createdAt: z.string(),
      followers: Count,
      following: Count,
      repositories: Count,
      contributionsCollection: z.object({
        totalCommitContributions: z.number().int(),
        totalPullRequestContributions: z.number().int(),
        totalIssueContributions: z.number().int(),
        totalRepositoryContributions: z.number().int(),
        contributionCalendar: z.object({ totalContributions: z.number().int() }),
      }),
    })
    .nullable(),
});

export const UserRepositoriesData = z.object({
  user: z
    .object({
      login: z.string(),
      avatarUrl: z.string(),
      repositories: z.object({
        totalCount: z.number().int(),
        pageInfo: z.object({ hasNextPage: z.boolean(), endCursor: z.string().nullish() }),
        nodes: z.array(
          z.object({
            name: z.string(),
            nameWithOwner: z.string(),
            description: z.string().nullish(),
            url: z.string(),
            isPrivate: z.boolean(),
            isFork: z.boolean(),
            stargazerCount: z.number().int(),
            forkCount: z.number().int(),
            primaryLanguage: LanguageSchema.nullish(),
            createdAt: z.string(),
            updatedAt: z.string(),
            pushedAt: z.string().nullish(),
            owner: OwnerSchema,
          })
        ),
      }),
    })
    .nullable(),
});

export const RepositoryDetailsData = z.object({
  repository: z
    .object({
      name: z.string(),
      nameWithOwner: z.string(),
      description: z.string().nullish(),
      url: z.string(),
      homepageUrl: z.string().nullish(),
      isPrivate: z.boolean(),
      isFork: z.boolean(),
      isArchived: z.boolean(),
      stargazerCount: z.number().int(),
      forkCount: z.number().int(),
      createdAt: z.string(),
      updatedAt: z.string(),
      pushedAt: z.string().nullish(),
      owner: OwnerSchema,
      primaryLanguage: LanguageSchema.nullish(),
      languages: z
        .object({
          totalSize: z.number().int(),
          edges: z.array(z.object({ size: z.number().int(), node: LanguageSchema })),
        })
        .nullish(),
      repositoryTopics: z
        .object({ nodes: z.array(z.object({ topic: z.object({ name: z.string() }) })) })
        .nullish(),
      defaultBranchRef: z.object({ name: z.string() }).nullish(),
      readme: z.object({ text: z.string().nullish() }).nullish(),
    })
    .nullable(),
});

/** Tree entry as GitHub returns it: `type` is "tree", "blob" or "commit" (submodule). */
export type RawTreeEntry = {
  name: string;
  type: string;
  object?: { entries?: RawTreeEntry[] | null } | null;
};

export const RawTreeEntrySchema: z.ZodType<RawTreeEntry> = z.lazy(() =>
  z.object({
    name: z.string(),
    type: z.string(),
    object: z.object({ entries: z.array(RawTreeEntrySchema).nullish() }).nullish(),
  })
);

export const DirectoryTreeData = z.object({
  repository: z
    .object({
      object: z.object({ entries: z.array(RawTreeEntrySchema).nullish() }).nullish(),
    })
    .nullable(),
});

export const FileContentData = z.object({
  repository: z
    .object({
      object: z
        .object({
          text: z.string().nullish(),
          byteSize: z.number().int().optional(),
          isBinary: z.boolean().nullish(),
        })
        .nullish(),
    })
    .nullable(),
});

const PullRequestNode = z.object({
  title: z.string(),
  state: z.enum(["OPEN", "CLOSED", "MERGED"]),
  createdAt: z.string(),
  mergedAt: z.string().nullish(),
  closedAt: z.string().nullish(),
  additions: z.number().int(),
  deletions: z.number().int(),
  changedFiles: z.number().int(),
  files: z.object({ nodes: z.array(z.object({ path: z.string() })).nullish() }).nullish(),
});

const IssueNode = z.object({
  title: z.string(),
  state: z.enum(["OPEN", "CLOSED"]),
  createdAt: z.string(),
  closedAt: z.string().nullish(),
  labels: z.object({ nodes: z.array(z.object({ name: z.string() })).nullish() }).nullish(),
});

// Search results of another kind come back as {} and are skipped.
const onlyNodes = <T extends z.ZodTypeAny>(node: T) =>
  z.array(z.unknown()).transform((nodes) =>
    nodes.flatMap((n): z.infer<T>[] => {
      const parsed = node.safeParse(n);
      return parsed.success ? [parsed.data] : [];
    })
  );

export const UserContributionsData = z.object({
  repository: z
    .object({
      nameWithOwner: z.string(),
      defaultBranchRef: z
        .object({
          target: z
            .object({
              history: z
                .object({
                  totalCount: z.number().int(),
                  nodes: z.array(
                    z.object({
                      message: z.string(),
                      committedDate: z.string(),
                      additions: z.number().int(),
                      deletions: z.number().int(),
                      changedFilesIfAvailable: z.number().int().nullish(),
                    })
                  ),
                })
                .optional(),
            })
            .nullish(),
        })
        .nullish(),
    })
    .nullable(),
  pullRequests: z.object({
    issueCount: z.number().int(),
    nodes: onlyNodes(PullRequestNode),
  }),
  issues: z.object({
    issueCount: z.number().int(),
    nodes: onlyNodes(IssueNode),
  }),
});

export type UserProfileData = z.infer<typeof UserProfileData>;
export type UserRepositoriesData = z.infer<typeof UserRepositoriesData>;
export type RepositoryDetailsData = z.infer<typeof RepositoryDetailsData>;
export type DirectoryTreeData = z.infer<typeof DirectoryTreeData>;
export type FileContentData = z.infer<typeof FileContentData>;
export type UserContributionsData = z.infer<typeof UserContributionsData>;
