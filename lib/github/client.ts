import { readFileSync } from "node:fs";
import { z } from "zod";
import { NotFoundError, RateLimitedError, UpstreamError, toMsg } from "@/lib/errors";
import {
  DirectoryTreeData,
  FileContentData,
  RepositoryDetailsData,
  UserContributionsData,
  UserProfileData,
  UserRepositoriesData,
} from "@/lib/github/schemas";
import {
  toContributions,
  toDirectoryEntries,
  toRepositoryDetails,
  toRepositoryPage,
  toUserProfile,
} from "@/lib/github/normalize";
import type {
  DirectoryEntry,
  FileContent,
  RepositoryDetails,
  RepositoryPage,
  UserContributions,
  UserProfile,
} from "@/types/github";

export const QUERY_NAMES = [
  "user-profile",
  "user-repositories",
  "repository-details",
  "directory-tree",
  "file-content",
  "user-contributions",
] as const;

export type QueryName = (typeof QUERY_NAMES)[number];

const queryCache = new Map<QueryName, string>();

export function loadQuery(name: QueryName) {
  let q = queryCache.get(name);
  if (!q) {
    q = readFileSync(new URL(`./queries/${name}.graphql`, import.meta.url), "utf8");
    queryCache.set(name, q);
  }
  return q;
}

const GraphQLErrorSchema = z.object({
  message: z.string(),
  type: z.string().optional(),
});

const EnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(GraphQLErrorSchema).optional(),
});

export type GitHubClientOptions = {
  token: string;
  url?: string;
  fetch?: typeof fetch;
  userAgent?: string;
};

function retryAfterSeconds(res: Response): number | undefined {
  const retryAfter = Number(res.headers.get("retry-after"));
  if (Number.isFinite(retryAfter) && retryAfter > 0) return retryAfter;

  const reset = Number(res.headers.get("x-ratelimit-reset"));
  if (Number.isFinite(reset) && reset > 0) {
    return Math.max(1, Math.ceil(reset - Date.now() / 1000));
  }
  return undefined;
}

function isRateLimited(res: Response) {
  if (res.status === 429) return true;
  return (
    (res.status === 401 || res.status === 403) && res.headers.get("x-ratelimit-remaining") === "0"
  );
}

export class GitHubClient {
  private readonly url: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;

  constructor(opts: GitHubClientOptions) {
    this.token = opts.token;
    this.url = opts.url ?? "https://api.github.com/graphql";
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.userAgent = opts.userAgent ?? "github-analyzer";
  }

  /** Run a named query and validate `data` against `schema`. */
  async send<S extends z.ZodTypeAny>(
    name: QueryName,
    variables: Record<string, unknown>,
    schema: S
  ): Promise<z.infer<S>> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.token}`,
          "Content-Type": "application/json",
          "User-Agent": this.userAgent,
        },
        body: JSON.stringify({ query: loadQuery(name), variables }),
      });
    } catch (err) {
      console.error("[github] request failed", { query: name, msg: toMsg(err) });
      throw new UpstreamError(`GitHub request failed: ${toMsg(err)}`, { cause: err });
    }

    if (isRateLimited(res)) {
      throw new RateLimitedError("GitHub rate limit reached.", {
        retryAfterSeconds: retryAfterSeconds(res),
      });
    }
    if (!res.ok) {
      console.error("[github] request failed", { query: name, status: res.status });
      throw new UpstreamError(`GitHub responded with ${res.status}.`, {
        upstreamStatus: res.status,
      });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new UpstreamError(`GitHub request failed: ${toMsg(err)}`, { cause: err });
    }

    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new UpstreamError("GitHub returned a malformed GraphQL response.", {
        cause: envelope.error,
      });
    }

    const first = envelope.data.errors?.[0];
    if (first) {
      if (first.type === "NOT_FOUND") throw new NotFoundError(first.message);
      if (first.type === "RATE_LIMITED") throw new RateLimitedError(first.message);
      throw new UpstreamError(first.message);
    }

    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      console.error("[github] unexpected data shape", { query: name, issues: data.error.issues });
      throw new UpstreamError(`Unexpected data for ${name} query.`, { cause: data.error });
    }
    return data.data;
  }

  async getUserProfile(username: string): Promise<UserProfile> {
    const data = await this.send("user-profile", { username }, UserProfileData);
    if (!data.user) throw new NotFoundError(`User ${username} not found`);
    return toUserProfile(data.user);
  }

  async getUserRepositories(
    username: string,
    opts: { first?: number; after?: string | null } = {}
  ): Promise<RepositoryPage> {
    const data = await this.send(
      "user-repositories",
      { username, first: opts.first ?? 20, after: opts.after ?? null },
      UserRepositoriesData
    );
    if (!data.user) throw new NotFoundError(`User ${username} not found`);
    return toRepositoryPage(data.user);
  }

  async getRepositoryDetails(owner: string, name: string): Promise<RepositoryDetails> {
    const data = await this.send("repository-details", { owner, name }, RepositoryDetailsData);
    if (!data.repository) throw new NotFoundError(`Repository ${owner}/${name} not found`);
    return toRepositoryDetails(data.repository);
  }

  /** Root listing, three levels deep. An empty repository yields []. */
  async getDirectoryTree(owner: string, name: string): Promise<DirectoryEntry[]> {
    const data = await this.send("directory-tree", { owner, name }, DirectoryTreeData);
    if (!data.repository) throw new NotFoundError(`Repository ${owner}/${name} not found`);
    return toDirectoryEntries(data.repository.object?.entries);
  }

  /** `expression` is a git object expression such as `HEAD:package.json`. Null when nothing is there. */
  async getFileContent(owner: string, name: string, expression: string): Promise<FileContent | null> {
    const data = await this.send("file-content", { owner, name, expression }, FileContentData);
    if (!data.repository) throw new NotFoundError(`Repository ${owner}/${name} not found`);

    const blob = data.repository.object;
    if (!blob) return null;
    return {
      text: blob.text ?? null,
      isBinary: blob.isBinary ?? false,
      byteSize: blob.byteSize ?? 0,
    };
  }

  async getUserContributions(
    owner: string,
    name: string,
    user: { id: string; login: string },
    first = 50
  ): Promise<UserContributions> {
    const scope = `repo:${owner}/${name} author:${user.login}`;
    const data = await this.send(
      "user-contributions",
      {
        owner,
        name,
        userId: user.id,
        prQuery: `${scope} is:pr`,
        issueQuery: `${scope} is:issue`,
        first,
      },
      UserContributionsData
    );
    if (!data.repository) throw new NotFoundError(`Repository ${owner}/${name} not found`);
    return toContributions(user.login, data.repository, data.pullRequests, data.issues);
  }
}
