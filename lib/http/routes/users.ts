import { Hono } from "hono";
import { z } from "zod";
import { getServices } from "@/lib/services";
import { Login } from "@/lib/http/params";

const ParamsSchema = z.object({ username: Login });

const QuerySchema = z.object({
  first: z.coerce.number().int().min(1).max(100).default(20),
  after: z.string().min(1).optional(),
});

export const users = new Hono();

users.get("/:username", async (c) => {
  const { username } = ParamsSchema.parse(c.req.param());
  const user = await getServices().github.getUserProfile(username);
  return c.json(user);
});

/** Timeline view: one page of repositories, most recently pushed first. */
users.get("/:username/repositories", async (c) => {
  const { username } = ParamsSchema.parse(c.req.param());
  const query = QuerySchema.parse({ first: c.req.query("first"), after: c.req.query("after") });

  const page = await getServices().github.getUserRepositories(username, query);

  return c.json({
    user: { login: page.login, avatarUrl: page.avatarUrl },
    repositories: page.repositories,
    totalCount: page.totalCount,
    hasNextPage: page.hasNextPage,
    nextCursor: page.endCursor,
  });
});
