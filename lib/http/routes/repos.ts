import { Hono } from "hono";
import { z } from "zod";
import { getServices } from "@/lib/services";
import { Login, RepoName } from "@/lib/http/params";

const RepoParams = z.object({ owner: Login, repo: RepoName });
const ContributionParams = RepoParams.extend({ username: Login });
const AnalysisQuery = z.object({ username: Login.optional() });

export const repos = new Hono();

repos.get("/:owner/:repo/analysis", async (c) => {
  const { owner, repo } = RepoParams.parse(c.req.param());
  const { username } = AnalysisQuery.parse({ username: c.req.query("username") });

  const result = await getServices().repoAnalyzer.analyze(owner, repo, username);
  return c.json(result);
});

repos.get("/:owner/:repo/contributions/:username", async (c) => {
  const { owner, repo, username } = ContributionParams.parse(c.req.param());
  const result = await getServices().contributionAnalyzer.analyze(owner, repo, username);
  return c.json(result);
});
