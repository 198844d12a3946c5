import { z } from "zod";
import type { PromptCache } from "@/lib/cache/prompt-cache";
import { UpstreamError } from "@/lib/errors";
import {
  CONTRIBUTION_SYSTEM_PROMPT,
  REPO_SYSTEM_PROMPT,
  contributionUserPrompt,
  repoUserPrompt,
} from "@/lib/analysis/prompts";
import type {
  AnalysisContext,
  ContributionContext,
  ContributionSummary,
  ProjectAnalysis,
} from "@/types/analysis";

/** Expected model output */
const ProjectAnalysisSchema = z.object({
  description: z.string(),
  technologies: z.array(z.string()).default([]),
});

const ContributionSummarySchema = z.object({
  relationship: z.string(),
  primaryAreas: z.array(z.string()).default([]),
  summary: z.string(),
  notableContributions: z.array(z.string()).default([]),
});

export class Summarizer {
  constructor(private readonly cache: PromptCache) {}

  async analyzeRepository(ctx: AnalysisContext): Promise<ProjectAnalysis> {
    const raw = await this.cache.getOrCompute(REPO_SYSTEM_PROMPT, repoUserPrompt(ctx));
    return this.validate(ProjectAnalysisSchema, raw, "repository analysis");
  }

  async summarizeContributions(ctx: ContributionContext): Promise<ContributionSummary> {
    const raw = await this.cache.getOrCompute(CONTRIBUTION_SYSTEM_PROMPT, contributionUserPrompt(ctx));
    return this.validate(ContributionSummarySchema, raw, "contribution summary");
  }

  private validate<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.infer<S> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamError(`Model returned an unexpected ${what} shape.`, { cause: parsed.error });
    }
    return parsed.data;
  }
}
