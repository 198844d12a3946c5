import { z } from "zod";

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().min(1),
  GEMINI_MODEL: z.string().default("gemini-2.5-flash"),

  GITHUB_TOKEN: z.string().min(1),
  GITHUB_GRAPHQL_URL: z.string().url().default("https://api.github.com/graphql"),

  UPSTASH_REDIS_REST_URL: z.string().url().optional().or(z.literal("")),
  UPSTASH_REDIS_REST_TOKEN: z.string().optional().or(z.literal("")),

  PORT: z.coerce.number().int().positive().default(8000),
});

export const env = EnvSchema.parse({
  GEMINI_API_KEY: process.env.GEMINI_API_KEY,
  GEMINI_MODEL: process.env.GEMINI_MODEL,
  GITHUB_TOKEN: process.env.GITHUB_TOKEN,
  GITHUB_GRAPHQL_URL: process.env.GITHUB_GRAPHQL_URL,
  UPSTASH_REDIS_REST_URL: process.env.UPSTASH_REDIS_REST_URL,
  UPSTASH_REDIS_REST_TOKEN: process.env.UPSTASH_REDIS_REST_TOKEN,
  PORT: process.env.PORT,
});
