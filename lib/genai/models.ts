import { env } from "@/lib/env";

export const MODELS = {
  summary: env.GEMINI_MODEL,
} as const;
