import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import type { ChatCompleter } from "@/lib/cache/prompt-cache";
import { RateLimitedError, UpstreamError, isQuota, toMsg } from "@/lib/errors";

export function makeGenAI(apiKey: string) {
  return new GoogleGenAI({ apiKey });
}

/** The slice of `GoogleGenAI["models"]` we call. */
export interface GenerateContent {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

function statusOf(err: unknown): number | null {
  if (!err || typeof err !== "object" || !("status" in err)) return null;
  const n = Number(err.status);
  return Number.isFinite(n) ? n : null;
}

/** Chat-style completion: system instruction + user instruction in, JSON text out. */
export class GeminiCompleter implements ChatCompleter {
  constructor(
    private readonly models: GenerateContent,
    private readonly model: string,
    private readonly temperature = 0.2
  ) {}

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    let text: string | undefined;
    try {
      const res = await this.models.generateContent({
        model: this.model,
        contents: [{ role: "user", parts: [{ text: userPrompt }] }],
        config: {
          systemInstruction: systemPrompt,
          responseMimeType: "application/json",
          temperature: this.temperature,
        },
      });
      text = res.text;
    } catch (err) {
      const msg = toMsg(err);
      if (statusOf(err) === 429 || isQuota(msg)) {
        throw new RateLimitedError("Gemini rate limit reached. Try again in ~60s.", { cause: err });
      }
      console.error("[genai] generateContent failed", { model: this.model, msg });
      throw new UpstreamError(`Gemini request failed: ${msg}`, { cause: err });
    }

    if (!text) throw new UpstreamError("Gemini returned no text.");
    return text;
  }
}
