import { createHash } from "node:crypto";
import type { KvStore } from "@/lib/cache/store";
import { UpstreamError, toMsg } from "@/lib/errors";

export const PROMPT_TTL = 60 * 60; // 1h

/** What gets stored per prompt: the raw JSON text the model returned. */
export type CacheEntry = { json: string; expiresAt: number };

/** Anything that turns a system + user instruction into JSON text. */
export interface ChatCompleter {
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export function promptKey(systemPrompt: string, userPrompt: string) {
  const hash = createHash("sha256")
    .update(systemPrompt)
    .update("\u0000")
    .update(userPrompt)
    .digest("hex");
  return `prompt:${hash}`;
}

function isCacheEntry(v: unknown): v is CacheEntry {
  if (!v || typeof v !== "object") return false;
  return (
    "json" in v &&
    typeof v.json === "string" &&
    "expiresAt" in v &&
    typeof v.expiresAt === "number"
  );
}

export class PromptCache {
  private readonly inFlight = new Map<string, Promise<unknown>>();

  constructor(
    private readonly store: KvStore,
    private readonly completer: ChatCompleter,
    private readonly ttlSeconds = PROMPT_TTL,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Returns the parsed JSON reply for this prompt pair, calling the model only on a miss.
   * Concurrent callers with the same prompt share one upstream call.
   */
  async getOrCompute(systemPrompt: string, userPrompt: string): Promise<unknown> {
    const key = promptKey(systemPrompt, userPrompt);

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const run = this.resolve(key, systemPrompt, userPrompt).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  private async resolve(key: string, systemPrompt: string, userPrompt: string) {
    const hit = await this.read(key);
    if (hit !== undefined) return hit;

    const json = await this.completer.complete(systemPrompt, userPrompt);

    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (err) {
      throw new UpstreamError("Model did not return valid JSON.", { cause: err });
    }

    await this.write(key, json);
    return parsed;
  }

  private async read(key: string): Promise<unknown> {
    let entry: unknown;
    try {
      entry = await this.store.get<CacheEntry>(key);
    } catch (err) {
      console.warn("[prompt-cache] read failed, calling model", { key, msg: toMsg(err) });
      return undefined;
    }

    if (!isCacheEntry(entry) || entry.expiresAt <= this.now()) return undefined;

    try {
      return JSON.parse(entry.json);
    } catch {
      console.warn("[prompt-cache] dropping unreadable entry", { key });
      return undefined;
    }
  }

  private async write(key: string, json: string) {
    const entry: CacheEntry = { json, expiresAt: this.now() + this.ttlSeconds * 1000 };
    try {
      await this.store.set<CacheEntry>(key, entry, this.ttlSeconds);
    } catch (err) {
      console.warn("[prompt-cache] write failed", { key, msg: toMsg(err) });
    }
  }
}
