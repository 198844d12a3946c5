import { describe, it, expect, vi, beforeEach } from "vitest";
import type { GenerateContentParameters } from "@google/genai";
import { GeminiCompleter } from "./client";
import { RateLimitedError, UpstreamError } from "@/lib/errors";

function fakeModels(impl: () => Promise<{ text?: string }>) {
  return { generateContent: vi.fn((_params: GenerateContentParameters) => impl()) };
}

describe("GeminiCompleter", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("asks for JSON with the system instruction", async () => {
    const models = fakeModels(async () => ({ text: '{"ok":true}' }));
    const completer = new GeminiCompleter(models, "gemini-test");

    expect(await completer.complete("be brief", "describe repo")).toBe('{"ok":true}');
    expect(models.generateContent).toHaveBeenCalledWith({
      model: "gemini-test",
      contents: [{ role: "user", parts: [{ text: "describe repo" }] }],
      config: {
        systemInstruction: "be brief",
        responseMimeType: "application/json",
        temperature: 0.2,
      },
    });
  });

  it("fails on an empty reply", async () => {
    const completer = new GeminiCompleter(fakeModels(async () => ({})), "gemini-test");
    await expect(completer.complete("s", "u")).rejects.toThrow("Gemini returned no text.");
  });

  it("maps quota errors to RateLimitedError", async () => {
    const quota = Object.assign(new Error("RESOURCE_EXHAUSTED: quota"), { status: 429 });
    const completer = new GeminiCompleter(
      fakeModels(async () => {
        throw quota;
      }),
      "gemini-test"
    );
    await expect(completer.complete("s", "u")).rejects.toBeInstanceOf(RateLimitedError);
  });

  it("wraps other SDK errors as UpstreamError", async () => {
    const completer = new GeminiCompleter(
      fakeModels(async () => {
        throw new Error("invalid argument");
      }),
      "gemini-test"
    );
    const err = await completer.complete("s", "u").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toHaveProperty("message", "Gemini request failed: invalid argument");
  });
});
