import { loadAiConfig, type AiConfig } from "@/lib/ai/config";
import { chatCompletion, type FetchLike } from "@/lib/ai/client";
import { fallbackImagePrompt } from "@/lib/ai/prompts";
import type { SecretsStore } from "@/lib/ai/secrets";
import type { ImageAspect, ImageQuality, ImageRequest, ResolveResult } from "@/lib/types";

export const DEFAULT_ASPECT: ImageAspect = "3:2";
export const DEFAULT_QUALITY: ImageQuality = "high";

const URL_PATTERN = /https?:\/\/[^\s)]+/;
const SUBJECT_MAX_WORDS = 12;

export interface ImageDeps {
  secrets?: SecretsStore;
  fetch?: FetchLike;
}

export function extractImageUrl(text: string): string | null {
  return text.match(URL_PATTERN)?.[0] ?? null;
}

/** First sentence of the prompt, at most 12 words, without trailing punctuation. */
export function simplifySubject(prompt: string): string {
  const firstSentence = prompt.trim().split(/[.!?\n]/)[0] ?? "";
  const words = firstSentence.split(/\s+/).filter(Boolean).slice(0, SUBJECT_MAX_WORDS);
  return words.join(" ").replace(/[,;:]+$/, "") || "a scenic landscape";
}

export function buildFallbackPrompt(request: ImageRequest): string {
  const subject = request.subject?.trim() || simplifySubject(request.prompt);
  return fallbackImagePrompt(subject, request.accentColor?.trim() || undefined);
}

function requestImage(config: AiConfig, prompt: string, request: ImageRequest, fetchImpl?: FetchLike) {
  return chatCompletion(
    config,
    {
      model: config.imageModel,
      messages: [{ role: "user", content: prompt }],
      extra: {
        aspect: request.aspect ?? DEFAULT_ASPECT,
        quality: request.quality ?? DEFAULT_QUALITY,
      },
    },
    fetchImpl,
  );
}

/**
 * Generates an image and returns its URL.
 * A failed first request is retried exactly once with a simpler, derived prompt.
 * A response without any URL is reported as `no_image_url` with the raw text.
 */
export async function resolveImage(request: ImageRequest, deps: ImageDeps = {}): Promise<ResolveResult<string>> {
  const config = loadAiConfig(deps.secrets);
  if (!config.ok) return config;

  let content: string;
  try {
    content = await requestImage(config.value, request.prompt, request, deps.fetch);
  } catch (primaryError) {
    const fallback = buildFallbackPrompt(request);
    console.debug(
      "[Image] Primary prompt failed, retrying with fallback:",
      primaryError instanceof Error ? primaryError.message : primaryError,
    );
    try {
      content = await requestImage(config.value, fallback, request, deps.fetch);
    } catch (fallbackError) {
      const message = fallbackError instanceof Error ? fallbackError.message : String(fallbackError);
      return { ok: false, error: { kind: "capability", message: `Error generating image: ${message}` } };
    }
  }

  const url = extractImageUrl(content);
  if (!url) {
    return {
      ok: false,
      error: { kind: "no_image_url", message: `Error: no image URL in response: ${content.trim() || "(empty)"}` },
    };
  }
  return { ok: true, value: url };
}
