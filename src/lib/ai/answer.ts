import { loadAiConfig } from "@/lib/ai/config";
import { chatCompletion, type FetchLike } from "@/lib/ai/client";
import { DEFAULT_PERSONA, personaPrompt } from "@/lib/ai/prompts";
import type { SecretsStore } from "@/lib/ai/secrets";
import type { GenerationParams, PersonaId, ResolveResult } from "@/lib/types";

export const DEFAULT_GENERATION: GenerationParams = { temperature: 0.4, maxTokens: 300 };

export interface AnswerDeps {
  persona?: PersonaId;
  secrets?: SecretsStore;
  fetch?: FetchLike;
}

/**
 * Asks the text model for an answer in the configured persona's voice.
 * Never throws: configuration and provider failures come back as `{ ok: false }`.
 */
export async function resolveAnswer(
  question: string,
  params: GenerationParams = DEFAULT_GENERATION,
  deps: AnswerDeps = {},
): Promise<ResolveResult<string>> {
  const config = loadAiConfig(deps.secrets);
  if (!config.ok) return config;

  try {
    const content = await chatCompletion(
      config.value,
      {
        model: config.value.model,
        messages: [
          { role: "system", content: personaPrompt(deps.persona ?? DEFAULT_PERSONA) },
          { role: "user", content: question },
        ],
        temperature: params.temperature,
        maxTokens: params.maxTokens,
      },
      deps.fetch,
    );

    const answer = content.trim();
    if (!answer) {
      return { ok: false, error: { kind: "capability", message: "Error calling completion API: empty response" } };
    }
    return { ok: true, value: answer };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.debug("[Answer] Completion failed:", message);
    return { ok: false, error: { kind: "capability", message: `Error calling completion API: ${message}` } };
  }
}
