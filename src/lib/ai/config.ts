import { readEnv } from "@/lib/env";
import { fileSecrets, type SecretsStore } from "@/lib/ai/secrets";
import type { ResolveResult } from "@/lib/types";

export const DEFAULT_API_BASE = "https://api.poe.com/v1";
export const DEFAULT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_IMAGE_MODEL = "Qwen-Image";

export const MISSING_KEY_MESSAGE =
  "Error: API key not found. Set `API_KEY` in .env, the environment, or the secrets file.";

export interface AiConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  imageModel: string;
}

// Key: env var, then secrets store. Base URL and models fall back to fixed defaults.
export function loadAiConfig(secrets?: SecretsStore): ResolveResult<AiConfig> {
  const env = readEnv();
  const store = secrets ?? fileSecrets(env.secretsFile);

  const apiKey = env.apiKey ?? store.get("API_KEY");
  if (!apiKey) {
    return { ok: false, error: { kind: "configuration", message: MISSING_KEY_MESSAGE } };
  }

  return {
    ok: true,
    value: {
      apiKey,
      baseUrl: (env.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, ""),
      model: env.model ?? DEFAULT_MODEL,
      imageModel: env.imageModel ?? DEFAULT_IMAGE_MODEL,
    },
  };
}
