// Typed environment variable access.
// Everything is optional here: a missing API key is reported per request by
// the resolvers instead of failing the server on cold start.

function optionalEnv(name: string): string | undefined {
  return process.env[name]?.trim() || undefined;
}

// Read lazily so tests (and .env reloads in dev) see current values
export function readEnv() {
  return {
    apiKey: optionalEnv("API_KEY"),
    apiBase: optionalEnv("API_BASE") ?? optionalEnv("POE_BASE_URL"),
    model: optionalEnv("MODEL"),
    imageModel: optionalEnv("IMAGE_MODEL"),
    secretsFile: optionalEnv("SECRETS_FILE"),
  } as const;
}

export type Env = ReturnType<typeof readEnv>;
