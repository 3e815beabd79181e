import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";

export const DEFAULT_SECRETS_FILE = ".secrets.json";

export interface SecretsStore {
  get(name: string): string | undefined;
}

const SecretsFileSchema = z.record(z.string(), z.unknown());

/**
 * Secrets kept in a flat JSON object file, e.g. `{ "API_KEY": "..." }`.
 * A missing file is an empty store; a malformed one is logged and treated the same.
 */
export function fileSecrets(path: string = DEFAULT_SECRETS_FILE): SecretsStore {
  return {
    get(name) {
      let raw: string;
      try {
        raw = readFileSync(resolve(process.cwd(), path), "utf-8");
      } catch {
        return undefined;
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (err) {
        console.debug(`[Secrets] ${path} is not valid JSON:`, err instanceof Error ? err.message : err);
        return undefined;
      }

      const parsed = SecretsFileSchema.safeParse(json);
      if (!parsed.success) {
        console.debug(`[Secrets] ${path} must contain a JSON object`);
        return undefined;
      }
      const value = parsed.data[name];
      return typeof value === "string" && value.trim() ? value.trim() : undefined;
    },
  };
}

export function memorySecrets(values: Record<string, string>): SecretsStore {
  return {
    get: (name) => values[name]?.trim() || undefined,
  };
}
