import { z } from "zod";
import type { AnswerResolver, ImageRequest, PersonaId, ResolveResult } from "@/lib/types";

// Browser-side resolvers backed by the /api routes. Same contract as the
// server resolvers: they never throw.

const ResolveResultSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), value: z.string() }),
  z.object({
    ok: z.literal(false),
    error: z.object({
      kind: z.enum(["configuration", "capability", "no_image_url"]),
      message: z.string(),
    }),
  }),
]);

const ApiErrorSchema = z.object({ error: z.string() });

async function postForResult(
  url: string,
  body: unknown,
  errorPrefix: string,
  fetchImpl: typeof fetch,
): Promise<ResolveResult<string>> {
  const fail = (message: string): ResolveResult<string> => ({
    ok: false,
    error: { kind: "capability", message: `${errorPrefix}: ${message}` },
  });

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  } catch (err) {
    return fail(err instanceof Error ? err.message : "network error");
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch {
    return fail(`unreadable response (HTTP ${response.status})`);
  }

  if (!response.ok) {
    const apiError = ApiErrorSchema.safeParse(json);
    return fail(apiError.success ? apiError.data.error : `HTTP ${response.status}`);
  }

  const parsed = ResolveResultSchema.safeParse(json);
  return parsed.success ? parsed.data : fail("unexpected response shape");
}

export function remoteAnswerResolver(
  persona: PersonaId,
  fetchImpl: typeof fetch = fetch,
): AnswerResolver {
  return (question, params) =>
    postForResult(
      "/api/answer",
      { question, temperature: params.temperature, maxTokens: params.maxTokens, persona },
      "Error calling completion API",
      fetchImpl,
    );
}

export function fetchImage(
  request: ImageRequest,
  fetchImpl: typeof fetch = fetch,
): Promise<ResolveResult<string>> {
  return postForResult("/api/image", request, "Error generating image", fetchImpl);
}
