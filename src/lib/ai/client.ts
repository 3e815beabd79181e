import { z } from "zod";
import type { AiConfig } from "@/lib/ai/config";

// Minimal client for OpenAI-compatible /chat/completions endpoints.
// No retries: a failed call is reported once and the caller decides.

const REQUEST_TIMEOUT_MS = 60_000;

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  // Provider-specific fields merged into the body (e.g. image aspect/quality)
  extra?: Record<string, string | number | boolean>;
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }),
  })).min(1),
});

function payloadToMessage(text: string): string {
  try {
    const json: unknown = JSON.parse(text);
    const parsed = z.object({ error: z.object({ message: z.string() }) }).safeParse(json);
    if (parsed.success) return parsed.data.error.message;
  } catch {
    // not JSON; use the raw body
  }
  return text.slice(0, 500) || "Empty response body";
}

export class ChatCompletionError extends Error {
  status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "ChatCompletionError";
    this.status = status;
  }
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** Returns the first choice's content (possibly empty). Throws ChatCompletionError. */
export async function chatCompletion(
  config: Pick<AiConfig, "apiKey" | "baseUrl">,
  request: ChatCompletionRequest,
  fetchImpl: FetchLike = fetch,
): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

  let response: Response;
  let text: string;
  // The timer covers the body read too; a stalled body aborts like a stalled connect
  try {
    response = await fetchImpl(`${config.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.apiKey}`,
      },
      body: JSON.stringify({
        ...request.extra,
        model: request.model,
        messages: request.messages,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
        stream: false,
      }),
      signal: controller.signal,
    });
    text = await response.text();
  } catch (err) {
    if (controller.signal.aborted) {
      throw new ChatCompletionError(`Request timed out after ${REQUEST_TIMEOUT_MS / 1000}s`);
    }
    throw new ChatCompletionError(err instanceof Error ? err.message : String(err));
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    throw new ChatCompletionError(`HTTP ${response.status}: ${payloadToMessage(text)}`, response.status);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ChatCompletionError("Malformed response: body is not JSON", response.status);
  }

  const parsed = ChatCompletionResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "unexpected shape";
    throw new ChatCompletionError(`Malformed response: ${detail}`, response.status);
  }

  return parsed.data.choices[0].message.content ?? "";
}
