import { z } from "zod";
import { createRateLimiter } from "@/lib/rate-limit";
import { apiError, apiSuccess } from "@/lib/api-utils";
import { DEFAULT_GENERATION, resolveAnswer } from "@/lib/ai/answer";
import { clientIp, validationMessage } from "@/lib/request";

export const runtime = "nodejs";
export const maxDuration = 60;

const AnswerRequestSchema = z.object({
  question: z.string().trim().min(1, "Question is required").max(2000),
  temperature: z.number().min(0).max(1).default(DEFAULT_GENERATION.temperature),
  maxTokens: z.number().int().min(50).max(2000).default(DEFAULT_GENERATION.maxTokens),
  persona: z.enum(["friend", "unsure"]).optional(),
});

const limiter = createRateLimiter(20);

export async function POST(req: Request) {
  if (!limiter.check(clientIp(req))) {
    return apiError("You’re asking too quickly. Please wait a moment.", 429, { "Retry-After": "60" });
  }

  let raw: unknown;
  try {
    raw = await req.json();
  } catch {
    return apiError("Invalid request: body must be JSON", 400);
  }

  const parsed = AnswerRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = validationMessage(parsed.error);
    console.debug("[Answer API] Validation failed:", detail);
    return apiError(`Invalid request: ${detail}`, 400);
  }

  const { question, temperature, maxTokens, persona } = parsed.data;
  const result = await resolveAnswer(question, { temperature, maxTokens }, { persona });
  if (!result.ok) {
    console.debug(`[Answer API] ${result.error.kind} error:`, result.error.message);
  }
  return apiSuccess(result);
}
