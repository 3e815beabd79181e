import { z } from "zod";
import { createRateLimiter } from "@/lib/rate-limit";
import { apiError, apiSuccess } from "@/lib/api-utils";
import { resolveImage } from "@/lib/ai/image";
import { clientIp, validationMessage } from "@/lib/request";

export const runtime = "nodejs";
export const maxDuration = 120; // two image generations in the worst case

const ImageRequestSchema = z.object({
  prompt: z.string().trim().min(1, "Please enter a description to generate an image.").max(4000),
  subject: z.string().trim().max(200).optional(),
  accentColor: z.string().trim().max(40).optional(),
  aspect: z.enum(["1:1", "3:2", "2:3", "auto"]).optional(),
  quality: z.enum(["low", "medium", "high"]).optional(),
});

const limiter = createRateLimiter(10);

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

  const parsed = ImageRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = validationMessage(parsed.error);
    console.debug("[Image API] Validation failed:", detail);
    return apiError(`Invalid request: ${detail}`, 400);
  }

  const result = await resolveImage(parsed.data);
  if (!result.ok) {
    console.debug(`[Image API] ${result.error.kind} error:`, result.error.message);
  }
  return apiSuccess(result);
}
