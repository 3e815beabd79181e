/**
 * Client error reporting.
 * Logs to the console and, when NEXT_PUBLIC_ERROR_ENDPOINT is set outside
 * development, posts the error there. Never throws.
 */
export function reportError(error: Error, context?: Record<string, unknown>): void {
  console.error("[Answer Machine]", error.message, context);

  const endpoint = process.env.NEXT_PUBLIC_ERROR_ENDPOINT;
  if (!endpoint || process.env.NODE_ENV === "development") return;

  fetch(endpoint, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      message: error.message,
      stack: error.stack,
      context,
      timestamp: Date.now(),
      url: typeof window !== "undefined" ? window.location.href : undefined,
    }),
  }).catch((err: unknown) => {
    console.debug("[Answer Machine] Error report not delivered:", err);
  });
}

// Rejections can carry anything; keep a real Error when there is one
export function toError(reason: unknown, fallbackMessage?: string): Error {
  if (reason instanceof Error) return reason;
  if (reason === undefined || reason === null) return new Error(fallbackMessage ?? "Unknown error");
  return new Error(typeof reason === "string" ? reason : describe(reason));
}

function describe(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

// Cross-origin script failures reach window.onerror with no detail at all
export function isOpaqueScriptError(message: string, error: unknown): boolean {
  return message === "Script error." && error == null;
}
