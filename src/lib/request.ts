import type { ZodError } from "zod";

export function clientIp(req: Request): string {
  return req.headers.get("x-forwarded-for")?.split(",")[0]?.trim() || "unknown";
}

// First issue as "path: message", the way the API reports bad bodies
export function validationMessage(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid format";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
