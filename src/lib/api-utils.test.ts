import { describe, it, expect } from "vitest";
import { apiError, apiSuccess } from "./api-utils";

describe("apiError", () => {
  it("wraps the message in an error body", async () => {
    const res = apiError("Invalid request: body must be JSON", 400);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid request: body must be JSON" });
  });

  it("merges extra headers over the JSON defaults", () => {
    const res = apiError("Slow down", 429, { "Retry-After": "60" });
    expect(res.headers.get("Retry-After")).toBe("60");
    expect(res.headers.get("Content-Type")).toBe("application/json");
    expect(res.headers.get("Cache-Control")).toBe("no-store");
  });
});

describe("apiSuccess", () => {
  it("serializes the data with status 200", async () => {
    const res = apiSuccess({ ok: true, value: "42" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, value: "42" });
  });

  it("takes a custom status", () => {
    expect(apiSuccess({}, 201).status).toBe(201);
  });

  it("is never cached", () => {
    const res = apiSuccess({});
    expect(res.headers.get("Content-Type")).toBe("application/json");
    expect(res.headers.get("Cache-Control")).toBe("no-store");
  });
});
