import { beforeEach, describe, it, expect, vi } from "vitest";
import { resolveImage } from "@/lib/ai/image";
import { POST } from "./route";

vi.mock("@/lib/ai/image", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@/lib/ai/image")>()),
  resolveImage: vi.fn(),
}));

function post(ip: string, body: unknown) {
  return POST(
    new Request("http://localhost/api/image", {
      method: "POST",
      headers: { "Content-Type": "application/json", "x-forwarded-for": ip },
      body: JSON.stringify(body),
    }),
  );
}

describe("POST /api/image", () => {
  beforeEach(() => {
    vi.mocked(resolveImage).mockReset();
    vi.mocked(resolveImage).mockResolvedValue({ ok: true, value: "https://img.example/cat.png" });
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  it("returns the image URL", async () => {
    const res = await post("192.0.2.1", { prompt: "a cat on a roof", aspect: "1:1", quality: "low" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, value: "https://img.example/cat.png" });
    expect(resolveImage).toHaveBeenCalledWith({ prompt: "a cat on a roof", aspect: "1:1", quality: "low" });
  });

  it("trims the optional fallback hints", async () => {
    await post("192.0.2.2", { prompt: "p", subject: "  a cat ", accentColor: " orange " });
    expect(resolveImage).toHaveBeenCalledWith({ prompt: "p", subject: "a cat", accentColor: "orange" });
  });

  it("rejects an empty prompt", async () => {
    const res = await post("192.0.2.3", { prompt: "" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid request: prompt: Please enter a description to generate an image.",
    });
    expect(resolveImage).not.toHaveBeenCalled();
  });

  it("rejects an unknown aspect ratio", async () => {
    const res = await post("192.0.2.4", { prompt: "p", aspect: "16:9" });
    expect(res.status).toBe(400);
  });

  it("reports a missing image URL as a result, not an HTTP error", async () => {
    vi.mocked(resolveImage).mockResolvedValue({
      ok: false,
      error: { kind: "no_image_url", message: "Error: no image URL in response: sorry" },
    });

    const res = await post("192.0.2.5", { prompt: "p" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: false,
      error: { kind: "no_image_url", message: "Error: no image URL in response: sorry" },
    });
  });

  it("limits each client to 10 requests a minute", async () => {
    for (let i = 0; i < 10; i++) {
      expect((await post("192.0.2.6", { prompt: "p" })).status).toBe(200);
    }
    const res = await post("192.0.2.6", { prompt: "p" });
    expect(res.status).toBe(429);
    expect(await res.json()).toEqual({ error: "You’re asking too quickly. Please wait a moment." });
  });
});
