import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { buildFallbackPrompt, extractImageUrl, resolveImage, simplifySubject } from "./image";
import { MISSING_KEY_MESSAGE } from "./config";
import { memorySecrets } from "./secrets";
import type { FetchLike } from "./client";

const secrets = memorySecrets({ API_KEY: "test-key" });

const ok = (content: string) => new Response(JSON.stringify({ choices: [{ message: { content } }] }));
const fail = (status: number, message: string) => new Response(JSON.stringify({ error: { message } }), { status });

function promptsSent(fetchMock: Mock<FetchLike>): string[] {
  return fetchMock.mock.calls.map(([, init]) => JSON.parse(String(init.body)).messages[0].content);
}

describe("extractImageUrl", () => {
  it("finds the first URL in free text", () => {
    expect(extractImageUrl("Here you go: https://cdn.example.test/a.png and https://cdn.example.test/b.png")).toBe(
      "https://cdn.example.test/a.png",
    );
  });

  it("stops at a closing parenthesis", () => {
    expect(extractImageUrl("![image](https://cdn.example.test/cat.jpg)")).toBe("https://cdn.example.test/cat.jpg");
  });

  it("accepts plain http", () => {
    expect(extractImageUrl("http://img.example.test/x")).toBe("http://img.example.test/x");
  });

  it("returns null when there is no URL", () => {
    expect(extractImageUrl("Sorry, I can't draw that.")).toBeNull();
  });
});

describe("buildFallbackPrompt", () => {
  it("uses the subject and accent color when given", () => {
    expect(buildFallbackPrompt({ prompt: "ignored", subject: "a lion", accentColor: "gold" })).toBe(
      "A beautiful, professional photograph of a lion with gold color accents, well-lit, high quality",
    );
  });

  it("derives the subject from the prompt's first sentence", () => {
    expect(buildFallbackPrompt({ prompt: "A majestic lion wearing a crown. It sits in a jungle." })).toBe(
      "A beautiful, professional photograph of A majestic lion wearing a crown, well-lit, high quality",
    );
  });
});

describe("simplifySubject", () => {
  it("keeps at most twelve words", () => {
    expect(simplifySubject("one two three four five six seven eight nine ten eleven twelve thirteen fourteen")).toBe(
      "one two three four five six seven eight nine ten eleven twelve",
    );
  });

  it("drops trailing separators", () => {
    expect(simplifySubject("a red bicycle, leaning on a wall, at dusk, in the rain, with puddles")).toBe(
      "a red bicycle, leaning on a wall, at dusk, in the rain",
    );
  });

  it("has a default for empty prompts", () => {
    expect(simplifySubject("   ")).toBe("a scenic landscape");
  });
});

describe("resolveImage", () => {
  beforeEach(() => {
    for (const name of ["API_KEY", "API_BASE", "POE_BASE_URL", "IMAGE_MODEL"]) vi.stubEnv(name, "");
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("returns the URL from the first response", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => ok("Image ready: https://cdn.example.test/lion.png"));

    const result = await resolveImage({ prompt: "a lion" }, { secrets, fetch: fetchMock });

    expect(result).toEqual({ ok: true, value: "https://cdn.example.test/lion.png" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(fetchMock.mock.calls[0][1].body))).toEqual({
      aspect: "3:2",
      quality: "high",
      model: "Qwen-Image",
      messages: [{ role: "user", content: "a lion" }],
      stream: false,
    });
  });

  it("passes aspect and quality through", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => ok("https://cdn.example.test/x.png"));
    await resolveImage({ prompt: "p", aspect: "1:1", quality: "low" }, { secrets, fetch: fetchMock });
    expect(JSON.parse(String(fetchMock.mock.calls[0][1].body))).toMatchObject({ aspect: "1:1", quality: "low" });
  });

  it("retries once with the fallback prompt when the first request fails", async () => {
    const fetchMock = vi.fn<FetchLike>()
      .mockResolvedValueOnce(fail(400, "prompt rejected"))
      .mockResolvedValueOnce(ok("https://cdn.example.test/fallback.png"));

    const result = await resolveImage(
      { prompt: "something the model refuses", subject: "a bowl of ramen", accentColor: "red" },
      { secrets, fetch: fetchMock },
    );

    expect(result).toEqual({ ok: true, value: "https://cdn.example.test/fallback.png" });
    expect(promptsSent(fetchMock)).toEqual([
      "something the model refuses",
      "A beautiful, professional photograph of a bowl of ramen with red color accents, well-lit, high quality",
    ]);
  });

  it("never makes a third request", async () => {
    const fetchMock = vi.fn<FetchLike>()
      .mockResolvedValueOnce(fail(500, "first failure"))
      .mockResolvedValueOnce(fail(500, "second failure"))
      .mockResolvedValue(ok("https://cdn.example.test/never.png"));

    const result = await resolveImage({ prompt: "a cat" }, { secrets, fetch: fetchMock });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(result).toEqual({
      ok: false,
      error: { kind: "capability", message: "Error generating image: HTTP 500: second failure" },
    });
  });

  it("reports a response without a URL and skips the fallback", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => ok("I cannot generate that image."));

    const result = await resolveImage({ prompt: "a cat" }, { secrets, fetch: fetchMock });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      ok: false,
      error: { kind: "no_image_url", message: "Error: no image URL in response: I cannot generate that image." },
    });
  });

  it("returns a configuration error without any request", async () => {
    const fetchMock = vi.fn<FetchLike>();
    const result = await resolveImage({ prompt: "a cat" }, { secrets: memorySecrets({}), fetch: fetchMock });

    expect(result).toEqual({ ok: false, error: { kind: "configuration", message: MISSING_KEY_MESSAGE } });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
