import { afterEach, describe, it, expect, vi, type Mock } from "vitest";
import { ChatCompletionError, chatCompletion, type FetchLike } from "./client";

const config = { apiKey: "test-key", baseUrl: "https://llm.example.test/v1" };

function respond(status: number, body: unknown) {
  return vi.fn<FetchLike>(async () =>
    new Response(typeof body === "string" ? body : JSON.stringify(body), { status }),
  );
}

function sentBody(fetchMock: Mock<FetchLike>): Record<string, unknown> {
  const init = fetchMock.mock.calls[0][1];
  return JSON.parse(String(init.body));
}

// A body that never arrives; it errors only once the request is aborted
function stalledBody(signal: AbortSignal | null | undefined) {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      signal?.addEventListener("abort", () => controller.error(new DOMException("This operation was aborted", "AbortError")));
    },
  });
}

describe("chatCompletion", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("posts an OpenAI-style request and returns the first choice", async () => {
    const fetchMock = respond(200, { choices: [{ message: { content: "hello there" } }, { message: { content: "ignored" } }] });

    const content = await chatCompletion(
      config,
      { model: "m", messages: [{ role: "user", content: "hi" }], temperature: 0.4, maxTokens: 300 },
      fetchMock,
    );

    expect(content).toBe("hello there");
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.example.test/v1/chat/completions");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-key" });
    expect(sentBody(fetchMock)).toEqual({
      model: "m",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.4,
      max_tokens: 300,
      stream: false,
    });
  });

  it("omits unset sampling params and merges extra fields", async () => {
    const fetchMock = respond(200, { choices: [{ message: { content: "x" } }] });
    await chatCompletion(
      config,
      { model: "img", messages: [{ role: "user", content: "cat" }], extra: { aspect: "3:2", quality: "high" } },
      fetchMock,
    );
    expect(sentBody(fetchMock)).toEqual({
      aspect: "3:2",
      quality: "high",
      model: "img",
      messages: [{ role: "user", content: "cat" }],
      stream: false,
    });
  });

  it("returns an empty string for null content", async () => {
    const fetchMock = respond(200, { choices: [{ message: { content: null } }] });
    await expect(chatCompletion(config, { model: "m", messages: [] }, fetchMock)).resolves.toBe("");
  });

  it("throws with the provider's error message on non-2xx", async () => {
    const fetchMock = respond(401, { error: { message: "invalid_api_key" } });
    const error = await chatCompletion(config, { model: "m", messages: [] }, fetchMock).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ChatCompletionError);
    expect(error).toMatchObject({ message: "HTTP 401: invalid_api_key", status: 401 });
  });

  it("uses the raw body when the error is not JSON", async () => {
    const fetchMock = respond(502, "Bad Gateway");
    await expect(chatCompletion(config, { model: "m", messages: [] }, fetchMock)).rejects.toThrow("HTTP 502: Bad Gateway");
  });

  it("rejects malformed success bodies", async () => {
    await expect(
      chatCompletion(config, { model: "m", messages: [] }, respond(200, "not json")),
    ).rejects.toThrow("Malformed response: body is not JSON");
    await expect(
      chatCompletion(config, { model: "m", messages: [] }, respond(200, { choices: [] })),
    ).rejects.toThrow("Malformed response: choices:");
  });

  it("wraps network failures", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(chatCompletion(config, { model: "m", messages: [] }, fetchMock)).rejects.toThrow(
      new ChatCompletionError("fetch failed"),
    );
  });

  it("times out a request that never answers", async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<FetchLike>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new DOMException("This operation was aborted", "AbortError")));
        }),
    );

    const result = chatCompletion(config, { model: "m", messages: [] }, fetchMock).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(60_000);

    const error = await result;
    expect(error).toBeInstanceOf(ChatCompletionError);
    expect(error).toMatchObject({ message: "Request timed out after 60s" });
    expect(fetchMock.mock.calls[0][1].signal?.aborted).toBe(true);
  });

  it("keeps the timeout running while the body is read", async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<FetchLike>(async (_url, init) => new Response(stalledBody(init.signal), { status: 200 }));

    const result = chatCompletion(config, { model: "m", messages: [] }, fetchMock).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(60_000);

    const error = await result;
    expect(error).toBeInstanceOf(ChatCompletionError);
    expect(error).toMatchObject({ message: "Request timed out after 60s", status: null });
  });
});
