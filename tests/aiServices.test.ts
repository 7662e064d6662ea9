import { describe, it, expect, vi, beforeEach } from "vitest";

// ─── Mocks ───
vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});
vi.mock("../src/utils/logger.js", () => ({
  default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import fetch, { Response } from "node-fetch";
import { createCompletionClient } from "../src/services/aiServices.js";
import { CompletionError } from "../src/models/errors.js";

const fetchMock = vi.mocked(fetch);
const API_URL = "https://llm.test/v1/chat/completions";
const messages = [
  { role: "system" as const, content: "sys" },
  { role: "user" as const, content: "Tell me a pun joke about Git." },
];

function jsonResponse(body: unknown, status = 200, statusText = "") {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "Content-Type": "application/json" },
  });
}

function client(apiKey: string | undefined = "test-secret", timeoutMs = 1000) {
  return createCompletionClient({ apiUrl: API_URL, apiKey, timeoutMs });
}

describe("createCompletionClient", () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it("returns the first choice content", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        choices: [
          { message: { role: "assistant", content: "I would tell you a UDP joke, but you might not get it." } },
          { message: { role: "assistant", content: "second" } },
        ],
      })
    );

    const reply = await client().complete({ model: "gpt-4", messages, temperature: 0.8 });
    expect(reply).toBe("I would tell you a UDP joke, but you might not get it.");
  });

  it("posts the chat-completions body with a bearer credential", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: "ok" } }] }));

    await client().complete({ model: "gpt-4", messages, temperature: 0.3 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(API_URL);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "gpt-4",
      messages,
      temperature: 0.3,
      max_tokens: 400,
      stream: false,
    });
  });

  it("passes a custom max token bound", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: "ok" } }] }));

    await client().complete({ model: "gpt-4", messages, temperature: 0.3, maxTokens: 50 });

    const [, init] = fetchMock.mock.calls[0];
    expect(JSON.parse(String(init?.body)).max_tokens).toBe(50);
  });

  it("fails without calling the service when no key is configured", async () => {
    const err = await client(undefined).complete({ model: "gpt-4", messages, temperature: 0.8 }).catch((e) => e);

    expect(err).toBeInstanceOf(CompletionError);
    expect(err.message).toBe("Missing API key. Set OPENAI_API_KEY or provide a key for this session.");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports the provider error message on a non-2xx status", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ error: { message: "Incorrect API key provided" } }, 401, "Unauthorized")
    );

    const err = await client().complete({ model: "gpt-4", messages, temperature: 0.8 }).catch((e) => e);

    expect(err).toBeInstanceOf(CompletionError);
    expect(err.message).toBe("Completion service returned 401: Incorrect API key provided");
    expect(err.status).toBe(401);
  });

  it("falls back to the status text when the error body is not JSON", async () => {
    fetchMock.mockResolvedValue(new Response("slow down", { status: 429, statusText: "Too Many Requests" }));

    await expect(client().complete({ model: "gpt-4", messages, temperature: 0.8 })).rejects.toThrow(
      "Completion service returned 429: Too Many Requests"
    );
  });

  it("rejects a malformed body", async () => {
    fetchMock.mockResolvedValue(new Response("not json", { status: 200 }));

    await expect(client().complete({ model: "gpt-4", messages, temperature: 0.8 })).rejects.toThrow(
      "Unexpected response from the completion service."
    );
  });

  it("reports a timeout that fires while the body is read", async () => {
    const response = jsonResponse({ choices: [{ message: { content: "late" } }] });
    const abort = new Error("The operation was aborted.");
    abort.name = "AbortError";
    vi.spyOn(response, "json").mockRejectedValue(abort);
    fetchMock.mockResolvedValue(response);

    await expect(client().complete({ model: "gpt-4", messages, temperature: 0.8 })).rejects.toThrow(
      "Completion service timed out after 1000 ms."
    );
  });

  it("rejects an empty reply", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ choices: [] }));

    await expect(client().complete({ model: "gpt-4", messages, temperature: 0.8 })).rejects.toThrow(
      "The completion service returned an empty reply."
    );
  });

  it("wraps network errors", async () => {
    const cause = new Error("connect ECONNREFUSED");
    fetchMock.mockRejectedValue(cause);

    const err = await client().complete({ model: "gpt-4", messages, temperature: 0.8 }).catch((e) => e);

    expect(err).toBeInstanceOf(CompletionError);
    expect(err.message).toBe("Could not reach the completion service: connect ECONNREFUSED");
    expect(err.cause).toBe(cause);
  });

  it("aborts the call after the timeout", async () => {
    fetchMock.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const abort = new Error("The operation was aborted.");
            abort.name = "AbortError";
            reject(abort);
          });
        })
    );

    await expect(client("test-secret", 20).complete({ model: "gpt-4", messages, temperature: 0.8 })).rejects.toThrow(
      "Completion service timed out after 20 ms."
    );
  });
});
