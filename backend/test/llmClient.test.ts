import { describe, it, expect, vi } from "vitest";
import axios, { AxiosError, CanceledError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";

import { ChatCompletionsClient, chatCompletionsUrl, providerDetail } from "../ai/extractor/llmClient";
import type { LlmConfig } from "../services/config";

const config: LlmConfig = {
  apiKey: "test-key",
  apiUrl: "https://llm.example.test/v1/",
  model: "test-model",
  timeoutMs: 30_000,
  temperature: 0.1,
  topP: 0.95,
  maxTokens: 512,
};

const prompt = { system: "sys", user: "user prompt" };

function respond(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

function httpWith(adapter: (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>) {
  return axios.create({ adapter });
}

function failWith(status: number, data: unknown) {
  return httpWith(async (cfg) => {
    throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, cfg, undefined, respond(cfg, status, data));
  });
}

describe("chatCompletionsUrl", () => {
  it("appends the endpoint path once", () => {
    expect(chatCompletionsUrl("https://api.opentyphoon.ai/v1")).toBe("https://api.opentyphoon.ai/v1/chat/completions");
    expect(chatCompletionsUrl("https://api.opentyphoon.ai/v1//")).toBe("https://api.opentyphoon.ai/v1/chat/completions");
    expect(chatCompletionsUrl("https://host/v1/chat/completions/")).toBe("https://host/v1/chat/completions");
  });
});

describe("providerDetail", () => {
  it("prefers the provider's error message", () => {
    expect(providerDetail({ error: { message: "Invalid model" } })).toBe("Invalid model");
    expect(providerDetail({ error: "quota exceeded" })).toBe("quota exceeded");
    expect(providerDetail("Bad Gateway")).toBe("Bad Gateway");
    expect(providerDetail({ detail: "x" })).toBe('{"detail":"x"}');
  });
});

describe("ChatCompletionsClient", () => {
  it("posts the chat request and returns the message content", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const http = httpWith(async (cfg) => {
      seen.push(cfg);
      return respond(cfg, 200, { choices: [{ message: { role: "assistant", content: '{"recipientName":"A"}' } }] });
    });

    const result = await new ChatCompletionsClient(config, http).complete(prompt);

    expect(result).toEqual({ ok: true, value: '{"recipientName":"A"}' });
    expect(seen).toHaveLength(1);
    const req = seen[0];
    expect(req.url).toBe("https://llm.example.test/v1/chat/completions");
    expect(req.method).toBe("post");
    expect(req.timeout).toBe(30_000);
    expect(req.headers.Authorization).toBe("Bearer test-key");
    expect(JSON.parse(String(req.data))).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "user prompt" },
      ],
      temperature: 0.1,
      top_p: 0.95,
      max_tokens: 512,
    });
  });

  it("surfaces the provider error on non-2xx", async () => {
    const result = await new ChatCompletionsClient(config, failWith(401, { error: { message: "Invalid API key" } })).complete(prompt);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("HTTP 401: Invalid API key");
      expect(result.error.status).toBe(401);
      expect(result.error.kind).toBe("LlmCapabilityError");
    }
  });

  it("falls back to the raw body when the provider sends no error object", async () => {
    const result = await new ChatCompletionsClient(config, failWith(500, "upstream exploded")).complete(prompt);
    expect(!result.ok && result.error.message).toBe("HTTP 500: upstream exploded");
  });

  it("reports a timeout", async () => {
    const http = httpWith(async (cfg) => {
      throw new AxiosError("timeout of 30000ms exceeded", AxiosError.ECONNABORTED, cfg);
    });
    const result = await new ChatCompletionsClient(config, http).complete(prompt);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("LLM request timed out after 30s");
      expect(result.error.timedOut).toBe(true);
    }
  });

  it("hands the caller's abort signal to the request", async () => {
    const controller = new AbortController();
    const seen: InternalAxiosRequestConfig[] = [];
    const http = httpWith(async (cfg) => {
      seen.push(cfg);
      return respond(cfg, 200, { choices: [{ message: { content: "{}" } }] });
    });

    await new ChatCompletionsClient(config, http).complete(prompt, { signal: controller.signal });

    expect(seen[0].signal).toBe(controller.signal);
  });

  it("reports a cancelled request", async () => {
    const http = httpWith(async () => {
      throw new CanceledError();
    });
    const result = await new ChatCompletionsClient(config, http).complete(prompt);
    expect(!result.ok && result.error.message).toBe("LLM request cancelled");
  });

  it("reports network errors", async () => {
    const http = httpWith(async (cfg) => {
      throw new AxiosError("connect ECONNREFUSED 127.0.0.1:443", AxiosError.ERR_NETWORK, cfg);
    });
    const result = await new ChatCompletionsClient(config, http).complete(prompt);
    expect(!result.ok && result.error.message).toBe("LLM network error: connect ECONNREFUSED 127.0.0.1:443");
  });

  it("rejects a malformed envelope", async () => {
    const http = httpWith(async (cfg) => respond(cfg, 200, { choices: [] }));
    const result = await new ChatCompletionsClient(config, http).complete(prompt);
    expect(!result.ok && result.error.message).toBe("Malformed completion envelope: missing choices[0].message.content");
  });

  it("refuses to call the provider without a key", async () => {
    const adapter = vi.fn(async (cfg: InternalAxiosRequestConfig) => respond(cfg, 200, {}));
    const client = new ChatCompletionsClient({ ...config, apiKey: "  " }, httpWith(adapter));
    expect(client.isConfigured()).toBe(false);
    const result = await client.complete(prompt);
    expect(!result.ok && result.error.message).toBe("LLM API key not configured");
    expect(adapter).not.toHaveBeenCalled();
  });
});
