import axios, { AxiosError, type AxiosInstance } from "axios";
import { z } from "zod";

import type { LlmConfig } from "../../services/config";
import { LlmCapabilityError, err, getErrorMessage, ok, type Result } from "../../services/errors";
import { createLog } from "../../services/log";
import type { ExtractionPrompt } from "./systemPrompt";

const log = createLog("llm");

export interface CompleteOptions {
  /** Fired by the caller to abandon an in-flight request. */
  signal?: AbortSignal;
}

/** Black-box completion capability: prompt in, raw model text out. */
export interface LlmCapability {
  complete(prompt: ExtractionPrompt, options?: CompleteOptions): Promise<Result<string, LlmCapabilityError>>;
  isConfigured(): boolean;
}

const completionEnvelope = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1),
});

const providerError = z.object({
  error: z.union([z.object({ message: z.string() }), z.string()]),
});

/** Accept either a base URL or the full endpoint; never append the path twice. */
export function chatCompletionsUrl(rawUrl: string): string {
  const base = rawUrl.replace(/\/+$/, "");
  return base.endsWith("/chat/completions") ? base : `${base}/chat/completions`;
}

/** Provider's own error message when the body carries one, else the body text. */
export function providerDetail(data: unknown): string {
  const parsed = providerError.safeParse(data);
  if (parsed.success) {
    const e = parsed.data.error;
    return typeof e === "string" ? e : e.message;
  }
  if (typeof data === "string") return data;
  return data === undefined ? "" : JSON.stringify(data);
}

function toCapabilityError(e: unknown, timeoutMs: number): LlmCapabilityError {
  if (axios.isCancel(e)) {
    return new LlmCapabilityError("LLM request cancelled", { cause: e });
  }
  if (axios.isAxiosError(e)) {
    const ax: AxiosError = e;
    if (ax.response) {
      const status = ax.response.status;
      return new LlmCapabilityError(`HTTP ${status}: ${providerDetail(ax.response.data)}`, { status, cause: e });
    }
    if (ax.code === AxiosError.ECONNABORTED || ax.code === AxiosError.ETIMEDOUT) {
      return new LlmCapabilityError(`LLM request timed out after ${timeoutMs / 1000}s`, { timedOut: true, cause: e });
    }
    return new LlmCapabilityError(`LLM network error: ${ax.message}`, { cause: e });
  }
  return new LlmCapabilityError(`LLM request failed: ${getErrorMessage(e)}`, { cause: e });
}

/**
 * OpenAI-compatible chat-completions client (Typhoon by default).
 * No retries: one failure ends the request.
 */
export class ChatCompletionsClient implements LlmCapability {
  private readonly http: AxiosInstance;
  readonly endpoint: string;

  constructor(private readonly config: LlmConfig, http?: AxiosInstance) {
    this.endpoint = chatCompletionsUrl(config.apiUrl);
    this.http = http ?? axios.create();
    if (!this.isConfigured()) log.warn("LLM_API_KEY is not set; extraction requests will fail");
  }

  isConfigured(): boolean {
    return this.config.apiKey.trim().length > 0;
  }

  async complete(prompt: ExtractionPrompt, options: CompleteOptions = {}): Promise<Result<string, LlmCapabilityError>> {
    if (!this.isConfigured()) {
      return err(new LlmCapabilityError("LLM API key not configured"));
    }

    const body = {
      model: this.config.model,
      messages: [
        { role: "system", content: prompt.system },
        { role: "user", content: prompt.user },
      ],
      temperature: this.config.temperature,
      top_p: this.config.topP,
      max_tokens: this.config.maxTokens,
    };

    let data: unknown;
    try {
      const res = await this.http.post(this.endpoint, body, {
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.config.apiKey.trim()}`,
        },
        timeout: this.config.timeoutMs,
        signal: options.signal,
      });
      data = res.data;
    } catch (e) {
      const error = toCapabilityError(e, this.config.timeoutMs);
      log.error(`${error.message} (endpoint ${this.endpoint})`);
      return err(error);
    }

    const envelope = completionEnvelope.safeParse(data);
    if (!envelope.success) {
      return err(new LlmCapabilityError("Malformed completion envelope: missing choices[0].message.content"));
    }
    return ok(envelope.data.choices[0].message.content);
  }
}
