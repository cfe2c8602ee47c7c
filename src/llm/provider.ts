import axios, { AxiosError } from "axios";
import { z } from "zod";

import type { Capability, ProviderConfig } from "../config/pipelineConfig";

export const ImageInputSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("url"), url: z.string().url() }).strict(),
  z.object({ kind: z.literal("bytes"), bytes: z.instanceof(Buffer), contentType: z.string().min(1) }).strict(),
]);

export type ImageInput = z.infer<typeof ImageInputSchema>;

export type ProviderErrorCode =
  | "PROVIDER_UNAVAILABLE"
  | "PROVIDER_RATE_LIMITED"
  | "PROVIDER_TIMEOUT"
  | "CAPABILITY_UNSUPPORTED"
  | "PROVIDER_REQUEST_INVALID";

export class ProviderError extends Error {
  public readonly code: ProviderErrorCode;

  public readonly cause?: unknown;

  public readonly retryAfterMs: number | null;

  constructor(code: ProviderErrorCode, message: string, cause?: unknown, retryAfterMs: number | null = null) {
    super(message);
    this.name = "ProviderError";
    this.code = code;
    this.cause = cause;
    this.retryAfterMs = retryAfterMs;
  }
}

export type CallOptions = {
  signal?: AbortSignal;
  maxTokens?: number;
  temperature?: number;
};

export type ProviderCompletion = {
  text: string;
  inputTokens: number;
  outputTokens: number;
  model: string;
};

export type ProviderPricing = { inputPer1k: number; outputPer1k: number };

/**
 * One LLM backend behind the capability contract. Adapters never retry and
 * never fall back; they classify every failure into a {@link ProviderError}
 * and leave recovery to the caller.
 */
export interface ProviderAdapter {
  readonly id: string;
  readonly capabilities: readonly Capability[];
  readonly priority: number;
  readonly models: { text: string; vision: string | null };
  readonly pricing: ProviderPricing;

  callText(prompt: string, options?: CallOptions): Promise<ProviderCompletion>;

  callVision(prompt: string, image: ImageInput, options?: CallOptions): Promise<ProviderCompletion>;
}

const SYSTEM_INSTRUCTION = "You are a strict JSON generator. Output JSON only. No markdown, no extra keys, no prose.";

const DEFAULT_MAX_TOKENS = 900;

function normalizeOpenAiBaseUrl(raw: string): string {
  const base = String(raw || "").trim() || "https://api.openai.com";
  const noTrailingSlash = base.replace(/\/+$/, "");
  // Some proxies ask users to set ".../v1" as the base URL. Our client always calls "/v1/chat/completions".
  return noTrailingSlash.replace(/\/v1$/i, "");
}

function normalizeGeminiBaseUrl(raw: string): string {
  const noTrailingSlash = String(raw || "https://generativelanguage.googleapis.com").trim().replace(/\/+$/, "");
  // Some deploy configs include the API version in the base URL already.
  return noTrailingSlash
    .replace(/\/v1beta\/models$/i, "")
    .replace(/\/v1\/models$/i, "")
    .replace(/\/v1beta$/i, "")
    .replace(/\/v1$/i, "");
}

function geminiModelName(model: string): string {
  const m = String(model || "").trim();
  return m.startsWith("models/") ? m.slice("models/".length) : m;
}

function toDataUrl(bytes: Buffer, contentType: string): string {
  return `data:${contentType};base64,${bytes.toString("base64")}`;
}

export function parseRetryAfterMs(value: unknown, now: number = Date.now()): number | null {
  if (value === null || value === undefined) return null;
  const s = String(value).trim();
  if (!s) return null;

  const seconds = Number(s);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);

  const dateMs = Date.parse(s);
  if (!Number.isNaN(dateMs)) return Math.max(0, dateMs - now);

  return null;
}

const ApiErrorBodySchema = z
  .object({
    error: z.object({ message: z.string().optional() }).passthrough().optional(),
    message: z.string().optional(),
  })
  .passthrough();

function apiMessageFrom(data: unknown): string {
  const parsed = ApiErrorBodySchema.safeParse(data);
  if (!parsed.success) return "";
  return String(parsed.data.error?.message ?? parsed.data.message ?? "").trim();
}

/**
 * Maps a transport failure onto the adapter error taxonomy. 429 is a rate
 * limit, auth failures and 5xx make the backend unavailable, any other 4xx is
 * a request-shape problem that another backend would reject as well.
 */
export function toProviderError(err: unknown, providerId: string): ProviderError {
  if (err instanceof ProviderError) return err;

  if (axios.isCancel(err)) {
    return new ProviderError("PROVIDER_TIMEOUT", `${providerId} request was aborted`, err);
  }

  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
      return new ProviderError("PROVIDER_TIMEOUT", `${providerId} request timed out`, err);
    }

    const status = err.response?.status;
    const apiMessage = apiMessageFrom(err.response?.data);
    const suffix = apiMessage ? `: ${apiMessage.slice(0, 200)}` : "";
    const msg = status
      ? `${providerId} request failed (HTTP ${status})${suffix}`
      : `${providerId} request failed${suffix || `: ${err.message}`}`;

    if (status === 429) {
      const retryAfterMs = parseRetryAfterMs(err.response?.headers?.["retry-after"]);
      return new ProviderError("PROVIDER_RATE_LIMITED", msg, err, retryAfterMs);
    }
    if (status === 408) return new ProviderError("PROVIDER_TIMEOUT", msg, err);
    if (!status || status === 401 || status === 403 || status >= 500) {
      return new ProviderError("PROVIDER_UNAVAILABLE", msg, err);
    }
    return new ProviderError("PROVIDER_REQUEST_INVALID", msg, err);
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError("PROVIDER_UNAVAILABLE", `${providerId} request failed: ${message}`, err);
}

function tokenCount(v: number | undefined): number {
  return typeof v === "number" && Number.isFinite(v) && v > 0 ? Math.floor(v) : 0;
}

function capabilitiesOf(config: ProviderConfig): Capability[] {
  return config.visionModel ? ["text", "vision"] : ["text"];
}

function visionUnsupported(providerId: string): ProviderError {
  return new ProviderError("CAPABILITY_UNSUPPORTED", `${providerId} has no vision model configured`);
}

const OpenAiChatResponseSchema = z
  .object({
    model: z.string().optional(),
    choices: z
      .array(
        z
          .object({
            message: z
              .object({
                content: z
                  .union([z.string(), z.array(z.object({ text: z.string().optional() }).passthrough())])
                  .nullable()
                  .optional(),
              })
              .passthrough(),
          })
          .passthrough(),
      )
      .default([]),
    usage: z
      .object({ prompt_tokens: z.number().optional(), completion_tokens: z.number().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

type OpenAiMessageContent =
  | string
  | Array<{ type: "text"; text: string } | { type: "image_url"; image_url: { url: string } }>;

export function createOpenAiCompatibleAdapter(config: ProviderConfig): ProviderAdapter {
  const client = axios.create({
    baseURL: normalizeOpenAiBaseUrl(config.baseUrl),
    timeout: config.timeoutMs,
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
      "Content-Type": "application/json",
    },
  });

  async function complete(model: string, content: OpenAiMessageContent, options: CallOptions): Promise<ProviderCompletion> {
    try {
      const response = await client.post(
        "/v1/chat/completions",
        {
          model,
          temperature: options.temperature ?? 0.2,
          max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: SYSTEM_INSTRUCTION },
            { role: "user", content },
          ],
        },
        { signal: options.signal },
      );

      const parsed = OpenAiChatResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ProviderError("PROVIDER_UNAVAILABLE", `${config.id} returned an unexpected response body`, parsed.error);
      }

      const raw = parsed.data.choices[0]?.message.content ?? "";
      const text = typeof raw === "string" ? raw : raw.map((part) => part.text ?? "").join("");
      return {
        text,
        inputTokens: tokenCount(parsed.data.usage?.prompt_tokens),
        outputTokens: tokenCount(parsed.data.usage?.completion_tokens),
        model: parsed.data.model || model,
      };
    } catch (err) {
      throw toProviderError(err, config.id);
    }
  }

  return {
    id: config.id,
    capabilities: capabilitiesOf(config),
    priority: config.priority,
    models: { text: config.textModel, vision: config.visionModel },
    pricing: config.pricing,

    async callText(prompt, options = {}) {
      return complete(config.textModel, prompt, options);
    },

    async callVision(prompt, image, options = {}) {
      if (!config.visionModel) throw visionUnsupported(config.id);
      const imageUrl = image.kind === "url" ? image.url : toDataUrl(image.bytes, image.contentType);
      return complete(
        config.visionModel,
        [
          { type: "text", text: prompt },
          { type: "image_url", image_url: { url: imageUrl } },
        ],
        options,
      );
    },
  };
}

const GeminiResponseSchema = z
  .object({
    candidates: z
      .array(
        z
          .object({
            content: z
              .object({ parts: z.array(z.object({ text: z.string().optional() }).passthrough()).default([]) })
              .passthrough()
              .optional(),
          })
          .passthrough(),
      )
      .default([]),
    usageMetadata: z
      .object({ promptTokenCount: z.number().optional(), candidatesTokenCount: z.number().optional() })
      .passthrough()
      .optional(),
    modelVersion: z.string().optional(),
  })
  .passthrough();

type GeminiPart = { text: string } | { inlineData: { mimeType: string; data: string } };

async function resolveImageForGemini(
  image: ImageInput,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<{ mimeType: string; data: string }> {
  if (image.kind === "bytes") {
    return { mimeType: image.contentType, data: image.bytes.toString("base64") };
  }

  // Gemini inlineData requires bytes; fetch them from the URL.
  const res = await axios.get<ArrayBuffer>(image.url, {
    responseType: "arraybuffer",
    timeout: timeoutMs,
    signal,
    validateStatus: (s) => s >= 200 && s < 300,
  });
  const contentType = String(res.headers?.["content-type"] || "").split(";")[0].trim();
  return { mimeType: contentType || "image/jpeg", data: Buffer.from(res.data).toString("base64") };
}

export function createGeminiAdapter(config: ProviderConfig): ProviderAdapter {
  const baseURL = normalizeGeminiBaseUrl(config.baseUrl);
  const urlFor = (model: string) =>
    `${baseURL}/v1beta/models/${encodeURIComponent(geminiModelName(model))}:generateContent?key=${encodeURIComponent(config.apiKey)}`;

  async function generate(model: string, parts: GeminiPart[], options: CallOptions): Promise<ProviderCompletion> {
    try {
      const res = await axios.post(
        urlFor(model),
        {
          systemInstruction: { parts: [{ text: SYSTEM_INSTRUCTION }] },
          contents: [{ role: "user", parts }],
          generationConfig: {
            temperature: options.temperature ?? 0,
            maxOutputTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
            responseMimeType: "application/json",
          },
        },
        { timeout: config.timeoutMs, signal: options.signal },
      );

      const parsed = GeminiResponseSchema.safeParse(res.data);
      if (!parsed.success) {
        throw new ProviderError("PROVIDER_UNAVAILABLE", `${config.id} returned an unexpected response body`, parsed.error);
      }

      const text = (parsed.data.candidates[0]?.content?.parts ?? [])
        .map((p) => p.text)
        .filter(Boolean)
        .join("\n");
      return {
        text,
        inputTokens: tokenCount(parsed.data.usageMetadata?.promptTokenCount),
        outputTokens: tokenCount(parsed.data.usageMetadata?.candidatesTokenCount),
        model: parsed.data.modelVersion || geminiModelName(model),
      };
    } catch (err) {
      throw toProviderError(err, config.id);
    }
  }

  return {
    id: config.id,
    capabilities: capabilitiesOf(config),
    priority: config.priority,
    models: { text: config.textModel, vision: config.visionModel },
    pricing: config.pricing,

    async callText(prompt, options = {}) {
      return generate(config.textModel, [{ text: prompt }], options);
    },

    async callVision(prompt, image, options = {}) {
      const visionModel = config.visionModel;
      if (!visionModel) throw visionUnsupported(config.id);
      let inline: { mimeType: string; data: string };
      try {
        inline = await resolveImageForGemini(image, config.timeoutMs, options.signal);
      } catch (err) {
        throw toProviderError(err, config.id);
      }
      return generate(visionModel, [{ text: prompt }, { inlineData: inline }], options);
    },
  };
}

export function createAdapter(config: ProviderConfig): ProviderAdapter {
  return config.kind === "gemini" ? createGeminiAdapter(config) : createOpenAiCompatibleAdapter(config);
}
