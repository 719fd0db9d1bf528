// backend/services/config.ts
import path from "path";
import { fileURLToPath } from "url";
import dotenv from "dotenv";
import { z } from "zod";

export const PREPROCESS_POLICIES = ["shrink-threshold", "upscale-stretch", "none"] as const;
export type PreprocessPolicy = (typeof PREPROCESS_POLICIES)[number];

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  UPLOAD_DIR: z.string().min(1).optional(),
  AWS_REGION: z.string().min(1).default("ap-southeast-1"),

  LLM_API_KEY: z.string().default(""),
  LLM_API_URL: z.string().url().default("https://api.opentyphoon.ai/v1"),
  LLM_MODEL: z.string().min(1).default("typhoon-v2.5-30b-a3b-instruct"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_TOP_P: z.coerce.number().gt(0).max(1).default(0.95),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(512),

  OCR_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.4),
  OCR_AUTO_ROTATE: booleanFlag.default("true"),
  MIN_TEXT_LENGTH: z.coerce.number().int().nonnegative().default(5),
  PREPROCESS_POLICY: z.enum(PREPROCESS_POLICIES).default("shrink-threshold"),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(16),
  STALE_UPLOAD_MINUTES: z.coerce.number().positive().default(30),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface LlmConfig {
  apiKey: string;
  apiUrl: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  topP: number;
  maxTokens: number;
}

export interface PipelineConfig {
  minConfidence: number;
  autoRotate: boolean;
  minTextLength: number;
  preprocessPolicy: PreprocessPolicy;
  maxUploadBytes: number;
  llmTimeoutMs: number;
  workDir: string;
}

export interface AppConfig {
  port: number;
  uploadDir: string;
  awsRegion: string;
  staleUploadMinutes: number;
  logLevel: LogLevel;
  llm: LlmConfig;
  pipeline: PipelineConfig;
}

function backendRoot() {
  const __filename = fileURLToPath(import.meta.url);
  return path.resolve(path.dirname(__filename), "..");
}

/**
 * Parse an environment map into a typed config. Throws on invalid values so a
 * misconfigured server never starts.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  const uploadDir = e.UPLOAD_DIR ? path.resolve(e.UPLOAD_DIR) : path.join(backendRoot(), "uploads");

  return {
    port: e.PORT,
    uploadDir,
    awsRegion: e.AWS_REGION,
    staleUploadMinutes: e.STALE_UPLOAD_MINUTES,
    logLevel: e.LOG_LEVEL,
    llm: {
      apiKey: e.LLM_API_KEY.trim(),
      apiUrl: e.LLM_API_URL,
      model: e.LLM_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
      temperature: e.LLM_TEMPERATURE,
      topP: e.LLM_TOP_P,
      maxTokens: e.LLM_MAX_TOKENS,
    },
    pipeline: {
      minConfidence: e.OCR_MIN_CONFIDENCE,
      autoRotate: e.OCR_AUTO_ROTATE,
      minTextLength: e.MIN_TEXT_LENGTH,
      preprocessPolicy: e.PREPROCESS_POLICY,
      maxUploadBytes: Math.floor(e.MAX_UPLOAD_MB * 1024 * 1024),
      llmTimeoutMs: e.LLM_TIMEOUT_MS,
      workDir: uploadDir,
    },
  };
}

// Load env from backend/.env
export function loadConfig(): AppConfig {
  dotenv.config({ path: path.join(backendRoot(), ".env") });
  return parseConfig(process.env);
}
