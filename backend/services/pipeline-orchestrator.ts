// backend/services/pipeline-orchestrator.ts
import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { performance } from "perf_hooks";

import type { Health, ParcelRecord, PipelineResult, StageName, StageTimings } from "../../shared/schema";
import type { LlmCapability } from "../ai/extractor/llmClient";
import { normalizeReply } from "../ai/extractor/responseNormalizer";
import { buildExtractionPrompt } from "../ai/extractor/systemPrompt";
import type { PipelineConfig } from "./config";
import { filterDetections, summarizeDetections } from "./confidence-filter";
import {
  InputValidationError,
  LlmCapabilityError,
  OcrCapabilityError,
  type PipelineError,
  type Result,
  err,
  getErrorMessage,
  ok,
} from "./errors";
import { derivedImagePath, normalizeImage } from "./image-normalizer";
import { createLog } from "./log";
import type { OcrCapability, RawDetection } from "./ocr-types";
import { withTempFiles, type TempFileScope } from "./temp-files";

const log = createLog("pipeline");

export const ALLOWED_EXTENSIONS = new Set(["png", "jpg", "jpeg", "gif", "webp"]);
export const TEXT_PREVIEW_LENGTH = 200;

export type PipelineState =
  | "received"
  | "validating"
  | "ocr"
  | "ocr-done"
  | "ocr-failed"
  | "llm"
  | "llm-done"
  | "llm-failed"
  | "responded";

export interface RunOptions {
  /** Overrides the configured drop threshold for this request. */
  minConfidence?: number;
  /** Delete the input image when the request ends (uploaded files). */
  ownsInput?: boolean;
  requestId?: string;
  onState?: (state: PipelineState) => void;
}

export interface ParcelPipelineDeps {
  ocr: OcrCapability;
  llm: LlmCapability;
  config: PipelineConfig;
}

/** Extension check, as in "label.JPG" → "jpg". */
export function allowedImageFile(filename: string): boolean {
  const ext = path.extname(filename).slice(1).toLowerCase();
  return ext.length > 0 && ALLOWED_EXTENSIONS.has(ext);
}

function seconds(since: number) {
  return Math.round(Math.max(0, performance.now() - since)) / 1000;
}

function preview(text: string) {
  return text.length > TEXT_PREVIEW_LENGTH ? text.slice(0, TEXT_PREVIEW_LENGTH) : text;
}

export function getHealth(ocr: OcrCapability, llm: LlmCapability): Health {
  return { ocrReady: ocr.isReady(), llmConfigured: llm.isConfigured() };
}

/**
 * Sequences preprocessing, OCR, prompt building, the LLM call and reply
 * normalization for one label image. Capabilities are injected once and
 * shared across requests; every temp file a run creates is removed before
 * the run returns.
 */
export class ParcelPipeline {
  private readonly ocr: OcrCapability;
  private readonly llm: LlmCapability;
  private readonly config: PipelineConfig;

  constructor(deps: ParcelPipelineDeps) {
    this.ocr = deps.ocr;
    this.llm = deps.llm;
    this.config = deps.config;
  }

  health(): Health {
    return getHealth(this.ocr, this.llm);
  }

  async run(imagePath: string, opts: RunOptions = {}): Promise<PipelineResult> {
    const requestId = opts.requestId ?? randomUUID();
    const minConfidence = opts.minConfidence ?? this.config.minConfidence;
    const timings: StageTimings = {};
    const started = performance.now();
    const enter = (state: PipelineState) => {
      log.debug(`${requestId} -> ${state}`);
      opts.onState?.(state);
    };

    enter("received");
    return withTempFiles<PipelineResult>(async (scope) => {
      if (opts.ownsInput) scope.track(imagePath);

      enter("validating");
      const valid = await this.validateInput(imagePath);
      if (!valid.ok) return this.fail(valid.error, "validating", timings, "", enter);

      enter("ocr");
      const ocrStart = performance.now();
      const text = await this.recognize(imagePath, requestId, minConfidence, scope);
      this.record(timings, "ocr", ocrStart);
      if (!text.ok) {
        enter("ocr-failed");
        return this.fail(text.error, "ocr", timings, "", enter);
      }
      enter("ocr-done");
      log.info(`${requestId} OCR completed in ${timings.ocr}s, preview: ${preview(text.value).slice(0, 100)}`);

      enter("llm");
      const llmStart = performance.now();
      const reply = await this.callLlm(text.value);
      if (!reply.ok) {
        enter("llm-failed");
        return this.fail(reply.error, "llm", timings, text.value, enter);
      }
      this.record(timings, "llm", llmStart);
      enter("llm-done");

      const data = this.structure(requestId, reply.value);
      this.record(timings, "total", started);
      log.info(`${requestId} total ${timings.total}s (ocr ${timings.ocr}s, llm ${timings.llm}s)`);

      enter("responded");
      return {
        success: true,
        data,
        timings,
        textPreview: preview(text.value),
        error: null,
        errorKind: null,
        failedStage: null,
      };
    });
  }

  private record(timings: StageTimings, stage: StageName, since: number) {
    timings[stage] = seconds(since);
  }

  private fail(
    error: PipelineError,
    stage: "validating" | "ocr" | "llm",
    timings: StageTimings,
    text: string,
    enter: (state: PipelineState) => void
  ): PipelineResult {
    if (error.clientFacing) log.warn(`${stage}: ${error.message}`);
    else log.error(`${stage}: ${error.message}`);
    enter("responded");
    return {
      success: false,
      data: null,
      timings,
      textPreview: preview(text),
      error: error.message,
      errorKind: error.kind,
      failedStage: stage,
    };
  }

  private async validateInput(imagePath: string): Promise<Result<void, InputValidationError>> {
    if (!allowedImageFile(imagePath)) {
      return err(new InputValidationError(`Unsupported file type (allowed: ${[...ALLOWED_EXTENSIONS].join(", ")})`));
    }
    let size: number;
    try {
      const stat = await fs.stat(imagePath);
      if (!stat.isFile()) return err(new InputValidationError("Input is not a file"));
      size = stat.size;
    } catch (e) {
      return err(new InputValidationError(`Image file not found: ${path.basename(imagePath)}`, { cause: e }));
    }
    if (size === 0) return err(new InputValidationError("Image file is empty"));
    if (size > this.config.maxUploadBytes) {
      const mb = (size / (1024 * 1024)).toFixed(1);
      return err(new InputValidationError(`Image file too large (${mb}MB)`));
    }
    return ok(undefined);
  }

  private async recognize(
    imagePath: string,
    requestId: string,
    minConfidence: number,
    scope: TempFileScope
  ): Promise<Result<string, PipelineError>> {
    // Track before writing so a half-written file is removed too.
    scope.track(derivedImagePath(this.config.workDir, requestId));
    const image = await normalizeImage(imagePath, {
      policy: this.config.preprocessPolicy,
      workDir: this.config.workDir,
      requestId,
    });
    if (!image.ok) return err(image.error);

    let detections: RawDetection[];
    try {
      detections = await this.ocr.detect(image.value.path, { autoRotate: this.config.autoRotate });
    } catch (e) {
      return err(new OcrCapabilityError(`OCR failed: ${getErrorMessage(e)}`, { cause: e }));
    }

    const summary = summarizeDetections(detections, minConfidence);
    log.debug(`${requestId} detections kept ${summary.kept}/${summary.total} (mean ${summary.meanConfidence})`);

    const text = filterDetections(detections, minConfidence);
    if (text.length < this.config.minTextLength) {
      return err(new InputValidationError("No readable text found in the image"));
    }
    return ok(text);
  }

  private async callLlm(ocrText: string): Promise<Result<string, LlmCapabilityError>> {
    const prompt = buildExtractionPrompt(ocrText);
    const timeoutMs = this.config.llmTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<Result<string, LlmCapabilityError>>((resolve) => {
      timer = setTimeout(() => {
        resolve(err(new LlmCapabilityError(`LLM request timed out after ${timeoutMs / 1000}s`, { timedOut: true })));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.llm.complete(prompt, { signal: controller.signal }), deadline]);
    } catch (e) {
      return err(new LlmCapabilityError(`LLM request failed: ${getErrorMessage(e)}`, { cause: e }));
    } finally {
      clearTimeout(timer);
    }
  }

  private structure(requestId: string, rawReply: string): ParcelRecord {
    const normalized = normalizeReply(rawReply);
    if (!normalized.ok) {
      log.warn(`${requestId} ${normalized.error.message}; raw reply: ${rawReply.slice(0, 500)}`);
      return normalized.record;
    }
    if (normalized.warnings.length) {
      log.debug(`${requestId} payload repaired: ${normalized.warnings.join("; ")}`);
    }
    return normalized.record;
  }
}
