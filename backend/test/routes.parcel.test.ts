import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm } from "fs/promises";
import { createServer, type Server } from "http";
import os from "os";
import path from "path";
import axios from "axios";
import express from "express";

import type { PipelineResult } from "../../shared/schema";
import type { AppConfig } from "../services/config";
import { ok } from "../services/errors";
import { ParcelPipeline, type RunOptions } from "../services/pipeline-orchestrator";
import { createParcelRouter, statusForResult } from "../services/routes.parcel";

const parcel = {
  recipientName: "สมชาย ใจดี",
  roomNumber: "301",
  shippingCompany: "Flash Express",
  trackingNumber: "TH1234567890",
};

const succeeded: PipelineResult = {
  success: true,
  data: parcel,
  timings: { ocr: 0.5, llm: 1.2, total: 1.8 },
  textPreview: "TH1234567890",
  error: null,
  errorKind: null,
  failedStage: null,
};

function failed(errorKind: PipelineResult["errorKind"]): PipelineResult {
  return {
    success: false,
    data: null,
    timings: {},
    textPreview: "",
    error: "boom",
    errorKind,
    failedStage: "ocr",
  };
}

describe("statusForResult", () => {
  it("maps outcomes to HTTP statuses", () => {
    expect(statusForResult(succeeded)).toBe(200);
    expect(statusForResult(failed("InputValidationError"))).toBe(400);
    expect(statusForResult(failed("ImageDecodeError"))).toBe(400);
    expect(statusForResult(failed("LlmCapabilityError"))).toBe(502);
    expect(statusForResult(failed("OcrCapabilityError"))).toBe(500);
  });
});

/** Records what the route asked for and answers with a canned result. */
class RecordingPipeline extends ParcelPipeline {
  readonly runs: Array<{ imagePath: string; opts: RunOptions }> = [];

  override async run(imagePath: string, opts: RunOptions = {}): Promise<PipelineResult> {
    this.runs.push({ imagePath, opts });
    return succeeded;
  }
}

describe("POST /api/process", () => {
  let uploadDir: string;
  let server: Server | undefined;

  function appConfig(maxUploadBytes: number): AppConfig {
    return {
      port: 0,
      uploadDir,
      awsRegion: "ap-southeast-1",
      staleUploadMinutes: 30,
      logLevel: "silent",
      llm: {
        apiKey: "",
        apiUrl: "https://llm.example.test/v1",
        model: "test-model",
        timeoutMs: 30_000,
        temperature: 0.1,
        topP: 0.95,
        maxTokens: 512,
      },
      pipeline: {
        minConfidence: 0.4,
        autoRotate: true,
        minTextLength: 5,
        preprocessPolicy: "none",
        maxUploadBytes,
        llmTimeoutMs: 30_000,
        workDir: uploadDir,
      },
    };
  }

  async function start(maxUploadBytes = 1024 * 1024) {
    const config = appConfig(maxUploadBytes);
    const pipeline = new RecordingPipeline({
      ocr: { isReady: () => true, detect: async () => [] },
      llm: { isConfigured: () => false, complete: async () => ok("{}") },
      config: config.pipeline,
    });
    const app = express();
    app.use(createParcelRouter(pipeline, config));
    const listening = createServer(app);
    server = listening;
    await new Promise<void>((resolve) => listening.listen(0, "127.0.0.1", resolve));
    const address = listening.address();
    if (address === null || typeof address === "string") throw new Error("server has no TCP address");
    return { pipeline, baseURL: `http://127.0.0.1:${address.port}` };
  }

  function upload(fields: Record<string, string>, file?: { name: string; type: string; size?: number }) {
    const body = new FormData();
    for (const [key, value] of Object.entries(fields)) body.append(key, value);
    if (file) body.append("image", new Blob([Buffer.alloc(file.size ?? 64, 1)], { type: file.type }), file.name);
    return body;
  }

  async function post(baseURL: string, body: FormData) {
    return axios.post(`${baseURL}/api/process`, body, { validateStatus: () => true });
  }

  beforeEach(async () => {
    uploadDir = await mkdtemp(path.join(os.tmpdir(), "routes-test-"));
  });

  afterEach(async () => {
    const listening = server;
    server = undefined;
    if (listening) {
      await new Promise<void>((resolve, reject) => listening.close((e) => (e ? reject(e) : resolve())));
    }
    await rm(uploadDir, { recursive: true, force: true });
  });

  it("runs the pipeline on the stored upload and owns it", async () => {
    const { pipeline, baseURL } = await start();
    const res = await post(baseURL, upload({ minConfidence: "0.7" }, { name: "label.PNG", type: "image/png" }));

    expect(res.status).toBe(200);
    expect(res.data).toEqual(succeeded);
    expect(pipeline.runs).toHaveLength(1);
    const { imagePath, opts } = pipeline.runs[0];
    expect(opts).toEqual({ minConfidence: 0.7, ownsInput: true });
    expect(path.dirname(imagePath)).toBe(uploadDir);
    expect(path.extname(imagePath)).toBe(".png");
  });

  it("falls back to the configured threshold when minConfidence is blank", async () => {
    const { pipeline, baseURL } = await start();
    const res = await post(baseURL, upload({ minConfidence: "" }, { name: "label.jpg", type: "image/jpeg" }));

    expect(res.status).toBe(200);
    expect(pipeline.runs[0].opts.minConfidence).toBeUndefined();
  });

  it("rejects a non-numeric threshold and deletes the upload", async () => {
    const { pipeline, baseURL } = await start();
    const res = await post(baseURL, upload({ minConfidence: "high" }, { name: "label.png", type: "image/png" }));

    expect(res.status).toBe(400);
    expect(res.data).toEqual({ success: false, error: "minConfidence must be a number between 0 and 1", timings: {} });
    expect(pipeline.runs).toHaveLength(0);
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it("rejects a threshold outside [0, 1]", async () => {
    const { baseURL } = await start();
    const res = await post(baseURL, upload({ minConfidence: "1.5" }, { name: "label.png", type: "image/png" }));
    expect(res.status).toBe(400);
  });

  it("rejects files that are not supported images", async () => {
    const { pipeline, baseURL } = await start();
    const expected = { success: false, error: "Invalid file type (allowed: png, jpg, jpeg, gif, webp)", timings: {} };

    const text = await post(baseURL, upload({}, { name: "notes.txt", type: "text/plain" }));
    const bmp = await post(baseURL, upload({}, { name: "scan.bmp", type: "image/bmp" }));

    expect(text.status).toBe(400);
    expect(text.data).toEqual(expected);
    expect(bmp.status).toBe(400);
    expect(bmp.data).toEqual(expected);
    expect(pipeline.runs).toHaveLength(0);
  });

  it("rejects a request without an image", async () => {
    const { baseURL } = await start();
    const res = await post(baseURL, upload({ minConfidence: "0.5" }));
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ success: false, error: "No image uploaded", timings: {} });
  });

  it("rejects uploads over the size limit", async () => {
    const { pipeline, baseURL } = await start(1024);
    const res = await post(baseURL, upload({}, { name: "label.png", type: "image/png", size: 4096 }));

    expect(res.status).toBe(400);
    expect(res.data.error).toMatch(/^File too large \(max /);
    expect(pipeline.runs).toHaveLength(0);
  });

  it("reports capability health", async () => {
    const { baseURL } = await start();
    const res = await axios.get(`${baseURL}/health`);
    expect(res.data).toEqual({ status: "healthy", ocrReady: true, llmConfigured: false });
  });
});
