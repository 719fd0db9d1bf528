import { describe, it, expect } from "vitest";
import path from "path";

import { parseConfig } from "../services/config";

describe("parseConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = parseConfig({});

    expect(config.port).toBe(5000);
    expect(config.awsRegion).toBe("ap-southeast-1");
    expect(config.logLevel).toBe("info");
    expect(config.staleUploadMinutes).toBe(30);
    expect(path.basename(config.uploadDir)).toBe("uploads");
    expect(config.llm).toEqual({
      apiKey: "",
      apiUrl: "https://api.opentyphoon.ai/v1",
      model: "typhoon-v2.5-30b-a3b-instruct",
      timeoutMs: 30000,
      temperature: 0.1,
      topP: 0.95,
      maxTokens: 512,
    });
    expect(config.pipeline).toEqual({
      minConfidence: 0.4,
      autoRotate: true,
      minTextLength: 5,
      preprocessPolicy: "shrink-threshold",
      maxUploadBytes: 16 * 1024 * 1024,
      llmTimeoutMs: 30000,
      workDir: config.uploadDir,
    });
  });

  it("reads overrides from strings", () => {
    const config = parseConfig({
      PORT: "8080",
      UPLOAD_DIR: "/tmp/parcel-uploads",
      LLM_API_KEY: "  test-key  ",
      LLM_TIMEOUT_MS: "5000",
      OCR_MIN_CONFIDENCE: "0.6",
      OCR_AUTO_ROTATE: "0",
      PREPROCESS_POLICY: "upscale-stretch",
      MAX_UPLOAD_MB: "2",
    });

    expect(config.port).toBe(8080);
    expect(config.uploadDir).toBe("/tmp/parcel-uploads");
    expect(config.llm.apiKey).toBe("test-key");
    expect(config.llm.timeoutMs).toBe(5000);
    expect(config.pipeline).toMatchObject({
      minConfidence: 0.6,
      autoRotate: false,
      preprocessPolicy: "upscale-stretch",
      maxUploadBytes: 2097152,
      llmTimeoutMs: 5000,
      workDir: "/tmp/parcel-uploads",
    });
  });

  it("rejects invalid values with the offending key", () => {
    expect(() => parseConfig({ OCR_MIN_CONFIDENCE: "1.5" })).toThrow(/^Invalid configuration: OCR_MIN_CONFIDENCE: /);
    expect(() => parseConfig({ PREPROCESS_POLICY: "sharpen" })).toThrow(/PREPROCESS_POLICY/);
    expect(() => parseConfig({ OCR_AUTO_ROTATE: "yes" })).toThrow(/OCR_AUTO_ROTATE/);
  });
});
