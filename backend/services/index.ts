// backend/services/index.ts

import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import fs from "fs";
import { createServer } from "http";

import { ChatCompletionsClient } from "../ai/extractor/llmClient";
import { loadConfig } from "./config";
import { log, setLogLevel } from "./log";
import { ParcelPipeline } from "./pipeline-orchestrator";
import { createParcelRouter } from "./routes.parcel";
import { createOcrEngine } from "./textract";

/* ---------------------------------- Setup --------------------------------- */

const config = loadConfig();
setLogLevel(config.logLevel);

const app = express();
app.use(cors());
app.use(express.json({ limit: "1mb" }));

/* -------------------------- Security / Cache headers ----------------------- */

app.use((req: Request, res: Response, next: NextFunction) => {
  res.setHeader("X-Content-Type-Options", "nosniff");
  if (req.path.startsWith("/api/")) {
    res.setHeader("Cache-Control", "no-store");
  }
  next();
});

/* ------------------------------ Local uploads dir ------------------------- */

if (!fs.existsSync(config.uploadDir)) {
  fs.mkdirSync(config.uploadDir, { recursive: true });
  log(`Created upload directory at ${config.uploadDir}`);
}

/* ------------------------------- Capabilities ------------------------------ */

// Built once per process and shared by every request.
const ocr = createOcrEngine(config.awsRegion);
const llm = new ChatCompletionsClient(config.llm);
const pipeline = new ParcelPipeline({ ocr, llm, config: config.pipeline });

app.use(createParcelRouter(pipeline, config));

/* ------------------------------ Start server ------------------------------- */

const server = createServer(app);
server.listen(config.port, "0.0.0.0", () => {
  const health = pipeline.health();
  log(`HTTP server running at http://localhost:${config.port}`);
  log(`Upload directory: ${config.uploadDir}`);
  log(`OCR engine: ${health.ocrReady ? "ready" : "NOT READY"}`);
  log(`LLM: ${health.llmConfigured ? `configured (${config.llm.model})` : "NOT CONFIGURED (set LLM_API_KEY)"}`);
  log(`Preprocess policy: ${config.pipeline.preprocessPolicy}, min confidence ${config.pipeline.minConfidence}`);
});
