// backend/services/routes.parcel.ts
import express, { type Request, type Response } from "express";
import multer from "multer";
import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";

import { processRequestSchema, type PipelineResult } from "../../shared/schema";
import type { AppConfig } from "./config";
import { getErrorMessage } from "./errors";
import { createLog } from "./log";
import { ALLOWED_EXTENSIONS, allowedImageFile, type ParcelPipeline } from "./pipeline-orchestrator";
import { sweepStaleFiles } from "./temp-files";

const log = createLog("routes.parcel");

/** HTTP status for a finished pipeline run. */
export function statusForResult(result: PipelineResult): number {
  if (result.success) return 200;
  switch (result.errorKind) {
    case "InputValidationError":
    case "ImageDecodeError":
      return 400;
    case "LlmCapabilityError":
      return 502;
    default:
      return 500;
  }
}

function createUpload(config: AppConfig) {
  return multer({
    storage: multer.diskStorage({
      destination: config.uploadDir,
      // Unique per request so concurrent uploads never share a path.
      filename: (_req, file, cb) => {
        const ext = path.extname(file.originalname).toLowerCase();
        cb(null, `${Date.now()}-${randomUUID()}${ext}`);
      },
    }),
    fileFilter: (_req, file, cb) => {
      if (file.mimetype.startsWith("image/") && allowedImageFile(file.originalname)) {
        cb(null, true);
      } else {
        cb(new Error(`Invalid file type (allowed: ${[...ALLOWED_EXTENSIONS].join(", ")})`));
      }
    },
    limits: { fileSize: config.pipeline.maxUploadBytes },
  });
}

export function createParcelRouter(pipeline: ParcelPipeline, config: AppConfig) {
  const router = express.Router();
  const upload = createUpload(config).single("image");

  // POST /api/process (form field: "image", optional "minConfidence")
  router.post("/api/process", (req: Request, res: Response) => {
    upload(req, res, async (uploadErr: unknown) => {
      if (uploadErr) {
        const message =
          uploadErr instanceof multer.MulterError && uploadErr.code === "LIMIT_FILE_SIZE"
            ? `File too large (max ${config.pipeline.maxUploadBytes / (1024 * 1024)}MB)`
            : getErrorMessage(uploadErr);
        return res.status(400).json({ success: false, error: message, timings: {} });
      }
      if (!req.file) {
        return res.status(400).json({ success: false, error: "No image uploaded", timings: {} });
      }

      const fields = processRequestSchema.safeParse(req.body ?? {});
      if (!fields.success) {
        await fs.rm(req.file.path, { force: true }).catch((e: unknown) => log.warn(`Failed to delete upload: ${getErrorMessage(e)}`));
        return res.status(400).json({ success: false, error: "minConfidence must be a number between 0 and 1", timings: {} });
      }

      try {
        const result = await pipeline.run(req.file.path, {
          minConfidence: fields.data.minConfidence,
          ownsInput: true,
        });
        return res.status(statusForResult(result)).json(result);
      } catch (e) {
        log.error("[/api/process] error:", e);
        return res.status(500).json({ success: false, error: getErrorMessage(e), timings: {} });
      } finally {
        void sweepStaleFiles(config.uploadDir, config.staleUploadMinutes).catch((e: unknown) =>
          log.warn(`Cleanup error: ${getErrorMessage(e)}`)
        );
      }
    });
  });

  router.get("/health", (_req, res) => {
    res.json({ status: "healthy", ...pipeline.health() });
  });

  return router;
}
