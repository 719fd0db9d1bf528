import { z } from "zod";

export const NOT_FOUND = "not found";
export const EXTRACTION_FAILED = "extraction failed";
export const PARSE_FAILURE_MESSAGE = "Failed to parse model response as JSON";

export const PARCEL_FIELDS = [
  "recipientName",
  "roomNumber",
  "shippingCompany",
  "trackingNumber",
] as const;

export type ParcelField = (typeof PARCEL_FIELDS)[number];

// Four required string fields; extra keys from the model pass through untouched.
export const parcelRecordSchema = z
  .object({
    recipientName: z.string(),
    roomNumber: z.string(),
    shippingCompany: z.string(),
    trackingNumber: z.string(),
    error: z.string().optional(),
  })
  .passthrough();

export type ParcelRecord = z.infer<typeof parcelRecordSchema>;

export const stageTimingsSchema = z.object({
  ocr: z.number().nonnegative().optional(),
  llm: z.number().nonnegative().optional(),
  total: z.number().nonnegative().optional(),
});

export type StageTimings = z.infer<typeof stageTimingsSchema>;
export type StageName = keyof StageTimings;

export const pipelineErrorKindSchema = z.enum([
  "InputValidationError",
  "ImageDecodeError",
  "OcrCapabilityError",
  "LlmCapabilityError",
  "ResponseParseError",
]);

export const pipelineStageSchema = z.enum(["validating", "ocr", "llm"]);

export const pipelineResultSchema = z.object({
  success: z.boolean(),
  data: parcelRecordSchema.nullable(),
  timings: stageTimingsSchema,
  textPreview: z.string(),
  error: z.string().nullable(),
  errorKind: pipelineErrorKindSchema.nullable(),
  failedStage: pipelineStageSchema.nullable(),
});

export type PipelineResult = z.infer<typeof pipelineResultSchema>;

export const healthSchema = z.object({
  ocrReady: z.boolean(),
  llmConfigured: z.boolean(),
});

export type Health = z.infer<typeof healthSchema>;

// Multipart form fields accompanying an uploaded label image.
// A blank field means "use the configured threshold", not zero.
export const processRequestSchema = z.object({
  minConfidence: z.preprocess(
    (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
    z.coerce.number().min(0).max(1).optional()
  ),
});
