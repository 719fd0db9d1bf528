// backend/services/textract.ts
import { promises as fs } from "fs";
import sharp from "sharp";
import {
  TextractClient,
  DetectDocumentTextCommand,
  type Block,
  type DetectDocumentTextCommandInput,
  type DetectDocumentTextCommandOutput,
} from "@aws-sdk/client-textract";

import type { BoundingBox, DetectOptions, OcrCapability, RawDetection } from "./ocr-types";
import { createLog } from "./log";
import { getErrorMessage } from "./errors";

const log = createLog("textract");

export type DetectDocumentText = (
  input: DetectDocumentTextCommandInput
) => Promise<DetectDocumentTextCommandOutput>;

// Synchronous Textract accepts at most 10 MB of inline bytes.
const MAX_INLINE_BYTES = 10 * 1024 * 1024;
// GIF and WebP uploads must be re-encoded before they are sent.
const TEXTRACT_FORMATS = new Set(["jpeg", "png"]);

function toBoundingBox(block: Block): BoundingBox {
  const box = block.Geometry?.BoundingBox;
  return {
    left: box?.Left ?? 0,
    top: box?.Top ?? 0,
    width: box?.Width ?? 0,
    height: box?.Height ?? 0,
  };
}

/** Keep LINE blocks in the order Textract returned them; confidence 0..100 → 0..1. */
export function linesFromBlocks(blocks: readonly Block[]): RawDetection[] {
  const out: RawDetection[] = [];
  for (const b of blocks) {
    if (b.BlockType !== "LINE" || !b.Text) continue;
    const confidence = Math.min(1, Math.max(0, (b.Confidence ?? 0) / 100));
    out.push({ text: b.Text, confidence, boundingBox: toBoundingBox(b) });
  }
  return out;
}

export class TextractOcrEngine implements OcrCapability {
  private readonly detectText: DetectDocumentText;

  constructor(detectText: DetectDocumentText) {
    this.detectText = detectText;
  }

  static fromRegion(region: string): TextractOcrEngine {
    const client = new TextractClient({ region });
    return new TextractOcrEngine((input) => client.send(new DetectDocumentTextCommand(input)));
  }

  isReady(): boolean {
    return true;
  }

  async detect(imagePath: string, options: DetectOptions = {}): Promise<RawDetection[]> {
    const autoRotate = options.autoRotate ?? true;
    let bytes: Buffer = await fs.readFile(imagePath);

    if (autoRotate) {
      // Apply EXIF orientation so phone photos arrive upright.
      bytes = await sharp(bytes).rotate().png().toBuffer();
    } else {
      const { format } = await sharp(bytes).metadata();
      if (!format || !TEXTRACT_FORMATS.has(format)) {
        bytes = await sharp(bytes).png().toBuffer();
      }
    }
    if (bytes.length > MAX_INLINE_BYTES) {
      throw new Error(`Image too large for Textract (${bytes.length} bytes)`);
    }

    const out = await this.detectText({ Document: { Bytes: bytes } });
    const lines = linesFromBlocks(out.Blocks ?? []);
    log.debug(`detected ${lines.length} lines in ${imagePath}`);
    return lines;
  }
}

/** An engine that could not be constructed. Reports not-ready and fails every call. */
export class UnavailableOcrEngine implements OcrCapability {
  constructor(private readonly reason: string) {}

  isReady(): boolean {
    return false;
  }

  async detect(): Promise<RawDetection[]> {
    throw new Error(`OCR engine not initialized: ${this.reason}`);
  }
}

export function createOcrEngine(region: string): OcrCapability {
  try {
    const engine = TextractOcrEngine.fromRegion(region);
    log.info(`Textract OCR ready (region ${region})`);
    return engine;
  } catch (err) {
    const reason = getErrorMessage(err);
    log.error(`Textract initialization failed: ${reason}`);
    return new UnavailableOcrEngine(reason);
  }
}
