// backend/services/ocr-types.ts

export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** One recognized text line. Confidence is normalized to [0, 1]. */
export interface RawDetection {
  readonly text: string;
  readonly confidence: number;
  readonly boundingBox: BoundingBox;
}

export interface DetectOptions {
  autoRotate?: boolean;
}

/**
 * Black-box OCR engine. Expensive to construct, so one instance is built at
 * startup and shared by every request.
 */
export interface OcrCapability {
  detect(imagePath: string, options?: DetectOptions): Promise<RawDetection[]>;
  isReady(): boolean;
}
