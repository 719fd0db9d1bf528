// backend/services/image-normalizer.ts
import path from "path";
import sharp from "sharp";

import type { PreprocessPolicy } from "./config";
import { ImageDecodeError, err, getErrorMessage, ok, type Result } from "./errors";
import { createLog } from "./log";

const log = createLog("preprocess");

export const MAX_DIMENSION = 2000;
export const UPSCALE_FACTOR = 2;

// Adaptive Gaussian threshold: 11px block, subtract constant 2.
const THRESHOLD_BLOCK = 11;
const THRESHOLD_C = 2;

export interface NormalizeImageOptions {
  policy: PreprocessPolicy;
  workDir: string;
  requestId: string;
}

export interface NormalizedImage {
  /** Path OCR should read: the derived PNG, or the original on passthrough/degrade. */
  path: string;
  derived: boolean;
  policy: PreprocessPolicy;
  width: number;
  height: number;
}

export function derivedImagePath(workDir: string, requestId: string) {
  return path.join(workDir, `${requestId}_processed.png`);
}

/** Target size for the shrink policy; null when the image already fits. */
export function shrinkTarget(width: number, height: number, maxDim = MAX_DIMENSION) {
  const longest = Math.max(width, height);
  if (longest <= maxDim) return null;
  // Multiply before dividing so integer sizes floor exactly.
  if (width >= height) return { width: maxDim, height: Math.max(1, Math.floor((height * maxDim) / width)) };
  return { width: Math.max(1, Math.floor((width * maxDim) / height)), height: maxDim };
}

// Gaussian sigma matching an 11px kernel: 0.3 * ((k - 1) * 0.5 - 1) + 0.8
function blockSigma(block: number) {
  return 0.3 * ((block - 1) * 0.5 - 1) + 0.8;
}

/**
 * Binarize a single-channel raster against its Gaussian-weighted local mean.
 * A pixel turns white when it is brighter than (local mean - c).
 */
export function adaptiveThreshold(grey: Uint8Array, localMean: Uint8Array, c = THRESHOLD_C): Buffer {
  const out = Buffer.alloc(grey.length);
  for (let i = 0; i < grey.length; i++) {
    out[i] = grey[i] > localMean[i] - c ? 255 : 0;
  }
  return out;
}

async function shrinkAndThreshold(input: string, width: number, height: number, dest: string) {
  let pipeline = sharp(input).rotate().flatten({ background: "#ffffff" });
  const target = shrinkTarget(width, height);
  if (target) {
    pipeline = pipeline.resize(target.width, target.height, { fit: "fill", kernel: "mitchell" });
  }

  const { data, info } = await pipeline.greyscale().extractChannel(0).raw().toBuffer({ resolveWithObject: true });
  const raw = { width: info.width, height: info.height, channels: 1 as const };

  const localMean = await sharp(data, { raw }).blur(blockSigma(THRESHOLD_BLOCK)).extractChannel(0).raw().toBuffer();
  const binary = adaptiveThreshold(data, localMean);

  await sharp(binary, { raw }).median(3).png().toFile(dest);
  return { width: info.width, height: info.height };
}

async function upscaleAndStretch(input: string, width: number, height: number, dest: string) {
  const target = { width: width * UPSCALE_FACTOR, height: height * UPSCALE_FACTOR };
  const info = await sharp(input)
    .rotate()
    .flatten({ background: "#ffffff" })
    .resize(target.width, target.height, { fit: "fill", kernel: "cubic" })
    .greyscale()
    .normalise()
    .png()
    .toFile(dest);
  return { width: info.width, height: info.height };
}

/**
 * Preprocess a label photo for OCR. Decoding failures are fatal; any failure
 * while transforming a decodable image falls back to the original path.
 */
export async function normalizeImage(
  imagePath: string,
  options: NormalizeImageOptions
): Promise<Result<NormalizedImage, ImageDecodeError>> {
  let width: number;
  let height: number;
  try {
    const meta = await sharp(imagePath).metadata();
    if (!meta.width || !meta.height) {
      return err(new ImageDecodeError(`Image has no raster dimensions: ${path.basename(imagePath)}`));
    }
    // EXIF orientations 5-8 are rotated a quarter turn; .rotate() below applies them.
    const quarterTurn = (meta.orientation ?? 1) >= 5;
    width = quarterTurn ? meta.height : meta.width;
    height = quarterTurn ? meta.width : meta.height;
  } catch (e) {
    return err(new ImageDecodeError(`Cannot read image: ${getErrorMessage(e)}`, { cause: e }));
  }

  const original: NormalizedImage = { path: imagePath, derived: false, policy: options.policy, width, height };
  if (options.policy === "none") return ok(original);

  const dest = derivedImagePath(options.workDir, options.requestId);
  try {
    const size =
      options.policy === "upscale-stretch"
        ? await upscaleAndStretch(imagePath, width, height, dest)
        : await shrinkAndThreshold(imagePath, width, height, dest);
    log.debug(`${options.policy}: ${width}x${height} -> ${size.width}x${size.height}`);
    return ok({ path: dest, derived: true, policy: options.policy, ...size });
  } catch (e) {
    log.warn(`Preprocessing failed, using original image: ${getErrorMessage(e)}`);
    return ok(original);
  }
}
