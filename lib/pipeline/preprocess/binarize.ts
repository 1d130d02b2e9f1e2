/**
 * Single-image normalization: bounded resize, grayscale, mean-based global
 * threshold and JPEG re-encode.
 */

import sharp from "sharp";
import { DecodeError } from "../../errors";

// ============================================================================
// Types
// ============================================================================

export interface BinarizeOptions {
  /** Subtracted from the mean intensity before clamping. */
  offset: number;
  maxWidth: number;
  /** JPEG quality factor for the encoded output. */
  quality: number;
  /** Used in error messages only. */
  sourceName?: string;
}

export interface ProcessedImage {
  width: number;
  height: number;
  /** Single-channel pixels, every value 0 or 255. */
  pixels: Buffer;
  mean: number;
  threshold: number;
  encoded: Buffer;
}

export interface Dimensions {
  width: number;
  height: number;
}

// ============================================================================
// Pure steps
// ============================================================================

export function fitToMaxWidth(
  width: number,
  height: number,
  maxWidth: number
): Dimensions {
  if (width <= maxWidth) return { width, height };
  return {
    width: maxWidth,
    height: Math.max(1, Math.floor((height * maxWidth) / width)),
  };
}

export function meanIntensity(pixels: Uint8Array): number {
  if (pixels.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < pixels.length; i++) sum += pixels[i];
  return sum / pixels.length;
}

export function computeThreshold(mean: number, offset: number): number {
  return Math.max(0, Math.min(255, Math.trunc(mean) - offset));
}

/**
 * Per-axis area weights: each output cell averages the source cells it
 * covers, with fractional coverage at its edges. Weights sum to 1.
 */
function areaWeights(srcSize: number, dstSize: number): { index: number; weight: number }[][] {
  const scale = srcSize / dstSize;
  const cells: { index: number; weight: number }[][] = [];
  for (let i = 0; i < dstSize; i++) {
    const start = i * scale;
    const end = Math.min(srcSize, (i + 1) * scale);
    const taps: { index: number; weight: number }[] = [];
    for (let j = Math.floor(start); j < Math.ceil(end); j++) {
      const overlap = Math.min(end, j + 1) - Math.max(start, j);
      if (overlap > 0) taps.push({ index: j, weight: overlap / scale });
    }
    cells.push(taps);
  }
  return cells;
}

/**
 * Downscale single-channel pixels by area averaging. Output values stay
 * within the min/max of the source.
 */
export function areaResize(
  pixels: Uint8Array,
  width: number,
  height: number,
  target: Dimensions
): Buffer {
  const xTaps = areaWeights(width, target.width);
  const yTaps = areaWeights(height, target.height);

  // Horizontal pass: height rows of target.width
  const rows = new Float64Array(target.width * height);
  for (let y = 0; y < height; y++) {
    const srcRow = y * width;
    const dstRow = y * target.width;
    for (let x = 0; x < target.width; x++) {
      let acc = 0;
      for (const tap of xTaps[x]) acc += pixels[srcRow + tap.index] * tap.weight;
      rows[dstRow + x] = acc;
    }
  }

  const out = Buffer.alloc(target.width * target.height);
  for (let y = 0; y < target.height; y++) {
    for (let x = 0; x < target.width; x++) {
      let acc = 0;
      for (const tap of yTaps[y]) acc += rows[tap.index * target.width + x] * tap.weight;
      out[y * target.width + x] = Math.max(0, Math.min(255, Math.round(acc)));
    }
  }
  return out;
}

/**
 * Global binary threshold: pixels at or above `threshold` become 255, the
 * rest 0. Done here rather than with sharp's threshold(), which treats 0 as
 * "disabled".
 */
export function binarize(pixels: Uint8Array, threshold: number): Buffer {
  const out = Buffer.alloc(pixels.length);
  for (let i = 0; i < pixels.length; i++) {
    out[i] = pixels[i] >= threshold ? 255 : 0;
  }
  return out;
}

// ============================================================================
// Main entry point
// ============================================================================

/**
 * Normalize one image.
 *
 * @param input - Encoded image bytes (JPEG, PNG, ...)
 * @throws DecodeError when the bytes cannot be decoded
 */
export async function preprocessImage(
  input: Buffer,
  options: BinarizeOptions
): Promise<ProcessedImage> {
  const gray = await decodeGrayscale(input, options);

  const mean = meanIntensity(gray.data);
  const threshold = computeThreshold(mean, options.offset);
  const pixels = binarize(gray.data, threshold);

  const encoded = await sharp(pixels, {
    raw: { width: gray.width, height: gray.height, channels: 1 },
  })
    .toColourspace("b-w")
    .jpeg({ quality: options.quality })
    .toBuffer();

  return {
    width: gray.width,
    height: gray.height,
    pixels,
    mean,
    threshold,
    encoded,
  };
}

/**
 * Decode to upright single-channel pixels (EXIF orientation applied), then
 * bring the width down to `maxWidth` by area averaging.
 */
async function decodeGrayscale(
  input: Buffer,
  options: BinarizeOptions
): Promise<{ data: Buffer; width: number; height: number }> {
  const sourceName = options.sourceName ?? "<buffer>";
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(input)
      .rotate()
      .removeAlpha()
      .grayscale()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (err) {
    throw new DecodeError(sourceName, { cause: err });
  }

  const { data, info } = decoded;
  if (info.channels !== 1) {
    throw new DecodeError(sourceName, {
      cause: new Error(`expected 1 channel after grayscale, got ${info.channels}`),
    });
  }

  const target = fitToMaxWidth(info.width, info.height, options.maxWidth);
  if (target.width === info.width && target.height === info.height) {
    return { data, width: info.width, height: info.height };
  }
  return {
    data: areaResize(data, info.width, info.height, target),
    width: target.width,
    height: target.height,
  };
}
