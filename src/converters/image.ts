/**
 * Image → PDF
 * One page per image, sized to the image (1 px = 1 pt)
 *
 * Image libraries disagree on malformed EXIF orientation tags, so rendering
 * walks a chain of tiers: embed as-is with the orientation as page rotation,
 * then embed a re-decoded upright PNG, then embed with no orientation at all.
 */

import { readFile, writeFile } from "fs/promises";
import { orientation as readExifOrientation } from "exifr";
import { Jimp } from "jimp";
import { PDFDocument, degrees } from "pdf-lib";
import { extensionOf } from "./extensions";
import type { Logger } from "../utils/logger";

export class ImageRotationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ImageRotationError";
  }
}

/**
 * Bytes pdf-lib can embed without decoding
 */
interface EmbeddableImage {
  format: "jpg" | "png";
  bytes: Uint8Array;
}

export interface ImageTier {
  name: string;
  render(inputPath: string): Promise<Uint8Array>;
  // Whether a failure of this tier should be retried by the next one
  retryable(error: unknown): boolean;
}

// Formats that can carry an EXIF orientation tag
const ORIENTED_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".tif", ".tiff"]);
const JPEG_EXTENSIONS = new Set([".jpg", ".jpeg"]);

// EXIF orientations a page rotation can express (clockwise degrees)
// 2, 4, 5 and 7 are mirrored and need the pixels transposed instead
const PAGE_ROTATION: Record<number, number> = { 1: 0, 3: 180, 6: 90, 8: 270 };

/**
 * Decides whether a direct-embed failure is the malformed-rotation case.
 *
 * Matches ImageRotationError first, then any error whose message mentions
 * "rotation". The message match is fragile across library versions; keep
 * it this narrow so unrelated decode failures still surface.
 */
export function isRotationFailure(error: unknown): boolean {
  if (error instanceof ImageRotationError) return true;
  return error instanceof Error && /\brotation\b/i.test(error.message);
}

/**
 * Page rotation for an EXIF orientation value (undefined: no tag)
 */
export function pageRotationFor(orientation: number | undefined): number {
  if (orientation === undefined) return 0;

  const rotation = PAGE_ROTATION[orientation];
  if (rotation !== undefined) return rotation;

  if (Number.isInteger(orientation) && orientation >= 1 && orientation <= 8) {
    throw new ImageRotationError(`Unsupported flipped rotation mode: ${orientation}`);
  }
  throw new ImageRotationError(`Invalid rotation: ${orientation}`);
}

/**
 * EXIF orientation tag, if the format can carry one and the file has it
 * Metadata parse failures propagate unchanged
 */
async function readOrientation(path: string, bytes: Uint8Array): Promise<number | undefined> {
  if (!ORIENTED_EXTENSIONS.has(extensionOf(path))) return undefined;

  const value: unknown = await readExifOrientation(bytes);
  return typeof value === "number" ? value : undefined;
}

type PixelSource = (x: number, y: number, width: number, height: number) => [number, number];

// Where each displayed pixel comes from in the stored image, per orientation
const TRANSPOSITIONS: Record<number, { swapsAxes: boolean; source: PixelSource }> = {
  2: { swapsAxes: false, source: (x, y, w) => [w - 1 - x, y] },
  3: { swapsAxes: false, source: (x, y, w, h) => [w - 1 - x, h - 1 - y] },
  4: { swapsAxes: false, source: (x, y, _w, h) => [x, h - 1 - y] },
  5: { swapsAxes: true, source: (x, y) => [y, x] },
  6: { swapsAxes: true, source: (x, y, _w, h) => [y, h - 1 - x] },
  7: { swapsAxes: true, source: (x, y, w, h) => [w - 1 - y, h - 1 - x] },
  8: { swapsAxes: true, source: (x, y, w) => [w - 1 - y, x] },
};

/**
 * Upright PNG for a stored image and its EXIF orientation
 * Orientation 1 and values outside 2-8 keep the pixels as stored
 */
export async function transposeToPng(
  image: InstanceType<typeof Jimp>,
  orientation: number | undefined,
): Promise<Uint8Array> {
  const transposition = orientation === undefined ? undefined : TRANSPOSITIONS[orientation];
  if (!transposition) {
    return image.getBuffer("image/png");
  }

  const { width, height, data } = image.bitmap;
  const upright = transposition.swapsAxes
    ? new Jimp({ width: height, height: width })
    : new Jimp({ width, height });
  const out = upright.bitmap;

  for (let y = 0; y < out.height; y++) {
    for (let x = 0; x < out.width; x++) {
      const [sx, sy] = transposition.source(x, y, width, height);
      const from = (sy * width + sx) * 4;
      data.copy(out.data, (y * out.width + x) * 4, from, from + 4);
    }
  }

  return upright.getBuffer("image/png");
}

async function toEmbeddable(path: string, bytes: Uint8Array): Promise<EmbeddableImage> {
  switch (extensionOf(path)) {
    case ".jpg":
    case ".jpeg":
      return { format: "jpg", bytes };
    case ".png":
      return { format: "png", bytes };
    default: {
      // BMP, GIF and TIFF go through a decoder
      const image = await Jimp.read(Buffer.from(bytes));
      return { format: "png", bytes: await image.getBuffer("image/png") };
    }
  }
}

async function renderPage(image: EmbeddableImage, rotation: number): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const embedded =
    image.format === "jpg"
      ? await doc.embedJpg(image.bytes)
      : await doc.embedPng(image.bytes);

  const page = doc.addPage([embedded.width, embedded.height]);
  page.drawImage(embedded, {
    x: 0,
    y: 0,
    width: embedded.width,
    height: embedded.height,
  });
  if (rotation !== 0) {
    page.setRotation(degrees(rotation));
  }

  return doc.save();
}

// ============================================================================
// Tiers
// ============================================================================

/**
 * Embed the original bytes and honour EXIF orientation via page rotation
 */
async function renderDirect(inputPath: string): Promise<Uint8Array> {
  const bytes = await readFile(inputPath);
  const rotation = pageRotationFor(await readOrientation(inputPath, bytes));
  return renderPage(await toEmbeddable(inputPath, bytes), rotation);
}

/**
 * Re-decode, transpose the pixels upright and embed as PNG with no page rotation.
 * Jimp already transposes JPEGs while decoding; other formats are done here.
 */
async function renderNormalized(inputPath: string): Promise<Uint8Array> {
  const bytes = await readFile(inputPath);
  const image = await Jimp.read(bytes);
  const decoderTransposes = JPEG_EXTENSIONS.has(extensionOf(inputPath));
  const orientation = decoderTransposes ? undefined : await readOrientation(inputPath, bytes);
  const png = await transposeToPng(image, orientation);
  return renderPage({ format: "png", bytes: png }, 0);
}

/**
 * Last resort: the original image, no orientation handling at all
 */
async function renderPlain(inputPath: string): Promise<Uint8Array> {
  const bytes = await readFile(inputPath);
  return renderPage(await toEmbeddable(inputPath, bytes), 0);
}

export const IMAGE_TIERS: readonly ImageTier[] = [
  { name: "direct", render: renderDirect, retryable: isRotationFailure },
  { name: "normalized", render: renderNormalized, retryable: () => true },
  { name: "plain", render: renderPlain, retryable: () => false },
];

/**
 * Render with the first tier that succeeds
 * A non-retryable failure is rethrown as-is
 */
export async function renderImage(
  inputPath: string,
  tiers: readonly ImageTier[] = IMAGE_TIERS,
  logger?: Logger,
): Promise<Uint8Array> {
  let lastError: unknown = new Error("No image rendering tiers configured");

  for (const tier of tiers) {
    try {
      return await tier.render(inputPath);
    } catch (error) {
      if (!tier.retryable(error)) throw error;
      logger?.debug(`Image tier "${tier.name}" failed for ${inputPath}, retrying: ${String(error)}`);
      lastError = error;
    }
  }

  throw lastError;
}

export async function imageToPdf(
  inputPath: string,
  outputPath: string,
  logger?: Logger,
): Promise<void> {
  await writeFile(outputPath, await renderImage(inputPath, IMAGE_TIERS, logger));
}
