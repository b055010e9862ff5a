/**
 * Test fixtures
 * Generates PDFs and images on the fly; nothing is checked in
 */

import { readFile, rm, writeFile } from "fs/promises";
import { Jimp } from "jimp";
import { PDFDocument } from "pdf-lib";
import { temporaryDirectory } from "tempy";

type ImageMime = "image/png" | "image/jpeg" | "image/bmp" | "image/gif" | "image/tiff";

/**
 * Scratch directory per test; call cleanup in afterEach
 */
export function createScratch(): { dir: string; cleanup: () => Promise<void> } {
  const dir = temporaryDirectory({ prefix: "pdf-assemble-spec-" });
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * PDF whose pages are `width + 1`, `width + 2`, ... points wide,
 * so page order can be read back from the merged output
 */
export async function writePdf(path: string, pageCount: number, width = 100): Promise<string> {
  const doc = await PDFDocument.create();
  for (let i = 1; i <= pageCount; i++) {
    doc.addPage([width + i, 300]);
  }
  await writeFile(path, await doc.save());
  return path;
}

export async function encodeImage(
  mime: ImageMime,
  width = 6,
  height = 4,
): Promise<Buffer> {
  const image = new Jimp({ width, height, color: 0x3366ccff });
  return image.getBuffer(mime);
}

export async function writeImage(
  path: string,
  mime: ImageMime,
  width = 6,
  height = 4,
): Promise<string> {
  await writeFile(path, await encodeImage(mime, width, height));
  return path;
}

/**
 * Big-endian TIFF structure holding only an Orientation tag
 */
function orientationTiff(orientation: number): Buffer {
  const tiff = Buffer.alloc(26);
  tiff.write("MM", 0, "latin1");
  tiff.writeUInt16BE(0x2a, 2);
  tiff.writeUInt32BE(8, 4); // IFD0 offset
  tiff.writeUInt16BE(1, 8); // one entry
  tiff.writeUInt16BE(0x0112, 10); // Orientation
  tiff.writeUInt16BE(3, 12); // SHORT
  tiff.writeUInt32BE(1, 14); // count
  tiff.writeUInt16BE(orientation, 18);
  // bytes 22-25: no next IFD
  return tiff;
}

/**
 * Insert an EXIF APP1 segment right after the JPEG SOI marker
 */
export function withExifOrientation(jpeg: Uint8Array, orientation: number): Buffer {
  const exif = Buffer.concat([Buffer.from("Exif\0\0", "latin1"), orientationTiff(orientation)]);
  const marker = Buffer.from([0xff, 0xe1, 0x00, exif.length + 2]);
  return Buffer.concat([jpeg.subarray(0, 2), marker, exif, jpeg.subarray(2)]);
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  return c >>> 0;
});

function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Insert an eXIf chunk right after the PNG IHDR chunk
 */
export function withPngExifOrientation(png: Uint8Array, orientation: number): Buffer {
  // 8-byte signature, then IHDR: length, type, 13 data bytes, CRC
  const afterHeader = 8 + 4 + 4 + 13 + 4;
  const body = Buffer.concat([Buffer.from("eXIf", "latin1"), orientationTiff(orientation)]);

  const length = Buffer.alloc(4);
  length.writeUInt32BE(body.length - 4);
  const crc = Buffer.alloc(4);
  crc.writeUInt32BE(crc32(body));

  return Buffer.concat([
    png.subarray(0, afterHeader),
    length,
    body,
    crc,
    png.subarray(afterHeader),
  ]);
}

export async function loadPdf(path: string): Promise<PDFDocument> {
  return PDFDocument.load(await readFile(path));
}

export async function pageWidths(path: string): Promise<number[]> {
  const doc = await loadPdf(path);
  return doc.getPages().map((page) => page.getWidth());
}
