/**
 * File extension helpers
 */

import { extname } from "node:path";

export const PDF_EXTENSION = ".pdf";
export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".bmp", ".tif", ".tiff", ".gif"] as const;
export const TEXT_EXTENSIONS = [".txt"] as const;
export const DOCX_EXTENSIONS = [".docx"] as const;

/**
 * Lowercase extension including the dot ("" when there is none)
 */
export function extensionOf(path: string): string {
  return extname(path).toLowerCase();
}

export function isPdf(path: string): boolean {
  return extensionOf(path) === PDF_EXTENSION;
}

/**
 * Append ".pdf" unless the path already ends with it (any case)
 */
export function withPdfSuffix(path: string): string {
  return isPdf(path) ? path : `${path}${PDF_EXTENSION}`;
}
