/**
 * Converter - Strategy dispatch for non-PDF inputs
 * Picks a conversion strategy by file extension and writes one temporary PDF
 */

import { tmpdir } from "node:os";
import { parse, resolve } from "node:path";
import { ConversionError, describeError } from "./errors";
import {
  DOCX_EXTENSIONS,
  IMAGE_EXTENSIONS,
  TEXT_EXTENSIONS,
  extensionOf,
} from "./converters/extensions";
import { imageToPdf } from "./converters/image";
import { textToPdf } from "./converters/text";
import { docxToPdf, findOfficeBinary, runCommand } from "./converters/docx";
import type { CommandRunner } from "./converters/docx";
import { isFile, uniquePath } from "./utils/fs";
import { loadDefaultConfig } from "./utils/load-config";
import type { Logger } from "./utils/logger";
import type { MergeConfig } from "./types";

const DOCX_UNAVAILABLE =
  ".docx support requires LibreOffice (soffice on PATH or docx.converter in the config)";

interface ConversionStrategy {
  tag: string; // Output filename prefix
  extensions: readonly string[];
  available: boolean;
  unavailableReason?: string;
  convert(inputPath: string, outputPath: string, tempDir: string): Promise<void>;
}

export interface ConverterOptions {
  config?: MergeConfig;
  logger?: Logger;
  // Office binary to use; null disables DOCX, undefined looks it up
  officeBinary?: string | null;
  runCommand?: CommandRunner;
}

export class Converter {
  readonly wordProcessorConversionAvailable: boolean;
  private strategies = new Map<string, ConversionStrategy>();

  constructor(options: ConverterOptions = {}) {
    const config = options.config ?? loadDefaultConfig();
    const logger = options.logger;
    const run = options.runCommand ?? runCommand;

    // Resolved once; supports() and convert() only read the flag
    const officeBinary =
      options.officeBinary !== undefined
        ? options.officeBinary
        : findOfficeBinary(config.docx.converter);
    this.wordProcessorConversionAvailable = officeBinary !== null;

    this.register({
      tag: "img",
      extensions: IMAGE_EXTENSIONS,
      available: true,
      convert: (input, output) => imageToPdf(input, output, logger),
    });

    this.register({
      tag: "txt",
      extensions: TEXT_EXTENSIONS,
      available: true,
      convert: (input, output) => textToPdf(input, output, config.text),
    });

    this.register({
      tag: "docx",
      extensions: DOCX_EXTENSIONS,
      available: officeBinary !== null,
      unavailableReason: DOCX_UNAVAILABLE,
      convert: async (input, output, tempDir) => {
        if (officeBinary === null) throw new Error(DOCX_UNAVAILABLE);
        await docxToPdf(officeBinary, input, output, tempDir, run);
      },
    });
  }

  private register(strategy: ConversionStrategy): void {
    for (const extension of strategy.extensions) {
      this.strategies.set(extension, strategy);
    }
  }

  /**
   * Whether the input's extension has a strategy available in this environment
   */
  supports(path: string): boolean {
    return this.strategies.get(extensionOf(path))?.available ?? false;
  }

  /**
   * Convert one file into `<tag>_<name>.pdf` inside tempDir
   *
   * @returns Path of the written PDF
   * @throws ConversionError when the type is unsupported, its converter is
   *   unavailable, or conversion fails
   */
  async convert(inputPath: string, tempDir: string): Promise<string> {
    const input = resolve(inputPath);
    if (!(await isFile(input))) {
      throw new ConversionError(`Input not found: ${input}`, input);
    }

    const extension = extensionOf(input);
    const strategy = this.strategies.get(extension);
    if (!strategy) {
      throw new ConversionError(
        `Unsupported file type for conversion: ${extension || "(no extension)"}`,
        input,
      );
    }
    if (!strategy.available) {
      throw new ConversionError(
        strategy.unavailableReason ?? `No converter available for ${extension}`,
        input,
      );
    }

    const output = await uniquePath(tempDir, `${strategy.tag}_${parse(input).name}.pdf`);
    try {
      await strategy.convert(input, output, tempDir);
    } catch (error) {
      throw new ConversionError(`Failed to convert ${input}: ${describeError(error)}`, input, {
        cause: error,
      });
    }
    return output;
  }
}

// ============================================================================
// Shared default converter
// ============================================================================

let defaultConverter: Converter | undefined;

/**
 * Converter built from the default configuration on first use
 */
export function getDefaultConverter(): Converter {
  defaultConverter ??= new Converter();
  return defaultConverter;
}

/**
 * True for image and text inputs, and for DOCX when LibreOffice is installed
 */
export function isSupportedNonPdf(path: string): boolean {
  return getDefaultConverter().supports(path);
}

/**
 * Convert one non-PDF file; without tempDir the system temp directory is used
 */
export async function convertToPdf(path: string, tempDir: string = tmpdir()): Promise<string> {
  return getDefaultConverter().convert(path, tempDir);
}
