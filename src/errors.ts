/**
 * Error taxonomy
 * Every failure the merge pipeline reports is one of these classes
 */

export class PdfAssembleError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed request: empty input list, missing input, output is a directory
 */
export class ValidationError extends PdfAssembleError {}

/**
 * Output exists and overwrite was not requested
 * Kept apart from ValidationError so callers can offer an overwrite prompt
 */
export class AlreadyExistsError extends PdfAssembleError {
  constructor(readonly path: string) {
    super(`Output file already exists: ${path}`);
  }
}

/**
 * A single input could not be turned into a PDF
 */
export class ConversionError extends PdfAssembleError {
  constructor(
    message: string,
    readonly inputPath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * Conversion, concatenation or output write failed after validation
 */
export class MergeError extends PdfAssembleError {}

/**
 * Filesystem failure (permission denied, disk full, ...)
 */
export class IOError extends PdfAssembleError {
  readonly code?: string;

  constructor(message: string, options?: ErrorOptions & { code?: string }) {
    super(message, options);
    this.code = options?.code;
  }

  static from(error: unknown, message: string): IOError {
    const code = errorCode(error);
    const detail = error instanceof Error ? `: ${error.message}` : "";
    return new IOError(`${message}${detail}`, { cause: error, code });
  }
}

/**
 * Read the errno code (ENOENT, EACCES, ...) off a Node.js filesystem error
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Human-readable message for any thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
