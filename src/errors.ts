export enum WatermarkErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  DOCUMENT_OPEN_FAILED = 'DOCUMENT_OPEN_FAILED',
  PAGE_RENDER_FAILED = 'PAGE_RENDER_FAILED',
  EXPORT_FAILED = 'EXPORT_FAILED',
  TEMP_FILE_CLEANUP_FAILED = 'TEMP_FILE_CLEANUP_FAILED'
}

export class WatermarkRemoverError extends Error {
  constructor(
    public readonly code: WatermarkErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'WatermarkRemoverError';
  }
}

export class ConfigError extends WatermarkRemoverError {
  constructor(message: string, details?: unknown) {
    super(WatermarkErrorCode.INVALID_CONFIG, message, details);
    this.name = 'ConfigError';
  }
}

export class InputNotFoundError extends WatermarkRemoverError {
  constructor(public readonly path: string) {
    super(WatermarkErrorCode.INPUT_NOT_FOUND, `File not found: ${path}`);
    this.name = 'InputNotFoundError';
  }
}

export class DocumentOpenError extends WatermarkRemoverError {
  constructor(path: string, cause: unknown) {
    super(WatermarkErrorCode.DOCUMENT_OPEN_FAILED, `Failed to open ${path}: ${describeError(cause)}`, cause);
    this.name = 'DocumentOpenError';
  }
}

export class PageRenderError extends WatermarkRemoverError {
  constructor(public readonly pageIndex: number, cause: unknown) {
    super(
      WatermarkErrorCode.PAGE_RENDER_FAILED,
      `Could not render page ${pageIndex + 1}: ${describeError(cause)}`,
      cause
    );
    this.name = 'PageRenderError';
  }
}

export class ExportError extends WatermarkRemoverError {
  constructor(message: string, cause?: unknown) {
    super(WatermarkErrorCode.EXPORT_FAILED, cause === undefined ? message : `${message}: ${describeError(cause)}`, cause);
    this.name = 'ExportError';
  }
}

export class TempFileCleanupError extends WatermarkRemoverError {
  constructor(public readonly path: string, cause: unknown) {
    super(
      WatermarkErrorCode.TEMP_FILE_CLEANUP_FAILED,
      `Could not remove temporary file ${path}: ${describeError(cause)}`,
      cause
    );
    this.name = 'TempFileCleanupError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
