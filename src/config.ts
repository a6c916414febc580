import type { ExportFormat, RemoverConfig, ResolvedRemoverConfig, WatermarkSignatures } from './types/config.js';
import { ConfigError } from './errors.js';

export const DEFAULT_SIGNATURES: WatermarkSignatures = Object.freeze({
  keywords: Object.freeze([
    'camscanner',
    'intsig',
    'www.camscanner.com',
    'camscanner.com',
    'intsig.net',
    'intsig.com',
    'scanned with camscanner'
  ]),
  domains: Object.freeze(['camscanner.com', 'intsig.net', 'intsig.com'])
});

export const MAIN_CONTENT_THRESHOLD = 1000;
export const DEFAULT_DPI = 300;
export const MIN_DPI = 72;
export const MAX_DPI = 1200;

export const EXPORT_FORMATS: readonly ExportFormat[] = ['pdf', 'png', 'tif'];

export const DEFAULT_CONFIG: ResolvedRemoverConfig = {
  format: 'pdf',
  dpi: DEFAULT_DPI,
  debug: false,
  signatures: DEFAULT_SIGNATURES,
  mainContentThreshold: MAIN_CONTENT_THRESHOLD
};

/**
 * Accepts `tiff` as an alias of `tif`, case-insensitively.
 * Throws `ConfigError` for anything else outside {@link EXPORT_FORMATS}.
 */
export function parseExportFormat(value: string): ExportFormat {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'tiff') return 'tif';
  const match = EXPORT_FORMATS.find((format) => format === normalized);
  if (!match) {
    throw new ConfigError(`Invalid format "${value}". Use: ${EXPORT_FORMATS.join(', ')}`);
  }
  return match;
}

export function validateDpi(dpi: number): number {
  if (!Number.isInteger(dpi) || dpi < MIN_DPI || dpi > MAX_DPI) {
    throw new ConfigError(`DPI must be an integer between ${MIN_DPI} and ${MAX_DPI}, got ${dpi}`);
  }
  return dpi;
}

export function resolveConfig(config: Partial<RemoverConfig> = {}): ResolvedRemoverConfig {
  const threshold = config.mainContentThreshold ?? DEFAULT_CONFIG.mainContentThreshold;
  if (!Number.isFinite(threshold) || threshold <= 0) {
    throw new ConfigError(`mainContentThreshold must be a positive number, got ${threshold}`);
  }

  return {
    format: parseExportFormat(config.format ?? DEFAULT_CONFIG.format),
    dpi: validateDpi(config.dpi ?? DEFAULT_CONFIG.dpi),
    output: config.output,
    debug: config.debug ?? DEFAULT_CONFIG.debug,
    signatures: config.signatures ?? DEFAULT_CONFIG.signatures,
    mainContentThreshold: threshold
  };
}
