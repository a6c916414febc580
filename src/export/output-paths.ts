import { basename, dirname, extname, join } from 'path';
import type { ExportFormat } from '../types/config.js';

const EXTENSIONS: Record<ExportFormat, string> = {
  pdf: '.pdf',
  png: '.png',
  tif: '.tif'
};

/**
 * Where output goes when the caller gives no path. For PNG this is the base
 * name that {@link pngPagePath} extends.
 */
export function defaultOutputPath(inputPath: string, format: ExportFormat): string {
  const stem = basename(inputPath, extname(inputPath));
  const base = join(dirname(inputPath), `${stem}_cleaned`);
  return format === 'png' ? base : `${base}${EXTENSIONS[format]}`;
}

export function resolveOutputPath(inputPath: string, format: ExportFormat, override?: string): string {
  if (!override) return defaultOutputPath(inputPath, format);
  if (format === 'png' && extname(override).toLowerCase() === '.png') {
    return override.slice(0, -'.png'.length);
  }
  return override;
}

export function pngPagePath(base: string, pageIndex: number, pageCount: number): string {
  return pageCount === 1 ? `${base}.png` : `${base}_page_${pageIndex + 1}.png`;
}

export function temporaryPdfPath(directory: string): string {
  return join(directory, `_temp_${process.pid}_${Date.now()}.pdf`);
}
