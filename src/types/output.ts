import type { ExportFormat } from './config.js';
import type { PruneReport } from './pdf.js';

/** RGBA pixels, row-major, four bytes per pixel. Same shape as a decoded `pngjs` image. */
export interface Raster {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface RasterSession {
  readonly pageCount: number;
  render(pageIndex: number, scale: number): Promise<Raster>;
  close(): Promise<void>;
}

export interface PageRasterizer {
  open(pdfPath: string): Promise<RasterSession>;
}

export type PageRenderState =
  | { state: 'accumulated'; pageIndex: number; retried: boolean }
  | { state: 'skipped'; pageIndex: number; reason: string };

export interface ExportResult {
  format: ExportFormat;
  files: string[];
  pages: PageRenderState[];
}

export interface ProcessResult {
  files: string[];
  report: PruneReport;
  export: ExportResult;
}
