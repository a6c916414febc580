import { rm, writeFile } from 'fs/promises';
import { PNG } from 'pngjs';
import type { PDFDocument } from 'pdf-lib';
import type { ExportFormat } from '../types/config.js';
import type { ExportResult, PageRasterizer, PageRenderState, Raster, RasterSession } from '../types/output.js';
import { DEFAULT_DPI } from '../config.js';
import { ExportError, PageRenderError, describeError } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { encodeTiff } from './tiff-encoder.js';
import { pngPagePath, temporaryPdfPath } from './output-paths.js';
import { withTemporaryFile } from './temp-file.js';
import { UnpdfRasterizer } from './unpdf-rasterizer.js';

export interface ExportAdapterOptions {
  format: ExportFormat;
  dpi?: number;
  rasterizer?: PageRasterizer;
  logger?: Logger;
}

export interface ExportTarget {
  /** Output file, or for PNG the base path that page suffixes are added to. */
  outputPath: string;
  /** Directory for the intermediate PDF handed to the rasterizer. */
  tempDir: string;
}

type PageRender = { raster: Raster; retried: boolean } | { error: PageRenderError };

// pdf.js user space units per inch
const PDF_UNITS_PER_INCH = 72;

export class ExportAdapter {
  private readonly format: ExportFormat;
  private readonly dpi: number;
  private readonly rasterizer: PageRasterizer;
  private readonly logger: Logger;

  constructor(options: ExportAdapterOptions) {
    this.format = options.format;
    this.dpi = options.dpi ?? DEFAULT_DPI;
    this.rasterizer = options.rasterizer ?? new UnpdfRasterizer();
    this.logger = options.logger ?? createLogger();
  }

  async export(document: PDFDocument, target: ExportTarget): Promise<ExportResult> {
    const bytes = await this.serialize(document);

    if (this.format === 'pdf') {
      this.logger.action(`Saving PDF: ${target.outputPath}`);
      await this.writeOutput(target.outputPath, bytes);
      this.logger.success(`Saved: ${target.outputPath}`);
      return { format: 'pdf', files: [target.outputPath], pages: [] };
    }

    return await withTemporaryFile(
      temporaryPdfPath(target.tempDir),
      bytes,
      (pdfPath) => (this.format === 'png' ? this.exportPng(pdfPath, target.outputPath) : this.exportTiff(pdfPath, target.outputPath)),
      this.logger
    );
  }

  private async serialize(document: PDFDocument): Promise<Uint8Array> {
    try {
      return await document.save();
    } catch (error) {
      throw new ExportError('Failed to serialize cleaned PDF', error);
    }
  }

  private async writeOutput(path: string, contents: Uint8Array): Promise<void> {
    try {
      await writeFile(path, contents);
    } catch (error) {
      throw new ExportError(`Failed to write ${path}`, error);
    }
  }

  private async exportPng(pdfPath: string, base: string): Promise<ExportResult> {
    this.logger.action(`Exporting to PNG (DPI: ${this.dpi})...`);
    const files: string[] = [];

    let pages: PageRenderState[];
    try {
      pages = await this.renderAll(pdfPath, async (raster, pageIndex, pageCount) => {
        const out = pngPagePath(base, pageIndex, pageCount);
        await this.writeOutput(out, encodePng(raster));
        files.push(out);
        this.logger.success(`  Page ${pageIndex + 1} → ${out}`);
      });
    } catch (error) {
      await this.removePartialOutput(files);
      throw error;
    }

    if (files.length === 0) throw new ExportError('No pages could be rendered');
    return { format: 'png', files, pages };
  }

  private async removePartialOutput(files: string[]): Promise<void> {
    for (const file of files) {
      try {
        await rm(file, { force: true });
      } catch (error) {
        this.logger.warn(`Could not remove partial output ${file}: ${describeError(error)}`);
      }
    }
  }

  private async exportTiff(pdfPath: string, output: string): Promise<ExportResult> {
    this.logger.action(`Exporting to multi-page TIF (DPI: ${this.dpi})...`);
    const rasters: Raster[] = [];

    const pages = await this.renderAll(pdfPath, async (raster, pageIndex) => {
      rasters.push(raster);
      this.logger.debug(`  Converted page ${pageIndex + 1}`);
    });

    if (rasters.length === 0) throw new ExportError('No pages could be rendered');

    let encoded: Uint8Array;
    try {
      encoded = encodeTiff(rasters, { dpi: this.dpi });
    } catch (error) {
      throw new ExportError('Failed to encode TIF', error);
    }
    await this.writeOutput(output, encoded);
    this.logger.success(`TIF saved: ${output}`);
    return { format: 'tif', files: [output], pages };
  }

  /**
   * Visits every page in order. A page that fails to render is retried once
   * at 72 DPI; if that fails too it is skipped and the run continues.
   */
  private async renderAll(
    pdfPath: string,
    onPage: (raster: Raster, pageIndex: number, pageCount: number) => Promise<void>
  ): Promise<PageRenderState[]> {
    let session: RasterSession;
    try {
      session = await this.rasterizer.open(pdfPath);
    } catch (error) {
      throw new ExportError('Failed to open PDF for export', error);
    }

    const states: PageRenderState[] = [];
    try {
      for (let pageIndex = 0; pageIndex < session.pageCount; pageIndex++) {
        const result = await this.renderPage(session, pageIndex);
        if ('error' in result) {
          this.logger.error(`  ${result.error.message}, skipping`);
          states.push({ state: 'skipped', pageIndex, reason: result.error.message });
          continue;
        }
        await onPage(result.raster, pageIndex, session.pageCount);
        states.push({ state: 'accumulated', pageIndex, retried: result.retried });
      }
    } finally {
      await session.close();
    }
    return states;
  }

  private async renderPage(session: RasterSession, pageIndex: number): Promise<PageRender> {
    try {
      return { raster: await session.render(pageIndex, this.dpi / PDF_UNITS_PER_INCH), retried: false };
    } catch (first) {
      this.logger.debug(`  Page ${pageIndex + 1} failed at ${this.dpi} DPI (${describeError(first)}), retrying at defaults`);
      try {
        return { raster: await session.render(pageIndex, 1), retried: true };
      } catch (second) {
        return { error: new PageRenderError(pageIndex, second) };
      }
    }
  }
}

/** RGB PNG; any transparency is flattened onto white. */
export function encodePng(raster: Raster): Buffer {
  const png = new PNG({ width: raster.width, height: raster.height });
  png.data = Buffer.from(raster.data.buffer, raster.data.byteOffset, raster.data.byteLength);
  return PNG.sync.write(png, { colorType: 2 });
}
