import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { dirname } from 'path';
import { PDFDocument } from 'pdf-lib';
import type {
  ProcessResult,
  ProgressCallback,
  PruneReport,
  RemoverConfig,
  RemoverProgress,
  ResolvedRemoverConfig
} from './types/index.js';
import type { PageRasterizer } from './types/output.js';
import { resolveConfig } from './config.js';
import { DocumentOpenError, InputNotFoundError } from './errors.js';
import { createLogger, type Logger } from './utils/logger.js';
import { SignatureMatcher } from './core/signature-matcher.js';
import { ObjectGraphPruner } from './core/object-graph-pruner.js';
import { ExportAdapter } from './export/export-adapter.js';
import { resolveOutputPath } from './export/output-paths.js';

export interface WatermarkRemoverDependencies {
  logger?: Logger;
  rasterizer?: PageRasterizer;
}

/**
 * Load → prune → export for a single document.
 *
 * ```ts
 * const remover = new WatermarkRemover({ format: 'tif', dpi: 200 });
 * const { files, report } = await remover.process('scan.pdf');
 * ```
 */
export class WatermarkRemover {
  private readonly config: ResolvedRemoverConfig;
  private readonly logger: Logger;
  private readonly pruner: ObjectGraphPruner;
  private readonly exporter: ExportAdapter;

  constructor(config: Partial<RemoverConfig> = {}, dependencies: WatermarkRemoverDependencies = {}) {
    this.config = resolveConfig(config);
    this.logger = dependencies.logger ?? createLogger({ debug: this.config.debug });
    this.pruner = new ObjectGraphPruner({
      matcher: new SignatureMatcher(this.config.signatures),
      mainContentThreshold: this.config.mainContentThreshold,
      logger: this.logger
    });
    this.exporter = new ExportAdapter({
      format: this.config.format,
      dpi: this.config.dpi,
      rasterizer: dependencies.rasterizer,
      logger: this.logger
    });
  }

  getConfig(): Readonly<ResolvedRemoverConfig> {
    return this.config;
  }

  async load(inputPath: string): Promise<PDFDocument> {
    if (!existsSync(inputPath)) {
      throw new InputNotFoundError(inputPath);
    }
    try {
      const bytes = await readFile(inputPath);
      // updateMetadata would stamp pdf-lib's own Producer/Creator into the Info dictionary.
      return await PDFDocument.load(bytes, { updateMetadata: false });
    } catch (error) {
      throw new DocumentOpenError(inputPath, error);
    }
  }

  clean(document: PDFDocument): PruneReport {
    return this.pruner.prune(document);
  }

  async process(inputPath: string, progressCallback?: ProgressCallback): Promise<ProcessResult> {
    const outputPath = resolveOutputPath(inputPath, this.config.format, this.config.output);
    this.logger.info(`Input:  ${inputPath}`);
    this.logger.info(`Output: ${outputPath}`);
    this.logger.info(`Format: ${this.config.format.toUpperCase()}`);
    if (this.config.format !== 'pdf') this.logger.info(`DPI:    ${this.config.dpi}`);

    this.reportProgress(progressCallback, { stage: 'loading', message: 'Loading PDF' });
    this.logger.action('Phase 1: Loading PDF');
    const document = await this.load(inputPath);
    const totalPages = document.getPageCount();
    this.logger.success(`Loaded ${totalPages} page(s)`);

    this.reportProgress(progressCallback, { stage: 'pruning', totalPages, message: 'Removing watermarks' });
    this.logger.action('Phase 2: Removing watermarks');
    const report = this.clean(document);

    this.reportProgress(progressCallback, { stage: 'exporting', totalPages, message: `Exporting ${this.config.format}` });
    this.logger.action('Phase 3: Exporting');
    const exported = await this.exporter.export(document, {
      outputPath,
      tempDir: dirname(inputPath)
    });

    this.reportProgress(progressCallback, { stage: 'complete', totalPages, message: `Created ${exported.files.length} file(s)` });
    return { files: exported.files, report, export: exported };
  }

  private reportProgress(callback: ProgressCallback | undefined, progress: RemoverProgress): void {
    if (callback) {
      callback(progress);
    }
  }
}

export * from './types/index.js';
export * from './errors.js';
export {
  DEFAULT_SIGNATURES,
  DEFAULT_CONFIG,
  MAIN_CONTENT_THRESHOLD,
  resolveConfig,
  parseExportFormat,
  validateDpi
} from './config.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './utils/logger.js';
export * from './core/index.js';
export * from './export/index.js';
