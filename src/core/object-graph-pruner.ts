import { PDFContext, PDFDict, PDFDocument, PDFName } from 'pdf-lib';
import type { ObjectOutcome, PassName, PassReport, PruneReport } from '../types/pdf.js';
import { METADATA_KEYS } from '../types/pdf.js';
import { MAIN_CONTENT_THRESHOLD } from '../config.js';
import { describeError } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { SignatureMatcher } from './signature-matcher.js';
import { stripReferences, stripTextBlocks } from './content-stream-rewriter.js';
import { pageContentStreams } from './content-streams.js';
import {
  asArray,
  asDict,
  asName,
  asNumber,
  asStream,
  asText,
  inspect,
  kindOf,
  type PdfNode,
  lookupEntry,
  lookupItem,
  resourceIdentifier
} from './pdf-objects.js';

interface XObjectGroup {
  xobjects: PDFDict;
  pages: Array<{ node: PDFDict; pageNumber: number }>;
}

export interface ObjectGraphPrunerOptions {
  matcher?: SignatureMatcher;
  mainContentThreshold?: number;
  logger?: Logger;
}

const removed = (target: string, detail?: string): ObjectOutcome => ({ status: 'removed', target, detail });
const kept = (target: string): ObjectOutcome => ({ status: 'kept', target });
const skipped = (target: string, reason: string): ObjectOutcome => ({ status: 'skipped', target, reason });

/** Runs `classify`, turning anything it throws into a `skipped` outcome for `target`. */
function attempt(target: string, classify: () => ObjectOutcome): ObjectOutcome {
  try {
    return classify();
  } catch (error) {
    return skipped(target, describeError(error));
  }
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}…` : value;
}

/**
 * Finds and deletes watermark artifacts in a loaded document, mutating it in
 * place. Each pass is independent; {@link prune} runs them in the order the
 * later passes rely on.
 */
export class ObjectGraphPruner {
  private readonly matcher: SignatureMatcher;
  private readonly mainContentThreshold: number;
  private readonly logger: Logger;

  constructor(options: ObjectGraphPrunerOptions = {}) {
    this.matcher = options.matcher ?? new SignatureMatcher();
    this.mainContentThreshold = options.mainContentThreshold ?? MAIN_CONTENT_THRESHOLD;
    this.logger = options.logger ?? createLogger();
  }

  prune(document: PDFDocument): PruneReport {
    this.logger.info('  Step 1: Annotations...');
    const annotations = this.removeAnnotations(document);
    this.logger.success(`  Removed ${annotations.removed} annotation(s)`);

    this.logger.info('  Step 2: Images...');
    const images = this.removeWatermarkImages(document);
    this.logger.success(`  Removed ${images.removed} image(s)`);

    this.logger.info('  Step 3: Text...');
    const text = this.removeTextWatermarks(document);
    this.logger.success(`  Removed ${text.removed} text block(s)`);

    this.logger.info('  Step 4: Metadata...');
    const metadata = this.cleanMetadata(document);
    this.logger.success(`  Cleaned ${metadata.removed} field(s)`);

    return {
      pages: document.getPageCount(),
      annotations: annotations.removed,
      images: images.removed,
      textBlocks: text.removed,
      metadata: metadata.removed,
      passes: [annotations, images, text, metadata]
    };
  }

  removeAnnotations(document: PDFDocument): PassReport {
    const report = this.newReport('annotations');
    const { context } = document;

    document.getPages().forEach((page, pageIndex) => {
      const pageNumber = pageIndex + 1;
      const node = lookupEntry(context, page.node, 'Annots');
      if (!node) return;
      const annots = asArray(node);
      if (!annots) {
        this.record(report, skipped(`page ${pageNumber} annotations`, `expected array, got ${node.kind}`));
        return;
      }

      const toRemove: number[] = [];
      for (let i = 0; i < annots.size(); i++) {
        const target = `page ${pageNumber} annotation ${i + 1}`;
        const outcome = attempt(target, () => this.classifyAnnotation(context, lookupItem(context, annots, i), target));
        this.record(report, outcome);
        if (outcome.status === 'removed') toRemove.push(i);
      }

      // Highest index first so earlier indices stay valid.
      for (let k = toRemove.length - 1; k >= 0; k--) {
        annots.remove(toRemove[k]);
        report.removed++;
      }
    });

    return report;
  }

  private classifyAnnotation(context: PDFContext, node: PdfNode | undefined, target: string): ObjectOutcome {
    const annot = asDict(node);
    if (!annot) return skipped(target, `expected dictionary, got ${kindOf(node)}`);

    const action = asDict(lookupEntry(context, annot, 'A'));
    const uri = action ? asText(lookupEntry(context, action, 'URI')) : undefined;
    if (uri !== undefined && this.matcher.matchesWatermarkUrl(uri)) {
      return removed(target, `link ${truncate(uri, 50)}`);
    }

    const contents = asText(lookupEntry(context, annot, 'Contents'));
    if (contents !== undefined && this.matcher.matchesWatermarkText(contents)) {
      return removed(target, 'watermark contents');
    }

    return kept(target);
  }

  removeWatermarkImages(document: PDFDocument): PassReport {
    const report = this.newReport('images');
    const { context } = document;

    // Pages can share one XObject dictionary, by reference or through the page tree.
    const groups = new Map<PDFDict, XObjectGroup>();
    document.getPages().forEach((page, pageIndex) => {
      const resources = asDict(inspect(context, page.node.getInheritableAttribute(PDFName.of('Resources'))));
      if (!resources) return;
      const xobjects = asDict(lookupEntry(context, resources, 'XObject'));
      if (!xobjects) return;
      const group = groups.get(xobjects) ?? { xobjects, pages: [] };
      group.pages.push({ node: page.node, pageNumber: pageIndex + 1 });
      groups.set(xobjects, group);
    });

    for (const { xobjects, pages } of groups.values()) {
      const pageNumber = pages[0].pageNumber;
      const keys = xobjects.keys();
      this.logger.debug(`Page ${pageNumber}: Checking ${keys.length} XObject(s)`);

      const candidates: Array<{ key: PDFName; outcome: ObjectOutcome }> = [];
      for (const key of keys) {
        const target = `page ${pageNumber} XObject ${resourceIdentifier(key)}`;
        const outcome = attempt(target, () => this.classifyImage(context, xobjects, key, target));
        if (outcome.status === 'removed') candidates.push({ key, outcome });
        else this.record(report, outcome);
      }
      if (candidates.length === 0) continue;

      // References go first, on every page drawing from this dictionary.
      const identifiers = candidates.map(({ key }) => resourceIdentifier(key));
      let cleaned = true;
      for (const page of pages) {
        if (!this.cleanContentReferences(context, page.node, page.pageNumber, identifiers, report)) cleaned = false;
      }

      for (const { key, outcome } of candidates) {
        if (!cleaned) {
          // Deleting now would leave the unreadable stream pointing at nothing.
          this.record(report, skipped(outcome.target, 'content streams could not be cleaned, image kept'));
          continue;
        }
        xobjects.delete(key);
        report.removed++;
        this.record(report, outcome);
      }
    }

    return report;
  }

  private classifyImage(context: PDFContext, xobjects: PDFDict, key: PDFName, target: string): ObjectOutcome {
    const node = lookupEntry(context, xobjects, key);
    const stream = asStream(node);
    if (!stream) return skipped(target, `expected stream, got ${kindOf(node)}`);

    const subtype = asName(lookupEntry(context, stream.dict, 'Subtype'));
    if (subtype !== 'Image') return kept(target);

    const width = asNumber(lookupEntry(context, stream.dict, 'Width'));
    const height = asNumber(lookupEntry(context, stream.dict, 'Height'));
    if (width === undefined || height === undefined) {
      return skipped(target, 'image without numeric Width/Height');
    }

    const w = Math.trunc(width);
    const h = Math.trunc(height);
    this.logger.debug(`  ${target}: ${w}x${h}px`);

    if (w >= this.mainContentThreshold && h >= this.mainContentThreshold) return kept(target);
    return removed(target, `${w}x${h}px`);
  }

  /** Returns false when some content stream of the page could not be rewritten. */
  private cleanContentReferences(
    context: PDFContext,
    page: PDFDict,
    pageNumber: number,
    identifiers: string[],
    report: PassReport
  ): boolean {
    const { slots, unreadable } = pageContentStreams(context, page, pageNumber);
    for (const stream of unreadable) this.record(report, skipped(stream.target, stream.reason));
    let cleaned = unreadable.length === 0;

    for (const slot of slots) {
      try {
        const before = slot.read();
        const after = stripReferences(before, identifiers);
        if (after === before) continue;
        slot.write(after);
        this.logger.debug(`  Cleaned ${before.length - after.length} bytes from ${slot.target}`);
      } catch (error) {
        cleaned = false;
        this.record(report, skipped(slot.target, `could not clean references: ${describeError(error)}`));
      }
    }
    return cleaned;
  }

  removeTextWatermarks(document: PDFDocument): PassReport {
    const report = this.newReport('text');
    const { context } = document;

    document.getPages().forEach((page, pageIndex) => {
      const { slots, unreadable } = pageContentStreams(context, page.node, pageIndex + 1);
      for (const stream of unreadable) this.record(report, skipped(stream.target, stream.reason));

      for (const slot of slots) {
        const outcome = attempt(slot.target, () => {
          const scan = stripTextBlocks(slot.read(), (text) => this.matcher.matchesWatermarkText(text));
          if (scan.removed === 0) return kept(slot.target);
          slot.write(scan.bytes);
          report.removed += scan.removed;
          return removed(slot.target, `${scan.removed} text block(s)`);
        });
        this.record(report, outcome);
      }
    });

    return report;
  }

  cleanMetadata(document: PDFDocument): PassReport {
    const report = this.newReport('metadata');
    const { context } = document;
    const infoNode = inspect(context, context.trailerInfo.Info);
    if (!infoNode) return report;
    const info = asDict(infoNode);
    if (!info) {
      this.record(report, skipped('document info', `expected dictionary, got ${infoNode.kind}`));
      return report;
    }

    for (const key of METADATA_KEYS) {
      const target = `metadata ${key}`;
      const node = lookupEntry(context, info, key);
      if (!node) continue;
      const outcome = attempt(target, () => {
        const value = asText(node);
        if (value === undefined) return skipped(target, `expected string, got ${node.kind}`);
        if (!this.matcher.matchesWatermarkText(value)) return kept(target);
        info.delete(PDFName.of(key));
        report.removed++;
        return removed(target, truncate(value, 50));
      });
      this.record(report, outcome);
    }

    return report;
  }

  private newReport(pass: PassName): PassReport {
    return { pass, removed: 0, outcomes: [] };
  }

  private record(report: PassReport, outcome: ObjectOutcome): void {
    report.outcomes.push(outcome);
    if (outcome.status === 'removed') {
      this.logger.action(`Removing ${outcome.target}${outcome.detail ? ` (${outcome.detail})` : ''}`);
    } else if (outcome.status === 'skipped') {
      this.logger.warn(`Skipped ${outcome.target}: ${outcome.reason}`);
    }
  }
}
