export { SignatureMatcher } from './signature-matcher.js';
export { ObjectGraphPruner, type ObjectGraphPrunerOptions } from './object-graph-pruner.js';
export { stripReferences, stripTextBlocks, type TextBlockScan } from './content-stream-rewriter.js';
export { pageContentStreams, readStreamContents, type ContentStreamSlot } from './content-streams.js';
export * from './pdf-objects.js';
