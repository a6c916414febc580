import {
  PDFArray,
  PDFContext,
  PDFDict,
  PDFFlateStream,
  PDFName,
  PDFObject,
  PDFRawStream,
  PDFRef,
  PDFStream,
  decodePDFRawStream
} from 'pdf-lib';
import { inspect, kindOf } from './pdf-objects.js';

export interface ContentStreamSlot {
  /** Human-readable location, e.g. `page 2 stream 1`. */
  target: string;
  read(): Uint8Array;
  write(contents: Uint8Array): void;
}

export interface UnreadableContentStream {
  target: string;
  reason: string;
}

export interface PageContentStreams {
  slots: ContentStreamSlot[];
  unreadable: UnreadableContentStream[];
}

const CONTENTS = PDFName.of('Contents');

export function readStreamContents(stream: PDFStream): Uint8Array {
  if (stream instanceof PDFRawStream) return decodePDFRawStream(stream).decode();
  if (stream instanceof PDFFlateStream) return stream.getUnencodedContents();
  throw new Error(`Unsupported stream type ${stream.constructor.name}`);
}

/**
 * Lists the content streams of a page in drawing order. `Contents` may be a
 * stream or an array of streams, each either direct or by reference; every
 * slot writes back to wherever its stream came from.
 */
export function pageContentStreams(context: PDFContext, page: PDFDict, pageNumber: number): PageContentStreams {
  const result: PageContentStreams = { slots: [], unreadable: [] };
  const raw = page.get(CONTENTS);
  if (raw === undefined) return result;

  const top = inspect(context, raw);
  if (top?.kind === 'stream') {
    result.slots.push(
      makeSlot(context, `page ${pageNumber} stream 1`, top.value, raw, (stream) => page.set(CONTENTS, stream))
    );
    return result;
  }

  if (top?.kind !== 'array') {
    result.unreadable.push({ target: `page ${pageNumber} contents`, reason: `expected stream or array, got ${kindOf(top)}` });
    return result;
  }

  const array: PDFArray = top.value;
  for (let i = 0; i < array.size(); i++) {
    const target = `page ${pageNumber} stream ${i + 1}`;
    const item = array.get(i);
    const node = inspect(context, item);
    if (node?.kind !== 'stream') {
      result.unreadable.push({ target, reason: `expected stream, got ${kindOf(node)}` });
      continue;
    }
    result.slots.push(makeSlot(context, target, node.value, item, (stream) => array.set(i, stream)));
  }
  return result;
}

function makeSlot(
  context: PDFContext,
  target: string,
  stream: PDFStream,
  source: PDFObject,
  replaceDirect: (stream: PDFStream) => void
): ContentStreamSlot {
  return {
    target,
    read: () => readStreamContents(stream),
    write: (contents) => {
      const replacement = context.flateStream(contents);
      if (source instanceof PDFRef) context.assign(source, replacement);
      else replaceDirect(replacement);
    }
  };
}
