import {
  PDFArray,
  PDFBool,
  PDFContext,
  PDFDict,
  PDFHexString,
  PDFName,
  PDFNull,
  PDFNumber,
  PDFObject,
  PDFRef,
  PDFStream,
  PDFString
} from 'pdf-lib';

/**
 * A resolved view of a `pdf-lib` object. Accessors below hand back
 * `undefined` on a kind mismatch instead of throwing, so callers decide what
 * a missing or mistyped entry means for them.
 */
export type PdfNode =
  | { kind: 'dict'; value: PDFDict }
  | { kind: 'array'; value: PDFArray }
  | { kind: 'stream'; value: PDFStream }
  | { kind: 'name'; value: PDFName }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'null' }
  | { kind: 'ref'; value: PDFRef }
  | { kind: 'other'; value: PDFObject };

export type PdfNodeKind = PdfNode['kind'];

// Guards against reference cycles in broken files.
const MAX_REF_HOPS = 8;

export function inspect(context: PDFContext, object: PDFObject | undefined): PdfNode | undefined {
  if (object === undefined) return undefined;

  let current: PDFObject = object;
  for (let hops = 0; current instanceof PDFRef; hops++) {
    const target = hops < MAX_REF_HOPS ? context.lookup(current) : undefined;
    // A reference to a missing object stays a ref so the caller can report it.
    if (target === undefined) return { kind: 'ref', value: current };
    current = target;
  }

  if (current instanceof PDFStream) return { kind: 'stream', value: current };
  if (current instanceof PDFDict) return { kind: 'dict', value: current };
  if (current instanceof PDFArray) return { kind: 'array', value: current };
  if (current instanceof PDFName) return { kind: 'name', value: current };
  if (current instanceof PDFNumber) return { kind: 'number', value: current.asNumber() };
  if (current instanceof PDFString || current instanceof PDFHexString) {
    return { kind: 'string', value: current.decodeText() };
  }
  if (current instanceof PDFBool) return { kind: 'bool', value: current.asBoolean() };
  if (current === PDFNull) return { kind: 'null' };
  return { kind: 'other', value: current };
}

export function lookupEntry(context: PDFContext, dict: PDFDict, key: string | PDFName): PdfNode | undefined {
  const name = typeof key === 'string' ? PDFName.of(key) : key;
  return inspect(context, dict.get(name));
}

export function lookupItem(context: PDFContext, array: PDFArray, index: number): PdfNode | undefined {
  if (index < 0 || index >= array.size()) return undefined;
  return inspect(context, array.get(index));
}

export function asDict(node: PdfNode | undefined): PDFDict | undefined {
  return node?.kind === 'dict' ? node.value : undefined;
}

export function asArray(node: PdfNode | undefined): PDFArray | undefined {
  return node?.kind === 'array' ? node.value : undefined;
}

export function asStream(node: PdfNode | undefined): PDFStream | undefined {
  return node?.kind === 'stream' ? node.value : undefined;
}

export function asNumber(node: PdfNode | undefined): number | undefined {
  return node?.kind === 'number' ? node.value : undefined;
}

/** Name value without the leading slash, e.g. `Image` for `/Image`. */
export function asName(node: PdfNode | undefined): string | undefined {
  return node?.kind === 'name' ? node.value.decodeText() : undefined;
}

/** Text strings, hex strings and names all read as text here. */
export function asText(node: PdfNode | undefined): string | undefined {
  if (!node) return undefined;
  if (node.kind === 'string') return node.value;
  if (node.kind === 'name') return node.value.decodeText();
  return undefined;
}

export function kindOf(node: PdfNode | undefined): PdfNodeKind | 'missing' {
  return node ? node.kind : 'missing';
}

/** The identifier a content stream uses for a resource key (`/Im0` → `Im0`). */
export function resourceIdentifier(key: PDFName): string {
  return key.asString().slice(1);
}
