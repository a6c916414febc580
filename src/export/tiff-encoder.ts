import { deflateSync } from 'zlib';
import type { Raster } from '../types/output.js';

// Baseline TIFF tags written for every page, in ascending tag order.
const TAG = {
  ImageWidth: 256,
  ImageLength: 257,
  BitsPerSample: 258,
  Compression: 259,
  PhotometricInterpretation: 262,
  StripOffsets: 273,
  SamplesPerPixel: 277,
  RowsPerStrip: 278,
  StripByteCounts: 279,
  XResolution: 282,
  YResolution: 283,
  PlanarConfiguration: 284,
  ResolutionUnit: 296,
  PageNumber: 297
} as const;

const TYPE_SHORT = 3;
const TYPE_LONG = 4;
const TYPE_RATIONAL = 5;

const COMPRESSION_DEFLATE = 8;
const PHOTOMETRIC_RGB = 2;
const RESOLUTION_UNIT_INCH = 2;

const HEADER_SIZE = 8;
const ENTRY_SIZE = 12;

// Values that fit in the four-byte field are stored inline, the rest at an offset.
type IfdEntry =
  | { tag: number; kind: 'shorts'; values: [number] | [number, number] }
  | { tag: number; kind: 'long'; value: number }
  | { tag: number; kind: 'offset'; type: typeof TYPE_SHORT | typeof TYPE_RATIONAL; count: number; offset: number };

export interface TiffEncodeOptions {
  dpi: number;
}

/** Composites RGBA pixels onto white and drops the alpha channel. */
export function flattenToRgb(raster: Raster): Buffer {
  const pixels = raster.width * raster.height;
  const rgb = Buffer.alloc(pixels * 3);
  for (let p = 0; p < pixels; p++) {
    const alpha = raster.data[p * 4 + 3] / 255;
    for (let c = 0; c < 3; c++) {
      const value = raster.data[p * 4 + c];
      rgb[p * 3 + c] = Math.round(value * alpha + 255 * (1 - alpha));
    }
  }
  return rgb;
}

/**
 * Encodes pages as one multi-page TIFF: 8-bit RGB, Adobe Deflate, a single
 * strip per page and the same resolution on both axes.
 */
export function encodeTiff(pages: Raster[], options: TiffEncodeOptions): Uint8Array {
  if (pages.length === 0) throw new Error('Cannot encode a TIFF without pages');

  const chunks: Buffer[] = [];
  let offset = HEADER_SIZE;
  const header = Buffer.alloc(HEADER_SIZE);
  header.write('II', 0, 'latin1');
  header.writeUInt16LE(42, 2);
  chunks.push(header);

  // Offset field of the previous IFD (or the header) that must point at the next one.
  let pendingLinkChunk = header;
  let pendingLinkAt = 4;

  pages.forEach((page, index) => {
    const strip = deflateSync(flattenToRgb(page));
    const stripOffset = offset;
    chunks.push(strip);
    offset += strip.length;
    // Word-align what follows.
    if (offset % 2 !== 0) {
      chunks.push(Buffer.alloc(1));
      offset += 1;
    }

    const extra = Buffer.alloc(6 + 8 + 8);
    extra.writeUInt16LE(8, 0);
    extra.writeUInt16LE(8, 2);
    extra.writeUInt16LE(8, 4);
    extra.writeUInt32LE(options.dpi, 6);
    extra.writeUInt32LE(1, 10);
    extra.writeUInt32LE(options.dpi, 14);
    extra.writeUInt32LE(1, 18);
    const extraOffset = offset;
    chunks.push(extra);
    offset += extra.length;

    const entries: IfdEntry[] = [
      { tag: TAG.ImageWidth, kind: 'long', value: page.width },
      { tag: TAG.ImageLength, kind: 'long', value: page.height },
      { tag: TAG.BitsPerSample, kind: 'offset', type: TYPE_SHORT, count: 3, offset: extraOffset },
      { tag: TAG.Compression, kind: 'shorts', values: [COMPRESSION_DEFLATE] },
      { tag: TAG.PhotometricInterpretation, kind: 'shorts', values: [PHOTOMETRIC_RGB] },
      { tag: TAG.StripOffsets, kind: 'long', value: stripOffset },
      { tag: TAG.SamplesPerPixel, kind: 'shorts', values: [3] },
      { tag: TAG.RowsPerStrip, kind: 'long', value: page.height },
      { tag: TAG.StripByteCounts, kind: 'long', value: strip.length },
      { tag: TAG.XResolution, kind: 'offset', type: TYPE_RATIONAL, count: 1, offset: extraOffset + 6 },
      { tag: TAG.YResolution, kind: 'offset', type: TYPE_RATIONAL, count: 1, offset: extraOffset + 14 },
      { tag: TAG.PlanarConfiguration, kind: 'shorts', values: [1] },
      { tag: TAG.ResolutionUnit, kind: 'shorts', values: [RESOLUTION_UNIT_INCH] },
      { tag: TAG.PageNumber, kind: 'shorts', values: [index, pages.length] }
    ];

    const ifdOffset = offset;
    pendingLinkChunk.writeUInt32LE(ifdOffset, pendingLinkAt);

    const ifd = Buffer.alloc(2 + entries.length * ENTRY_SIZE + 4);
    ifd.writeUInt16LE(entries.length, 0);
    entries.forEach((entry, i) => writeEntry(ifd, 2 + i * ENTRY_SIZE, entry));
    chunks.push(ifd);
    offset += ifd.length;

    pendingLinkChunk = ifd;
    pendingLinkAt = ifd.length - 4;
  });

  return new Uint8Array(Buffer.concat(chunks));
}

function writeEntry(target: Buffer, at: number, entry: IfdEntry): void {
  target.writeUInt16LE(entry.tag, at);
  switch (entry.kind) {
    case 'shorts':
      target.writeUInt16LE(TYPE_SHORT, at + 2);
      target.writeUInt32LE(entry.values.length, at + 4);
      entry.values.forEach((value, i) => target.writeUInt16LE(value, at + 8 + i * 2));
      break;
    case 'long':
      target.writeUInt16LE(TYPE_LONG, at + 2);
      target.writeUInt32LE(1, at + 4);
      target.writeUInt32LE(entry.value, at + 8);
      break;
    case 'offset':
      target.writeUInt16LE(entry.type, at + 2);
      target.writeUInt32LE(entry.count, at + 4);
      target.writeUInt32LE(entry.offset, at + 8);
      break;
  }
}
