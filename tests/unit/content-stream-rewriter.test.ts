import { describe, it, expect } from 'vitest';
import {
  decodeLatin1,
  encodeLatin1,
  stripReferences,
  stripTextBlocks
} from '../../src/core/content-stream-rewriter.js';
import { SignatureMatcher } from '../../src/core/signature-matcher.js';

const strip = (text: string, ids: string[]): string => decodeLatin1(stripReferences(encodeLatin1(text), ids));

describe('stripReferences', () => {
  it('removes the whole q ... Q bracket around the painted image', () => {
    const input = 'q\n612 0 0 792 0 0 cm\n/Im0 Do\nQ\nq\n50 0 0 50 500 20 cm\n/Im1 Do\nQ\n';
    expect(strip(input, ['Im1'])).toBe('q\n612 0 0 792 0 0 cm\n/Im0 Do\nQ\n\n');
  });

  it('removes a six-number cm glued to the paint operator outside a bracket', () => {
    const input = '1 0 0 1 0 0 cm\nBT\n/F1 12 Tf\n(Hello) Tj\nET\n100 0 0 100 10 10 cm /Im2 Do\n';
    expect(strip(input, ['Im2'])).toBe('1 0 0 1 0 0 cm\nBT\n/F1 12 Tf\n(Hello) Tj\nET\n\n');
  });

  it('removes a bare Do invocation', () => {
    expect(strip('BT ET\n/Im3 Do\n/Im4 Do\n', ['Im3'])).toBe('BT ET\n/Im4 Do\n');
  });

  it('removes any other mention of the name', () => {
    expect(strip('0 g /Im5 sh\n', ['Im5'])).toBe('0 g  sh\n');
  });

  it('collapses brackets that end up empty, including nested ones', () => {
    const input = 'q\nq\n5 0 0 5 0 0 cm\n/Im7 Do\nQ\nQ\nBT\nET\n';
    expect(strip(input, ['Im7'])).toBe('\nBT\nET\n');
  });

  it('collapses runs of three or more newlines once something was removed', () => {
    expect(strip('A\n\n\n/Im9 Do\nB', ['Im9'])).toBe('A\n\nB');
  });

  it('handles several identifiers in one call', () => {
    const input = 'q\n10 0 0 10 0 0 cm\n/X1 Do\nQ\nq\n10 0 0 10 0 0 cm\n/X2 Do\nQ\nq\n10 0 0 10 0 0 cm\n/X3 Do\nQ';
    expect(strip(input, ['X1', 'X3'])).toBe('\nq\n10 0 0 10 0 0 cm\n/X2 Do\nQ\n');
  });

  it('does not touch names that merely share a prefix', () => {
    const input = encodeLatin1('q\n10 0 0 10 0 0 cm\n/Im10 Do\nQ\n');
    expect(stripReferences(input, ['Im1'])).toBe(input);
  });

  it('returns the same bytes when nothing matched', () => {
    const input = encodeLatin1('q\n1 0 0 1 0 0 cm\n/Im0 Do\nQ\n\n\n\n');
    expect(stripReferences(input, ['Other'])).toBe(input);
  });

  it('escapes identifiers before building patterns', () => {
    const input = 'q\n1 0 0 1 0 0 cm\n/Im.1 Do\nQ\n/ImX1 Do\n';
    expect(strip(input, ['Im.1'])).toBe('\n/ImX1 Do\n');
  });

  it('leaves no paint operator for the identifier and is idempotent', () => {
    const inputs = [
      'q\n50 0 0 50 0 0 cm\n/Wm Do\nQ',
      'q 50 0 0 50 0 0 cm /Wm Do Q /Page Do',
      '/Wm Do\n/Wm Do\nq\n/Wm Do\nBT (x) Tj ET\nQ',
      '2 0 0 2 0 0 cm\n/Wm Do'
    ];
    for (const text of inputs) {
      const once = stripReferences(encodeLatin1(text), ['Wm']);
      expect(decodeLatin1(once)).not.toMatch(/\/Wm\s+Do/);
      expect(stripReferences(once, ['Wm'])).toBe(once);
    }
  });

  it('keeps bytes above 0x7f intact', () => {
    const prefix = encodeLatin1('BT\n(');
    const binary = new Uint8Array([0xe9, 0x9f, 0x80, 0xff]);
    const suffix = encodeLatin1(') Tj\nET\n');
    const input = new Uint8Array([...prefix, ...binary, ...suffix, ...encodeLatin1('/Im8 Do\n')]);

    const output = stripReferences(input, ['Im8']);
    expect(Array.from(output)).toEqual([...prefix, ...binary, ...suffix]);
  });
});

describe('stripTextBlocks', () => {
  const matcher = new SignatureMatcher();
  const isWatermark = (text: string) => matcher.matchesWatermarkText(text);

  it('drops matching BT/ET blocks and keeps the rest verbatim', () => {
    const input = 'q\nBT\n/F1 9 Tf\n(Scanned with CamScanner) Tj\nET\nBT\n(Invoice 42) Tj\nET\nQ';
    const scan = stripTextBlocks(encodeLatin1(input), isWatermark);
    expect(scan.removed).toBe(1);
    expect(decodeLatin1(scan.bytes)).toBe('q\nBT\n(Invoice 42) Tj\nET\nQ');
  });

  it('recognises delimiters with surrounding whitespace', () => {
    const input = '  BT\r\n(intsig) Tj\r\n ET \r\n0 g';
    const scan = stripTextBlocks(encodeLatin1(input), isWatermark);
    expect(scan.removed).toBe(1);
    expect(decodeLatin1(scan.bytes)).toBe('0 g');
  });

  it('treats an unterminated block as running to the end of the stream', () => {
    const scan = stripTextBlocks(encodeLatin1('0 g\nBT\n(CamScanner) Tj'), isWatermark);
    expect(scan.removed).toBe(1);
    expect(decodeLatin1(scan.bytes)).toBe('0 g');
  });

  it('returns the original bytes when no block matched', () => {
    const input = encodeLatin1('BT\n(Hello) Tj\nET\n');
    const scan = stripTextBlocks(input, isWatermark);
    expect(scan.removed).toBe(0);
    expect(scan.bytes).toBe(input);
  });
});
