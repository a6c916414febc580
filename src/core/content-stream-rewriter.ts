/**
 * Textual surgery on decoded page content streams.
 *
 * Streams are handled as latin1 strings so that every byte maps to exactly one
 * UTF-16 unit and survives the round trip, whatever binary data (inline images,
 * non-ASCII string operands) the stream carries.
 */

// Lookarounds that make an operator or operand match only as a whole token.
const TOKEN_START = '(?<![^\\s])';
const TOKEN_END = '(?![^\\s])';
const NAME_END = '(?=[\\s/\\[\\]()<>{}%]|$)';
const NUMBER = '[-+]?(?:\\d+\\.?\\d*|\\.\\d+)';

const EMPTY_BRACKET = /(?<![^\s])q\s+Q(?![^\s])/g;
const NEWLINE_RUN = /\n(?:[ \t\r\f]*\n){2,}/g;

export function decodeLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

export function encodeLatin1(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'latin1'));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Patterns for one resource name, most specific first: the whole `q ... Q`
 * bracket, then a `cm` glued to the paint operator, then the bare `Do`, then
 * any leftover mention of the name.
 */
function referencePatterns(identifier: string): RegExp[] {
  const name = `/${escapeRegExp(identifier)}`;
  const paint = `${name}\\s+Do${TOKEN_END}`;
  return [
    new RegExp(`${TOKEN_START}q\\s[^qQ]*?${paint}[^qQ]*?${TOKEN_START}Q${TOKEN_END}`, 'g'),
    new RegExp(`${TOKEN_START}(?:${NUMBER}\\s+){6}cm\\s+${paint}`, 'g'),
    new RegExp(`${paint}\\s*`, 'g'),
    new RegExp(`${name}${NAME_END}`, 'g')
  ];
}

function collapseEmptyBrackets(text: string): string {
  let current = text;
  for (;;) {
    const next = current.replace(EMPTY_BRACKET, '');
    if (next === current) return current;
    current = next;
  }
}

/**
 * Removes every painting of, and every remaining mention of, the given
 * XObject names from a content stream. Returns `stream` itself when nothing
 * referenced any of the names.
 */
export function stripReferences(stream: Uint8Array, identifiers: Iterable<string>): Uint8Array {
  const original = decodeLatin1(stream);
  let text = original;
  let matched = false;

  for (const identifier of identifiers) {
    if (!identifier) continue;
    for (const pattern of referencePatterns(identifier)) {
      const next = text.replace(pattern, '');
      if (next !== text) {
        matched = true;
        text = next;
      }
    }
  }

  if (!matched) return stream;

  text = collapseEmptyBrackets(text).replace(NEWLINE_RUN, '\n\n');
  return text === original ? stream : encodeLatin1(text);
}

export interface TextBlockScan {
  bytes: Uint8Array;
  removed: number;
}

/**
 * Drops `BT ... ET` blocks (each delimiter on its own line) whose raw text
 * satisfies `isWatermark`. An unterminated block runs to the end of the stream.
 */
export function stripTextBlocks(stream: Uint8Array, isWatermark: (blockText: string) => boolean): TextBlockScan {
  const lines = decodeLatin1(stream).split('\n');
  const kept: string[] = [];
  let removed = 0;

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    if (line.trim() !== 'BT') {
      kept.push(line);
      i++;
      continue;
    }

    const block = [line];
    i++;
    while (i < lines.length) {
      const inner = lines[i];
      block.push(inner);
      i++;
      if (inner.trim() === 'ET') break;
    }

    if (isWatermark(block.join('\n'))) {
      removed++;
    } else {
      kept.push(...block);
    }
  }

  if (removed === 0) return { bytes: stream, removed };
  return { bytes: encodeLatin1(kept.join('\n')), removed };
}
