import { DISCORD_MESSAGE_LIMIT, QUOTE_MARKER, QUOTE_PREFIX } from '@digestor/protocol';

export interface SplitOptions {
  /**
   * Keep block quotes intact across fragments: lines before the first quoted
   * line stay with the first fragment, and any fragment that starts inside the
   * quoted region begins with the quote marker.
   */
  preserveQuotes?: boolean;
}

function isQuoteLine(line: string): boolean {
  return line.startsWith(QUOTE_MARKER);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut an over-long line into fixed windows. Windows after the first carry
 * `continuation` and shrink so that they still fit. A window never ends
 * between the two halves of a surrogate pair.
 */
function hardSplit(line: string, maxLength: number, continuation: string): string[] {
  const pieces: string[] = [];
  let prefix = '';
  let start = 0;
  while (start < line.length) {
    let end = Math.min(start + maxLength - prefix.length, line.length);
    if (end < line.length && end - start > 1 && isHighSurrogate(line.charCodeAt(end - 1))) end--;
    pieces.push(prefix + line.slice(start, end));
    prefix = continuation;
    start = end;
  }
  return pieces;
}

/**
 * Split text into fragments of at most `maxLength` characters on line
 * boundaries. Input that already fits comes back as a single fragment;
 * blank input yields no fragments.
 */
export function splitMessage(text: string, maxLength: number = DISCORD_MESSAGE_LIMIT, options: SplitOptions = {}): string[] {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer (got ${maxLength})`);
  }
  if (!text.trim()) return [];
  if (text.length <= maxLength) return [text];

  const lines = text.split('\n');
  const quoteStart = options.preserveQuotes && maxLength > QUOTE_PREFIX.length
    ? lines.findIndex(isQuoteLine)
    : -1;

  const parts: string[] = [];
  let current = '';

  const flush = () => {
    const trimmed = current.trimEnd();
    if (trimmed) parts.push(trimmed);
    current = '';
  };

  const open = (line: string, inQuote: boolean) => {
    // Nothing worth opening a fragment with
    if (!line.trim()) return;
    const opening = inQuote && !isQuoteLine(line) ? QUOTE_PREFIX + line : line;
    if (opening.length > maxLength) {
      const pieces = hardSplit(opening, maxLength, inQuote ? QUOTE_PREFIX : '');
      parts.push(...pieces.filter(piece => piece.trim()));
      return;
    }
    current = opening + '\n';
  };

  lines.forEach((line, index) => {
    if (current !== '' && current.length + line.length + 1 <= maxLength) {
      current += line + '\n';
      return;
    }
    flush();
    open(line, quoteStart >= 0 && index >= quoteStart);
  });

  flush();
  return parts;
}
