// Opening punctuation takes no space after it, closing punctuation none before it.
const LEFT_PUNCTUATION = new Set(['(', '[', '{', '„', '‚', '«', '$', '€', '£', '#']);
const RIGHT_PUNCTUATION = new Set([
  '.', ',', ':', ';', ')', ']', '}', '!', '?', '%', '“', '»', '”', '’', '…', '°',
]);

type PieceKind = 'left' | 'right' | 'word';

interface Piece {
  readonly text: string;
  readonly kind: PieceKind;
}

function splitChunk(chunk: string): Piece[] {
  const chars = [...chunk];
  const leading: Piece[] = [];
  const trailing: Piece[] = [];

  let start = 0;
  while (start < chars.length && LEFT_PUNCTUATION.has(chars[start])) {
    leading.push({ text: chars[start], kind: 'left' });
    start++;
  }
  let end = chars.length;
  while (end > start && RIGHT_PUNCTUATION.has(chars[end - 1])) {
    trailing.unshift({ text: chars[end - 1], kind: 'right' });
    end--;
  }

  const core = chars.slice(start, end).join('');
  return core ? [...leading, { text: core, kind: 'word' }, ...trailing] : [...leading, ...trailing];
}

/**
 * Collapses redundant whitespace in free text and normalizes the spacing
 * around punctuation, e.g. `'forseti ( fyrrverandi ) Íslands .'` becomes
 * `'forseti (fyrrverandi) Íslands.'`.
 */
export function correctSpaces(text: string): string {
  const pieces = text
    .split(/\s+/)
    .filter((chunk) => chunk.length > 0)
    .flatMap(splitChunk);

  let result = '';
  let last: PieceKind | undefined;
  for (const piece of pieces) {
    if (last !== undefined && last !== 'left' && piece.kind !== 'right') {
      result += ' ';
    }
    result += piece.text;
    last = piece.kind;
  }
  return result;
}

/** Uppercases the first character, leaving the rest as-is. */
export function upperFirst(text: string): string {
  return text.length > 0 ? text[0].toUpperCase() + text.slice(1) : text;
}
