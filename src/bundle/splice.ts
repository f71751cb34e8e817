import MagicString from 'magic-string';

/** Replace `[start, end)` of the original text; `column` is the statement's indentation depth. */
export type SpliceEdit = {
  start: number;
  end: number;
  column: number;
  /** Start of the first statement of the enclosing block; absent at module level. */
  blockStart?: number;
  replacement: string;
};

/** Placeholder for a nested statement that turned into nothing, so its block stays non-empty. */
export const EMPTY_BLOCK_STATEMENT = 'pass';

const INDENT_UNIT = '    ';

function lineStartOf(text: string, offset: number): number {
  return text.lastIndexOf('\n', offset - 1) + 1;
}

/** Leading whitespace of the line that contains `offset`. */
export function lineIndentAt(text: string, offset: number): string {
  const lineStart = lineStartOf(text, offset);
  const m = /^[ \t]*/.exec(text.slice(lineStart, offset));
  return m ? m[0] : '';
}

export function stripTrailingNewline(text: string): string {
  if (text.endsWith('\r\n')) return text.slice(0, -2);
  if (text.endsWith('\n')) return text.slice(0, -1);
  return text;
}

/**
 * Re-indents `body` for a statement slot: the first line lands where the statement began,
 * every following non-empty line gets `indent` in front.
 */
export function indentBody(body: string, indent: string): string {
  if (indent === '') return body;
  return body
    .split('\n')
    .map((line, i) => (i === 0 || line.length === 0 ? line : indent + line))
    .join('\n');
}

function newlineLengthAt(text: string, offset: number): number {
  if (text.startsWith('\r\n', offset)) return 2;
  if (text.startsWith('\n', offset)) return 1;
  return offset === text.length ? 0 : -1;
}

function isBlank(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t';
}

function skipBlanks(text: string, offset: number): number {
  while (isBlank(text[offset])) offset++;
  return offset;
}

function skipBlanksBack(text: string, offset: number): number {
  while (offset > 0 && isBlank(text[offset - 1])) offset--;
  return offset;
}

function startsLine(text: string, offset: number): boolean {
  return text.slice(lineStartOf(text, offset), offset).trim() === '';
}

/** Start of the statement that follows `end` after a `;` on the same line, or -1. */
function nextStatementAfter(text: string, end: number): number {
  const sep = skipBlanks(text, end);
  if (text[sep] !== ';') return -1;
  const next = skipBlanks(text, sep + 1);
  if (next >= text.length || text[next] === '\n' || text[next] === '\r' || text[next] === '#') return -1;
  return next;
}

/** `end` moved past a trailing `;` that ends the line. */
function pastTrailingSeparator(text: string, end: number): number {
  const sep = skipBlanks(text, end);
  return text[sep] === ';' ? sep + 1 : end;
}

/** Indentation for the body of a block written on its header line (`if x: import a`). */
function headerBlockIndent(text: string, blockStart: number): string {
  const header = lineIndentAt(text, blockStart);
  return header + (header.includes('\t') ? '\t' : INDENT_UNIT);
}

/**
 * Applies non-overlapping edits to `text`. Text between edits is copied verbatim.
 *
 * An empty replacement drops the statement together with a `;` that joins it to the next one.
 * Otherwise it removes its whole line when the statement stood alone at column 0, and becomes
 * `pass` when the statement was nested. A non-empty replacement that does not stand alone on
 * its line is moved to lines of its own; a block written on its header line is broken out
 * below the header first.
 */
export function applyEdits(text: string, edits: readonly SpliceEdit[]): string {
  const sorted = [...edits].sort((a, b) => a.start - b.start);
  const magic = new MagicString(text);
  const brokenBlocks = new Set<number>();
  let cursor = 0;
  let lineBrokenAt = -1;

  for (const edit of sorted) {
    if (edit.end <= edit.start || edit.end <= cursor) continue;
    const start = Math.max(edit.start, cursor);
    const next = nextStatementAfter(text, edit.end);
    const body = stripTrailingNewline(edit.replacement);

    if (body === '') {
      if (next >= 0) {
        magic.remove(start, next);
        cursor = next;
        continue;
      }
      let end = pastTrailingSeparator(text, edit.end);
      if (edit.column > 0) {
        magic.overwrite(start, end, EMPTY_BLOCK_STATEMENT);
      } else {
        const nl = newlineLengthAt(text, end);
        if (lineStartOf(text, edit.start) === start && nl >= 0) end += nl;
        magic.remove(start, end);
      }
      cursor = end;
      continue;
    }

    const { blockStart } = edit;
    const headerBlock = blockStart !== undefined && !startsLine(text, blockStart);
    const indent = headerBlock ? headerBlockIndent(text, blockStart) : lineIndentAt(text, edit.start);

    if (headerBlock && !brokenBlocks.has(blockStart)) {
      brokenBlocks.add(blockStart);
      const ws = Math.max(skipBlanksBack(text, blockStart), cursor);
      if (ws < blockStart) magic.overwrite(ws, blockStart, '\n' + indent);
      else magic.appendLeft(blockStart, '\n' + indent);
    }

    let from = start;
    let lead = '';
    const onOwnLine = edit.start === blockStart || startsLine(text, edit.start) || lineBrokenAt === edit.start;
    if (!onOwnLine) {
      from = Math.max(skipBlanksBack(text, edit.start), cursor);
      lead = '\n' + indent;
    }

    let to = pastTrailingSeparator(text, edit.end);
    let tail = '';
    if (next >= 0) {
      to = next;
      tail = '\n' + indent;
      lineBrokenAt = next;
    }

    magic.overwrite(from, to, lead + indentBody(body, indent) + tail);
    cursor = to;
  }

  return magic.toString();
}
