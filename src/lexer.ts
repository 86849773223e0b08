import { GedcomToken } from './types.js';
import { MalformedLineError } from './errors.js';

/**
 * Regex patterns for a GEDCOM line: LEVEL [@XREF@] TAG [VALUE]
 *
 *   0 HEAD
 *   0 @I1@ INDI
 *   1 NAME John /Smith/
 *   2 DATE 14 OCT 1895
 */

// Group 1: level, Group 2: everything after it
const LEVEL_PATTERN = /^(\S+)(?:\s+(.*))?$/;

// Group 1: pointer id, Group 2: the rest (tag and value)
const POINTER_PATTERN = /^@([^@\s]+)@(?:\s+(.*))?$/;

// Group 1: tag, Group 2: value after the single separator space
const TAG_PATTERN = /^(\S+)(?: (.*))?$/;

const VALID_TAG = /^[A-Za-z0-9_]+$/;

/**
 * Lex a single line. Returns null for blank lines.
 */
export function lexLine(rawLine: string, lineNum: number): GedcomToken | null {
  const line = rawLine.trim();
  if (!line) return null;

  const levelMatch = line.match(LEVEL_PATTERN);
  if (!levelMatch || !/^\d+$/.test(levelMatch[1])) {
    throw new MalformedLineError(lineNum, 'level is not a number', line);
  }
  const level = parseInt(levelMatch[1], 10);
  let rest = levelMatch[2] ?? '';

  let pointer: string | undefined;
  if (rest.startsWith('@')) {
    const pointerMatch = rest.match(POINTER_PATTERN);
    if (!pointerMatch) {
      throw new MalformedLineError(lineNum, 'malformed pointer', line);
    }
    pointer = pointerMatch[1];
    rest = pointerMatch[2] ?? '';
  }

  const tagMatch = rest.match(TAG_PATTERN);
  if (!tagMatch) {
    throw new MalformedLineError(lineNum, 'missing tag', line);
  }
  const tag = tagMatch[1];
  if (!VALID_TAG.test(tag)) {
    throw new MalformedLineError(lineNum, `invalid tag ${tag}`, line);
  }

  const token: GedcomToken = { line: lineNum, level, tag: tag.toUpperCase() };
  if (pointer !== undefined) token.pointer = pointer;
  const value = tagMatch[2];
  if (value) token.value = value;
  return token;
}

/**
 * Tokenize GEDCOM text. The result is lazy and can be iterated any number of
 * times; every iteration starts again from the first line.
 */
export function tokenize(content: string): Iterable<GedcomToken> {
  return {
    *[Symbol.iterator]() {
      // Normalize line endings (handle \r\n and bare \r) and drop a BOM
      const lines = content.replace(/^\uFEFF/, '').split(/\r\n|\r|\n/);
      for (let i = 0; i < lines.length; i++) {
        const token = lexLine(lines[i], i + 1);
        if (token) {
          yield token;
        }
      }
    }
  };
}
