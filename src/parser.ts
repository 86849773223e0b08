import { GedcomToken, RawRecord, RecordKind } from './types.js';
import { StructuralError } from './errors.js';
import { tokenize } from './lexer.js';

/**
 * A record still being assembled. Frozen into a RawRecord once input ends.
 */
interface OpenRecord {
  level: number;
  tag: string;
  pointer?: string;
  value?: string;
  line: number;
  children: OpenRecord[];
}

/**
 * Continuation tags: CONT starts a new line of the parent's value, CONC
 * continues the current one.
 */
const CONTINUATION_TAGS = new Set(['CONT', 'CONC']);

function foldContinuation(parent: OpenRecord, token: GedcomToken): void {
  const text = token.value ?? '';
  if (token.tag === 'CONT') {
    parent.value = `${parent.value ?? ''}\n${text}`;
  } else {
    parent.value = `${parent.value ?? ''}${text}`;
  }
}

function freeze(record: OpenRecord): RawRecord {
  const frozen: RawRecord = {
    level: record.level,
    tag: record.tag,
    line: record.line,
    children: Object.freeze(record.children.map(freeze))
  };
  if (record.pointer !== undefined) frozen.pointer = record.pointer;
  if (record.value !== undefined) frozen.value = record.value;
  return Object.freeze(frozen);
}

/**
 * Assemble tokens into a record tree, using level numbers as nesting depth.
 * Returns the top-level records in source order.
 */
export function buildRecordTree(tokens: Iterable<GedcomToken>): readonly RawRecord[] {
  const roots: OpenRecord[] = [];

  // Stack of open records; index i holds the open record at level i
  const stack: OpenRecord[] = [];

  for (const token of tokens) {
    // Close every record at the same level or deeper
    while (stack.length > 0 && stack[stack.length - 1].level >= token.level) {
      stack.pop();
    }
    const parent = stack.length > 0 ? stack[stack.length - 1] : null;
    const expectedLevel = parent ? parent.level + 1 : 0;

    if (!parent && token.level !== 0) {
      throw new StructuralError(token.line, `level ${token.level} record has no enclosing level 0 record`);
    }
    if (token.level !== expectedLevel) {
      throw new StructuralError(
        token.line,
        `level ${token.level} cannot follow level ${expectedLevel - 1} (child level must increase by exactly one)`
      );
    }

    if (parent && CONTINUATION_TAGS.has(token.tag)) {
      foldContinuation(parent, token);
      continue;
    }

    const record: OpenRecord = {
      level: token.level,
      tag: token.tag,
      line: token.line,
      children: []
    };
    if (token.pointer !== undefined) record.pointer = token.pointer;
    if (token.value !== undefined) record.value = token.value;

    if (parent) {
      parent.children.push(record);
    } else {
      roots.push(record);
    }
    stack.push(record);
  }

  // Trailing open records simply close
  return Object.freeze(roots.map(freeze));
}

/**
 * Decide what a top-level record becomes in the graph.
 */
export function classifyRecord(root: RawRecord): RecordKind {
  switch (root.tag) {
    case 'INDI':
      return 'individual';
    case 'FAM':
      return 'family';
    default:
      // HEAD, SOUR, SUBM, NOTE, OBJE, REPO, TRLR, ...
      return 'other';
  }
}

/**
 * Parse GEDCOM text into its top-level records.
 */
export function parseGedcom(content: string): readonly RawRecord[] {
  return buildRecordTree(tokenize(content));
}

/**
 * First child with the given tag, if any.
 */
export function childByTag(record: RawRecord, tag: string): RawRecord | undefined {
  return record.children.find(child => child.tag === tag);
}
