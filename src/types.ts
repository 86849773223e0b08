/**
 * One physical GEDCOM line after lexing.
 */
export interface GedcomToken {
  /** Line number in the source file (1-based) */
  line: number;

  /** Nesting depth, 0 for top-level records */
  level: number;

  /** Tag keyword, upper-cased (INDI, NAME, DATE, ...) */
  tag: string;

  /** Cross-reference id declared on this line, without the @ delimiters */
  pointer?: string;

  /** Everything after the tag, trimmed */
  value?: string;
}

/**
 * A node of the record tree. CONT/CONC lines are already folded into `value`.
 */
export interface RawRecord {
  level: number;
  tag: string;
  pointer?: string;
  value?: string;

  /** Source line of the record's own token */
  line: number;

  children: readonly RawRecord[];
}

export type RecordKind = 'individual' | 'family' | 'other';

export type Sex = 'male' | 'female' | 'unknown';

/**
 * How precisely a date could be read from its source text.
 */
export type DateFidelity = 'exact' | 'month' | 'year-only' | 'approximate' | 'range' | 'unparsed';

export interface GedcomDate {
  /** The date exactly as written in the source file */
  text: string;

  fidelity: DateFidelity;

  /** Normalized start: yyyy-MM-dd, yyyy-MM or yyyy */
  value?: string;

  /** Normalized end of a range */
  end?: string;

  /** GEDCOM keyword in front of the date (ABT, BEF, BET, FROM, ...) */
  qualifier?: string;
}

export type EventKind = 'birth' | 'death' | 'marriage' | 'other';

export interface LifeEvent {
  kind: EventKind;

  /** Source tag, e.g. BURI for a burial recorded as 'other' */
  tag: string;

  date?: GedcomDate;
  place?: string;
}

export interface PersonName {
  /** NAME value as written, slashes included */
  raw: string;

  /** Name parts in display order */
  parts: readonly string[];

  given?: string;
  surname?: string;
  suffix?: string;
}

export interface Individual {
  /** Source pointer without the @ delimiters */
  id: string;

  names: readonly PersonName[];
  sex: Sex;

  /** Events in source order */
  events: readonly LifeEvent[];

  /** Families this person is a child of (ordered, no duplicates) */
  familiesAsChild: readonly string[];

  /** Families this person is a spouse in (ordered, no duplicates) */
  familiesAsSpouse: readonly string[];

  occupation?: string;
  notes: readonly string[];
}

export interface Family {
  id: string;

  /** At most two spouses, in source order */
  spouseIds: readonly string[];

  childIds: readonly string[];
  events: readonly LifeEvent[];
}

/**
 * The resolved genealogical graph. Read-only once built.
 */
export interface FamilyGraph {
  individuals: ReadonlyMap<string, Individual>;
  families: ReadonlyMap<string, Family>;
}

export interface BiographyRecord {
  individualId: string;
  text: string;

  /** File the text came from */
  source: string;

  matchedBy: 'id' | 'slug';
}

/**
 * A rendered output document.
 */
export interface ProfileDocument {
  /** Path relative to the output directory, always with forward slashes */
  path: string;

  content: string;
}
