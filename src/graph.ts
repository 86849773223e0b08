import { EventKind, Family, FamilyGraph, Individual, LifeEvent, PersonName, RawRecord, Sex } from './types.js';
import { DanglingReferenceError, StructuralError } from './errors.js';
import { childByTag, classifyRecord } from './parser.js';
import { parseGedcomDate } from './dates.js';
import { parseName } from './names.js';

/**
 * Event tags read from INDI and FAM records, and the kind each maps to
 */
const INDIVIDUAL_EVENT_TAGS: Record<string, EventKind> = {
  BIRT: 'birth',
  DEAT: 'death',
  CHR: 'other',
  BAPM: 'other',
  BURI: 'other',
  CREM: 'other',
  ADOP: 'other',
  EMIG: 'other',
  IMMI: 'other',
  NATU: 'other',
  CENS: 'other',
  RESI: 'other',
  GRAD: 'other',
  RETI: 'other'
};

const FAMILY_EVENT_TAGS: Record<string, EventKind> = {
  MARR: 'marriage',
  DIV: 'other',
  ENGA: 'other',
  MARB: 'other',
  ANUL: 'other'
};

const POINTER_VALUE = /^@([^@\s]+)@$/;

/**
 * A pointer string as found in the source, resolved in the second pass
 */
interface PendingRef {
  value: string;
  line: number;
}

interface IndividualDraft {
  individual: Omit<Individual, 'familiesAsChild' | 'familiesAsSpouse' | 'notes'>;
  line: number;
  noteRefs: PendingRef[];
  familyAsChildRefs: PendingRef[];
  familyAsSpouseRefs: PendingRef[];
}

interface FamilyDraft {
  id: string;
  line: number;
  events: readonly LifeEvent[];
  spouseRefs: PendingRef[];
  childRefs: PendingRef[];
}

function readEvents(record: RawRecord, tags: Record<string, EventKind>): LifeEvent[] {
  const events: LifeEvent[] = [];
  for (const child of record.children) {
    const kind = tags[child.tag];
    if (!kind) continue;

    const event: LifeEvent = { kind, tag: child.tag };
    const date = childByTag(child, 'DATE')?.value;
    if (date) event.date = parseGedcomDate(date);
    const place = childByTag(child, 'PLAC')?.value?.trim();
    if (place) event.place = place;
    events.push(Object.freeze(event));
  }
  return events;
}

function readSex(record: RawRecord): Sex {
  const value = childByTag(record, 'SEX')?.value?.trim().toUpperCase();
  if (value === 'M') return 'male';
  if (value === 'F') return 'female';
  return 'unknown';
}

function readNames(record: RawRecord): PersonName[] {
  return record.children
    .filter(child => child.tag === 'NAME')
    .map(child => parseName(child.value ?? '', {
      given: childByTag(child, 'GIVN')?.value,
      surname: childByTag(child, 'SURN')?.value,
      suffix: childByTag(child, 'NSFX')?.value
    }));
}

function refsOf(record: RawRecord, tag: string): PendingRef[] {
  return record.children
    .filter(child => child.tag === tag)
    .map(child => ({ value: child.value?.trim() ?? '', line: child.line }));
}

function requirePointer(root: RawRecord): string {
  if (!root.pointer) {
    throw new StructuralError(root.line, `${root.tag} record has no @id@ pointer`);
  }
  return root.pointer;
}

function pointerId(ref: PendingRef): string {
  const match = ref.value.match(POINTER_VALUE);
  if (!match) {
    throw new DanglingReferenceError(ref.value || '(empty)', ref.line, 'is not an @id@ pointer');
  }
  return match[1];
}

function addUnique(list: string[], id: string): void {
  if (!list.includes(id)) {
    list.push(id);
  }
}

function listFor(map: Map<string, string[]>, id: string): string[] {
  const list = map.get(id);
  if (!list) {
    throw new Error(`No membership list for ${id}`);
  }
  return list;
}

/**
 * Build the genealogical graph from the top-level records.
 *
 * Pass one collects every INDI and FAM record with its pointers kept as raw
 * strings; pass two resolves them, so records may reference others defined
 * later in the file. Memberships are completed in both directions: a CHIL
 * line without the matching FAMC (or HUSB/WIFE without FAMS) still links
 * parent and child.
 */
export function buildGraph(roots: readonly RawRecord[]): FamilyGraph {
  const individualDrafts = new Map<string, IndividualDraft>();
  const familyDrafts = new Map<string, FamilyDraft>();
  const noteTexts = new Map<string, string>();
  const seenIds = new Set<string>();

  function claimId(id: string, line: number): void {
    if (seenIds.has(id)) {
      throw new StructuralError(line, `duplicate record id @${id}@`);
    }
    seenIds.add(id);
  }

  // Pass 1: collect
  for (const root of roots) {
    const kind = classifyRecord(root);

    if (kind === 'individual') {
      const id = requirePointer(root);
      claimId(id, root.line);

      const individual: IndividualDraft['individual'] = {
        id,
        names: Object.freeze(readNames(root)),
        sex: readSex(root),
        events: Object.freeze(readEvents(root, INDIVIDUAL_EVENT_TAGS))
      };
      const occupation = root.children.find(child => child.tag === 'OCCU' && child.value?.trim())?.value?.trim();
      if (occupation) individual.occupation = occupation;

      individualDrafts.set(id, {
        individual,
        line: root.line,
        noteRefs: refsOf(root, 'NOTE'),
        familyAsChildRefs: refsOf(root, 'FAMC'),
        familyAsSpouseRefs: refsOf(root, 'FAMS')
      });
    } else if (kind === 'family') {
      const id = requirePointer(root);
      claimId(id, root.line);

      familyDrafts.set(id, {
        id,
        line: root.line,
        events: Object.freeze(readEvents(root, FAMILY_EVENT_TAGS)),
        spouseRefs: root.children
          .filter(child => child.tag === 'HUSB' || child.tag === 'WIFE')
          .map(child => ({ value: child.value?.trim() ?? '', line: child.line })),
        childRefs: refsOf(root, 'CHIL')
      });
    } else if (root.tag === 'NOTE' && root.pointer) {
      claimId(root.pointer, root.line);
      noteTexts.set(root.pointer, root.value ?? '');
    }
  }

  function resolve(ref: PendingRef, target: 'individual' | 'family'): string {
    const id = pointerId(ref);
    const found = target === 'individual' ? individualDrafts.has(id) : familyDrafts.has(id);
    if (!found) {
      const reason = seenIds.has(id)
        ? `does not name ${target === 'individual' ? 'an individual' : 'a family'}`
        : undefined;
      throw new DanglingReferenceError(ref.value, ref.line, reason);
    }
    return id;
  }

  // Pass 2: resolve
  const familiesAsChild = new Map<string, string[]>();
  const familiesAsSpouse = new Map<string, string[]>();
  const notes = new Map<string, string[]>();
  const spouses = new Map<string, string[]>();
  const children = new Map<string, string[]>();

  for (const draft of familyDrafts.values()) {
    const spouseIds: string[] = [];
    for (const ref of draft.spouseRefs) {
      addUnique(spouseIds, resolve(ref, 'individual'));
      if (spouseIds.length > 2) {
        throw new StructuralError(ref.line, `family @${draft.id}@ lists more than two spouses`);
      }
    }
    const childIds: string[] = [];
    for (const ref of draft.childRefs) {
      addUnique(childIds, resolve(ref, 'individual'));
    }
    spouses.set(draft.id, spouseIds);
    children.set(draft.id, childIds);
  }

  for (const [id, draft] of individualDrafts) {
    familiesAsChild.set(id, draft.familyAsChildRefs.map(ref => resolve(ref, 'family'))
      .filter((familyId, index, all) => all.indexOf(familyId) === index));
    familiesAsSpouse.set(id, draft.familyAsSpouseRefs.map(ref => resolve(ref, 'family'))
      .filter((familyId, index, all) => all.indexOf(familyId) === index));
    notes.set(id, draft.noteRefs.map(ref => {
      if (!ref.value.startsWith('@')) return ref.value;
      const noteId = pointerId(ref);
      const text = noteTexts.get(noteId);
      if (text === undefined) {
        throw new DanglingReferenceError(ref.value, ref.line, 'does not name a note');
      }
      return text;
    }).filter(text => text.trim() !== ''));
  }

  // Complete memberships recorded on one side only
  for (const draft of familyDrafts.values()) {
    for (const childId of listFor(children, draft.id)) {
      addUnique(listFor(familiesAsChild, childId), draft.id);
    }
    for (const spouseId of listFor(spouses, draft.id)) {
      addUnique(listFor(familiesAsSpouse, spouseId), draft.id);
    }
  }
  for (const [id, draft] of individualDrafts) {
    for (const familyId of listFor(familiesAsChild, id)) {
      addUnique(listFor(children, familyId), id);
    }
    for (const familyId of listFor(familiesAsSpouse, id)) {
      const spouseIds = listFor(spouses, familyId);
      addUnique(spouseIds, id);
      if (spouseIds.length > 2) {
        throw new StructuralError(draft.line, `family @${familyId}@ would have more than two spouses`);
      }
    }
  }

  const individuals = new Map<string, Individual>();
  for (const [id, draft] of individualDrafts) {
    individuals.set(id, Object.freeze({
      ...draft.individual,
      familiesAsChild: Object.freeze(listFor(familiesAsChild, id)),
      familiesAsSpouse: Object.freeze(listFor(familiesAsSpouse, id)),
      notes: Object.freeze(listFor(notes, id))
    }));
  }

  const families = new Map<string, Family>();
  for (const draft of familyDrafts.values()) {
    families.set(draft.id, Object.freeze({
      id: draft.id,
      spouseIds: Object.freeze(listFor(spouses, draft.id)),
      childIds: Object.freeze(listFor(children, draft.id)),
      events: draft.events
    }));
  }

  return Object.freeze({ individuals, families });
}
