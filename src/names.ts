import { Individual, PersonName } from './types.js';

// "Given /Surname/ Suffix"
const SURNAME_PATTERN = /^([^/]*)\/([^/]*)\/([^/]*)$/;

export interface NameOverrides {
  given?: string;
  surname?: string;
  suffix?: string;
}

function clean(part: string | undefined): string | undefined {
  const trimmed = part?.replace(/\s+/g, ' ').trim();
  return trimmed ? trimmed : undefined;
}

function partsOf(given?: string, surname?: string, suffix?: string): string[] {
  return [given, surname, suffix].filter((part): part is string => part !== undefined);
}

/**
 * Split a NAME value on its surname slashes. A value without slashes is a
 * single part; unbalanced slashes fall back to the raw value as the only part.
 */
export function parseName(value: string, overrides: NameOverrides = {}): PersonName {
  const raw = value.trim();
  const match = raw.match(SURNAME_PATTERN);

  let given: string | undefined;
  let surname: string | undefined;
  let suffix: string | undefined;
  let parts: string[];

  if (match) {
    given = clean(match[1]);
    surname = clean(match[2]);
    suffix = clean(match[3]);
    parts = partsOf(given, surname, suffix);
  } else if (!raw.includes('/')) {
    given = clean(raw);
    parts = given ? [given] : [];
  } else {
    parts = [raw];
  }

  const hasOverride = overrides.given !== undefined
    || overrides.surname !== undefined
    || overrides.suffix !== undefined;
  if (hasOverride) {
    given = clean(overrides.given) ?? given;
    surname = clean(overrides.surname) ?? surname;
    suffix = clean(overrides.suffix) ?? suffix;
    parts = partsOf(given, surname, suffix);
  }

  const name: PersonName = { raw, parts: Object.freeze(parts) };
  if (given) name.given = given;
  if (surname) name.surname = surname;
  if (suffix) name.suffix = suffix;
  return Object.freeze(name);
}

/**
 * Canonical display name: the parts of the first NAME record.
 */
export function displayName(individual: Individual): string {
  const primary = individual.names[0];
  if (!primary || primary.parts.length === 0) {
    return `Unknown (${individual.id})`;
  }
  return primary.parts.join(' ');
}

/**
 * Generate a filename-safe slug from a name. Letters of any script survive.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFC')
    .replace(/[^\p{L}\p{N}\s-]/gu, '') // Remove everything but letters, digits, spaces and hyphens
    .trim()
    .replace(/\s+/g, '-')              // Replace spaces with hyphens
    .replace(/-+/g, '-');              // Collapse multiple hyphens
}
