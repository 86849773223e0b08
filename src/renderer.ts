import { createHash } from 'node:crypto';
import { marked, type Token } from 'marked';
import { stringify } from 'yaml';
import { BiographyRecord, Family, FamilyGraph, Individual, LifeEvent, ProfileDocument } from './types.js';
import { displayName } from './names.js';
import { dateYear } from './dates.js';
import { formatPlace, PlaceLinkOptions } from './places.js';
import { relationshipsOf, requireFamily, requireIndividual } from './relationships.js';

/**
 * Options for rendering documents
 */
export interface RenderOptions extends PlaceLinkOptions {
  /** Include a Mermaid diagram of the immediate family (default: true) */
  familyDiagrams?: boolean;
}

export const PEOPLE_DIR = 'People';
export const FAMILIES_DIR = 'Families';

export const NO_BIOGRAPHY = '_No biography available._';
const EMPTY_SECTION = '—';
const DESCRIPTION_LIMIT = 160;

const EVENT_LABELS: Record<string, string> = {
  BIRT: 'Birth',
  DEAT: 'Death',
  CHR: 'Christening',
  BAPM: 'Baptism',
  BURI: 'Burial',
  CREM: 'Cremation',
  ADOP: 'Adoption',
  EMIG: 'Emigration',
  IMMI: 'Immigration',
  NATU: 'Naturalization',
  CENS: 'Census',
  RESI: 'Residence',
  GRAD: 'Graduation',
  RETI: 'Retirement',
  MARR: 'Marriage',
  DIV: 'Divorce',
  ENGA: 'Engagement',
  MARB: 'Marriage banns',
  ANUL: 'Annulment'
};

const SAFE_STEM = /^[A-Za-z0-9_-]+$/;

// Stems of the generated People/ pages; no record may take them
const RESERVED_STEMS = new Set(['index', 'bios']);

/**
 * File name (without extension) for a record id. Depends on the id alone, so
 * links stay stable when names change. Ids with unsafe characters, or that
 * match a generated page on a case-insensitive file system, get a hash suffix.
 */
export function profileFileStem(id: string): string {
  if (SAFE_STEM.test(id) && !RESERVED_STEMS.has(id.toLowerCase())) {
    return id;
  }
  const hash = createHash('sha1').update(id, 'utf8').digest('hex').slice(0, 8);
  return `${id.replace(/[^A-Za-z0-9_-]/g, '_')}-${hash}`;
}

export function profilePath(id: string): string {
  return `${PEOPLE_DIR}/${profileFileStem(id)}.md`;
}

export function familyPath(id: string): string {
  return `${FAMILIES_DIR}/${profileFileStem(id)}.md`;
}

/**
 * Keep a label from breaking out of [[target|label]]
 */
function linkLabel(text: string): string {
  return text.replace(/\|/g, '/').replace(/\[/g, '(').replace(/\]/g, ')');
}

export function wikiLink(individual: Individual): string {
  return `[[${profileFileStem(individual.id)}|${linkLabel(displayName(individual))}]]`;
}

function frontmatter(meta: Record<string, unknown>): string {
  return `---\n${stringify(meta, { lineWidth: 0 })}---\n`;
}

function eventLabel(event: LifeEvent): string {
  return EVENT_LABELS[event.tag] ?? event.tag;
}

function describeEvent(event: LifeEvent | undefined, options: RenderOptions): string {
  if (!event) return EMPTY_SECTION;
  const date = event.date?.text;
  const place = event.place ? formatPlace(event.place, options) : undefined;
  if (date && place) return `${date} at ${place}`;
  return date ?? place ?? EMPTY_SECTION;
}

function eventMeta(event: LifeEvent): Record<string, string> {
  const meta: Record<string, string> = {};
  if (event.date) {
    if (event.date.value) meta.date = event.date.value;
    if (event.date.end) meta.end = event.date.end;
    meta.fidelity = event.date.fidelity;
    meta.text = event.date.text;
  }
  if (event.place) meta.place = event.place;
  return meta;
}

function linkList(individuals: Individual[]): string {
  if (individuals.length === 0) return EMPTY_SECTION;
  return individuals.map(individual => `- ${wikiLink(individual)}`).join('\n');
}

function plainText(tokens: Token[]): string {
  return tokens.map(token => {
    if ('tokens' in token && Array.isArray(token.tokens)) {
      return plainText(token.tokens);
    }
    return 'text' in token && typeof token.text === 'string' ? token.text : '';
  }).join('');
}

/**
 * First paragraph of a biography as plain text, for the page description.
 */
export function biographyDescription(text: string): string | undefined {
  const paragraph = marked.lexer(text).find(token => token.type === 'paragraph');
  if (!paragraph) return undefined;

  const plain = plainText([paragraph]).replace(/\s+/g, ' ').trim();
  if (!plain) return undefined;
  // cut on code points, not UTF-16 units
  const chars = Array.from(plain);
  if (chars.length <= DESCRIPTION_LIMIT) return plain;
  return `${chars.slice(0, DESCRIPTION_LIMIT - 1).join('').trimEnd()}…`;
}

// Person nodes are styled like links to other profiles
const LINK_CLASS = 'internal-link';
const LINK_CLASS_STYLE = 'fill:#e1f5fe,stroke:#0277bd,stroke-width:2px;';

function mermaidLabel(individual: Individual): string {
  return displayName(individual).replace(/"/g, "'");
}

/**
 * Mermaid flowchart of parents, spouses and children.
 * Returns undefined when the person has no recorded relatives.
 */
export function familyDiagram(graph: FamilyGraph, individual: Individual): string | undefined {
  const lines = ['```mermaid', 'flowchart TD', `  classDef ${LINK_CLASS} ${LINK_CLASS_STYLE}`];
  const nodes = new Map<string, string>();
  let unions = 0;
  let edges = 0;

  function node(person: Individual): string {
    let key = nodes.get(person.id);
    if (!key) {
      key = `p${nodes.size}`;
      nodes.set(person.id, key);
      lines.push(`  ${key}["${mermaidLabel(person)}"]`, `  class ${key} ${LINK_CLASS}`);
    }
    return key;
  }

  function union(): string {
    const key = `u${unions++}`;
    lines.push(`  ${key}((" "))`);
    return key;
  }

  const self = node(individual);

  for (const familyId of individual.familiesAsChild) {
    const parents = requireFamily(graph, familyId).spouseIds
      .filter(id => id !== individual.id)
      .map(id => node(requireIndividual(graph, id)));
    if (parents.length === 2) {
      const key = union();
      lines.push(`  ${parents[0]} --- ${key}`, `  ${parents[1]} --- ${key}`, `  ${key} --> ${self}`);
      edges++;
    } else if (parents.length === 1) {
      lines.push(`  ${parents[0]} --> ${self}`);
      edges++;
    }
  }

  for (const familyId of individual.familiesAsSpouse) {
    const family = requireFamily(graph, familyId);
    const spouseId = family.spouseIds.find(id => id !== individual.id);
    let from = self;
    if (spouseId) {
      const spouse = node(requireIndividual(graph, spouseId));
      from = union();
      lines.push(`  ${self} --- ${from}`, `  ${spouse} --- ${from}`);
      edges++;
    }
    for (const childId of family.childIds) {
      if (childId === individual.id) continue;
      lines.push(`  ${from} --> ${node(requireIndividual(graph, childId))}`);
      edges++;
    }
  }

  if (edges === 0) return undefined;
  lines.push('```');
  return lines.join('\n');
}

/**
 * Render the profile document of one individual.
 */
export function renderProfile(
  graph: FamilyGraph,
  individual: Individual,
  biography: BiographyRecord | undefined,
  options: RenderOptions = {}
): ProfileDocument {
  const name = displayName(individual);
  const birth = individual.events.find(event => event.kind === 'birth');
  const death = individual.events.find(event => event.kind === 'death');
  const others = individual.events.filter(event => event.kind === 'other');
  const relations = relationshipsOf(graph, individual);

  const meta: Record<string, unknown> = {
    title: name,
    type: 'profile',
    id: individual.id,
    gedcomId: `@${individual.id}@`,
    sex: individual.sex
  };
  if (birth) meta.birth = eventMeta(birth);
  if (death) meta.death = eventMeta(death);
  const description = biography ? biographyDescription(biography.text) : undefined;
  if (description) meta.description = description;
  meta.tags = ['profile'];

  const sections: string[] = [
    `# ${name}`,
    [
      `- **Born**: ${describeEvent(birth, options)}`,
      `- **Died**: ${describeEvent(death, options)}`,
      `- **Occupation**: ${individual.occupation ?? EMPTY_SECTION}`
    ].join('\n')
  ];

  if (others.length > 0) {
    sections.push('## Events', others
      .map(event => `- **${eventLabel(event)}**: ${describeEvent(event, options)}`)
      .join('\n'));
  }

  sections.push(
    '## Parents', linkList(relations.parents),
    '## Siblings', linkList(relations.siblings),
    '## Spouses', linkList(relations.spouses),
    '## Children', linkList(relations.children)
  );

  if (options.familyDiagrams ?? true) {
    const diagram = familyDiagram(graph, individual);
    if (diagram) {
      sections.push('## Family Diagram', diagram);
    }
  }

  sections.push('## Biography', biography ? biography.text : NO_BIOGRAPHY);

  if (individual.notes.length > 0) {
    sections.push('## Notes', individual.notes.join('\n\n'));
  }

  sections.push('---', `GEDCOM ID: @${individual.id}@`);

  return {
    path: profilePath(individual.id),
    content: `${frontmatter(meta)}\n${sections.join('\n\n')}\n`
  };
}

export function familyTitle(graph: FamilyGraph, family: Family): string {
  const names = family.spouseIds.map(id => displayName(requireIndividual(graph, id)));
  return names.length > 0 ? `Family of ${names.join(' & ')}` : `Family ${family.id}`;
}

/**
 * Render the page of one family: spouses, children and family events.
 */
export function renderFamily(graph: FamilyGraph, family: Family, options: RenderOptions = {}): ProfileDocument {
  const title = familyTitle(graph, family);
  const meta = {
    title,
    type: 'family',
    id: family.id,
    gedcomId: `@${family.id}@`,
    tags: ['family']
  };

  const sections = [
    `# ${title}`,
    '## Spouses', linkList(family.spouseIds.map(id => requireIndividual(graph, id))),
    '## Children', linkList(family.childIds.map(id => requireIndividual(graph, id)))
  ];
  if (family.events.length > 0) {
    sections.push('## Events', family.events
      .map(event => `- **${eventLabel(event)}**: ${describeEvent(event, options)}`)
      .join('\n'));
  }
  sections.push('---', `GEDCOM ID: @${family.id}@`);

  return {
    path: familyPath(family.id),
    content: `${frontmatter(meta)}\n${sections.join('\n\n')}\n`
  };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Individuals ordered by display name, then id
 */
export function sortedIndividuals(individuals: Iterable<Individual>): Individual[] {
  return Array.from(individuals).sort((a, b) =>
    compareText(displayName(a), displayName(b)) || compareText(a.id, b.id));
}

function lifespan(individual: Individual): string {
  const born = dateYear(individual.events.find(event => event.kind === 'birth')?.date);
  const died = dateYear(individual.events.find(event => event.kind === 'death')?.date);
  if (born && died) return ` (${born}–${died})`;
  if (born) return ` (b. ${born})`;
  if (died) return ` (d. ${died})`;
  return '';
}

/**
 * People/index.md: every profile, sorted by name.
 */
export function renderPeopleIndex(graph: FamilyGraph): ProfileDocument {
  const entries = sortedIndividuals(graph.individuals.values())
    .map(individual => `- ${wikiLink(individual)}${lifespan(individual)}`);
  const body = entries.length > 0 ? entries.join('\n') : EMPTY_SECTION;
  return {
    path: `${PEOPLE_DIR}/index.md`,
    content: `${frontmatter({ title: 'All People', type: 'index' })}\n# All People\n\n${body}\n`
  };
}

/**
 * People/bios.md: profiles that have a merged biography.
 */
export function renderBiographyIndex(graph: FamilyGraph, withBiography: ReadonlySet<string>): ProfileDocument {
  const entries = sortedIndividuals(graph.individuals.values())
    .filter(individual => withBiography.has(individual.id))
    .map(individual => `- ${wikiLink(individual)}`);
  const body = entries.length > 0
    ? entries.join('\n')
    : '_No biographical information available yet._';
  return {
    path: `${PEOPLE_DIR}/bios.md`,
    content: `${frontmatter({ title: 'Biographies', type: 'index' })}\n# Profiles with Biographies\n\n`
      + `This page lists all family members who have biographical information.\n\n${body}\n`
  };
}
