import { FamilyGraph } from './types.js';

export interface PlaceLinkOptions {
  /** Exact place text -> URL */
  placeLinks?: Record<string, string>;
  /** Prefix for places without an explicit mapping, e.g. https://en.wikipedia.org/wiki/ */
  placeLinkBase?: string;
}

export interface PlaceCount {
  place: string;
  count: number;
}

/**
 * Render a place as Markdown: a link when one is configured, plain text otherwise.
 */
export function formatPlace(place: string, options: PlaceLinkOptions = {}): string {
  const mapped = options.placeLinks?.[place];
  if (mapped) {
    return `[${place}](${mapped})`;
  }
  if (options.placeLinkBase) {
    return `[${place}](${options.placeLinkBase}${encodeURI(place.replace(/ /g, '_'))})`;
  }
  return place;
}

/**
 * Count every place mentioned by an individual or family event.
 * Sorted by count (descending), then by name.
 */
export function countPlaces(graph: FamilyGraph): PlaceCount[] {
  const counts = new Map<string, number>();
  const records = [...graph.individuals.values(), ...graph.families.values()];
  for (const record of records) {
    for (const event of record.events) {
      if (event.place) {
        counts.set(event.place, (counts.get(event.place) ?? 0) + 1);
      }
    }
  }
  return Array.from(counts, ([place, count]) => ({ place, count }))
    .sort((a, b) => b.count - a.count || (a.place < b.place ? -1 : a.place > b.place ? 1 : 0));
}
