import { Family, FamilyGraph, Individual } from './types.js';

/**
 * Relationship views. Each is derived on demand from family membership and
 * walks exactly one hop, so pointer cycles in the source cannot make it loop.
 */

export interface RelationshipView {
  parents: Individual[];
  siblings: Individual[];
  spouses: Individual[];
  children: Individual[];
}

export function requireIndividual(graph: FamilyGraph, id: string): Individual {
  const individual = graph.individuals.get(id);
  if (!individual) {
    throw new Error(`Individual ${id} is not in the graph`);
  }
  return individual;
}

export function requireFamily(graph: FamilyGraph, id: string): Family {
  const family = graph.families.get(id);
  if (!family) {
    throw new Error(`Family ${id} is not in the graph`);
  }
  return family;
}

function collect(
  graph: FamilyGraph,
  familyIds: readonly string[],
  pick: (family: Family) => readonly string[],
  excludeId: string
): Individual[] {
  const seen = new Set<string>();
  const result: Individual[] = [];
  for (const familyId of familyIds) {
    for (const id of pick(requireFamily(graph, familyId))) {
      if (id === excludeId || seen.has(id)) continue;
      seen.add(id);
      result.push(requireIndividual(graph, id));
    }
  }
  return result;
}

export function parentsOf(graph: FamilyGraph, individual: Individual): Individual[] {
  return collect(graph, individual.familiesAsChild, family => family.spouseIds, individual.id);
}

export function childrenOf(graph: FamilyGraph, individual: Individual): Individual[] {
  return collect(graph, individual.familiesAsSpouse, family => family.childIds, individual.id);
}

export function spousesOf(graph: FamilyGraph, individual: Individual): Individual[] {
  return collect(graph, individual.familiesAsSpouse, family => family.spouseIds, individual.id);
}

/**
 * Other children of any family this person is a child of (half-siblings included)
 */
export function siblingsOf(graph: FamilyGraph, individual: Individual): Individual[] {
  return collect(graph, individual.familiesAsChild, family => family.childIds, individual.id);
}

export function relationshipsOf(graph: FamilyGraph, individual: Individual): RelationshipView {
  return {
    parents: parentsOf(graph, individual),
    siblings: siblingsOf(graph, individual),
    spouses: spousesOf(graph, individual),
    children: childrenOf(graph, individual)
  };
}
