import * as test from 'node:test';
import * as assert from 'node:assert';
import { buildGraph } from '../graph.js';
import { parseGedcom } from '../parser.js';
import { childrenOf, parentsOf, relationshipsOf, requireIndividual, siblingsOf, spousesOf } from '../relationships.js';
import { countPlaces } from '../places.js';
import { DanglingReferenceError, StructuralError } from '../errors.js';
import { FamilyGraph, Individual } from '../types.js';

const { describe, it } = test;

function graphOf(content: string): FamilyGraph {
  return buildGraph(parseGedcom(content));
}

function ids(individuals: Individual[]): string[] {
  return individuals.map(individual => individual.id);
}

const NUCLEAR_FAMILY = `0 HEAD
0 @F1@ FAM
1 HUSB @I1@
1 WIFE @I2@
1 CHIL @I3@
1 CHIL @I4@
1 MARR
2 DATE 1920
2 PLAC Leeds
0 @I1@ INDI
1 NAME John /Smith/
1 SEX M
1 FAMS @F1@
0 @I2@ INDI
1 NAME Mary /Jones/
1 SEX F
1 FAMS @F1@
0 @I3@ INDI
1 NAME Alice /Smith/
1 FAMC @F1@
0 @I4@ INDI
1 NAME Robert /Smith/
1 FAMC @F1@
0 TRLR
`;

describe('buildGraph', () => {

  it('should resolve a family defined before its members', () => {
    const graph = graphOf(NUCLEAR_FAMILY);

    assert.strictEqual(graph.individuals.size, 4);
    assert.strictEqual(graph.families.size, 1);
    const family = graph.families.get('F1');
    assert.deepStrictEqual(family?.spouseIds, ['I1', 'I2']);
    assert.deepStrictEqual(family?.childIds, ['I3', 'I4']);
    assert.deepStrictEqual(family?.events.map(e => [e.kind, e.date?.value, e.place]), [['marriage', '1920', 'Leeds']]);
  });

  it('should derive parents, children, spouses and siblings', () => {
    const graph = graphOf(NUCLEAR_FAMILY);
    const john = requireIndividual(graph, 'I1');
    const alice = requireIndividual(graph, 'I3');

    assert.deepStrictEqual(ids(parentsOf(graph, alice)), ['I1', 'I2']);
    assert.deepStrictEqual(ids(siblingsOf(graph, alice)), ['I4']);
    assert.deepStrictEqual(ids(childrenOf(graph, john)), ['I3', 'I4']);
    assert.deepStrictEqual(ids(spousesOf(graph, john)), ['I2']);
    assert.deepStrictEqual(ids(parentsOf(graph, john)), []);
  });

  it('should read sex, names, events, occupation and notes', () => {
    const graph = graphOf(`0 @I1@ INDI
1 NAME John /Smith/
1 NAME Johnny /Smith/
1 SEX M
1 BIRT
2 DATE 2 JAN 1900
2 PLAC Leeds
1 BIRT
2 DATE 1901
1 BURI
2 PLAC York
1 OCCU Carpenter
1 NOTE Inline note
1 NOTE @N1@
0 @N1@ NOTE Shared note
1 CONT second line
0 @I2@ INDI
1 SEX X
`);
    const john = requireIndividual(graph, 'I1');

    assert.strictEqual(john.sex, 'male');
    assert.strictEqual(requireIndividual(graph, 'I2').sex, 'unknown');
    assert.deepStrictEqual(john.names.map(name => name.raw), ['John /Smith/', 'Johnny /Smith/']);
    assert.deepStrictEqual(john.events.map(e => [e.kind, e.tag, e.date?.text, e.place]), [
      ['birth', 'BIRT', '2 JAN 1900', 'Leeds'],
      ['birth', 'BIRT', '1901', undefined],
      ['other', 'BURI', undefined, 'York']
    ]);
    assert.strictEqual(john.occupation, 'Carpenter');
    assert.deepStrictEqual(john.notes, ['Inline note', 'Shared note\nsecond line']);
  });

  it('should complete memberships recorded on only one side', () => {
    const graph = graphOf(`0 @I1@ INDI
0 @I2@ INDI
1 FAMC @F1@
0 @I3@ INDI
1 FAMS @F1@
0 @F1@ FAM
1 HUSB @I1@
1 CHIL @I4@
0 @I4@ INDI
`);
    const family = graph.families.get('F1');

    assert.deepStrictEqual(family?.spouseIds, ['I1', 'I3']);
    assert.deepStrictEqual(family?.childIds, ['I4', 'I2']);
    assert.deepStrictEqual(requireIndividual(graph, 'I1').familiesAsSpouse, ['F1']);
    assert.deepStrictEqual(requireIndividual(graph, 'I4').familiesAsChild, ['F1']);
  });

  it('should keep parent and child relations consistent both ways', () => {
    const graph = graphOf(`0 @I1@ INDI
1 FAMS @F1@
0 @I2@ INDI
1 FAMS @F1@
1 FAMS @F2@
0 @I3@ INDI
1 FAMC @F1@
1 FAMS @F3@
0 @I4@ INDI
1 FAMC @F2@
0 @I5@ INDI
1 FAMS @F2@
0 @I6@ INDI
0 @F1@ FAM
1 CHIL @I6@
0 @F2@ FAM
0 @F3@ FAM
1 CHIL @I4@
`);

    for (const individual of graph.individuals.values()) {
      for (const parent of parentsOf(graph, individual)) {
        assert.ok(ids(childrenOf(graph, parent)).includes(individual.id),
          `${individual.id} should be a child of ${parent.id}`);
      }
      for (const child of childrenOf(graph, individual)) {
        assert.ok(ids(parentsOf(graph, child)).includes(individual.id),
          `${individual.id} should be a parent of ${child.id}`);
      }
    }
    assert.deepStrictEqual(ids(parentsOf(graph, requireIndividual(graph, 'I4'))), ['I2', 'I5', 'I3']);
  });

  it('should fail when a family points at a missing individual', () => {
    assert.throws(
      () => graphOf('0 @F1@ FAM\n1 HUSB @I1@\n1 CHIL @I9@\n0 @I1@ INDI\n'),
      (err: unknown) => err instanceof DanglingReferenceError && err.pointer === '@I9@' && err.line === 3
    );
  });

  it('should fail when a pointer names the wrong kind of record', () => {
    assert.throws(
      () => graphOf('0 @I1@ INDI\n1 FAMC @I2@\n0 @I2@ INDI\n'),
      (err: unknown) => err instanceof DanglingReferenceError && err.message.includes('does not name a family')
    );
  });

  it('should fail when a link value is not a pointer', () => {
    assert.throws(
      () => graphOf('0 @F1@ FAM\n1 HUSB I1\n0 @I1@ INDI\n'),
      DanglingReferenceError
    );
  });

  it('should fail when a NOTE pointer does not resolve', () => {
    assert.throws(() => graphOf('0 @I1@ INDI\n1 NOTE @N7@\n'), DanglingReferenceError);
  });

  it('should reject duplicate record ids', () => {
    assert.throws(
      () => graphOf('0 @I1@ INDI\n0 @I1@ INDI\n'),
      (err: unknown) => err instanceof StructuralError && err.line === 2
    );
  });

  it('should reject a family with more than two spouses', () => {
    assert.throws(
      () => graphOf('0 @F1@ FAM\n1 HUSB @I1@\n1 WIFE @I2@\n0 @I1@ INDI\n0 @I2@ INDI\n0 @I3@ INDI\n1 FAMS @F1@\n'),
      StructuralError
    );
  });

  it('should reject an individual record without a pointer', () => {
    assert.throws(() => graphOf('0 INDI\n1 NAME Nobody\n'), StructuralError);
  });

  it('should return frozen structures', () => {
    const graph = graphOf(NUCLEAR_FAMILY);
    const alice = requireIndividual(graph, 'I3');

    assert.ok(Object.isFrozen(graph));
    assert.ok(Object.isFrozen(alice));
    assert.ok(Object.isFrozen(alice.familiesAsChild));
  });

  it('should not loop on a person who is their own ancestor by pointer', () => {
    const graph = graphOf(`0 @I1@ INDI
1 FAMC @F1@
1 FAMS @F1@
0 @F1@ FAM
`);
    const view = relationshipsOf(graph, requireIndividual(graph, 'I1'));

    assert.deepStrictEqual(ids(view.parents), []);
    assert.deepStrictEqual(ids(view.children), []);
  });
});

describe('countPlaces', () => {

  it('should count places across individuals and families', () => {
    const graph = graphOf(`0 @I1@ INDI
1 BIRT
2 PLAC York
1 DEAT
2 PLAC Leeds
0 @I2@ INDI
1 BIRT
2 PLAC Leeds
0 @F1@ FAM
1 MARR
2 PLAC Bath
`);

    assert.deepStrictEqual(countPlaces(graph), [
      { place: 'Leeds', count: 2 },
      { place: 'Bath', count: 1 },
      { place: 'York', count: 1 }
    ]);
  });
});
