import * as test from 'node:test';
import * as assert from 'node:assert';
import { lexLine, tokenize } from '../lexer.js';
import { MalformedLineError } from '../errors.js';

const { describe, it } = test;

describe('lexLine', () => {

  it('should read level, tag and value', () => {
    const token = lexLine('1 NAME John /Smith/', 4);

    assert.deepStrictEqual(token, { line: 4, level: 1, tag: 'NAME', value: 'John /Smith/' });
  });

  it('should read a pointer line', () => {
    const token = lexLine('0 @I12@ INDI', 1);

    assert.deepStrictEqual(token, { line: 1, level: 0, tag: 'INDI', pointer: 'I12' });
  });

  it('should keep a pointer value as the value', () => {
    const token = lexLine('1 FAMC @F1@', 2);

    assert.strictEqual(token?.value, '@F1@');
    assert.strictEqual(token?.pointer, undefined);
  });

  it('should tolerate surrounding whitespace and upper-case the tag', () => {
    const token = lexLine('  2 date 1 JAN 1900   \t', 7);

    assert.deepStrictEqual(token, { line: 7, level: 2, tag: 'DATE', value: '1 JAN 1900' });
  });

  it('should return null for blank lines', () => {
    assert.strictEqual(lexLine('   ', 3), null);
  });

  it('should reject a non-numeric level', () => {
    assert.throws(
      () => lexLine('X NAME John', 9),
      (err: unknown) => err instanceof MalformedLineError && err.line === 9
    );
  });

  it('should reject a line without a tag', () => {
    assert.throws(() => lexLine('1', 2), MalformedLineError);
    assert.throws(() => lexLine('0 @I1@', 5), MalformedLineError);
  });

  it('should reject a broken pointer', () => {
    assert.throws(() => lexLine('0 @I1 INDI', 1), MalformedLineError);
  });
});

describe('tokenize', () => {

  it('should handle mixed line endings, a BOM and trailing blank lines', () => {
    const content = '\uFEFF0 HEAD\r\n1 CHAR UTF-8\r0 TRLR\n\n\n';
    const tokens = Array.from(tokenize(content));

    assert.deepStrictEqual(tokens.map(t => [t.line, t.level, t.tag]), [
      [1, 0, 'HEAD'],
      [2, 1, 'CHAR'],
      [3, 0, 'TRLR']
    ]);
  });

  it('should restart from the first line on every iteration', () => {
    const tokens = tokenize('0 HEAD\n0 TRLR\n');

    assert.strictEqual(Array.from(tokens).length, 2);
    assert.strictEqual(Array.from(tokens).length, 2);
  });

  it('should be lazy: a bad line only fails when reached', () => {
    const tokens = tokenize('0 HEAD\nbroken line\n');
    const iterator = tokens[Symbol.iterator]();

    assert.strictEqual(iterator.next().value?.tag, 'HEAD');
    assert.throws(() => iterator.next(), (err: unknown) => err instanceof MalformedLineError && err.line === 2);
  });
});
