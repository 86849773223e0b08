import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import * as os from 'node:os';
import { loadGedcomFile, loadGedcomText } from '../loader.js';
import { GedcomError, MalformedLineError } from '../errors.js';

const { describe, it, beforeEach, afterEach } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

const FIXTURE = path.join(__dirname, 'fixtures', 'family.ged');

describe('loadGedcomText', () => {

  it('should count records and keep the unused ones by tag', () => {
    const result = loadGedcomText(`0 HEAD
0 @S1@ SOUR
1 TITL Parish register
0 @S2@ SOUR
0 @I1@ INDI
0 TRLR
`);

    assert.strictEqual(result.recordCount, 5);
    assert.strictEqual(result.graph.individuals.size, 1);
    assert.deepStrictEqual(result.otherRecords, { HEAD: 1, SOUR: 2, TRLR: 1 });
  });

  it('should stop at the first malformed line', () => {
    assert.throws(
      () => loadGedcomText('0 HEAD\nx INDI\n'),
      (err: unknown) => err instanceof MalformedLineError && err.line === 2
    );
  });
});

describe('loadGedcomFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gedcom-pages-load-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load the fixture file', async () => {
    const result = await loadGedcomFile(FIXTURE);

    assert.strictEqual(result.recordCount, 7);
    assert.deepStrictEqual([...result.graph.individuals.keys()], ['I1', 'I2', 'I3', 'I4']);
    assert.deepStrictEqual([...result.graph.families.keys()], ['F1']);
  });

  it('should accept CRLF line endings and a byte order mark', async () => {
    const filePath = path.join(tempDir, 'windows.ged');
    fs.writeFileSync(filePath, '\uFEFF0 @I1@ INDI\r\n1 NAME Ann /Lee/\r\n0 TRLR\r\n');

    const result = await loadGedcomFile(filePath);

    assert.strictEqual(result.graph.individuals.get('I1')?.names[0]?.raw, 'Ann /Lee/');
  });

  it('should fail with a GedcomError when the file cannot be read', async () => {
    await assert.rejects(
      loadGedcomFile(path.join(tempDir, 'missing.ged')),
      (err: unknown) => err instanceof GedcomError && err.message.startsWith('Cannot read GEDCOM file')
    );
  });
});
