import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { buildSite } from '../site-builder.js';
import { encodeSite, pageDirectory, writeSite } from '../site-writer.js';
import { FakeCodec, makeContext, makeDocument } from './fixtures.js';

const { describe, it, beforeEach, afterEach } = test;

const RECORDS = [{ name: 'Ada', type: 'person' }];

async function encode() {
  const context = makeContext(RECORDS);
  const build = buildSite([makeDocument('Then {% lod %}Ada{% endlod %} left.\n')], context);
  const codec = new FakeCodec();
  const files = await encodeSite(build, context, { codec });
  return { codec, files };
}

describe('pageDirectory', () => {
  it('should drop the base URL', () => {
    assert.strictEqual(pageDirectory('/book/people/ada/', '/book'), 'people/ada/');
  });

  it('should keep paths outside the base URL', () => {
    assert.strictEqual(pageDirectory('/chapters/arrival/', '/book'), 'chapters/arrival/');
    assert.strictEqual(pageDirectory('/bookish/x/', '/book'), 'bookish/x/');
  });
});

describe('encodeSite', () => {
  it('should write HTML, JSON-LD and Turtle for every page', async () => {
    const { files } = await encode();

    assert.deepStrictEqual(files.map(f => f.path), [
      'chapters/arrival/index.html',
      'chapters/arrival/index.json',
      'chapters/arrival/index.ttl',
      'people/ada/index.html',
      'people/ada/index.json',
      'people/ada/index.ttl'
    ]);
  });

  it('should encode each page graph once', async () => {
    const { codec } = await encode();
    assert.deepStrictEqual(codec.compacted.map(g => g['name']), ['Chapter 1: Arrival', 'Ada']);
  });

  it('should embed the compacted graph in entity pages', async () => {
    const { files } = await encode();
    const page = files.find(f => f.path === 'people/ada/index.html');
    const json = files.find(f => f.path === 'people/ada/index.json');

    assert.strictEqual(json?.content, '{\n  "name": "Ada"\n}\n');
    assert.ok(page?.content.includes('<script type="application/ld+json">\n{\n  "name": "Ada"\n}\n</script>'));
  });
});

describe('writeSite', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lodbook-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should replace the output directory with the encoded files', async () => {
    const outputDir = path.join(tempDir, '_site');
    fs.mkdirSync(outputDir);
    fs.writeFileSync(path.join(outputDir, 'stale.html'), 'old');

    await writeSite([{ path: 'people/ada/index.ttl', content: '# Ada\n' }], outputDir);

    assert.strictEqual(fs.existsSync(path.join(outputDir, 'stale.html')), false);
    assert.strictEqual(fs.readFileSync(path.join(outputDir, 'people', 'ada', 'index.ttl'), 'utf-8'), '# Ada\n');
  });
});
