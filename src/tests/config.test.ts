import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { loadConfig, parseConfig, resolvePath } from '../config.js';
import { ConfigError } from '../errors.js';

const { describe, it, beforeEach, afterEach } = test;

const MINIMAL = {
  url: 'https://example.org',
  source: { data: 'data/entities.yml' },
  dataTypes: {}
};

describe('parseConfig', () => {
  it('should fill in defaults', () => {
    const config = parseConfig(MINIMAL, '/site');

    assert.strictEqual(config.baseUrl, '');
    assert.strictEqual(config.contentDir, 'chapters');
    assert.strictEqual(config.outputDir, '_site');
    assert.deepStrictEqual(config.collections, []);
    assert.strictEqual(config.source.context, undefined);
  });

  it('should read types, collections and an inline context', () => {
    const config = parseConfig({
      ...MINIMAL,
      baseUrl: '/book/',
      source: { data: 'entities.jsonld', context: { '@vocab': 'http://schema.org/', knows: { '@type': '@id' } } },
      dataTypes: { person: { type: 'Person', collection: 'people', template: 'profile' }, place: { type: 'Place' } },
      collections: [{ name: 'people', color: '#1f77b4' }]
    }, '/site');

    assert.strictEqual(config.baseUrl, '/book');
    assert.deepStrictEqual(config.dataTypes, {
      person: { type: 'Person', collection: 'people', template: 'profile' },
      place: { type: 'Place', collection: 'place', template: 'place' }
    });
    assert.deepStrictEqual(config.collections, [{ name: 'people', color: '#1f77b4' }]);
    assert.deepStrictEqual(config.source.context, { '@vocab': 'http://schema.org/', knows: { '@type': '@id' } });
  });

  it('should reject a config without a site url', () => {
    assert.throws(() => parseConfig({ ...MINIMAL, url: '' }, '/site'), ConfigError);
  });

  it('should reject a type without a graph type', () => {
    assert.throws(() => parseConfig({ ...MINIMAL, dataTypes: { person: { collection: 'people' } } }, '/site'), ConfigError);
  });

  it('should reject a malformed context', () => {
    assert.throws(() => parseConfig({ ...MINIMAL, source: { data: 'x.yml', context: 42 } }, '/site'), ConfigError);
  });

  it('should resolve paths against the config directory', () => {
    const config = parseConfig(MINIMAL, '/site');
    assert.strictEqual(resolvePath(config, 'data/entities.yml'), path.resolve('/site', 'data/entities.yml'));
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lodbook-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read a config file', async () => {
    const file = path.join(tempDir, 'lodbook.config.json');
    fs.writeFileSync(file, JSON.stringify(MINIMAL));

    const config = await loadConfig(file);

    assert.strictEqual(config.url, 'https://example.org');
    assert.strictEqual(config.rootDir, tempDir);
  });

  it('should fail on a missing file', async () => {
    await assert.rejects(loadConfig(path.join(tempDir, 'missing.json')), ConfigError);
  });

  it('should fail on invalid JSON', async () => {
    const file = path.join(tempDir, 'broken.json');
    fs.writeFileSync(file, '{ "url": ');

    await assert.rejects(loadConfig(file), ConfigError);
  });
});
