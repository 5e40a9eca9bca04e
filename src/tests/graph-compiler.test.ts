import * as test from 'node:test';
import * as assert from 'node:assert';
import { compileEntityGraph, entityGraphId, hydrate } from '../graph-compiler.js';
import { makeContext } from './fixtures.js';

const { describe, it } = test;

const RECORDS = [
  {
    name: 'James Minahan',
    type: 'person',
    birthPlace: { name: 'Ballarat' },
    knows: [{ name: 'Mary Minahan' }],
    alternateName: ['Jim', 'Jimmy', 'J.M.'],
    image: { name: 'Minahan portrait' }
  },
  { name: 'Mary Minahan', type: 'person' },
  { name: 'Ballarat', type: 'place' },
  { name: 'Minahan portrait', type: 'image', image: 'portrait.jpg' },
  { name: 'Ada', type: 'person', id: 'https://id.example/ada' }
];

function record(name: string) {
  const context = makeContext(RECORDS);
  const found = context.records.get(name);
  assert.ok(found);
  return { context, record: found };
}

describe('hydrate', () => {
  it('should expand names into typed, identified links', () => {
    const { context, record: james } = record('James Minahan');

    assert.deepStrictEqual(hydrate(james, context), {
      name: 'James Minahan',
      '@type': 'Person',
      birthPlace: {
        name: 'Ballarat',
        '@id': 'https://example.org/book/places/ballarat/',
        '@type': 'Place'
      },
      knows: [{
        name: 'Mary Minahan',
        '@id': 'https://example.org/book/people/mary-minahan/',
        '@type': 'Person'
      }],
      alternateName: ['Jim', 'Jimmy', 'J.M.'],
      image: {
        name: 'Minahan portrait',
        '@id': 'https://example.org/book/images/minahan-portrait/',
        '@type': 'ImageObject',
        image: 'portrait.jpg'
      }
    });
  });

  it('should leave a list of plain strings unchanged', () => {
    const { context, record: james } = record('James Minahan');
    assert.deepStrictEqual(hydrate(james, context)['alternateName'], ['Jim', 'Jimmy', 'J.M.']);
  });

  it('should keep the referenced record own id', () => {
    const context = makeContext([...RECORDS, { name: 'Bo', type: 'person', knows: { name: 'Ada' } }]);
    const bo = context.records.get('Bo');
    assert.ok(bo);

    assert.deepStrictEqual(hydrate(bo, context)['knows'], {
      name: 'Ada',
      '@id': 'https://id.example/ada',
      '@type': 'Person'
    });
  });

  it('should not mint an id when the enclosing object has one', () => {
    const context = makeContext([
      ...RECORDS,
      { name: 'Bo', type: 'person', spouse: { name: 'Mary Minahan', id: 'https://other.example/mary' } }
    ]);
    const bo = context.records.get('Bo');
    assert.ok(bo);

    assert.deepStrictEqual(hydrate(bo, context)['spouse'], {
      name: 'Mary Minahan',
      '@type': 'Person',
      '@id': 'https://other.example/mary'
    });
  });

  it('should leave unknown names as plain names and report them', () => {
    const context = makeContext([{ name: 'Bo', type: 'person', friend: { name: 'Nobody' } }]);
    const bo = context.records.get('Bo');
    assert.ok(bo);

    assert.deepStrictEqual(hydrate(bo, context)['friend'], { name: 'Nobody' });
    assert.deepStrictEqual(context.advisories.ofKind('unresolved-reference'), [
      { kind: 'unresolved-reference', subject: 'Nobody', message: 'Not found: Nobody' }
    ]);
  });

  it('should resolve nested type tags', () => {
    const context = makeContext([{ name: 'Bo', type: 'person', role: { type: 'person', title: 'Smith' } }]);
    const bo = context.records.get('Bo');
    assert.ok(bo);

    assert.deepStrictEqual(hydrate(bo, context)['role'], { '@type': 'Person', title: 'Smith' });
  });

  it('should pass an unconfigured type through and report it', () => {
    const context = makeContext([{ name: 'Endeavour', type: 'ship' }]);
    const ship = context.records.get('Endeavour');
    assert.ok(ship);

    assert.deepStrictEqual(hydrate(ship, context), { name: 'Endeavour', '@type': 'ship' });
    assert.strictEqual(context.advisories.ofKind('unconfigured-type')[0]?.subject, 'ship');
  });

  it('should flatten a list element that hydrates to several values', () => {
    const context = makeContext([...RECORDS, { name: 'Trip', type: 'place', route: { name: ['Ballarat'] } }]);
    const trip = context.records.get('Trip');
    assert.ok(trip);

    assert.deepStrictEqual(hydrate(trip, context)['route'], {
      name: [['Ballarat', 'https://example.org/book/places/ballarat/', 'Place']]
    });
  });
});

describe('compileEntityGraph', () => {
  it('should identify the graph by its page and link the page', () => {
    const { context, record: mary } = record('Mary Minahan');

    assert.deepStrictEqual(compileEntityGraph(mary, context), {
      name: 'Mary Minahan',
      '@type': 'Person',
      '@id': 'https://example.org/book/people/mary-minahan/',
      mainEntityOfPage: 'https://example.org/book/people/mary-minahan/index.html'
    });
  });

  it('should give the same graph every time within a build', () => {
    const { context, record: james } = record('James Minahan');

    assert.deepStrictEqual(compileEntityGraph(james, context), compileEntityGraph(james, context));
    assert.deepStrictEqual(hydrate(james, context), hydrate(james, context));
    assert.strictEqual(entityGraphId(james, context), entityGraphId(james, context));
  });

  it('should keep a record own id', () => {
    const { context, record: ada } = record('Ada');
    const graph = compileEntityGraph(ada, context);

    assert.strictEqual(graph['@id'], 'https://id.example/ada');
    assert.strictEqual(graph['mainEntityOfPage'], 'https://example.org/book/people/ada/index.html');
    assert.strictEqual(entityGraphId(ada, context), 'https://id.example/ada');
  });
});
