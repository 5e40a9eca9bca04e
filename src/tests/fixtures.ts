import { silentAdvisories } from '../advisories.js';
import { BuildContext, createBuildContext } from '../build-context.js';
import { GraphCodec, CompactedDocument } from '../codec.js';
import { RecordStore } from '../records.js';
import { TypeRegistry } from '../type-registry.js';
import { GraphNode, LodContext, NarrativeDocument, TypeConfig } from '../types.js';

export const SITE = { url: 'https://example.org', baseUrl: '/book' };

export const TYPES: Record<string, TypeConfig> = {
  person: { type: 'Person', collection: 'people', template: 'person' },
  place: { type: 'Place', collection: 'places', template: 'place' },
  image: { type: 'ImageObject', collection: 'images', template: 'image' }
};

/**
 * A build context over the given raw records, with advisories kept quiet
 */
export function makeContext(entries: unknown[], lodContext?: LodContext): BuildContext {
  const advisories = silentAdvisories();
  return createBuildContext({
    records: RecordStore.fromRaw(entries, advisories),
    types: new TypeRegistry(TYPES),
    site: SITE,
    advisories,
    lodContext
  });
}

export function makeDocument(markdown: string, overrides: Partial<NarrativeDocument> = {}): NarrativeDocument {
  return {
    documentId: 'arrival.md',
    title: 'Arrival',
    chapter: '1',
    url: '/chapters/arrival/',
    markdown,
    ...overrides
  };
}

/**
 * Codec stand-in that records what it was asked to encode
 */
export class FakeCodec implements GraphCodec {
  readonly compacted: GraphNode[] = [];

  async compact(graph: GraphNode): Promise<CompactedDocument> {
    this.compacted.push(graph);
    return { name: typeof graph['name'] === 'string' ? graph['name'] : 'unnamed' };
  }

  async compactData(): Promise<CompactedDocument> {
    return {};
  }

  async toTurtle(graph: GraphNode): Promise<string> {
    return `# ${typeof graph['name'] === 'string' ? graph['name'] : 'unnamed'}\n`;
  }
}
