import jsonld from 'jsonld';
import type { ContextDefinition, JsonLdDocument, NodeObject } from 'jsonld';
import N3 from 'n3';
import schemaOrgContext from './contexts/schema-org.json' with { type: 'json' };
import { CodecError } from './errors.js';
import { GraphNode, LodContext } from './types.js';

export type CompactedDocument = NodeObject;

const SCHEMA_ORG = 'http://schema.org/';

// Bundled so builds never fetch it. URL-valued terms are typed "@id".
const PRELOADED_CONTEXTS = new Map<string, NodeObject>([
  ['http://schema.org', schemaOrgContext],
  ['http://schema.org/', schemaOrgContext],
  ['https://schema.org', schemaOrgContext],
  ['https://schema.org/', schemaOrgContext],
  ['https://schema.org/docs/jsonldcontext.json', schemaOrgContext]
]);

const TURTLE_PREFIXES = { schema: SCHEMA_ORG };

/**
 * Serves preloaded contexts; every other remote document is refused.
 */
async function documentLoader(url: string) {
  const document = PRELOADED_CONTEXTS.get(url);
  if (!document) {
    throw new CodecError(`Remote context not available: ${url}`);
  }
  return { documentUrl: url, document };
}

function isJsonLdDocument(value: unknown): value is JsonLdDocument {
  return typeof value === 'object' && value !== null;
}

function isJsonLdContext(value: unknown): value is ContextDefinition {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toDocument(value: unknown): JsonLdDocument {
  if (!isJsonLdDocument(value)) {
    throw new CodecError('A JSON-LD document must be an object or an array');
  }
  return value;
}

function toContext(context: LodContext): ContextDefinition {
  const wrapped: unknown = { '@context': context };
  if (!isJsonLdContext(wrapped)) {
    throw new CodecError('Invalid JSON-LD context');
  }
  return wrapped;
}

/**
 * Serializes graphs as compacted JSON-LD and as Turtle.
 */
export interface GraphCodec {
  compact(graph: GraphNode, context: LodContext): Promise<CompactedDocument>;
  compactData(data: unknown, context: LodContext): Promise<CompactedDocument>;
  toTurtle(graph: GraphNode, context: LodContext): Promise<string>;
}

/**
 * Codec backed by jsonld and n3. Failures from either library reach the
 * caller unchanged.
 */
export class JsonLdCodec implements GraphCodec {
  async compact(graph: GraphNode, context: LodContext): Promise<CompactedDocument> {
    return this.compactData({ '@context': context, '@graph': graph }, context);
  }

  async compactData(data: unknown, context: LodContext): Promise<CompactedDocument> {
    return jsonld.compact(toDocument(data), toContext(context), { documentLoader });
  }

  async toTurtle(graph: GraphNode, context: LodContext): Promise<string> {
    const input = toDocument({ '@context': context, '@graph': graph });
    const nquads: unknown = await jsonld.toRDF(input, { format: 'application/n-quads', documentLoader });
    if (typeof nquads !== 'string') {
      throw new CodecError('Expected N-Quads from the RDF conversion');
    }

    const quads = new N3.Parser({ format: 'N-Quads' }).parse(nquads);
    return new Promise<string>((resolve, reject) => {
      const writer = new N3.Writer({ prefixes: TURTLE_PREFIXES });
      writer.addQuads(quads);
      writer.end((error, result) => {
        if (error) {
          reject(error);
        } else {
          resolve(result);
        }
      });
    });
  }
}
