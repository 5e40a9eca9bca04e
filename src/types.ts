/**
 * A scalar property value as it appears in the data file.
 */
export type ScalarValue = string | number | boolean | null;

/**
 * A property value of an entity record.
 *
 * A mapping with a string `name` is a reference to another record; any other
 * mapping is a nested object.
 */
export type PropertyValue =
  | { kind: 'scalar'; value: ScalarValue }
  | { kind: 'reference'; name: string; properties: Map<string, PropertyValue> }
  | { kind: 'object'; properties: Map<string, PropertyValue> }
  | { kind: 'list'; items: PropertyValue[] };

/**
 * A structured description of a person, place, event etc, keyed by name.
 */
export interface EntityRecord {
  /** Unique key within the record store */
  name: string;

  /** Type tag, looked up in the type registry */
  type: string;

  /** Explicit identifier, when the data file already carries one */
  id?: string;

  /** Everything except name, type and id */
  properties: Map<string, PropertyValue>;
}

/**
 * How a record type is published.
 */
export interface TypeConfig {
  /** Canonical linked-data type, eg. "Person" */
  type: string;

  /** Output collection, eg. "people" */
  collection: string;

  /** Layout name used for the entity page */
  template: string;
}

export type GraphValue = ScalarValue | GraphValue[] | GraphNode;

/**
 * A node of a pre-compaction JSON-LD graph.
 */
export interface GraphNode {
  [key: string]: GraphValue;
}

/**
 * Site coordinates used to mint URIs.
 */
export interface SiteSettings {
  /** Scheme and host, eg. "https://example.org" */
  url: string;

  /** Path prefix, eg. "/book" (may be empty) */
  baseUrl: string;
}

/**
 * A reference established by an explicit marker in a rendered document.
 */
export interface ResolvedReference {
  /** Visible text of the marker */
  label: string;

  /** Name of the record it resolves to */
  name: string;

  collection: string;

  /** Site-relative URL of the entity page */
  url: string;
}

/**
 * Visible label text -> resolved reference, for one document.
 */
export type ReferenceIndex = ReadonlyMap<string, ResolvedReference>;

/**
 * One linked occurrence of an entity inside a narrative document.
 */
export interface Mention {
  documentTitle: string;
  documentChapter: string | null;
  documentUrl: string;
  paragraphId: string;
  contextString: string;
}

/**
 * A document's identity as recorded in the graph of an entity it mentions.
 */
export interface MentionedByEntry {
  id: string;
  name: string;
  type: 'WebPage';
}

/**
 * A narrative document as loaded from disk.
 */
export interface NarrativeDocument {
  /** Source filename */
  documentId: string;

  title: string;

  chapter: string | null;

  /** Site-relative URL, eg. "/chapters/arrival/" */
  url: string;

  /** Markdown body without front matter */
  markdown: string;
}

/**
 * A JSON-LD context: a URL or an inline context definition.
 */
export type LodContext = string | { [key: string]: GraphValue };
