import { BuildContext } from './build-context.js';
import { EntityRecord, GraphNode, GraphValue, PropertyValue, ScalarValue } from './types.js';
import { createEntityUri } from './uri.js';

const NO_KEYS: ReadonlySet<string> = new Set();

/**
 * Resolve a type tag to its graph type. Unconfigured tags pass through as
 * they are.
 */
function resolveType(tag: string, context: BuildContext): string {
  if (!context.types.isConfigured(tag)) {
    context.advisories.report('unconfigured-type', tag, `Type not configured: ${tag}`);
  }
  return context.types.graphType(tag);
}

/**
 * Relationships are expressed with `name` properties. Expand a name into a
 * link carrying the target's id and type (and image, for image objects).
 *
 * `enclosingKeys` are the keys of the object the name sits in; when it
 * already has an id, none is minted here.
 */
function hydrateLink(name: string, enclosingKeys: ReadonlySet<string>, context: BuildContext): GraphNode {
  const record = context.records.get(name);
  if (!record) {
    context.advisories.report('unresolved-reference', name, `Not found: ${name}`);
    return { name };
  }

  const link: GraphNode = { name };
  if (!enclosingKeys.has('id') && !enclosingKeys.has('@id')) {
    link['@id'] = record.id ?? createEntityUri(context.site, context.types.collection(record.type), name);
  }
  const type = resolveType(record.type, context);
  link['@type'] = type;

  if (type.includes('ImageObject')) {
    const image = record.properties.get('image');
    if (image?.kind === 'scalar' && image.value !== null) {
      link['image'] = image.value;
    }
  }
  return link;
}

function hydrateScalar(
  key: string,
  value: ScalarValue,
  enclosingKeys: ReadonlySet<string>,
  context: BuildContext
): GraphNode {
  if (key === 'name' && typeof value === 'string') {
    return hydrateLink(value, enclosingKeys, context);
  }
  if (key === 'type' && typeof value === 'string') {
    return { '@type': resolveType(value, context) };
  }
  if (key === 'id') {
    return { '@id': value };
  }
  return { [key]: value };
}

function hydrateMapping(
  value: Extract<PropertyValue, { kind: 'reference' | 'object' }>,
  context: BuildContext
): GraphNode {
  const keys = new Set(value.properties.keys());
  const node: GraphNode = {};

  // The link goes in first so the object's own id/type win over the target's
  if (value.kind === 'reference') {
    keys.add('name');
    Object.assign(node, hydrateLink(value.name, keys, context));
  }
  for (const [key, child] of value.properties) {
    Object.assign(node, hydrateProperty(key, child, keys, context));
  }
  return node;
}

/**
 * Strip the wrapper key from a hydrated list element. A single value is kept
 * as is; an element that hydrated to several values becomes the list of
 * those values.
 */
function collapse(fragment: GraphNode): GraphValue {
  const values = Object.values(fragment);
  return values.length === 1 ? values[0] : values;
}

/**
 * Hydrate one property, returning the graph properties it contributes.
 */
export function hydrateProperty(
  key: string,
  value: PropertyValue,
  enclosingKeys: ReadonlySet<string>,
  context: BuildContext
): GraphNode {
  switch (value.kind) {
    case 'scalar':
      return hydrateScalar(key, value.value, enclosingKeys, context);
    case 'reference':
    case 'object':
      return { [key]: hydrateMapping(value, context) };
    case 'list':
      // Each element is hydrated as if it were the only property of an object
      return { [key]: value.items.map(item => collapse(hydrateProperty(key, item, NO_KEYS, context))) };
  }
}

/**
 * Normalise a record into a graph node, hydrating every name-valued property
 * below the top level into a typed, identified link.
 */
export function hydrate(record: EntityRecord, context: BuildContext): GraphNode {
  const node: GraphNode = { name: record.name };
  if (record.type) {
    node['@type'] = resolveType(record.type, context);
  }
  if (record.id !== undefined) {
    node['@id'] = record.id;
  }

  const keys = new Set(record.properties.keys());
  for (const [key, value] of record.properties) {
    Object.assign(node, hydrateProperty(key, value, keys, context));
  }
  return node;
}

/**
 * Identifier of an entity's graph: its own id, or the URI of its page.
 */
export function entityGraphId(record: EntityRecord, context: BuildContext): string {
  return record.id ?? createEntityUri(context.site, context.types.collection(record.type), record.name);
}

/**
 * The graph that seeds an entity page: the hydrated record, identified and
 * related to its HTML page.
 */
export function compileEntityGraph(record: EntityRecord, context: BuildContext): GraphNode {
  const pageId = createEntityUri(context.site, context.types.collection(record.type), record.name);
  const graph = hydrate(record, context);
  if (record.id === undefined) {
    graph['@id'] = pageId;
  }
  graph['mainEntityOfPage'] = `${pageId}index.html`;
  return graph;
}
