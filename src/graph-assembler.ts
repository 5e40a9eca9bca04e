import { RenderedDocument } from './content-page.js';
import { GraphNode, Mention, MentionedByEntry } from './types.js';

/**
 * An entity page: its graph plus the mention contexts shown on the page.
 * The contexts are display data and stay out of the graph.
 */
export interface EntityPage {
  name: string;
  collection: string;
  template: string;
  /** Site-relative URL, eg. "/book/people/james-minahan/" */
  url: string;
  /** Graph identifier of the entity */
  id: string;
  graph: GraphNode;
  contexts: Mention[];
}

/**
 * If the document's graph mentions the entity, describe the document as a
 * back-reference.
 */
export function findMentioningDocument(document: RenderedDocument, entityId: string): MentionedByEntry | undefined {
  const mentions = document.graph['mentions'];
  if (!Array.isArray(mentions)) return undefined;

  const mentioned = mentions.some(node => (
    typeof node === 'object' && node !== null && !Array.isArray(node) && node['@id'] === entityId
  ));
  if (!mentioned) return undefined;

  return { id: document.id, name: document.title, type: 'WebPage' };
}

/**
 * Fold back-references and mention contexts into an entity page.
 *
 * `mentionedBy` is only added when at least one document mentions the
 * entity. Must run once per entity per build; a second run appends again.
 */
export function assembleEntityGraph(
  page: EntityPage,
  mentioningDocuments: readonly MentionedByEntry[],
  mentions: readonly Mention[]
): GraphNode {
  if (mentioningDocuments.length > 0) {
    const existing = page.graph['mentionedBy'];
    const entries: GraphNode[] = mentioningDocuments.map(entry => ({
      id: entry.id,
      name: entry.name,
      type: entry.type
    }));
    page.graph['mentionedBy'] = Array.isArray(existing) ? [...existing, ...entries] : entries;
  }
  page.contexts.push(...mentions);
  return page.graph;
}
