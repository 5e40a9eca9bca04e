import { BuildContext } from './build-context.js';
import { compileEntityGraph } from './graph-compiler.js';
import {
  ElementNode,
  HtmlFragment,
  createElement,
  findAll,
  parseHtml,
  serializeHtml,
  setAttribute
} from './html-tree.js';
import { markupLabels } from './label-markup.js';
import { collectReferences, referencedNames, textBlocks } from './reference-index.js';
import { renderNarrative } from './renderer.js';
import { GraphNode, LodContext, NarrativeDocument, ReferenceIndex } from './types.js';
import { createPageId } from './uri.js';

export const PAGE_DATA_ID = 'page-data';

/**
 * A narrative document after its markup pass. The tree is final: nothing
 * changes it once this value exists.
 */
export interface RenderedDocument {
  source: NarrativeDocument;
  title: string;
  chapter: string | null;
  url: string;
  /** Absolute URI of the page */
  id: string;
  tree: HtmlFragment;
  references: ReferenceIndex;
  /** Pre-compaction document graph */
  graph: GraphNode;
  /** Serialized tree, with the page-data script */
  html: string;
}

/**
 * Give paragraphs and block quotes numeric ids so mentions can point at them.
 */
export function numberParagraphs(fragment: HtmlFragment): void {
  textBlocks(fragment).forEach((para, index) => setAttribute(para, 'id', `para-${index}`));
  findAll(fragment.children, element => element.tag === 'blockquote')
    .forEach((quote, index) => setAttribute(quote, 'id', `quote-${index}`));
}

export function documentName(document: NarrativeDocument): string {
  return document.chapter === null ? document.title : `Chapter ${document.chapter}: ${document.title}`;
}

/**
 * The linked-data description of a narrative page: the page itself and the
 * graphs of every entity it refers to.
 */
export function createDocumentGraph(
  document: NarrativeDocument,
  references: ReferenceIndex,
  context: BuildContext
): GraphNode {
  const mentions: GraphNode[] = [];
  for (const name of referencedNames(references)) {
    const record = context.records.get(name);
    if (!record) {
      context.advisories.report('unresolved-reference', name, `Not found: ${name}`);
      continue;
    }
    mentions.push(compileEntityGraph(record, context));
  }

  return {
    '@id': createPageId(context.site, document.url),
    name: documentName(document),
    '@type': 'WebPage',
    mentions
  };
}

/**
 * JSON-LD script element carrying the document graph.
 */
export function pageDataScript(graph: GraphNode, lodContext: LodContext): ElementNode {
  const json = JSON.stringify({ '@context': lodContext, '@graph': graph }, null, 2)
    .replace(/</g, '\\u003c');
  return createElement('script', { id: PAGE_DATA_ID, type: 'application/ld+json' }, [{ type: 'raw', html: json }]);
}

/**
 * Run the document stage for one narrative: render, number paragraphs,
 * collect explicit references, link further occurrences of their labels and
 * describe the page as linked data.
 */
export function renderContentPage(document: NarrativeDocument, context: BuildContext): RenderedDocument {
  const tree = parseHtml(renderNarrative(document.markdown, context));
  numberParagraphs(tree);

  const references = collectReferences(tree);
  markupLabels(tree, references);

  const graph = createDocumentGraph(document, references, context);
  tree.children.push(pageDataScript(graph, context.lodContext));

  return {
    source: document,
    title: document.title,
    chapter: document.chapter,
    url: document.url,
    id: createPageId(context.site, document.url),
    tree,
    references,
    graph,
    html: serializeHtml(tree.children)
  };
}
