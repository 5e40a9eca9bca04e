import {
  ElementNode,
  HtmlFragment,
  HtmlNode,
  TextNode,
  createElement,
  createText,
  findAll,
  hasClass,
  textContent
} from './html-tree.js';
import { IGNORE_CLASS, LINK_CLASS } from './markers.js';
import { textBlocks } from './reference-index.js';
import { findWholeWords } from './tokens.js';
import { ReferenceIndex, ResolvedReference } from './types.js';

/**
 * Build a link to a resolved reference around the given content.
 */
export function createLabelLink(reference: ResolvedReference, children: HtmlNode[]): ElementNode {
  return createElement('a', {
    class: LINK_CLASS,
    'data-name': reference.name,
    'data-collection': reference.collection,
    property: 'name',
    href: reference.url
  }, children);
}

/**
 * Links (ours or anyone's) and ignore spans are never touched.
 */
function isSkipped(node: HtmlNode): boolean {
  return node.type === 'element'
    && (node.tag === 'a' || hasClass(node, LINK_CLASS) || hasClass(node, IGNORE_CLASS));
}

function containsSkipped(element: ElementNode): boolean {
  return findAll(element.children, isSkipped).length > 0;
}

/**
 * Split a text node around whole-word occurrences of the label. Returns the
 * sibling nodes that replace it.
 */
function linkTextNode(node: TextNode, reference: ResolvedReference): HtmlNode[] {
  const spans = findWholeWords(node.text, reference.label);
  if (spans.length === 0) return [node];

  const replacement: HtmlNode[] = [];
  let cursor = 0;
  for (const span of spans) {
    if (span.start > cursor) {
      replacement.push(createText(node.text.slice(cursor, span.start)));
    }
    replacement.push(createLabelLink(reference, [createText(node.text.slice(span.start, span.end))]));
    cursor = span.end;
  }
  if (cursor < node.text.length) {
    replacement.push(createText(node.text.slice(cursor)));
  }
  return replacement;
}

/**
 * Link every occurrence of one label among a block's children.
 *
 * Text children are rebuilt as text/link/text siblings. An element child
 * whose whole text is the label (eg. <em>James Minahan</em>) gets its content
 * wrapped in a link instead, unless it holds a link or an ignore span.
 */
export function markupBlock(block: ElementNode, reference: ResolvedReference): void {
  block.children = block.children.flatMap((child): HtmlNode[] => {
    if (isSkipped(child)) return [child];

    if (child.type === 'text') {
      return linkTextNode(child, reference);
    }
    if (child.type === 'element' && textContent(child) === reference.label && !containsSkipped(child)) {
      child.children = [createLabelLink(reference, child.children)];
    }
    return [child];
  });
}

/**
 * Add links to every further occurrence of the labels marked up explicitly in
 * this document. Longer labels go first, so "James Minahan" is linked whole
 * before "James" is considered.
 */
export function markupLabels(fragment: HtmlFragment, references: ReferenceIndex): void {
  const labels = Array.from(references.keys())
    .filter(label => label.trim() !== '')
    .sort((a, b) => b.length - a.length);

  for (const block of textBlocks(fragment)) {
    for (const label of labels) {
      const reference = references.get(label);
      if (reference) {
        markupBlock(block, reference);
      }
    }
  }
}
