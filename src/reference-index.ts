import { ElementNode, HtmlFragment, findAll, getAttribute, textContent } from './html-tree.js';
import { ReferenceIndex, ResolvedReference } from './types.js';

/**
 * The text blocks of a rendered document: every paragraph, in document order.
 */
export function textBlocks(fragment: HtmlFragment): ElementNode[] {
  return findAll(fragment.children, element => element.tag === 'p');
}

/**
 * Entity links placed by explicit markers carry property="name".
 */
export function isEntityLink(element: ElementNode): boolean {
  return element.tag === 'a' && getAttribute(element, 'property') === 'name';
}

/**
 * Collect the references established by explicit markers in a rendered
 * document, keyed by their visible label. A label seen twice keeps the last
 * reference.
 */
export function collectReferences(fragment: HtmlFragment): ReferenceIndex {
  const references = new Map<string, ResolvedReference>();

  for (const block of textBlocks(fragment)) {
    for (const link of findAll(block.children, isEntityLink)) {
      const name = getAttribute(link, 'data-name');
      if (!name) continue;
      const label = textContent(link);
      references.set(label, {
        label,
        name,
        collection: getAttribute(link, 'data-collection') ?? '',
        url: getAttribute(link, 'href') ?? ''
      });
    }
  }

  return references;
}

/**
 * Names of all entities referenced by a document, in first-reference order.
 */
export function referencedNames(references: ReferenceIndex): string[] {
  return Array.from(new Set(Array.from(references.values(), reference => reference.name)));
}
