import { ElementNode, HtmlFragment, HtmlNode, escapeText, findAll, getAttribute, textContent } from './html-tree.js';
import { textBlocks } from './reference-index.js';
import { firstWords, lastWords } from './tokens.js';
import { Mention } from './types.js';

/** Number of words shown either side of a mention */
export const CONTEXT_WORDS = 5;

/**
 * What the extractor needs to know about a rendered document.
 */
export interface MentionSource {
  title: string;
  chapter: string | null;
  url: string;
  tree: HtmlFragment;
}

interface SplitBlock {
  before: string;
  label: string;
  after: string;
}

/**
 * The block's text (tags stripped, still HTML-escaped) before, inside and
 * after the given link.
 */
function splitAround(block: ElementNode, target: ElementNode): SplitBlock {
  const split: SplitBlock = { before: '', label: '', after: '' };
  let seenTarget = false;

  const visit = (node: HtmlNode) => {
    if (node === target) {
      split.label = escapeText(textContent(node));
      seenTarget = true;
      return;
    }
    if (node.type === 'text') {
      if (seenTarget) {
        split.after += escapeText(node.text);
      } else {
        split.before += escapeText(node.text);
      }
    } else if (node.type === 'element') {
      node.children.forEach(visit);
    }
  };
  block.children.forEach(visit);

  return split;
}

/**
 * Show a link in context: up to five words either side, with the link text
 * emphasised.
 */
export function contextString(block: ElementNode, link: ElementNode, words = CONTEXT_WORDS): string {
  const { before, label, after } = splitAround(block, link);
  return `${lastWords(before, words)} <em>${label}</em> ${firstWords(after, words)}`.trim();
}

/**
 * Paragraphs are numbered "para-<n>"; fall back to the block's position when
 * a paragraph has no id.
 */
function paragraphId(block: ElementNode, index: number): string {
  const id = getAttribute(block, 'id');
  const suffix = id?.split('-')[1];
  return suffix ? suffix : String(index);
}

/**
 * Find every link to the named entity in a rendered document, in paragraph
 * order and left to right within each paragraph.
 */
export function extractMentions(document: MentionSource, name: string): Mention[] {
  const mentions: Mention[] = [];

  textBlocks(document.tree).forEach((block, index) => {
    const links = findAll(block.children, element => (
      element.tag === 'a' && getAttribute(element, 'data-name') === name
    ));
    for (const link of links) {
      mentions.push({
        documentTitle: document.title,
        documentChapter: document.chapter,
        documentUrl: document.url,
        paragraphId: paragraphId(block, index),
        contextString: contextString(block, link)
      });
    }
  });

  return mentions;
}
