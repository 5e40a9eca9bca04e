/**
 * A small HTML tree for rendered narrative pages.
 *
 * The tokenizer understands the HTML that marked and the marker renderer
 * produce: elements, text, comments/doctypes and raw-text elements (script,
 * style). Text is kept decoded in the tree and escaped again on output.
 */

import { decodeHTML } from 'entities';

export interface TextNode {
  type: 'text';
  text: string;
}

/** Comments, doctypes and script/style bodies, kept verbatim */
export interface RawNode {
  type: 'raw';
  html: string;
}

export interface Attribute {
  name: string;
  /** null for a bare attribute such as `hidden` */
  value: string | null;
}

export interface ElementNode {
  type: 'element';
  tag: string;
  attributes: Attribute[];
  children: HtmlNode[];
}

export type HtmlNode = TextNode | RawNode | ElementNode;

export interface HtmlFragment {
  children: HtmlNode[];
}

type HtmlToken =
  | { kind: 'text'; text: string }
  | { kind: 'raw'; html: string }
  | { kind: 'open'; tag: string; attributes: Attribute[]; selfClosing: boolean }
  | { kind: 'close'; tag: string };

const VOID_ELEMENTS = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input',
  'link', 'meta', 'source', 'track', 'wbr'
]);

const RAW_TEXT_ELEMENTS = new Set(['script', 'style']);

// Sticky patterns, matched at a given offset
const OPEN_TAG = /<([a-zA-Z][a-zA-Z0-9-]*)((?:\s+[^\s"'>/=]+(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s"'=<>`]+))?)*)\s*(\/?)>/y;
const CLOSE_TAG = /<\/([a-zA-Z][a-zA-Z0-9-]*)\s*>/y;
const ATTRIBUTE = /([^\s"'>/=]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g;

/**
 * Decode character references, named (the full HTML set) and numeric.
 */
export function decodeEntities(text: string): string {
  return decodeHTML(text);
}

/**
 * Escape decoded text for output.
 */
export function escapeText(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export function escapeAttribute(value: string): string {
  return escapeText(value).replace(/"/g, '&quot;');
}

function parseAttributes(source: string): Attribute[] {
  const attributes: Attribute[] = [];
  for (const match of source.matchAll(ATTRIBUTE)) {
    const raw = match[2] ?? match[3] ?? match[4];
    attributes.push({
      name: match[1].toLowerCase(),
      value: raw === undefined ? null : decodeEntities(raw)
    });
  }
  return attributes;
}

/**
 * Split an HTML string into tokens.
 */
export function tokenizeHtml(html: string): HtmlToken[] {
  const tokens: HtmlToken[] = [];
  let textStart = 0;
  let i = 0;

  function flushText(end: number) {
    if (end > textStart) {
      tokens.push({ kind: 'text', text: decodeEntities(html.slice(textStart, end)) });
    }
  }

  while (i < html.length) {
    const lt = html.indexOf('<', i);
    if (lt === -1) break;

    if (html.startsWith('<!--', lt)) {
      const close = html.indexOf('-->', lt + 4);
      const end = close === -1 ? html.length : close + 3;
      flushText(lt);
      tokens.push({ kind: 'raw', html: html.slice(lt, end) });
      i = textStart = end;
      continue;
    }

    if (html.startsWith('<!', lt) || html.startsWith('<?', lt)) {
      const close = html.indexOf('>', lt);
      const end = close === -1 ? html.length : close + 1;
      flushText(lt);
      tokens.push({ kind: 'raw', html: html.slice(lt, end) });
      i = textStart = end;
      continue;
    }

    CLOSE_TAG.lastIndex = lt;
    const closeMatch = CLOSE_TAG.exec(html);
    if (closeMatch) {
      flushText(lt);
      tokens.push({ kind: 'close', tag: closeMatch[1].toLowerCase() });
      i = textStart = CLOSE_TAG.lastIndex;
      continue;
    }

    OPEN_TAG.lastIndex = lt;
    const openMatch = OPEN_TAG.exec(html);
    if (openMatch) {
      flushText(lt);
      const tag = openMatch[1].toLowerCase();
      tokens.push({
        kind: 'open',
        tag,
        attributes: parseAttributes(openMatch[2]),
        selfClosing: openMatch[3] === '/'
      });
      i = textStart = OPEN_TAG.lastIndex;

      if (RAW_TEXT_ELEMENTS.has(tag) && openMatch[3] !== '/') {
        // Everything up to the matching end tag is raw text
        const end = html.toLowerCase().indexOf(`</${tag}`, i);
        const bodyEnd = end === -1 ? html.length : end;
        if (bodyEnd > i) {
          tokens.push({ kind: 'raw', html: html.slice(i, bodyEnd) });
        }
        i = textStart = bodyEnd;
      }
      continue;
    }

    // A stray "<" is plain text
    i = lt + 1;
  }

  flushText(html.length);
  return tokens;
}

/**
 * Parse an HTML string into a fragment. Unmatched end tags are dropped and
 * elements left open at the end are closed.
 */
export function parseHtml(html: string): HtmlFragment {
  const root: HtmlFragment = { children: [] };
  const stack: ElementNode[] = [];

  const current = (): HtmlNode[] => stack.length > 0 ? stack[stack.length - 1].children : root.children;

  for (const token of tokenizeHtml(html)) {
    switch (token.kind) {
      case 'text': {
        const siblings = current();
        const last = siblings[siblings.length - 1];
        if (last && last.type === 'text') {
          last.text += token.text;
        } else {
          siblings.push(createText(token.text));
        }
        break;
      }
      case 'raw':
        current().push({ type: 'raw', html: token.html });
        break;
      case 'open': {
        const element: ElementNode = {
          type: 'element',
          tag: token.tag,
          attributes: token.attributes,
          children: []
        };
        current().push(element);
        if (!token.selfClosing && !VOID_ELEMENTS.has(token.tag)) {
          stack.push(element);
        }
        break;
      }
      case 'close': {
        for (let depth = stack.length - 1; depth >= 0; depth--) {
          if (stack[depth].tag === token.tag) {
            stack.length = depth;
            break;
          }
        }
        break;
      }
    }
  }

  return root;
}

export function createText(text: string): TextNode {
  return { type: 'text', text };
}

export function createElement(
  tag: string,
  attributes: Record<string, string>,
  children: HtmlNode[] = []
): ElementNode {
  return {
    type: 'element',
    tag,
    attributes: Object.entries(attributes).map(([name, value]) => ({ name, value })),
    children
  };
}

export function getAttribute(element: ElementNode, name: string): string | undefined {
  const attribute = element.attributes.find(a => a.name === name);
  if (!attribute) return undefined;
  return attribute.value ?? '';
}

export function setAttribute(element: ElementNode, name: string, value: string): void {
  const attribute = element.attributes.find(a => a.name === name);
  if (attribute) {
    attribute.value = value;
  } else {
    element.attributes.push({ name, value });
  }
}

export function hasClass(node: HtmlNode, className: string): boolean {
  if (node.type !== 'element') return false;
  const classes = getAttribute(node, 'class');
  return classes !== undefined && classes.split(/\s+/).includes(className);
}

/**
 * All descendant elements matching the predicate, in document order.
 */
export function findAll(
  nodes: readonly HtmlNode[],
  predicate: (element: ElementNode) => boolean
): ElementNode[] {
  const found: ElementNode[] = [];
  const visit = (node: HtmlNode) => {
    if (node.type !== 'element') return;
    if (predicate(node)) found.push(node);
    node.children.forEach(visit);
  };
  nodes.forEach(visit);
  return found;
}

/**
 * Decoded text of a node and its descendants.
 */
export function textContent(node: HtmlNode): string {
  switch (node.type) {
    case 'text':
      return node.text;
    case 'raw':
      return '';
    case 'element':
      return node.children.map(textContent).join('');
  }
}

function openTag(element: ElementNode): string {
  const attributes = element.attributes
    .map(a => a.value === null ? ` ${a.name}` : ` ${a.name}="${escapeAttribute(a.value)}"`)
    .join('');
  return `<${element.tag}${attributes}>`;
}

export function outerHtml(node: HtmlNode): string {
  switch (node.type) {
    case 'text':
      return escapeText(node.text);
    case 'raw':
      return node.html;
    case 'element':
      if (VOID_ELEMENTS.has(node.tag)) {
        return openTag(node);
      }
      return `${openTag(node)}${innerHtml(node)}</${node.tag}>`;
  }
}

export function innerHtml(element: ElementNode): string {
  return serializeHtml(element.children);
}

export function serializeHtml(nodes: readonly HtmlNode[]): string {
  return nodes.map(outerHtml).join('');
}
