import { format, isValid, parse } from 'date-fns';
import * as path from 'node:path';
import { BuildContext } from './build-context.js';
import { CollectionStyle } from './config.js';
import { RenderedDocument, documentName } from './content-page.js';
import { EntityPage } from './graph-assembler.js';
import { escapeAttribute, escapeText } from './html-tree.js';
import { EntityRecord, GraphNode, GraphValue, Mention } from './types.js';
import { createEntityUri, entityPath } from './uri.js';

// Input pattern -> display pattern, most specific first
const DATE_FORMATS: ReadonlyArray<[string, string]> = [
  ['yyyy-MM-dd', 'd MMMM yyyy'],
  ['yyyy-MM', 'MMMM yyyy']
];

const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.gif']);
const UNSUPPORTED_IMAGE_EXTENSIONS = new Set(['.tif', '.tiff', '.pdf']);

// Graph keys rendered by the page layout itself rather than as property lists
const LAYOUT_KEYS = new Set(['name', '@type', '@id', 'mainEntityOfPage', 'mentionedBy', 'image']);

const HTTP_URL = /^https?:/;

function isNode(value: GraphValue | undefined): value is GraphNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nodeString(node: GraphNode, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = node[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function scalarText(value: GraphValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function capitalize(label: string): string {
  return label.charAt(0).toUpperCase() + label.slice(1).toLowerCase();
}

/**
 * Helpers used by the page layouts. Each instance is bound to one build.
 */
export class TemplateHelpers {
  constructor(private readonly context: BuildContext) {}

  /**
   * Absolute URI of an entity page.
   */
  lodUrl(name: string, collection: string): string {
    return createEntityUri(this.context.site, collection, name);
  }

  /**
   * Collection a record is published in, if its type is configured.
   */
  collectionOf(record: EntityRecord): string | undefined {
    return this.context.types.resolve(record.type)?.collection;
  }

  /**
   * Resolve an image to a file name. Images are referenced by the name of
   * an image record, or given directly as a file name.
   */
  imageLink(image: GraphValue | undefined): string | undefined {
    if (isNode(image)) {
      return this.findImageFile(image);
    }
    if (typeof image === 'string') {
      return this.checkExtension(image);
    }
    return undefined;
  }

  private checkExtension(image: string): string | undefined {
    const extension = path.extname(image).toLowerCase();
    if (IMAGE_EXTENSIONS.has(extension)) {
      return image;
    }
    if (UNSUPPORTED_IMAGE_EXTENSIONS.has(extension)) {
      this.context.advisories.report('unsupported-image-format', image, `Image not processed: ${image}`);
    }
    return undefined;
  }

  private findImageFile(image: GraphNode): string | undefined {
    const name = nodeString(image, 'name');
    if (!name) return undefined;

    const file = this.context.records.get(name)?.properties.get('image');
    if (file?.kind === 'scalar' && typeof file.value === 'string') {
      return file.value;
    }
    this.context.advisories.report('missing-image-record', name, `Image not found: ${name}`);
    return undefined;
  }

  /**
   * "1901-03-05" -> "5 March 1901", "1901-03" -> "March 1901". Anything else
   * is returned unchanged.
   */
  formatDate(date: string): string {
    for (const [input, output] of DATE_FORMATS) {
      const parsed = parse(date, input, new Date());
      if (isValid(parsed)) {
        return format(parsed, output);
      }
    }
    return date;
  }

  /**
   * A value as inline HTML: linked where it names a record or carries an id.
   */
  lodItem(value: GraphValue): string {
    if (!isNode(value)) {
      return escapeText(scalarText(value));
    }
    const name = nodeString(value, 'name');
    const id = nodeString(value, '@id', 'id');
    if (id !== undefined) {
      return `<a href="${escapeAttribute(id)}">${escapeText(name ?? id)}</a>`;
    }
    if (name !== undefined) {
      return this.recordLink(name);
    }
    return '';
  }

  private recordLink(name: string): string {
    const record = this.context.records.get(name);
    const typeConfig = record && this.context.types.resolve(record.type);
    if (!typeConfig) {
      return escapeText(name);
    }
    const href = entityPath(this.context.site, typeConfig.collection, name);
    return `<a href="${escapeAttribute(href)}">${escapeText(name)}</a>`;
  }

  private listItems(value: GraphValue): string {
    if (isNode(value)) {
      if (nodeString(value, 'name', '@id', 'id') !== undefined) {
        return `<li>${this.lodItem(value)}</li>\n`;
      }
      // A nested object without a name or id: list its properties
      return Object.entries(value)
        .map(([key, child]) => `<li>${escapeText(key)}: ${escapeText(scalarText(child))}</li>\n`)
        .join('');
    }
    const text = scalarText(value);
    if (HTTP_URL.test(text)) {
      return `<li><a href="${escapeAttribute(text)}">${escapeText(text)}</a></li>\n`;
    }
    return `<li>${escapeText(text)}</li>\n`;
  }

  /**
   * A titled HTML list of one property's values. Renders nothing for a
   * missing value.
   */
  lodList(list: GraphValue | undefined, label: string): string {
    if (list === undefined || list === null) return '';

    const items = Array.isArray(list) ? list : [list];
    return `<h4 class="title lod-list-title">${escapeText(capitalize(label))}</h4>\n`
      + '<ul class="lod-list">\n'
      + items.map(item => this.listItems(item)).join('')
      + '</ul>\n';
  }

  /**
   * Colour rules for each collection, for the theme to use.
   */
  collectionStyles(collections: readonly CollectionStyle[]): string {
    return collections.map(({ name, color }) => (
      `.${name} { background-color: ${color}; border-color: ${color}}\n`
      + `.${name}.inverse { background-color: #ffffff; color: ${color}}\n`
    )).join('');
  }

  private layout(title: string, bodyClass: string, head: string, body: string, collections: readonly CollectionStyle[]): string {
    const styles = collections.length > 0
      ? `<style type="text/css">${this.collectionStyles(collections)}</style>\n`
      : '';
    return '<!DOCTYPE html>\n'
      + '<html lang="en">\n'
      + '<head>\n'
      + '<meta charset="utf-8">\n'
      + `<title>${escapeText(title)}</title>\n`
      + styles
      + head
      + '</head>\n'
      + `<body class="${escapeAttribute(bodyClass)}">\n`
      + body
      + '</body>\n'
      + '</html>\n';
  }

  private mentionItem(mention: Mention): string {
    const title = mention.documentChapter === null
      ? mention.documentTitle
      : `Chapter ${mention.documentChapter}: ${mention.documentTitle}`;
    const href = `${this.context.site.baseUrl}${mention.documentUrl}#para-${mention.paragraphId}`;
    return `<li><a href="${escapeAttribute(href)}">${escapeText(title)}</a>: ${mention.contextString}</li>\n`;
  }

  private propertyRows(graph: GraphNode): string {
    let rows = '';
    let lists = '';
    for (const [key, value] of Object.entries(graph)) {
      if (LAYOUT_KEYS.has(key)) continue;
      if (Array.isArray(value) || isNode(value)) {
        lists += this.lodList(value, key);
      } else if (value !== null) {
        const text = typeof value === 'string' ? this.formatDate(value) : String(value);
        rows += `<dt>${escapeText(key)}</dt><dd>${escapeText(text)}</dd>\n`;
      }
    }
    return (rows ? `<dl class="lod-properties">\n${rows}</dl>\n` : '') + lists;
  }

  /**
   * Full HTML page for an entity. `jsonld` is the compacted graph, embedded
   * for machine readers.
   */
  renderEntityPage(page: EntityPage, jsonld: string, collections: readonly CollectionStyle[] = []): string {
    const image = this.imageLink(page.graph['image']);
    const mentionedBy = page.graph['mentionedBy'];

    let body = `<article class="entity ${escapeAttribute(page.collection)}">\n`
      + `<h1>${escapeText(page.name)}</h1>\n`;
    if (image) {
      body += `<img class="lod-image" src="${escapeAttribute(image)}" alt="${escapeAttribute(page.name)}">\n`;
    }
    body += this.propertyRows(page.graph);
    if (mentionedBy !== undefined) {
      body += this.lodList(mentionedBy, 'mentioned by');
    }
    if (page.contexts.length > 0) {
      body += '<section class="mentions">\n<h2>Mentions</h2>\n<ul>\n'
        + page.contexts.map(mention => this.mentionItem(mention)).join('')
        + '</ul>\n</section>\n';
    }
    body += '</article>\n';

    const head = `<script type="application/ld+json">\n${jsonld.replace(/</g, '\\u003c')}\n</script>\n`;
    return this.layout(page.name, page.template, head, body, collections);
  }

  /**
   * Full HTML page for a narrative document. Its page-data script is already
   * part of the rendered body.
   */
  renderDocumentPage(document: RenderedDocument, collections: readonly CollectionStyle[] = []): string {
    const title = documentName(document.source);
    const body = `<article class="document">\n<h1>${escapeText(title)}</h1>\n${document.html}\n</article>\n`;
    return this.layout(title, 'document', '', body, collections);
  }
}
