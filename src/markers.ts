import { BuildContext } from './build-context.js';
import { escapeAttribute } from './html-tree.js';
import { entityPath } from './uri.js';

/**
 * Explicit markers in narrative markdown:
 *
 *   {% lod James Minahan %}Minahan{% endlod %}   link "Minahan" to the record "James Minahan"
 *   {% lod %}James Minahan{% endlod %}           the content is the record name
 *   {% lod_ignore %}James{% endlod_ignore %}     never auto-link this content
 */
const LOD_MARKER = /\{%\s*lod(?=[\s%])([^%]*?)\s*%\}([\s\S]*?)\{%\s*endlod\s*%\}/g;
const IGNORE_MARKER = /\{%\s*lod_ignore\s*%\}([\s\S]*?)\{%\s*endlod_ignore\s*%\}/g;

export const LINK_CLASS = 'lod-link';
export const IGNORE_CLASS = 'lod-ignore';

/**
 * Opening tag of an entity link. Explicit markers and the label markup pass
 * produce identical tags.
 */
export function linkOpenTag(name: string, collection: string, url: string): string {
  return `<a class="${LINK_CLASS}" data-name="${escapeAttribute(name)}"`
    + ` data-collection="${escapeAttribute(collection)}" property="name"`
    + ` href="${escapeAttribute(url)}">`;
}

/**
 * Render one explicit marker. When the name cannot be resolved the content is
 * returned unlinked.
 */
export function renderLodMarker(explicitName: string, content: string, context: BuildContext): string {
  const name = explicitName.trim() || content.trim();
  if (!name) {
    context.advisories.report('unresolved-marker', content, 'Empty lod marker');
    return content;
  }

  const record = context.records.get(name);
  if (!record) {
    context.advisories.report('unresolved-marker', name, `${name} not found`);
    return content;
  }

  const typeConfig = context.types.resolve(record.type);
  if (!typeConfig) {
    context.advisories.report('unresolved-marker', name, `${name} has an unconfigured type: ${record.type}`);
    return content;
  }

  const url = entityPath(context.site, typeConfig.collection, name);
  return `${linkOpenTag(name, typeConfig.collection, url)}${content}</a>`;
}

export function renderIgnoreMarker(content: string): string {
  return `<span class="${IGNORE_CLASS}">${content}</span>`;
}

/**
 * Expand every marker in a markdown source into inline HTML.
 */
export function expandMarkers(markdown: string, context: BuildContext): string {
  return markdown
    .replace(LOD_MARKER, (_match, name: string, content: string) => renderLodMarker(name, content, context))
    .replace(IGNORE_MARKER, (_match, content: string) => renderIgnoreMarker(content));
}
