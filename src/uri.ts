import { SiteSettings } from './types.js';

/**
 * Generate a URL-safe slug from a name.
 * "James Minahan" -> "james-minahan", "Ballarat (Vic.)" -> "ballarat-vic"
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-') // Any run of non-alphanumerics becomes one hyphen
    .replace(/^-+|-+$/g, '');
}

/**
 * Site-relative path of an entity page, eg. "/book/people/james-minahan/"
 */
export function entityPath(site: SiteSettings, collection: string, name: string): string {
  return `${site.baseUrl}/${collection}/${slugify(name)}/`;
}

/**
 * Absolute URI of an entity, used as its graph identifier.
 */
export function createEntityUri(site: SiteSettings, collection: string, name: string): string {
  return `${site.url}${entityPath(site, collection, name)}`;
}

/**
 * Absolute URI of a narrative page from its site-relative URL.
 */
export function createPageId(site: SiteSettings, pageUrl: string): string {
  return `${site.url}${site.baseUrl}${pageUrl}`;
}
