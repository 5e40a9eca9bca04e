import * as fs from 'node:fs';
import * as path from 'node:path';
import matter from 'gray-matter';
import YAML from 'yaml';
import { Advisories } from './advisories.js';
import { BuildContext, DEFAULT_CONTEXT, createBuildContext } from './build-context.js';
import { GraphCodec } from './codec.js';
import { LodbookConfig, resolvePath } from './config.js';
import { DataSourceError } from './errors.js';
import { RecordStore } from './records.js';
import { TypeRegistry } from './type-registry.js';
import { GraphValue, LodContext, NarrativeDocument } from './types.js';
import { slugify } from './uri.js';

/**
 * Options for loading narrative files
 */
export interface LoadOptions {
  /** Directory to scan for .md files */
  contentDir: string;
  /** Whether to include _*.md drafts (default: false) */
  includeDrafts?: boolean;
}

/**
 * Result of loading the record data file
 */
export interface RecordData {
  /** Raw entries, one per record */
  entries: unknown[];
  /** Context to publish with */
  context: LodContext;
}

/**
 * Everything needed to build a site
 */
export interface LoadResult {
  context: BuildContext;
  documents: NarrativeDocument[];
  /** Any errors encountered while reading narrative files */
  errors: string[];
}

/**
 * Check if a filename is a draft (starts with _)
 */
function isDraftFile(filename: string): boolean {
  return path.basename(filename).startsWith('_');
}

/**
 * Find all markdown files in a directory (non-recursive), sorted by name
 */
function findMarkdownFiles(dir: string, includeDrafts: boolean): string[] {
  const files: string[] = [];

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    throw new DataSourceError(`Cannot read content directory: ${err instanceof Error ? err.message : String(err)}`, dir);
  }

  for (const entry of entries) {
    if (entry.isFile() && entry.name.endsWith('.md')) {
      if (includeDrafts || !isDraftFile(entry.name)) {
        files.push(path.join(dir, entry.name));
      }
    }
  }

  return files.sort();
}

function frontMatterString(value: unknown): string | null {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Parse one narrative file: front matter (title, chapter, permalink) plus a
 * markdown body.
 */
export function parseNarrative(content: string, documentId: string, collectionDir: string): NarrativeDocument {
  const parsed = matter(content);
  const data: Record<string, unknown> = parsed.data;
  const baseName = documentId.replace(/\.md$/, '');

  const permalink = frontMatterString(data['permalink']);
  const url = permalink
    ? `/${permalink.replace(/^\/+|\/+$/g, '')}/`
    : `/${slugify(collectionDir)}/${slugify(baseName)}/`;

  return {
    documentId,
    title: frontMatterString(data['title']) ?? baseName,
    chapter: frontMatterString(data['chapter']),
    url,
    markdown: parsed.content
  };
}

/**
 * Load and parse all narrative files from a directory
 */
export function loadNarratives(options: LoadOptions): { documents: NarrativeDocument[]; errors: string[] } {
  const { contentDir, includeDrafts = false } = options;
  const documents: NarrativeDocument[] = [];
  const errors: string[] = [];
  const collectionDir = path.basename(path.resolve(contentDir));

  for (const filePath of findMarkdownFiles(contentDir, includeDrafts)) {
    const documentId = path.basename(filePath);
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      documents.push(parseNarrative(content, documentId, collectionDir));
    } catch (err) {
      errors.push(`Failed to read ${documentId}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { documents, errors };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDataFile(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new DataSourceError(`Cannot read data file: ${err instanceof Error ? err.message : String(err)}`, file);
  }

  const extension = path.extname(file).toLowerCase();
  try {
    if (extension === '.yml' || extension === '.yaml') {
      const parsed: unknown = YAML.parse(text);
      return parsed;
    }
    if (extension === '.json' || extension === '.jsonld') {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    }
  } catch (err) {
    throw new DataSourceError(`Cannot parse data file: ${err instanceof Error ? err.message : String(err)}`, file);
  }
  throw new DataSourceError(`Unsupported data file type: ${extension}`, file);
}

/**
 * Pick the context to publish with: the configured one, else the data file's
 * own @context, else schema.org.
 */
export function selectContext(configured: LodContext | undefined, data: unknown): LodContext {
  if (configured !== undefined) return configured;
  if (isObject(data)) {
    const own = data['@context'];
    if (typeof own === 'string') return own;
    if (isObject(own)) return toLodContext(own);
  }
  return DEFAULT_CONTEXT;
}

function toLodContext(raw: Record<string, unknown>): LodContext {
  const context: { [key: string]: GraphValue } = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || value === null) {
      context[key] = value;
    } else if (isObject(value)) {
      context[key] = toLodContext(value);
    }
  }
  return context;
}

/**
 * Read the record data file. A plain list of records is used as is; a JSON-LD
 * document with @graph is compacted against the chosen context first.
 */
export async function loadRecordData(
  file: string,
  configuredContext: LodContext | undefined,
  codec: GraphCodec
): Promise<RecordData> {
  const data = parseDataFile(file);
  const context = selectContext(configuredContext, data);

  if (Array.isArray(data)) {
    return { entries: data, context };
  }
  if (isObject(data) && '@graph' in data) {
    const compacted = await codec.compactData(data, context);
    const graph: unknown = compacted['@graph'];
    if (Array.isArray(graph)) return { entries: graph, context };
    // A graph of one node compacts to the node itself
    const { '@context': _context, ...node } = compacted;
    return { entries: [node], context };
  }
  throw new DataSourceError('Data file must hold a list of records or a JSON-LD @graph', file);
}

/**
 * Load everything a build needs according to the config.
 */
export async function loadSite(
  config: LodbookConfig,
  codec: GraphCodec,
  advisories: Advisories = new Advisories()
): Promise<LoadResult> {
  const recordData = await loadRecordData(resolvePath(config, config.source.data), config.source.context, codec);
  const records = RecordStore.fromRaw(recordData.entries, advisories);

  const { documents, errors } = loadNarratives({ contentDir: resolvePath(config, config.contentDir) });

  const context = createBuildContext({
    records,
    types: new TypeRegistry(config.dataTypes),
    site: { url: config.url, baseUrl: config.baseUrl },
    advisories,
    lodContext: recordData.context
  });

  return { context, documents, errors };
}
