import fs from 'fs-extra';
import * as path from 'node:path';
import { BuildContext } from './build-context.js';
import { GraphCodec } from './codec.js';
import { CollectionStyle } from './config.js';
import { SiteBuild } from './site-builder.js';
import { TemplateHelpers } from './template-helpers.js';
import { GraphNode } from './types.js';

/**
 * One output file, relative to the output directory.
 */
export interface SiteFile {
  path: string;
  content: string;
}

export interface EncodeOptions {
  codec: GraphCodec;
  collections?: readonly CollectionStyle[];
}

/**
 * Output directory of a page, from its site-relative URL. The base URL is
 * where the site is served, not where its files live.
 */
export function pageDirectory(url: string, baseUrl: string): string {
  const relative = baseUrl && url.startsWith(`${baseUrl}/`) ? url.slice(baseUrl.length) : url;
  return relative.replace(/^\/+/, '');
}

async function encodeGraph(
  directory: string,
  graph: GraphNode,
  renderHtml: (jsonld: string) => string,
  context: BuildContext,
  codec: GraphCodec
): Promise<SiteFile[]> {
  const jsonld = JSON.stringify(await codec.compact(graph, context.lodContext), null, 2);
  const turtle = await codec.toTurtle(graph, context.lodContext);
  return [
    { path: path.posix.join(directory, 'index.html'), content: renderHtml(jsonld) },
    { path: path.posix.join(directory, 'index.json'), content: `${jsonld}\n` },
    { path: path.posix.join(directory, 'index.ttl'), content: turtle }
  ];
}

/**
 * Produce every file of a built site: HTML, compacted JSON-LD and Turtle for
 * each narrative and entity page.
 */
export async function encodeSite(build: SiteBuild, context: BuildContext, options: EncodeOptions): Promise<SiteFile[]> {
  const helpers = new TemplateHelpers(context);
  const collections = options.collections ?? [];
  const files: SiteFile[] = [];

  for (const document of build.documents) {
    const directory = pageDirectory(document.url, '');
    const render = () => helpers.renderDocumentPage(document, collections);
    files.push(...await encodeGraph(directory, document.graph, render, context, options.codec));
  }

  for (const entity of build.entities) {
    const directory = pageDirectory(entity.url, context.site.baseUrl);
    const render = (jsonld: string) => helpers.renderEntityPage(entity, jsonld, collections);
    files.push(...await encodeGraph(directory, entity.graph, render, context, options.codec));
  }

  return files;
}

/**
 * Write encoded files under the output directory.
 */
export async function writeSite(files: readonly SiteFile[], outputDir: string): Promise<void> {
  await fs.emptyDir(outputDir);
  for (const file of files) {
    await fs.outputFile(path.join(outputDir, file.path), file.content, 'utf-8');
  }
  console.log(`Wrote ${files.length} files to ${outputDir}`);
}
