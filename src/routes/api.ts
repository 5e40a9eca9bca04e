import { Router, Request, Response } from 'express';
import * as path from 'node:path';
import { Advisory } from '../advisories.js';
import { RenderedDocument } from '../content-page.js';
import { EntityPage } from '../graph-assembler.js';
import { SiteBuild } from '../site-builder.js';
import { slugify } from '../uri.js';

export interface EntitySummary {
  name: string;
  collection: string;
  url: string;
  id: string;
}

export interface DocumentSummary {
  slug: string;
  title: string;
  chapter: string | null;
  url: string;
}

export interface EntityQuery {
  collection?: string;
  limit?: number;
}

export function documentSlug(document: RenderedDocument): string {
  return path.posix.basename(document.url);
}

/**
 * List entities, optionally filtered by collection and limited in number
 */
export function listEntities(build: SiteBuild, query: EntityQuery = {}): EntitySummary[] {
  let entities = build.entities;
  if (query.collection) {
    entities = entities.filter(e => e.collection === query.collection);
  }
  if (query.limit !== undefined && query.limit > 0) {
    entities = entities.slice(0, query.limit);
  }
  return entities.map(e => ({ name: e.name, collection: e.collection, url: e.url, id: e.id }));
}

export function findEntity(build: SiteBuild, collection: string, slug: string): EntityPage | undefined {
  return build.entities.find(e => e.collection === collection && slugify(e.name) === slug);
}

export function listDocuments(build: SiteBuild): DocumentSummary[] {
  return build.documents.map(d => ({
    slug: documentSlug(d),
    title: d.title,
    chapter: d.chapter,
    url: d.url
  }));
}

export function findDocument(build: SiteBuild, slug: string): RenderedDocument | undefined {
  return build.documents.find(d => documentSlug(d) === slug);
}

function parseLimit(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const n = parseInt(value, 10);
  return !isNaN(n) && n > 0 ? n : undefined;
}

/**
 * Create API routes over a built site
 */
export function createApiRoutes(build: SiteBuild): Router {
  const router = Router();

  /**
   * GET /api/entities
   * Query params: ?collection=people&limit=10
   */
  router.get('/entities', (req: Request, res: Response) => {
    const { collection } = req.query;
    res.json(listEntities(build, {
      collection: typeof collection === 'string' ? collection : undefined,
      limit: parseLimit(req.query.limit)
    }));
  });

  /**
   * GET /api/entity/:collection/:slug
   * The entity's graph and mention contexts
   */
  router.get('/entity/:collection/:slug', (req: Request, res: Response) => {
    const { collection, slug } = req.params;
    const entity = findEntity(build, collection, slug);

    if (!entity) {
      res.status(404).json({ error: `Entity not found: ${collection}/${slug}` });
      return;
    }

    res.json(entity);
  });

  /**
   * GET /api/documents
   */
  router.get('/documents', (_req: Request, res: Response) => {
    res.json(listDocuments(build));
  });

  /**
   * GET /api/document/:slug
   * A rendered document with its graph
   */
  router.get('/document/:slug', (req: Request, res: Response) => {
    const { slug } = req.params;
    const document = findDocument(build, slug);

    if (!document) {
      res.status(404).json({ error: `Document not found: ${slug}` });
      return;
    }

    res.json({
      slug,
      title: document.title,
      chapter: document.chapter,
      url: document.url,
      id: document.id,
      graph: document.graph,
      html: document.html
    });
  });

  /**
   * GET /api/advisories
   */
  router.get('/advisories', (_req: Request, res: Response) => {
    const advisories: readonly Advisory[] = build.advisories;
    res.json(advisories);
  });

  return router;
}
