import { Advisory } from './advisories.js';
import { BuildContext } from './build-context.js';
import { RenderedDocument, renderContentPage } from './content-page.js';
import { EntityPage, assembleEntityGraph, findMentioningDocument } from './graph-assembler.js';
import { compileEntityGraph, entityGraphId } from './graph-compiler.js';
import { extractMentions } from './mention-extractor.js';
import { EntityRecord, Mention, MentionedByEntry, NarrativeDocument } from './types.js';
import { entityPath } from './uri.js';

/**
 * Result of building a site
 */
export interface SiteBuild {
  documents: RenderedDocument[];
  entities: EntityPage[];
  advisories: readonly Advisory[];
}

/**
 * Set up the page for one record. A record whose type is not configured gets
 * no page; the build carries on without it.
 */
export function createEntityPage(record: EntityRecord, context: BuildContext): EntityPage | undefined {
  const typeConfig = context.types.resolve(record.type);
  if (!typeConfig) {
    context.advisories.report('unconfigured-type', record.type, `Type not configured: ${record.type}`);
    return undefined;
  }

  return {
    name: record.name,
    collection: typeConfig.collection,
    template: typeConfig.template,
    url: entityPath(context.site, typeConfig.collection, record.name),
    id: entityGraphId(record, context),
    graph: compileEntityGraph(record, context),
    contexts: []
  };
}

/**
 * Gather back-references and mentions of one entity from every rendered
 * document, then fold them into its page.
 */
export function enrichEntityPage(page: EntityPage, documents: readonly RenderedDocument[]): EntityPage {
  const mentionedBy: MentionedByEntry[] = [];
  const mentions: Mention[] = [];

  for (const document of documents) {
    const entry = findMentioningDocument(document, page.id);
    if (!entry) continue;
    mentionedBy.push(entry);
    mentions.push(...extractMentions(document, page.name));
  }

  assembleEntityGraph(page, mentionedBy, mentions);
  return page;
}

/**
 * Build every narrative and entity page.
 *
 * Two phases: all documents are rendered and marked up first, and only then
 * are entity pages assembled, since each entity needs to see every document.
 */
export function buildSite(documents: readonly NarrativeDocument[], context: BuildContext): SiteBuild {
  // Phase 1: documents reach their final form
  const rendered = documents.map(document => renderContentPage(document, context));

  // Phase 2: entities, each assembled exactly once
  const entities: EntityPage[] = [];
  for (const record of context.records.all()) {
    const page = createEntityPage(record, context);
    if (page) {
      entities.push(enrichEntityPage(page, rendered));
    }
  }

  return { documents: rendered, entities, advisories: context.advisories.list() };
}
