export * from './types.js';
export * from './errors.js';
export { Advisories, silentAdvisories } from './advisories.js';
export type { Advisory, AdvisoryKind, AdvisoryLogger } from './advisories.js';
export { RecordStore, toEntityRecord, toPropertyValue } from './records.js';
export { TypeRegistry } from './type-registry.js';
export { DEFAULT_CONTEXT, createBuildContext } from './build-context.js';
export type { BuildContext } from './build-context.js';
export { compileEntityGraph, entityGraphId, hydrate, hydrateProperty } from './graph-compiler.js';
export { collectReferences, referencedNames, textBlocks } from './reference-index.js';
export { markupBlock, markupLabels } from './label-markup.js';
export { CONTEXT_WORDS, contextString, extractMentions } from './mention-extractor.js';
export { assembleEntityGraph, findMentioningDocument } from './graph-assembler.js';
export type { EntityPage } from './graph-assembler.js';
export { expandMarkers } from './markers.js';
export { renderNarrative } from './renderer.js';
export { renderContentPage } from './content-page.js';
export type { RenderedDocument } from './content-page.js';
export { buildSite } from './site-builder.js';
export type { SiteBuild } from './site-builder.js';
export { JsonLdCodec } from './codec.js';
export type { GraphCodec } from './codec.js';
export { TemplateHelpers } from './template-helpers.js';
export { encodeSite, writeSite } from './site-writer.js';
export type { SiteFile } from './site-writer.js';
export { loadConfig, parseConfig } from './config.js';
export type { LodbookConfig } from './config.js';
export { loadNarratives, loadRecordData, loadSite } from './loader.js';
