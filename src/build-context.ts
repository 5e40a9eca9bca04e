import { Advisories } from './advisories.js';
import { RecordStore } from './records.js';
import { TypeRegistry } from './type-registry.js';
import { LodContext, SiteSettings } from './types.js';

export const DEFAULT_CONTEXT = 'http://schema.org/';

/**
 * Everything the core needs for one build, passed explicitly to every stage.
 * The record store and type registry are shared and read-only.
 */
export interface BuildContext {
  records: RecordStore;
  types: TypeRegistry;
  site: SiteSettings;
  advisories: Advisories;
  /** JSON-LD context handed to the codec and embedded in pages */
  lodContext: LodContext;
}

export function createBuildContext(options: {
  records: RecordStore;
  types: TypeRegistry;
  site: SiteSettings;
  advisories?: Advisories;
  lodContext?: LodContext;
}): BuildContext {
  return {
    records: options.records,
    types: options.types,
    site: options.site,
    advisories: options.advisories ?? new Advisories(),
    lodContext: options.lodContext ?? DEFAULT_CONTEXT
  };
}
