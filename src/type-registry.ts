import { TypeConfig } from './types.js';

/**
 * Maps the type tags used in the data file to their published form.
 */
export class TypeRegistry {
  private readonly types: Map<string, TypeConfig>;

  constructor(types: Record<string, TypeConfig> | Map<string, TypeConfig> = {}) {
    this.types = types instanceof Map ? new Map(types) : new Map(Object.entries(types));
  }

  resolve(tag: string): TypeConfig | undefined {
    return this.types.get(tag);
  }

  isConfigured(tag: string): boolean {
    return this.types.has(tag);
  }

  /**
   * Canonical graph type, or the raw tag when it is not configured
   */
  graphType(tag: string): string {
    return this.types.get(tag)?.type ?? tag;
  }

  /**
   * Output collection, or the raw tag when it is not configured
   */
  collection(tag: string): string {
    return this.types.get(tag)?.collection ?? tag;
  }

  collections(): string[] {
    return Array.from(new Set(Array.from(this.types.values(), config => config.collection)));
  }
}
