import { Advisories } from './advisories.js';
import { EntityRecord, PropertyValue, ScalarValue } from './types.js';

// Keys that live on the record itself rather than in its properties
const RECORD_KEYS = new Set(['name', 'type', '@type', 'id', '@id']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function toScalar(value: unknown): ScalarValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    // YAML timestamps keep their calendar date
    return value.toISOString().slice(0, 10);
  }
  return null;
}

/**
 * Classify a raw data-file value.
 */
export function toPropertyValue(raw: unknown): PropertyValue {
  if (Array.isArray(raw)) {
    return { kind: 'list', items: raw.map(toPropertyValue) };
  }
  if (isPlainObject(raw)) {
    const properties = new Map<string, PropertyValue>();
    for (const [key, value] of Object.entries(raw)) {
      if (key === 'name' && typeof value === 'string') continue;
      properties.set(key, toPropertyValue(value));
    }
    if (typeof raw['name'] === 'string') {
      return { kind: 'reference', name: raw['name'], properties };
    }
    return { kind: 'object', properties };
  }
  return { kind: 'scalar', value: toScalar(raw) };
}

function stringKey(raw: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

/**
 * Turn one raw entry of the data file into a record, or null when it has no
 * usable name.
 */
export function toEntityRecord(raw: unknown): EntityRecord | null {
  if (!isPlainObject(raw)) return null;
  const name = raw['name'];
  if (typeof name !== 'string' || name.trim() === '') return null;

  const properties = new Map<string, PropertyValue>();
  for (const [key, value] of Object.entries(raw)) {
    if (!RECORD_KEYS.has(key)) {
      properties.set(key, toPropertyValue(value));
    }
  }

  const record: EntityRecord = {
    name,
    type: stringKey(raw, 'type', '@type') ?? '',
    properties
  };
  const id = stringKey(raw, 'id', '@id');
  if (id !== undefined) {
    record.id = id;
  }
  return record;
}

/**
 * Read-only lookup of entity records by exact (case-sensitive) name.
 */
export class RecordStore {
  private readonly byName: Map<string, EntityRecord>;

  constructor(records: Iterable<EntityRecord> = []) {
    this.byName = new Map();
    for (const record of records) {
      if (!this.byName.has(record.name)) {
        this.byName.set(record.name, record);
      }
    }
  }

  /**
   * Build a store from the raw entries of a data file. Entries without a
   * name are skipped; for duplicate names the first entry wins.
   */
  static fromRaw(entries: readonly unknown[], advisories: Advisories): RecordStore {
    const records: EntityRecord[] = [];
    const seen = new Set<string>();

    entries.forEach((entry, index) => {
      const record = toEntityRecord(entry);
      if (!record) {
        advisories.report('invalid-record', `#${index}`, `Record #${index} has no name and was skipped`);
        return;
      }
      if (seen.has(record.name)) {
        advisories.report('duplicate-record', record.name, `Duplicate record name: ${record.name}`);
        return;
      }
      seen.add(record.name);
      records.push(record);
    });

    return new RecordStore(records);
  }

  get(name: string): EntityRecord | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  all(): EntityRecord[] {
    return Array.from(this.byName.values());
  }

  get size(): number {
    return this.byName.size;
  }
}
