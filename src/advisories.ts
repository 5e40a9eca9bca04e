/**
 * Non-fatal build problems. They are collected and logged; none of them
 * stops the build.
 */
export type AdvisoryKind =
  | 'unresolved-reference'
  | 'unconfigured-type'
  | 'missing-image-record'
  | 'unsupported-image-format'
  | 'unresolved-marker'
  | 'duplicate-record'
  | 'invalid-record';

export interface Advisory {
  kind: AdvisoryKind;
  /** The name, file or value the advisory is about */
  subject: string;
  message: string;
}

export type AdvisoryLogger = (message: string) => void;

/**
 * Collects advisories for one build.
 */
export class Advisories {
  private readonly entries: Advisory[] = [];
  private readonly seen = new Set<string>();

  constructor(private readonly log: AdvisoryLogger = message => console.warn(message)) {}

  /**
   * Record an advisory. Repeats of the same advisory are recorded once.
   */
  report(kind: AdvisoryKind, subject: string, message: string): void {
    const key = `${kind}\u0000${subject}\u0000${message}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.entries.push({ kind, subject, message });
    this.log(`[${kind}] ${message}`);
  }

  list(): readonly Advisory[] {
    return this.entries;
  }

  ofKind(kind: AdvisoryKind): Advisory[] {
    return this.entries.filter(entry => entry.kind === kind);
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * An advisory sink that keeps everything but prints nothing.
 */
export function silentAdvisories(): Advisories {
  return new Advisories(() => undefined);
}
