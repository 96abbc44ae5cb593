import type { Logger, WorldStateSnapshot } from '../types/index.js';
import { fingerprint } from './fingerprint.js';

/**
 * ChangeDetector - remembers the fingerprint of the last snapshot submitted
 * to a successful decision cycle and compares new snapshots against it.
 *
 * The reference only moves forward: an advance tagged with a cycle sequence
 * not newer than the last applied one is ignored.
 */
export class ChangeDetector {
  private reference: string | null = null;
  private referenceSeq = 0;
  private readonly logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.logger = logger?.child({ component: 'change-detector' });
  }

  /**
   * True iff the snapshot's fingerprint differs from the reference.
   * With no reference yet, everything is a change.
   */
  hasChanged(snapshot: WorldStateSnapshot): boolean {
    return this.hasChangedFingerprint(fingerprint(snapshot));
  }

  hasChangedFingerprint(current: string): boolean {
    return current !== this.reference;
  }

  /**
   * Move the reference to `fp` for cycle `cycleSeq`.
   * @returns whether the reference moved
   */
  advance(fp: string, cycleSeq: number): boolean {
    if (cycleSeq <= this.referenceSeq) {
      this.logger?.warn(
        { cycleSeq, referenceSeq: this.referenceSeq },
        'Ignoring out-of-order fingerprint advance'
      );
      return false;
    }
    this.reference = fp;
    this.referenceSeq = cycleSeq;
    this.logger?.debug({ fingerprint: fp.slice(0, 12), cycleSeq }, 'Reference fingerprint advanced');
    return true;
  }

  getReference(): { fingerprint: string | null; cycleSeq: number } {
    return { fingerprint: this.reference, cycleSeq: this.referenceSeq };
  }

  /**
   * Reinstate a persisted reference (startup only).
   */
  restore(fp: string | null, cycleSeq: number): void {
    this.reference = fp;
    this.referenceSeq = cycleSeq;
  }
}

export function createChangeDetector(logger?: Logger): ChangeDetector {
  return new ChangeDetector(logger);
}
