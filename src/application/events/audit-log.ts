import type { Checkpoint, Revertible } from '../../contracts';
import type { CurveEvent } from './types';

/**
 * Append-only record of committed curve events.
 * `seq` starts at 1 and increases by one per appended record, across all assets
 * sharing the log.
 */
export class AuditLog implements Revertible {
  private records: CurveEvent[] = [];
  private nextSeq = 1;

  append<E extends CurveEvent>(ev: E): E {
    const committed: E = { ...ev, seq: this.nextSeq++ };
    this.records.push(committed);
    return committed;
  }

  get size(): number { return this.records.length; }

  get lastSeq(): number { return this.nextSeq - 1; }

  /** Copy of the records, optionally filtered by asset and/or type. */
  list(filter: { asset?: string; type?: CurveEvent['type'] } = {}): CurveEvent[] {
    return this.records.filter(r =>
      (filter.asset === undefined || r.asset === filter.asset) &&
      (filter.type === undefined || r.type === filter.type));
  }

  since(seq: number): CurveEvent[] {
    return this.records.filter(r => r.seq > seq);
  }

  /** Drops records appended after the checkpoint; sequence numbers are reused. */
  checkpoint(): Checkpoint {
    const length = this.records.length;
    const nextSeq = this.nextSeq;
    return {
      revert: () => {
        this.records = this.records.slice(0, length);
        this.nextSeq = nextSeq;
      },
    };
  }
}
