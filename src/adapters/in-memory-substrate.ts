import type { Checkpoint, ExecutionSubstrate, Revertible } from '../contracts';
import { composeRevertible, UnitQueue } from '../core/atomic';

/** The in-process world (ledgers, sink, venue) checkpointed as one unit, with its units run in order. */
export class InMemorySubstrate implements ExecutionSubstrate {
  private parts: Revertible[];
  private readonly queue = new UnitQueue();

  constructor(parts: Revertible[] = []) {
    this.parts = [...parts];
  }

  add(part: Revertible): this {
    this.parts.push(part);
    return this;
  }

  checkpoint(): Checkpoint {
    return composeRevertible(this.parts).checkpoint();
  }

  run<T>(work: () => Promise<T>): Promise<T> {
    return this.queue.run(work);
  }
}
