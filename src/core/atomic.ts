import { AsyncLocalStorage } from 'async_hooks';
import type { Checkpoint, Revertible } from '../contracts';
import { CurveError } from '../application/errors';

/** Treat several revertibles as one; their checkpoints are reverted newest first. */
export function composeRevertible(parts: Revertible[]): Revertible {
  return {
    checkpoint(): Checkpoint {
      const taken = parts.map(p => p.checkpoint());
      return {
        revert() {
          for (let i = taken.length - 1; i >= 0; i--) taken[i].revert();
        },
      };
    },
  };
}

/**
 * Run `work` as one all-or-nothing unit: every participant is checkpointed
 * first and, if `work` throws or rejects, reverted before the error is rethrown.
 */
export async function atomically<T>(participants: Revertible[], work: () => Promise<T>): Promise<T> {
  const checkpoint = composeRevertible(participants).checkpoint();
  try {
    return await work();
  } catch (e) {
    checkpoint.revert();
    throw e;
  }
}

/** Async-context marker for a running unit; closed once the unit settles. */
interface UnitScope {
  readonly operation: string;
  open: boolean;
}

// Callbacks scheduled from inside a unit (bus deliveries) inherit its context
// but run after it ends, so only an open scope counts as "inside".
async function runScoped<T>(storage: AsyncLocalStorage<UnitScope>, operation: string, work: () => Promise<T>): Promise<T> {
  const scope: UnitScope = { operation, open: true };
  try {
    return await storage.run(scope, work);
  } finally {
    scope.open = false;
  }
}

function openScope(storage: AsyncLocalStorage<UnitScope>): UnitScope | undefined {
  const scope = storage.getStore();
  return scope?.open ? scope : undefined;
}

/**
 * Runs units of work one after another. A unit started from inside a running
 * unit joins it and runs inline, since queueing it would wait on its own caller.
 */
export class UnitQueue {
  private tail: Promise<void> = Promise.resolve();
  private readonly scope = new AsyncLocalStorage<UnitScope>();

  get inUnit(): boolean { return openScope(this.scope) !== undefined; }

  run<T>(work: () => Promise<T>): Promise<T> {
    if (this.inUnit) return work();
    const next = this.tail.then(() => runScoped(this.scope, 'unit', work));
    // the caller observes the rejection through `next`; the chain only needs to settle
    this.tail = next.then(() => undefined, () => undefined);
    return next;
  }
}

/**
 * Re-entry guard for mutating entry points. The operation name is bound to the
 * async context of the running unit, so only calls made from inside it are
 * rejected; independent callers are ordered by the {@link UnitQueue} instead.
 */
export class BusyFlag {
  private readonly scope = new AsyncLocalStorage<UnitScope>();
  private running = 0;

  get busy(): boolean { return this.running > 0; }

  async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    const current = openScope(this.scope);
    if (current) {
      throw new CurveError('REENTRANCY_REJECTED', `${operation} rejected while ${current.operation} is in progress`, {
        detail: { operation, inProgress: current.operation },
      });
    }
    this.running++;
    try {
      return await runScoped(this.scope, operation, work);
    } finally {
      this.running--;
    }
  }
}
