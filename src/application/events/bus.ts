import type { AppEvent, AppEventType, EventOf } from './types';
import { log } from '../../utils/logger';

export type Handler<T extends AppEventType> = (ev: EventOf<T>) => void | Promise<void>;
export type Unsubscribe = () => void;

export interface PublishOptions {
  /** Deliver on a later tick (default) or synchronously before publish returns. */
  async?: boolean;
}

export interface EventBus {
  subscribe<T extends AppEventType>(type: T, handler: Handler<T>): Unsubscribe;
  subscribeOnce<T extends AppEventType>(type: T, handler: Handler<T>): Unsubscribe;
  publish(ev: AppEvent, opts?: PublishOptions): void;
  clear(): void;
}

type AnyHandler = (ev: AppEvent) => void | Promise<void>;

export function isEventOf<T extends AppEventType>(ev: AppEvent, type: T): ev is EventOf<T> {
  return ev.type === type;
}

/**
 * In-process publish/subscribe bus keyed by event type.
 * A failing handler is logged under EVENT-BUS and never affects the publisher
 * or the other handlers.
 */
export class InMemoryEventBus implements EventBus {
  private handlers = new Map<AppEventType, Set<AnyHandler>>();

  subscribe<T extends AppEventType>(type: T, handler: Handler<T>): Unsubscribe {
    const wrapped: AnyHandler = (ev) => {
      if (isEventOf(ev, type)) return handler(ev);
    };
    let set = this.handlers.get(type);
    if (!set) { set = new Set(); this.handlers.set(type, set); }
    set.add(wrapped);
    return () => { set?.delete(wrapped); };
  }

  subscribeOnce<T extends AppEventType>(type: T, handler: Handler<T>): Unsubscribe {
    const off = this.subscribe(type, (ev) => {
      off();
      return handler(ev);
    });
    return off;
  }

  publish(ev: AppEvent, opts: PublishOptions = {}): void {
    const set = this.handlers.get(ev.type);
    if (!set || set.size === 0) return;
    const targets = [...set];
    const deliver = () => {
      for (const h of targets) this.invoke(h, ev);
    };
    if (opts.async === false) deliver();
    else setImmediate(deliver);
  }

  clear(): void {
    this.handlers.clear();
  }

  private invoke(h: AnyHandler, ev: AppEvent) {
    try {
      const out = h(ev);
      if (out instanceof Promise) {
        out.catch((e: unknown) => log('ERROR', 'EVENT-BUS', 'handler rejected', { type: ev.type, error: e }));
      }
    } catch (e) {
      log('ERROR', 'EVENT-BUS', 'handler threw', { type: ev.type, error: e });
    }
  }
}

let bus: EventBus = new InMemoryEventBus();

export function getEventBus(): EventBus { return bus; }
export function setEventBus(next: EventBus): void { bus = next; }
