export * from './types';
export * from './bus';
export { AuditLog } from './audit-log';
export { registerLoggerSubscriber } from './subscribers/logger-subscriber';
export { registerStatsSubscriber, getCurveStats, resetCurveStats, type CurveStats } from './subscribers/stats-subscriber';

import type { Unsubscribe } from './bus';
import { registerLoggerSubscriber } from './subscribers/logger-subscriber';
import { registerStatsSubscriber } from './subscribers/stats-subscriber';

export function registerAllSubscribers(): Unsubscribe {
  const offs = [registerLoggerSubscriber(), registerStatsSubscriber()];
  return () => { for (const off of offs) off(); };
}
