import { vi, expect } from 'vitest';

type CapturedLevel = 'WARN' | 'ERROR' | 'INFO' | 'DEBUG';

export interface CapturedLog {
  level: CapturedLevel;
  category?: string;
  message: string;
  data?: Record<string, unknown>;
}

export function setupJsonLogs() {
  process.env.TEST_MODE = '0';
  process.env.LOG_JSON = '1';
  process.env.LOG_LEVEL = 'DEBUG';
}

function isCapturedLevel(v: string): v is CapturedLevel {
  return v === 'WARN' || v === 'ERROR' || v === 'INFO' || v === 'DEBUG';
}

function parseLine(line: unknown): CapturedLog | null {
  try {
    const e: unknown = JSON.parse(String(line));
    if (typeof e !== 'object' || e === null) return null;
    const level = 'level' in e ? String(e.level) : '';
    const message = 'message' in e ? String(e.message) : '';
    if (!isCapturedLevel(level) || !message) return null;
    const category = 'category' in e && typeof e.category === 'string' ? e.category : undefined;
    const first = 'data' in e && Array.isArray(e.data) ? e.data[0] : undefined;
    return {
      level,
      category,
      message,
      data: typeof first === 'object' && first !== null ? first : undefined,
    };
  } catch {
    return null;
  }
}

/** Collects JSON log lines written to the console; nothing reaches the terminal. */
export function captureLogs() {
  const logs: CapturedLog[] = [];
  const sink = (line: unknown) => {
    const entry = parseLine(line);
    if (entry) logs.push(entry);
  };
  vi.spyOn(console, 'log').mockImplementation(sink);
  vi.spyOn(console, 'warn').mockImplementation(sink);
  vi.spyOn(console, 'error').mockImplementation(sink);
  return logs;
}

export function expectJsonLog(logs: CapturedLog[], category: string, level: CapturedLevel, msgIncludes?: string, metaKeys?: string[]) {
  const hit = logs.find(l => l.category === category && l.level === level && (!msgIncludes || l.message.includes(msgIncludes)));
  expect(hit, `expected log ${category}/${level} containing '${msgIncludes}'`).toBeTruthy();
  if (hit && metaKeys && metaKeys.length) {
    for (const k of metaKeys) expect(hit.data, `missing meta ${k}`).toHaveProperty(k);
  }
  return hit;
}

/** Let handlers queued with setImmediate run. */
export function flushBus(): Promise<void> {
  return new Promise(r => setImmediate(r));
}
