import { performance } from 'node:perf_hooks';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: readonly TraceLevel[] = ['error', 'warn', 'info', 'debug'];

export function isTraceEnabled(): boolean {
  const v = process.env.TOOLPROBE_TRACE;
  return v === '1' || v === 'true' || v === 'yes';
}

function traceLevel(): TraceLevel {
  const v = (process.env.TOOLPROBE_TRACE_LEVEL ?? '').toLowerCase();
  return LEVELS.find((l) => l === v) ?? 'info';
}

export function shouldTrace(level: TraceLevel): boolean {
  return isTraceEnabled() && LEVELS.indexOf(level) <= LEVELS.indexOf(traceLevel());
}

type TracePayload = {
  t: number;
  pid: number;
  level: TraceLevel;
  event: string;
  data?: unknown;
  ms?: number;
};

function round(n: number) {
  return Number(n.toFixed(3));
}

function emit(level: TraceLevel, event: string, data: unknown, ms?: number) {
  const payload: TracePayload = { t: round(performance.now()), pid: process.pid, level, event };
  if (data !== undefined) payload.data = data;
  if (ms !== undefined) payload.ms = ms;

  // eslint-disable-next-line no-console
  console.log('[toolprobe:trace]', JSON.stringify(payload));
}

export function trace(level: TraceLevel, event: string, data?: unknown) {
  if (shouldTrace(level)) emit(level, event, data);
}

/**
 * Runs `fn` and traces `event` at info level with its duration in `ms`.
 * A throw is traced at error level and rethrown.
 */
export function traceSpan<T>(event: string, data: Record<string, unknown>, fn: () => T): T {
  if (!shouldTrace('error')) return fn();
  const start = performance.now();
  try {
    const result = fn();
    if (shouldTrace('info')) emit('info', event, data, round(performance.now() - start));
    return result;
  } catch (err) {
    emit('error', event, { ...data, failed: true }, round(performance.now() - start));
    throw err;
  }
}

export function traceError(event: string, data?: unknown) {
  trace('error', event, data);
}

export function traceWarn(event: string, data?: unknown) {
  trace('warn', event, data);
}

export function traceInfo(event: string, data?: unknown) {
  trace('info', event, data);
}

export function traceDebug(event: string, data?: unknown) {
  trace('debug', event, data);
}
