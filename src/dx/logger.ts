export type LogLevel = 'debug' | 'info' | 'warn';

const PREFIX = '[toolprobe]';

let enabled = false;

function envDebugEnabled(): boolean {
  const v = process.env.TOOLPROBE_DEBUG;
  return v === '1' || v === 'true';
}

export function isDebugEnabled(): boolean {
  return enabled || envDebugEnabled();
}

/** Set by the config loader (`debug: true`) and by tests. */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

function emit(level: LogLevel, args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  if (level === 'warn') console.warn(PREFIX, ...args);
  // eslint-disable-next-line no-console
  else console.log(PREFIX, ...args);
}

export function logDebug(...args: unknown[]) {
  emit('debug', args);
}

export function logInfo(...args: unknown[]) {
  emit('info', args);
}

export function logWarn(...args: unknown[]) {
  emit('warn', args);
}
