/**
 * Leveled logger used by every module.
 *
 * Environment:
 *   LOG_LEVEL = debug|info|warn|error|silent (default: info)
 *   LOG_JSON  = 1 for one JSON object per line (default: text)
 *
 * The environment is read on each call so tests and the CLI can change it
 * after modules have loaded.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function minLevel(): number {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  for (const [name, order] of Object.entries(LEVEL_ORDER)) {
    if (name === raw) return order;
  }
  return LEVEL_ORDER.info;
}

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < minLevel()) return;

  const ts = new Date().toISOString();
  let line: string;

  if (process.env.LOG_JSON === '1') {
    const entry: Record<string, unknown> = { ts, level, component, msg: message };
    if (data) entry.data = data;
    line = JSON.stringify(entry);
  } else {
    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
    line = data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;
  }

  if (level === 'error' || level === 'warn') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(component: string): Logger;
}

export function createLogger(component: string): Logger {
  return {
    debug: (msg, data) => emit('debug', component, msg, data),
    info: (msg, data) => emit('info', component, msg, data),
    warn: (msg, data) => emit('warn', component, msg, data),
    error: (msg, data) => emit('error', component, msg, data),
    child: (sub) => createLogger(`${component}:${sub}`),
  };
}
