/**
 * Structured logging for studyrag.
 *
 * Every module takes a component logger from `createLogger(component)`;
 * `child(meta)` binds fields (a collection name, a query id) that are then
 * attached to every entry. Output goes to stderr so stdout stays clean for
 * CLI results that get piped.
 *
 * Environment:
 * - `STUDYRAG_LOG_LEVEL`: debug | info | warn | error | silent (default info)
 * - `STUDYRAG_LOG_JSON`: `true` for one JSON object per line
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  component?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  /** Logger for the same component with extra fields on every entry */
  child(bound: Record<string, unknown>): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

let currentLevel: LogLevel = 'info';
let jsonMode = false;

/**
 * Apply `STUDYRAG_LOG_LEVEL` / `STUDYRAG_LOG_JSON`. Runs once at import;
 * an unrecognised level leaves the current one in place.
 */
export function configureLogging(env: NodeJS.ProcessEnv = process.env): void {
  const level = env.STUDYRAG_LOG_LEVEL;
  if (isLogLevel(level)) {
    currentLevel = level;
  } else if (level) {
    write({
      timestamp: new Date().toISOString(),
      level: 'warn',
      component: 'logger',
      message: `Ignoring STUDYRAG_LOG_LEVEL=${level}`,
    });
  }
  jsonMode = env.STUDYRAG_LOG_JSON === 'true';
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

/**
 * Render one entry: `[HH:MM:SS] LEVEL [component] message (k=v ...)`,
 * or the entry itself as JSON.
 */
export function formatEntry(entry: LogEntry, asJson: boolean = jsonMode): string {
  if (asJson) {
    return JSON.stringify(entry);
  }

  const time = entry.timestamp.slice(11, 19);
  const parts = [`[${time}]`, entry.level.toUpperCase().padEnd(5)];
  if (entry.component) parts.push(`[${entry.component}]`);
  parts.push(entry.message);
  let output = parts.join(' ');

  const meta = entry.meta ?? {};
  const pairs = Object.entries(meta).map(
    ([k, v]) => `${k}=${typeof v === 'object' && v !== null ? JSON.stringify(v) : String(v)}`,
  );
  if (pairs.length > 0) {
    output += ` (${pairs.join(' ')})`;
  }
  return output;
}

function write(entry: LogEntry): void {
  process.stderr.write(formatEntry(entry) + '\n');
}

function emit(
  level: EntryLevel,
  component: string,
  bound: Record<string, unknown>,
  msg: string,
  meta?: Record<string, unknown>,
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;

  const merged = { ...bound, ...meta };
  write({
    timestamp: new Date().toISOString(),
    level,
    component,
    message: msg,
    ...(Object.keys(merged).length > 0 ? { meta: merged } : {}),
  });
}

/**
 * Logger tagged with a component name.
 */
export function createLogger(component: string, bound: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, meta) => emit('debug', component, bound, msg, meta),
    info: (msg, meta) => emit('info', component, bound, msg, meta),
    warn: (msg, meta) => emit('warn', component, bound, msg, meta),
    error: (msg, meta) => emit('error', component, bound, msg, meta),
    child: (extra) => createLogger(component, { ...bound, ...extra }),
  };
}

configureLogging();
