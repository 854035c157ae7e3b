/**
 * Component logger for decision-relay.
 *
 * - plain text by default, JSON lines for jq when DECISION_RELAY_LOG_JSON=1
 * - level from DECISION_RELAY_LOG_LEVEL (DEBUG, INFO, WARN, ERROR)
 * - file output when DECISION_RELAY_LOG_FILE is set
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

// Env is read on every call: the CLI sets these after modules are imported
function getLogFile(): string | undefined {
  return process.env.DECISION_RELAY_LOG_FILE || undefined;
}

function getLogLevel(): LogLevel {
  const level = (process.env.DECISION_RELAY_LOG_LEVEL ?? 'INFO').toUpperCase();
  return isLogLevel(level) ? level : 'INFO';
}

function isLogJson(): boolean {
  return process.env.DECISION_RELAY_LOG_JSON === '1';
}

const createdLogDirs = new Set<string>();

function ensureLogDir(logFile: string): void {
  const logDir = path.dirname(logFile);
  if (!createdLogDirs.has(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
    createdLogDirs.add(logDir);
  }
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getLogLevel()];
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

export function formatMessage(entry: LogEntry, json = isLogJson()): string {
  if (json) {
    return JSON.stringify(entry, (_key, value: unknown) => (value instanceof Error ? value.message : value));
  }
  const { ts, level, component, msg, ...extra } = entry;
  const extraStr = Object.keys(extra).length > 0
    ? ' ' + Object.entries(extra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ')
    : '';
  return `${ts} [${level}] [${component}] ${msg}${extraStr}`;
}

function log(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    ...extra,
  };

  const formatted = formatMessage(entry);

  const logFile = getLogFile();
  if (logFile) {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, formatted + '\n');
    return;
  }

  if (level === 'ERROR' || level === 'WARN') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

/**
 * Create a logger for a specific component.
 * @param component - Component name (e.g., 'relay', 'router', 'queue')
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => log('DEBUG', component, msg, extra),
    info: (msg, extra) => log('INFO', component, msg, extra),
    warn: (msg, extra) => log('WARN', component, msg, extra),
    error: (msg, extra) => log('ERROR', component, msg, extra),
  };
}

// Pre-created loggers for the relay's components
export const relayLog = createLogger('relay');
export const routerLog = createLogger('router');
export const connectionLog = createLogger('connection');
export const queueLog = createLogger('queue');
export const muxLog = createLogger('multiplexer');
export const upstreamLog = createLogger('upstream');

export default createLogger;
