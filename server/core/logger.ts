import fs from 'node:fs';
import path from 'node:path';
import { isFalse, isTrue } from './env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogSink = 'console' | 'stderr';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const MAX_BYTES = 2_000_000; // 2MB
const BACKUPS = 3;

let sink: LogSink = 'console';

/**
 * Route console output. MCP over stdio owns stdout, so that mode sends every
 * line to stderr instead.
 */
export function setLogSink(next: LogSink) {
  sink = next;
}

function logDir() {
  return path.resolve(process.cwd(), process.env.LOG_DIR || 'logs');
}

function fileLoggingEnabled() {
  const flag = process.env.LOG_TO_FILE;
  if (isFalse(flag)) return false;
  if (isTrue(flag)) return true;
  return process.env.NODE_ENV !== 'test';
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function minLevel(): number {
  const raw = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? LEVELS[raw] : LEVELS.info;
}

function rotateIfNeeded(dir: string, filePath: string) {
  try {
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    if (!fs.existsSync(filePath)) return;
    const stat = fs.statSync(filePath);
    if (stat.size < MAX_BYTES) return;
    for (let i = BACKUPS - 1; i >= 0; i--) {
      const src = i === 0 ? filePath : `${filePath}.${i}`;
      const dst = `${filePath}.${i + 1}`;
      if (fs.existsSync(src)) fs.renameSync(src, dst);
    }
  } catch (err) {
    process.stderr.write(`log rotation failed: ${String(err)}\n`);
  }
}

function write(line: string) {
  if (!fileLoggingEnabled()) return;
  const dir = logDir();
  const file = path.join(dir, 'app.log');
  try {
    rotateIfNeeded(dir, file);
    fs.appendFileSync(file, line + '\n', 'utf8');
  } catch (err) {
    process.stderr.write(`log write failed: ${String(err)}\n`);
  }
}

function ts() {
  return new Date().toISOString();
}

function render(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.stack || arg.message;
  if (arg && typeof arg === 'object') {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

function emit(level: LogLevel, msg: string) {
  if (sink === 'stderr') {
    process.stderr.write(msg + '\n');
    return;
  }
  if (level === 'error') console.error(msg);
  else if (level === 'warn') console.warn(msg);
  else if (level === 'debug') console.debug(msg);
  else console.log(msg);
}

export function getLogger(name = 'app') {
  const log = (level: LogLevel, args: unknown[]) => {
    if (LEVELS[level] < minLevel()) return;
    const msg = `${ts()} | ${level.toUpperCase()} | ${name} | ${args.map(render).join(' ')}`;
    write(msg);
    if (level === 'debug' && process.env.NODE_ENV === 'production') return;
    emit(level, msg);
  };
  return {
    debug: (...args: unknown[]) => log('debug', args),
    info: (...args: unknown[]) => log('info', args),
    warn: (...args: unknown[]) => log('warn', args),
    error: (...args: unknown[]) => log('error', args),
  };
}

export type Logger = ReturnType<typeof getLogger>;
