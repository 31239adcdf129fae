import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

// The terminal belongs to the spinner and the streamed answer, so console echo is opt-in.
const consoleEnabled = process.env.NODE_ENV === 'test' ? false : process.env.DEBUG_AGENT === '1';
const fileEnabled = process.env.NODE_ENV === 'test' ? false : process.env.LOG_TO_FILE !== '0';
const logFile = process.env.LOG_FILE ?? 'logs/agent.log';
let fileReady = false;

export type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

const LEVEL_COLORS: Record<Level, string> = {
  INFO: '\x1b[34m',
  DEBUG: '\x1b[95m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m'
};
const RESET = '\x1b[0m';

/** Local time as `YYYY-MM-DD HH:mm:ss.SSS`. */
function timestamp(d = new Date()): string {
  const two = (n: number) => String(n).padStart(2, '0');
  const date = `${d.getFullYear()}-${two(d.getMonth() + 1)}-${two(d.getDate())}`;
  const time = `${two(d.getHours())}:${two(d.getMinutes())}:${two(d.getSeconds())}`;
  return `${date} ${time}.${String(d.getMilliseconds()).padStart(3, '0')}`;
}

function serialize(v: unknown): string {
  if (typeof v === 'string') return v;
  if (v instanceof Error) return v.stack ?? v.message;
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

// one line per record; only the console copy gets a colored tag
export function formatLine(level: Level, args: unknown[], colored: boolean): string {
  const tag = colored ? `${LEVEL_COLORS[level]}[${level}]${RESET}` : `[${level}]`;
  return `[${timestamp()}] ${tag} ${args.map(serialize).join(' ')}`;
}

function write(level: Level, args: unknown[]) {
  if (consoleEnabled) {
    const line = formatLine(level, args, true);
    if (level === 'WARN' || level === 'ERROR') console.error(line);
    else console.log(line);
  }
  if (!fileEnabled) return;
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  appendFileSync(logFile, `${formatLine(level, args, false)}\n`, 'utf8');
}

export const logger = {
  info: (...args: unknown[]) => write('INFO', args),
  warn: (...args: unknown[]) => write('WARN', args),
  error: (...args: unknown[]) => write('ERROR', args),
  debug: (...args: unknown[]) => write('DEBUG', args)
};
