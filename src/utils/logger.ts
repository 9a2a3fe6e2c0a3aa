import fs from 'fs';
import path from 'path';

const LOG_LEVEL = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
const LOG_DIR = process.env.LOG_DIR ?? 'logs';

const LOG_LEVELS = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
} as const;

type LogLevel = keyof typeof LOG_LEVELS;

function isLogLevel(level: string): level is LogLevel {
  return level in LOG_LEVELS;
}

const activeLevel: LogLevel = isLogLevel(LOG_LEVEL) ? LOG_LEVEL : 'INFO';

// Session log file, opened on first write; an empty LOG_DIR disables it
let logFile: fs.WriteStream | null = null;

function getLogFile(): fs.WriteStream | null {
  if (logFile || !LOG_DIR) return logFile;

  const logsDir = path.resolve(process.cwd(), LOG_DIR);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  const now = new Date();
  const logFileName = `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}-${String(now.getDate()).padStart(2, '0')}_${String(now.getHours()).padStart(2, '0')}-${String(now.getMinutes()).padStart(2, '0')}-${String(now.getSeconds()).padStart(2, '0')}.log`;
  logFile = fs.createWriteStream(path.join(logsDir, logFileName), { flags: 'a' });
  return logFile;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] <= LOG_LEVELS[activeLevel];
}

function getTimestamp() {
  return new Date().toLocaleString('en-GB');
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg);
  }
  return String(arg);
}

function log(level: LogLevel, color: string, ...args: unknown[]) {
  const timestamp = getTimestamp();
  const text = args.map(formatArg).join(' ');

  // stdout is reserved for schedule output
  process.stderr.write(`[${timestamp}] \x1b[${color}m[${level}]\x1b[0m ${text}\n`);

  getLogFile()?.write(`[${timestamp}] [${level}] ${text}\n`);
}

export const logger = {
  error(...args: unknown[]) {
    if (shouldLog('ERROR')) {
      log('ERROR', '31', ...args);
    }
  },

  warn(...args: unknown[]) {
    if (shouldLog('WARN')) {
      log('WARN', '33', ...args);
    }
  },

  info(...args: unknown[]) {
    if (shouldLog('INFO')) {
      log('INFO', '36', ...args);
    }
  },

  debug(...args: unknown[]) {
    if (shouldLog('DEBUG')) {
      log('DEBUG', '90', ...args);
    }
  },
};
