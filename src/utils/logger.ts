import { pino, destination, multistream, type Level, type Logger, type StreamEntry } from 'pino';
import * as path from 'path';

type UtilLogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly UtilLogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLogLevel(raw: string | undefined): UtilLogLevel {
  const level = LOG_LEVELS.find(l => l === raw);
  return level ?? 'info';
}

const logLevel = resolveLogLevel(process.env['LOG_LEVEL']);
const logFile = process.env['ACCESS_AUDIT_LOG_FILE'];

// multistream entries default to info; silent is handled by the root level
const streamLevel: Level = logLevel === 'silent' ? 'fatal' : logLevel;

// stdout carries CLI output, so logs go to stderr
const streams: StreamEntry[] = [
  { level: streamLevel, stream: process.stderr },
];

if (logFile) {
  try {
    const fileStream = destination({
      dest: path.resolve(logFile),
      sync: false,
      mkdir: true,
    });
    streams.push({ level: streamLevel, stream: fileStream });
  } catch (err) {
    process.stderr.write(`Failed to open log file ${logFile}: ${err instanceof Error ? err.message : String(err)}\n`);
  }
}

export const logger: Logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    redact: ['password', 'secret', '*.password', '*.secret'],
  },
  multistream(streams)
);

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
