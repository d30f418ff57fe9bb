import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export interface LoggerConfig {
  level?: pino.Level;
  pretty?: boolean;
  file?: string;
  redact?: string[];
}

const DEFAULT_REDACT = ['secretKey', 'accessKey', 'credentials', 'authorization'];

export function createLogger(config: LoggerConfig = {}): Logger {
  const { level = 'info', pretty = false, file, redact = DEFAULT_REDACT } = config;

  const options: pino.LoggerOptions = {
    level,
    redact,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  // Logs go to stderr so stdout stays clean for --json output.
  const consoleStream = pretty
    ? pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      })
    : pino.destination(2);

  if (!file) {
    return pino(options, consoleStream);
  }

  return pino(
    options,
    pino.multistream([
      { level, stream: consoleStream },
      { level, stream: pino.destination({ dest: file, mkdir: true, sync: false }) },
    ]),
  );
}

/** A logger that discards everything; used by tests and library callers. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
