import path from 'node:path';
import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  /** When set, every run also writes to its own timestamped file here. */
  logDir?: string;
  /** Colorized console output via pino-pretty; plain JSON lines otherwise. */
  pretty?: boolean;
  /** Used for the log file timestamp. */
  startedAt?: Date;
}

/** Formats a date as yyyyMMddHHmmss in local time. */
export function runTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function logFilePath(logDir: string, startedAt: Date): string {
  return path.join(logDir, `football_etl_${runTimestamp(startedAt)}.log`);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const targets: pino.TransportTargetOptions[] = [
    options.pretty === false
      ? { target: 'pino/file', level, options: { destination: 1 } }
      : { target: 'pino-pretty', level, options: { colorize: true, translateTime: 'SYS:standard' } },
  ];

  if (options.logDir) {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: logFilePath(options.logDir, options.startedAt ?? new Date()), mkdir: true },
    });
  }

  return pino({ level }, pino.transport({ targets }));
}

/**
 * JSON lines written synchronously to stdout, for when the run logger could
 * not be built or may not flush before the process exits.
 */
export function fallbackLogger(
  destination: pino.DestinationStream = pino.destination({ dest: 1, sync: true }),
): Logger {
  return pino({ level: 'info' }, destination);
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
