export interface Logger {
  info(message: string, ...meta: unknown[]): void;
  debug(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Console logger. Debug lines only show up in verbose mode.
 */
export function createConsoleLogger(verbose = false): Logger {
  const prefix = () => `[${formatTimestamp(new Date())}]`;

  return {
    info: (message, ...meta) => console.log(`${prefix()} ${message}`, ...meta),
    debug: (message, ...meta) => {
      if (verbose) console.log(`${prefix()} ${message}`, ...meta);
    },
    warn: (message, ...meta) => console.warn(`${prefix()} ${message}`, ...meta),
    error: (message, ...meta) => console.error(`${prefix()} ${message}`, ...meta),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
