/**
 * Add-Import Package - Logging
 *
 * Messages are written verbatim, one line per call. Scripts match on them,
 * so no timestamp or tag is added.
 */

export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** stdout for log/info, stderr for warn/error. */
export const consoleLogger: Logger = {
  log: (m: string) => process.stdout.write(`${m}\n`),
  info: (m: string) => process.stdout.write(`${m}\n`),
  warn: (m: string) => process.stderr.write(`${m}\n`),
  error: (m: string) => process.stderr.write(`${m}\n`),
};

export const nullLogger: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
