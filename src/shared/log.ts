/**
 * Scoped console logger.
 *
 * Lines look like `[rewriter] Error reading word/document.xml: ...`.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info(message) {
      console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message, err) {
      if (err === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}:`, err instanceof Error ? err.message : err);
      }
    },
  };
}
