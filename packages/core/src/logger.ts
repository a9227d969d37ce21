/**
 * Minimal logging seam for the engine. The CLI supplies a console
 * implementation; library callers get silence by default.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug?(message: string): void;
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};
