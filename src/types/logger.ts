/**
 * Minimal logging contract; `console` satisfies it.
 */
export interface Logger {
  log: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}
