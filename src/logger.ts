// ─── Logging ────────────────────────────────────────────────────────────────────

export interface PipelineLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const defaultLogger: PipelineLogger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};

/** Discards everything. Used by tests and by callers that log elsewhere. */
export const silentLogger: PipelineLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
