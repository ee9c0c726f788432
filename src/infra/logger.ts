export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

export const silentLogger: Logger = {
  info() {},
  warn() {}
};

export const consoleLogger: Logger = {
  info(message, meta) { console.log(`[info] ${message}`, meta ?? ''); },
  warn(message, meta) { console.warn(`[warn] ${message}`, meta ?? ''); }
};
