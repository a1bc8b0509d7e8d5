export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * `[Tag] message` 形式でコンソールに出力するロガーを作成
 * debugはVERBOSEモードのときのみ `[VERBOSE]` 付きで出力する
 */
export function createLogger(tag: string, verbose = false): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) {
      if (verbose) {
        console.log(`[VERBOSE] ${prefix} ${message}`, ...details);
      }
    },
    info(message, ...details) {
      console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}
