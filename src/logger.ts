/**
 * Cache logging. Misses go to `log`, hits to `verbose`.
 */

export interface Logger {
  log: (msg: string) => void;
  verbose: (msg: string) => void;
  error: (msg: string) => void;
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.log(`[cache] ${msg}`);
    },
    verbose: (msg: string) => {
      if (verbose) console.log(`[cache] [debug] ${msg}`);
    },
    error: (msg: string) => {
      console.error(`[cache error] ${msg}`);
    },
  };
}

export const silentLogger: Logger = {
  log: () => {},
  verbose: () => {},
  error: () => {},
};
