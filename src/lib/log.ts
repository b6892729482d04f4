export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Detail lines, printed only in verbose mode. */
  debug: (message: string) => void;
}

export const createConsoleLogger = (verbose: boolean): Logger => ({
  info: (message) => {
    console.log(message);
  },
  warn: (message) => {
    console.warn(message);
  },
  error: (message) => {
    console.error(message);
  },
  debug: (message) => {
    if (verbose) {
      console.log(message);
    }
  },
});
