/**
 * Where the console writes. Everything the operator sees goes through here,
 * so the lines double as the audit trail of what was done.
 */
export interface Output {
  line(text?: string): void;
  warn(text: string): void;
  error(text: string): void;
  debug(text: string): void;
}

export function createConsoleOutput(verbose: boolean = false): Output {
  return {
    line: (text = '') => console.log(text),
    warn: (text) => console.warn(text),
    error: (text) => console.error(text),
    debug: (text) => {
      if (verbose) {
        console.debug(`🔎 ${text}`);
      }
    },
  };
}
