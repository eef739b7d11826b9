// Log.ts
// ======
// Console logger handed to every component through its options. There is no
// module-level logger: each agent run builds its own.

const DIM = '\x1b[2m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

export interface Logger {
  info(message: string): void;
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  prefix?: string;
  verbose?: boolean;
  color?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = `[${options.prefix ?? 'scaffold'}]`;
  const verbose = options.verbose ?? false;
  const color = options.color ?? Boolean(process.stdout.isTTY);
  const paint = (code: string, text: string) => (color ? code + text + RESET : text);

  return {
    info(message) {
      console.log(`${prefix} ${message}`);
    },
    debug(message) {
      if (verbose) {
        console.log(paint(DIM, `${prefix} ${message}`));
      }
    },
    warn(message) {
      console.error(paint(YELLOW, `${prefix} ${message}`));
    },
    error(message) {
      console.error(paint(RED, `${prefix} ${message}`));
    },
  };
}

// Discards everything; used where a caller passes no logger.
export const silentLogger: Logger = {
  info() {},
  debug() {},
  warn() {},
  error() {},
};
