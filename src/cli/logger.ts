export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write =
    options.write ?? ((line: string) => process.stderr.write(line + "\n"));
  return {
    debug(message) {
      if (options.verbose) {
        write(`debug: ${message}`);
      }
    },
    info(message) {
      if (!options.quiet) {
        write(message);
      }
    },
    warn(message) {
      write(`warning: ${message}`);
    },
    error(message) {
      write(`error: ${message}`);
    },
  };
}

export const silentLogger: Logger = createLogger({
  quiet: true,
  write: () => undefined,
});
