export type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type DocumentationLogger = {
  info: LoggerFn;
  debug: LoggerFn;
  warn: LoggerFn;
};

const noop: LoggerFn = () => {};

export const silentLogger: DocumentationLogger = {
  info: noop,
  debug: noop,
  warn: noop,
};

type Level = keyof DocumentationLogger;

/**
 * Logs to stderr so stdout stays free for the run summary. Debug output is
 * dropped unless `verbose` is set.
 */
export const createConsoleLogger = ({
  verbose = false,
}: { verbose?: boolean } = {}): DocumentationLogger => {
  const emit = (level: Level, message: string, context?: LogContext): void => {
    if (level === "debug" && !verbose) {
      return;
    }
    const write = level === "warn" ? console.warn : console.error;
    if (context && Object.keys(context).length > 0) {
      write(message, context);
      return;
    }
    write(message);
  };

  return {
    info: (message, context) => emit("info", message, context),
    debug: (message, context) => emit("debug", message, context),
    warn: (message, context) => emit("warn", message, context),
  };
};
