/**
 * Console output for the report commands.
 * `log` and the per-user step lines are silenced by --quiet; warnings and
 * errors always go to stderr.
 */

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  stepStart(recordNumber: number, principalName: string): void;
  stepSuccess(recordNumber: number, detail: string): void;
  stepFailure(recordNumber: number, principalName: string): void;
}

type LoggerOptions = {
  quiet?: boolean;
};

export function createLogger(options: LoggerOptions): Logger {
  const quiet = Boolean(options.quiet);
  const log = (...args: unknown[]) => {
    if (quiet) return;
    // eslint-disable-next-line no-console
    console.log(...args);
  };

  return {
    log,
    warn: (...args: unknown[]) => {
      // eslint-disable-next-line no-console
      console.warn(...args);
    },
    error: (...args: unknown[]) => {
      // eslint-disable-next-line no-console
      console.error(...args);
    },
    stepStart: (recordNumber, principalName) => log(`▶ Processing user #${recordNumber}: ${principalName}`),
    stepSuccess: (recordNumber, detail) => log(`✔ User #${recordNumber} ${detail}`),
    stepFailure: (recordNumber, principalName) =>
      log(`✖ User #${recordNumber} ${principalName} failed (see summary / errors file)`)
  };
}

/**
 * Same logger without the per-user step lines, for runs that draw a
 * progress bar. Warnings still reach the operator.
 */
export function withoutSteps(logger: Logger): Logger {
  const noop = () => undefined;
  return {
    ...logger,
    stepStart: noop,
    stepSuccess: noop,
    stepFailure: noop
  };
}
