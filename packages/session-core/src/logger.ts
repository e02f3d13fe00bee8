export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  readonly debug?: boolean;
}

const REDACTED = "********";

const toStructuredLogArgs = (message: string, context?: Record<string, unknown>): [string, Record<string, unknown>] => {
  if (context && Object.keys(context).length > 0) {
    return [message, context];
  }
  return [message, {}];
};

export const createConsoleLogger = (options: ConsoleLoggerOptions = {}): Logger => {
  return {
    debug(message, context) {
      if (!options.debug) {
        return;
      }
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.debug(msg, ctx);
    },
    info(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.info(msg, ctx);
    },
    warn(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.warn(msg, ctx);
    },
    error(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.error(msg, ctx);
    }
  };
};

export const createNoopLogger = (): Logger => ({
  debug() {},
  info() {},
  warn() {},
  error() {}
});

const redactText = (value: string, secrets: ReadonlyArray<string>): string => {
  let result = value;
  for (const secret of secrets) {
    result = result.split(secret).join(REDACTED);
  }
  return result;
};

const redactValue = (value: unknown, secrets: ReadonlyArray<string>): unknown => {
  if (typeof value === "string") {
    return redactText(value, secrets);
  }
  if (value instanceof Error) {
    return redactText(value.message, secrets);
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, secrets));
  }
  if (value && typeof value === "object") {
    const copy: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = redactValue(entry, secrets);
    }
    return copy;
  }
  return value;
};

/**
 * Wraps a logger so none of the given secrets reach the sink.  Occurrences inside messages and
 * nested context values are replaced with a fixed mask.
 */
export const createRedactingLogger = (inner: Logger, secrets: ReadonlyArray<string>): Logger => {
  const active = secrets.filter((secret) => secret.length > 0);
  if (active.length === 0) {
    return inner;
  }
  const wrap =
    (level: keyof Logger) =>
    (message: string, context?: Record<string, unknown>): void => {
      const redactedContext = context
        ? Object.fromEntries(Object.entries(context).map(([key, value]) => [key, redactValue(value, active)]))
        : undefined;
      inner[level](redactText(message, active), redactedContext);
    };
  return {
    debug: wrap("debug"),
    info: wrap("info"),
    warn: wrap("warn"),
    error: wrap("error")
  };
};
