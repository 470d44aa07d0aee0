/**
 * Structured Logging
 * Leveled logger with context, pluggable handlers and metric entries
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";

export interface LogContext {
  correlationId?: string;
  component?: string;
  operation?: string;
  entityType?: string;
  entityId?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    kind?: string;
    stack?: string;
  };
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

const prettyHandler: LogHandler = (entry) => {
  const colors = {
    debug: "\x1b[90m",
    info: "\x1b[36m",
    warn: "\x1b[33m",
    error: "\x1b[31m",
  };
  const reset = "\x1b[0m";
  const color = colors[entry.level];

  const prefix = `${color}[${entry.timestamp}] [${entry.level.toUpperCase()}]${reset}`;
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";

  if (entry.error) {
    console.error(`${prefix} ${entry.message}${contextStr}`);
    console.error(`  Error: ${entry.error.message}`);
    if (entry.error.stack) {
      console.error(`  Stack: ${entry.error.stack.split("\n").slice(1, 4).join("\n")}`);
    }
  } else {
    console.log(`${prefix} ${entry.message}${contextStr}`);
  }
};

// One object per line, for log shippers
const jsonHandler: LogHandler = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === "error" || entry.level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
};

let defaultHandler: LogHandler = prettyHandler;
const handlers: LogHandler[] = [defaultHandler];

function createEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if ("kind" in error && typeof error.kind === "string") {
      entry.error.kind = error.kind;
    }
  }

  return entry;
}

function emit(entry: LogEntry): void {
  if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }

  for (const handler of handlers) {
    try {
      handler(entry);
    } catch (e) {
      console.error("Logger handler error:", e);
    }
  }
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  metric(name: string, value: number, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /**
   * Apply level and output format, typically from `AppConfig.env`
   */
  configure(options: { logLevel: LogLevel; logFormat: LogFormat }): void {
    currentLevel = options.logLevel;
    const next = options.logFormat === "json" ? jsonHandler : prettyHandler;
    const index = handlers.indexOf(defaultHandler);
    if (index >= 0) handlers[index] = next;
    defaultHandler = next;
  },

  addHandler(handler: LogHandler): void {
    handlers.push(handler);
  },

  /**
   * Drop every handler, including the console one
   */
  clearHandlers(): void {
    handlers.length = 0;
  },

  resetHandlers(): void {
    handlers.length = 0;
    handlers.push(defaultHandler);
  },

  debug(message: string, context?: LogContext): void {
    emit(createEntry("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    emit(createEntry("info", message, context));
  },

  warn(message: string, context?: LogContext): void {
    emit(createEntry("warn", message, context));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const err = error instanceof Error ? error : undefined;
    emit(createEntry("error", message, context, err));
  },

  child(baseContext: LogContext): Logger {
    return new ChildLogger(baseContext);
  },

  metric(name: string, value: number, context?: LogContext): void {
    emit(
      createEntry("info", `METRIC: ${name}=${value}`, {
        ...context,
        metric: name,
        value,
      })
    );
  },
};

class ChildLogger implements Logger {
  constructor(private baseContext: LogContext) {}

  debug(message: string, context?: LogContext): void {
    logger.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    logger.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    logger.warn(message, { ...this.baseContext, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    logger.error(message, error, { ...this.baseContext, ...context });
  }

  metric(name: string, value: number, context?: LogContext): void {
    logger.metric(name, value, { ...this.baseContext, ...context });
  }

  child(additionalContext: LogContext): Logger {
    return new ChildLogger({ ...this.baseContext, ...additionalContext });
  }
}
