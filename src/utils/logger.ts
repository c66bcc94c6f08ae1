/**
 * Structured Logging Utility
 *
 * pino-style logger used by every tracing component.
 *
 * - Levels: trace, debug, info, warn, error, fatal
 * - (msg, context) and (context, msg) call forms
 * - Child loggers carrying bound context
 * - LOG_LEVEL / LOG_PRETTY / NODE_ENV driven defaults
 *
 * Usage:
 *   import { logger } from "../utils/logger";
 *   const log = logger.child({ service: "SiblingDetector" });
 *   log.warn("Outbound lookup failed", { funder, error: err.message });
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Numeric log level values (pino-compatible) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LogContext {
  /** Component name */
  service?: string;
  /** Identifier of the trace this entry belongs to */
  traceId?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  time: string;
  level: LogLevel;
  levelNum: number;
  msg: string;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  name?: string;
  prettyPrint: boolean;
  base?: LogContext;
}

export interface Logger {
  level: LogLevel;
  trace(msg: string, context?: LogContext): void;
  trace(context: LogContext, msg: string): void;
  debug(msg: string, context?: LogContext): void;
  debug(context: LogContext, msg: string): void;
  info(msg: string, context?: LogContext): void;
  info(context: LogContext, msg: string): void;
  warn(msg: string, context?: LogContext): void;
  warn(context: LogContext, msg: string): void;
  error(msg: string, context?: LogContext): void;
  error(context: LogContext, msg: string): void;
  fatal(msg: string, context?: LogContext): void;
  fatal(context: LogContext, msg: string): void;
  child(bindings: LogContext): Logger;
}

// ============================================================================
// Configuration
// ============================================================================

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Level from LOG_LEVEL, else debug in development and info in production
 */
function getLogLevelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldPrettyPrint(): boolean {
  if (process.env.LOG_PRETTY === "false") {
    return false;
  }
  return process.env.NODE_ENV !== "production";
}

// ============================================================================
// Pretty printing
// ============================================================================

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const CYAN = "\x1b[36m";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: CYAN,
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[31m\x1b[1m",
};

const ENVELOPE_KEYS = new Set(["time", "level", "levelNum", "msg", "service"]);

function formatPretty(entry: LogEntry): string {
  const clock = entry.time.split("T")[1]?.replace("Z", "") ?? entry.time;
  const level = LEVEL_COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
  const service = typeof entry.service === "string" ? `${CYAN}[${entry.service}]${RESET} ` : "";

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!ENVELOPE_KEYS.has(key)) {
      extra[key] = value;
    }
  }
  const extraStr = Object.keys(extra).length > 0 ? ` ${DIM}${stringify(extra)}${RESET}` : "";

  return `${DIM}${clock}${RESET} ${level} ${service}${entry.msg}${extraStr}`;
}

/**
 * JSON.stringify that tolerates bigint amounts
 */
function stringify(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
}

// ============================================================================
// Logger Implementation
// ============================================================================

function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const fullConfig: LoggerConfig = {
    level: config.level ?? getLogLevelFromEnv(),
    name: config.name,
    prettyPrint: config.prettyPrint ?? shouldPrettyPrint(),
    base: config.base ?? {},
  };

  const threshold = LOG_LEVELS[fullConfig.level];

  function output(level: LogLevel, msg: string, context: LogContext): void {
    if (LOG_LEVELS[level] < threshold) {
      return;
    }

    const entry: LogEntry = {
      time: new Date().toISOString(),
      level,
      levelNum: LOG_LEVELS[level],
      msg,
      ...fullConfig.base,
      ...context,
    };
    if (fullConfig.name) {
      entry.service = fullConfig.name;
    }

    const line = fullConfig.prettyPrint ? formatPretty(entry) : stringify(entry);

    switch (level) {
      case "trace":
      case "debug":
        // eslint-disable-next-line no-console
        console.debug(line);
        break;
      case "info":
        // eslint-disable-next-line no-console
        console.info(line);
        break;
      case "warn":
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      case "error":
      case "fatal":
        // eslint-disable-next-line no-console
        console.error(line);
        break;
    }
  }

  function log(level: LogLevel) {
    return (arg1: string | LogContext, arg2?: string | LogContext): void => {
      if (typeof arg1 === "string") {
        output(level, arg1, typeof arg2 === "object" ? arg2 : {});
      } else {
        output(level, typeof arg2 === "string" ? arg2 : "", arg1);
      }
    };
  }

  return {
    level: fullConfig.level,
    trace: log("trace"),
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    fatal: log("fatal"),
    child(bindings: LogContext): Logger {
      return createLogger({
        ...fullConfig,
        name: bindings.service ?? fullConfig.name,
        base: { ...fullConfig.base, ...bindings },
      });
    },
  };
}

// ============================================================================
// Shared instances
// ============================================================================

export const logger = createLogger({
  name: "funding-trace",
});

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

/**
 * Logger bound to one trace invocation
 */
export function createTraceLogger(traceId: string, parent: Logger = logger): Logger {
  return parent.child({ traceId });
}

type ServiceName =
  | "tracer"
  | "originTracer"
  | "siblingDetector"
  | "outboundAnalyzer"
  | "bridgeDecoder"
  | "workerPool";

const SERVICE_NAMES: Record<ServiceName, string> = {
  tracer: "Tracer",
  originTracer: "OriginTracer",
  siblingDetector: "SiblingDetector",
  outboundAnalyzer: "OutboundAnalyzer",
  bridgeDecoder: "BridgeDecoder",
  workerPool: "WorkerPool",
};

const serviceLoggerCache = new Map<ServiceName, Logger>();

function lazyServiceLogger(name: ServiceName): Logger {
  let cached = serviceLoggerCache.get(name);
  if (!cached) {
    cached = createServiceLogger(SERVICE_NAMES[name]);
    serviceLoggerCache.set(name, cached);
  }
  return cached;
}

/**
 * Pre-configured component loggers, created on first use
 */
export const serviceLoggers = {
  get tracer(): Logger {
    return lazyServiceLogger("tracer");
  },
  get originTracer(): Logger {
    return lazyServiceLogger("originTracer");
  },
  get siblingDetector(): Logger {
    return lazyServiceLogger("siblingDetector");
  },
  get outboundAnalyzer(): Logger {
    return lazyServiceLogger("outboundAnalyzer");
  },
  get bridgeDecoder(): Logger {
    return lazyServiceLogger("bridgeDecoder");
  },
  get workerPool(): Logger {
    return lazyServiceLogger("workerPool");
  },
};

export { createLogger, getLogLevelFromEnv, shouldPrettyPrint };

export default logger;
