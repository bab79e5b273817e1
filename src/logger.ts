/**
 * Centralized pino logger.
 *
 * All diagnostics go to stderr: stdout carries CLI JSON output and the MCP
 * stdio protocol. Context via child loggers (getLogger('subsystem')).
 */

import pino from "pino";

let rootLogger: pino.Logger | null = null;

function createRoot(level: string): pino.Logger {
  return pino(
    {
      level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

/** Initialize the root logger. Call once at startup. */
export function initLogger(level: string): pino.Logger {
  rootLogger = createRoot(level);
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: the root is then created from
 * DOMAINKIT_LOG_LEVEL (default info).
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    rootLogger = createRoot(process.env.DOMAINKIT_LOG_LEVEL ?? "info");
  }
  return rootLogger.child({ subsystem });
}

export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
