import pino from 'pino';

let rootLogger: pino.Logger | null = null;

/**
 * Initialize the root logger. Call once at startup.
 *
 * Writes to stderr: stdout carries the MCP protocol.
 */
export function initLogger(level: string): pino.Logger {
  rootLogger = pino(
    {
      level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger; falls back to a warn-level stderr logger.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino(
      {
        level: 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2)
    ).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Flush and drop the root logger during shutdown
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
