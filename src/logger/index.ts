/**
 * Logging and metrics interfaces shared by every module that does I/O.
 *
 * The default logger emits one JSON line per call; the default metrics
 * collector is a no-op.
 */

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

type Level = 'info' | 'warn' | 'error' | 'debug';

function write(level: Level, module: string, message: string, context?: Record<string, unknown>): void {
  const line = JSON.stringify({ level, module, message, ...context, timestamp: new Date().toISOString() });
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/**
 * Create a console logger that tags every line with a module name
 */
export function createLogger(module: string): Logger {
  return {
    info: (message, context) => write('info', module, message, context),
    warn: (message, context) => write('warn', module, message, context),
    error: (message, context) => write('error', module, message, context),
    debug: (message, context) => {
      if (process.env['LOG_LEVEL'] === 'debug') {
        write('debug', module, message, context);
      }
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  info: () => { /* no-op */ },
  warn: () => { /* no-op */ },
  error: () => { /* no-op */ },
  debug: () => { /* no-op */ },
};

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};
