import pino from "pino";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

const nodeEnv = process.env.NODE_ENV;
const isDev = nodeEnv !== "production" && nodeEnv !== "test";

/**
 * Base logger configuration.
 * - Development: pretty-printed with colors
 * - Production and tests: JSON lines
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger with component context.
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.correlationId && { correlationId: options.correlationId }),
  });
}

/**
 * Create an evaluation-scoped logger, one per novelty request.
 */
export function createEvaluationLogger(evaluationId: string): pino.Logger {
  return createLogger({ component: "novelty", correlationId: evaluationId });
}

/**
 * Re-export base logger for simple use cases.
 */
export { baseLogger as logger };

/**
 * Re-export pino types for consumers.
 */
export type { Logger } from "pino";
