import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for scripts and request handlers.
 * - Local/dev: pretty-printed logs for readability
 * - Lambda/prod: JSON logs
 * - Tests: silent unless LOG_LEVEL says otherwise
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "signal-pages-be",
    stage: getStage(),
  },
  redact: {
    paths: ["*.password", "*.secret", "*.token", "*.apiKey"],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

// No worker-thread transport under Jest, it would outlive the test run
const usePretty = isLocal() && !isProduction() && !isTest();

const rootLogger: Logger = pino(
  usePretty
    ? {
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            singleLine: false,
            ignore: "pid,hostname",
          },
        },
      }
    : baseOptions
);

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger augmented with Lambda request context fields.
 */
export function withRequestContext(
  moduleName: string | undefined,
  request: {
    awsRequestId?: string;
    functionName?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    requestId: request.awsRequestId,
    functionName: request.functionName,
  });
}

export default rootLogger;
