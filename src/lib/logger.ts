import pino from "pino";

const isProduction = process.env.NODE_ENV === "production";
const logLevel = process.env.LOG_LEVEL || (isProduction ? "info" : "debug");

// Logs go to stderr so CLI output on stdout stays pipeable.
export const logger = pino({
  level: logLevel,
  ...(isProduction
    ? {
        // Production: JSON format for log aggregation
        formatters: {
          level: (label: string) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {
        formatters: {
          level: (label: string) => ({ level: label }),
        },
      }),
}, pino.destination(2));

// Create child loggers for different modules
export const wfsLogger = logger.child({ module: "wfs" });
export const cacheLogger = logger.child({ module: "cache" });
export const zoneLogger = logger.child({ module: "zones" });
export const exportLogger = logger.child({ module: "export" });
export const cliLogger = logger.child({ module: "cli" });

export default logger;
