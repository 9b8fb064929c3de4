// src/utils/logger.ts
import { createLogger, format, transports } from "winston";
import { logLevel } from "../config/config.js";

const { combine, timestamp, printf, colorize, errors, splat } = format;

// Define log format
const logFormat = printf(({ level, message, timestamp, stack }) => {
  return `[${timestamp}] ${level}: ${stack || message}`;
});

const logger = createLogger({
  level: logLevel,
  format: combine(
    colorize(),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    errors({ stack: true }),
    splat(),
    logFormat,
  ),
  transports: [
    // stderr keeps the CLI report on stdout clean
    new transports.Console({ stderrLevels: ["error", "warn", "info", "http", "verbose", "debug"] }),
  ],
  exitOnError: false,
});

export default logger;
