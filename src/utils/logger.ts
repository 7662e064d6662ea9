import { createLogger, format, transports } from "winston";
import { config } from "../config/env.js";

const logger = createLogger({
  level: config.LOG_LEVEL,
  format: format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.errors({ stack: true }),
    format.colorize(),
    format.printf(({ timestamp, level, message, stack }) => {
      const base = `[${String(timestamp)}] ${level}: ${String(message)}`;
      return typeof stack === "string" ? `${base}\n${stack}` : base;
    })
  ),
  transports: [
    new transports.Console(),
    new transports.File({ filename: "logs/error.log", level: "error" }),
    new transports.File({ filename: "logs/combined.log" }),
  ],
});

export default logger;
