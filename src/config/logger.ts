import winston from "winston";
import { config } from "./index.js";

export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json()),
  defaultMeta: { service: "campaign-insights" },
  transports: [
    new winston.transports.Console({
      silent: config.nodeEnv === "test",
    }),
  ],
});
