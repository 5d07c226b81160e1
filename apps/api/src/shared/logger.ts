// apps/api/src/shared/logger.ts
import pino from "pino";
import { config } from "./config";

export const logger = pino({
  name: "pickem",
  level: config.logLevel
});
