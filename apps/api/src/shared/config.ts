// apps/api/src/shared/config.ts

const nodeEnv = process.env.NODE_ENV || "development";

export const config = {
  nodeEnv,
  dbPath: process.env.PICKEM_DB_PATH || "./pickem.db",
  logLevel: process.env.LOG_LEVEL || (nodeEnv === "production" ? "info" : "debug")
} as const;
