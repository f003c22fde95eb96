import { ConfigError } from "./errors";
import { env, envFlag, envInt } from "./env";
import type { GroupingThresholds } from "./types";
import { isLogLevel, type LogLevel } from "./log";

export const APP_NAME = "OCR Page Diff API";
export const APP_VERSION = "0.1.0";

export const MIN_DPI = 72;
export const MAX_DPI = 600;

export type AppConfig = {
  host: string;
  port: number;
  debug: boolean;
  logLevel: LogLevel;
  maxUploadMb: number;
  artifactsDir: string;
  corsOrigins: string[];
  defaultDpi: number;
  grouping: GroupingThresholds;
};

export function loadConfig(): AppConfig {
  const logLevel = env("LOG_LEVEL", "info").trim().toLowerCase();
  if (!isLogLevel(logLevel)) throw new ConfigError(`Invalid LOG_LEVEL: ${logLevel}`);

  const defaultDpi = envInt("DEFAULT_DPI", 300);
  if (defaultDpi < MIN_DPI || defaultDpi > MAX_DPI) {
    throw new ConfigError(`DEFAULT_DPI must be between ${MIN_DPI} and ${MAX_DPI}`);
  }

  const maxYGap = envInt("DIFF_MAX_Y_GAP", 100);
  const maxXGap = envInt("DIFF_MAX_X_GAP", 200);
  if (maxYGap < 0 || maxXGap < 0) throw new ConfigError("DIFF_MAX_Y_GAP and DIFF_MAX_X_GAP must not be negative");

  return {
    host: env("HOST", "0.0.0.0"),
    port: envInt("PORT", 8000),
    debug: envFlag("DEBUG"),
    logLevel,
    maxUploadMb: envInt("MAX_UPLOAD_MB", 50),
    artifactsDir: env("ARTIFACTS_DIR", "./artifacts"),
    corsOrigins: env("CORS_ORIGINS", "http://localhost:3000,http://localhost:5173,http://localhost:8000")
      .split(",")
      .map((x) => x.trim())
      .filter((x) => x.length > 0),
    defaultDpi,
    grouping: { maxYGap, maxXGap }
  };
}
