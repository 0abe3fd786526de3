/**
 * Configuration.
 *
 * Built once from the environment and passed to each component.
 */

import * as path from "node:path";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export interface GmailConfig {
  /** Bearer token; wins over the token file when set */
  accessToken: string | null;
  /** JSON file holding `{ "access_token": "..." }` */
  tokenPath: string;
}

export interface AppConfig {
  databasePath: string;
  /** Upper bound on concurrent per-email actions within one run */
  actionConcurrency: number;
  fetchBatchSize: number;
  logLevel: LogLevel;
  gmail: GmailConfig;
}

/** Base data directory relative to the working directory */
const DATA_DIR = path.join(process.cwd(), "data");

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
  databasePath: path.join(DATA_DIR, "mail-rules.db"),
  actionConcurrency: 1,
  fetchBatchSize: 50,
  logLevel: "info",
  gmail: {
    accessToken: null,
    tokenPath: path.join(DATA_DIR, "gmail-token.json"),
  },
};

/** Gmail rejects list pages larger than this */
const MAX_FETCH_BATCH_SIZE = 500;

function parsePositiveInt(name: string, raw: string, max = Number.MAX_SAFE_INTEGER): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < 1 || value > max) {
    throw new ConfigError(`${name} must be between 1 and ${max}, got ${value}`);
  }
  return value;
}

function parseLogLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === raw.trim().toLowerCase());
  if (!level) {
    throw new ConfigError(
      `MAIL_RULES_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`
    );
  }
  return level;
}

/**
 * Read configuration from environment variables, falling back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dbPath = env.MAIL_RULES_DB_PATH?.trim();
  const concurrency = env.MAIL_RULES_ACTION_CONCURRENCY;
  const batchSize = env.MAIL_RULES_FETCH_BATCH_SIZE;
  const logLevel = env.MAIL_RULES_LOG_LEVEL;
  const accessToken = env.GMAIL_ACCESS_TOKEN?.trim();
  const tokenPath = env.GMAIL_TOKEN_PATH?.trim();

  return {
    databasePath: dbPath ? path.resolve(dbPath) : DEFAULT_CONFIG.databasePath,
    actionConcurrency: concurrency
      ? parsePositiveInt("MAIL_RULES_ACTION_CONCURRENCY", concurrency)
      : DEFAULT_CONFIG.actionConcurrency,
    fetchBatchSize: batchSize
      ? parsePositiveInt("MAIL_RULES_FETCH_BATCH_SIZE", batchSize, MAX_FETCH_BATCH_SIZE)
      : DEFAULT_CONFIG.fetchBatchSize,
    logLevel: logLevel ? parseLogLevel(logLevel) : DEFAULT_CONFIG.logLevel,
    gmail: {
      accessToken: accessToken ? accessToken : null,
      tokenPath: tokenPath ? path.resolve(tokenPath) : DEFAULT_CONFIG.gmail.tokenPath,
    },
  };
}
