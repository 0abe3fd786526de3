/**
 * Shared plumbing for CLI commands.
 */

import { createApp, type App } from "../app.js";
import { loadConfig } from "../config.js";
import { createConsoleLogger } from "../logger.js";
import { errorMessage } from "../errors.js";

/**
 * Build the application from the environment, run `fn`, and close the
 * database afterwards whatever happens.
 */
export async function withApp<T>(fn: (app: App) => Promise<T>): Promise<T> {
  const config = loadConfig();
  const logger = createConsoleLogger("MailRules", config.logLevel);
  const app = createApp({ config, logger });
  try {
    return await fn(app);
  } finally {
    app.close();
  }
}

/**
 * Print a command failure and set a non-zero exit code.
 */
export function reportFailure(err: unknown): void {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
}

/**
 * Abort signal tied to Ctrl-C for the duration of `fn`.
 */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error("Interrupted; finishing in-flight work...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
