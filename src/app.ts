/**
 * Composition root.
 *
 * Wires configuration, storage, provider and services together for the CLI
 * (and for anything else that wants the whole stack).
 */

import type { AppConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { MailProvider } from "./providers/mail-provider.js";
import { GmailProvider } from "./providers/gmail.js";
import { openDatabase, type SqliteDatabase } from "./storage/sqlite.js";
import { createUserRepository, type UserRepository } from "./storage/users.js";
import { createFolderRepository, type FolderRepository } from "./storage/folders.js";
import { createEmailRepository, type EmailRepository } from "./storage/emails.js";
import { createWorkflowStore, type WorkflowStore } from "./storage/workflows.js";
import { ActionExecutor } from "./services/action-executor.js";
import { WorkflowEngine } from "./services/workflow-engine.js";
import { EmailFetcher } from "./services/email-fetcher.js";

export interface App {
  config: AppConfig;
  logger: Logger;
  database: SqliteDatabase;
  provider: MailProvider;
  users: UserRepository;
  folders: FolderRepository;
  emails: EmailRepository;
  workflows: WorkflowStore;
  engine: WorkflowEngine;
  fetcher: EmailFetcher;
  close(): void;
}

export interface CreateAppOptions {
  config: AppConfig;
  logger: Logger;
  /** Defaults to Gmail */
  provider?: MailProvider;
  /** Defaults to opening config.databasePath */
  database?: SqliteDatabase;
}

export function createApp(options: CreateAppOptions): App {
  const { config, logger } = options;
  const database = options.database ?? openDatabase(config.databasePath);
  const provider =
    options.provider ?? new GmailProvider({ config: config.gmail, logger: logger.child("Gmail") });

  const users = createUserRepository(database);
  const folders = createFolderRepository(database);
  const emails = createEmailRepository(database);
  const workflows = createWorkflowStore(database);

  const executor = new ActionExecutor({
    provider,
    folders,
    emails,
    logger: logger.child("Action"),
  });
  const engine = new WorkflowEngine({
    store: workflows,
    emails,
    executor,
    logger: logger.child("Engine"),
    actionConcurrency: config.actionConcurrency,
  });
  const fetcher = new EmailFetcher({
    provider,
    users,
    folders,
    emails,
    logger: logger.child("Fetch"),
    pageSize: config.fetchBatchSize,
  });

  return {
    config,
    logger,
    database,
    provider,
    users,
    folders,
    emails,
    workflows,
    engine,
    fetcher,
    close: () => database.close(),
  };
}
