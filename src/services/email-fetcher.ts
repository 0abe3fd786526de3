/**
 * Email fetcher.
 *
 * Mirrors the provider mailbox into local storage: the owner, their folders,
 * then every message page by page. Messages already stored are skipped.
 */

import type { MailProvider } from "../providers/mail-provider.js";
import type { UserRepository } from "../storage/users.js";
import type { FolderRepository } from "../storage/folders.js";
import type { EmailRepository } from "../storage/emails.js";
import type { Logger } from "../logger.js";
import type { User } from "../types/email.js";
import { StorageError, errorMessage } from "../errors.js";

export interface FetchOptions {
  /** Only mirror one folder, by name */
  folder?: string;
  /** Stop after this many pages */
  maxPages?: number;
}

export interface FetchSummary {
  user: User;
  foldersSynced: number;
  messagesSeen: number;
  stored: number;
  alreadyStored: number;
  failed: number;
}

export interface EmailFetcherDeps {
  provider: MailProvider;
  users: UserRepository;
  folders: FolderRepository;
  emails: EmailRepository;
  logger: Logger;
  pageSize: number;
}

export class EmailFetcher {
  private deps: EmailFetcherDeps;

  constructor(deps: EmailFetcherDeps) {
    this.deps = deps;
  }

  async fetch(options: FetchOptions = {}): Promise<FetchSummary> {
    const { provider, users, folders, emails, logger, pageSize } = this.deps;

    const address = await provider.authenticate();
    const user = await users.upsertUser(address);

    const remoteFolders = await provider.listFolders();
    for (const folder of remoteFolders) {
      await folders.upsertFolder(user.id, folder);
    }
    const folderIdByProviderId = new Map<string, number>();
    for (const folder of await folders.getAllFolders(user.id)) {
      if (folder.providerId) folderIdByProviderId.set(folder.providerId, folder.id);
    }
    logger.info(`Synced ${remoteFolders.length} folders for ${user.emailAddress}`);

    const summary: FetchSummary = {
      user,
      foldersSynced: remoteFolders.length,
      messagesSeen: 0,
      stored: 0,
      alreadyStored: 0,
      failed: 0,
    };

    let pageToken: string | undefined;
    let pages = 0;
    do {
      const page = await provider.listMessages({
        pageSize,
        ...(options.folder ? { folder: options.folder } : {}),
        ...(pageToken ? { pageToken } : {}),
      });
      pages++;

      for (const message of page.messages) {
        summary.messagesSeen++;
        const folderIds = message.folderProviderIds
          .map((id) => folderIdByProviderId.get(id))
          .filter((id): id is number => id !== undefined);
        try {
          const { created } = await emails.upsertEmail(user.id, message, folderIds);
          if (created) summary.stored++;
          else summary.alreadyStored++;
        } catch (err) {
          if (!(err instanceof StorageError)) throw err;
          summary.failed++;
          logger.error(`Could not store message ${message.providerId}: ${errorMessage(err)}`);
        }
      }

      logger.info(`Fetched page ${pages}: ${summary.messagesSeen} messages so far`);
      pageToken = page.nextPageToken ?? undefined;
    } while (pageToken && (options.maxPages === undefined || pages < options.maxPages));

    return summary;
  }
}
