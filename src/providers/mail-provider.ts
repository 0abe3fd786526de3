/**
 * Mail provider capability.
 *
 * What the rest of the system needs from a remote mailbox: who the user is,
 * which folders exist, a paged message listing, and applying an action to
 * one message.
 */

import type { FolderType, IncomingEmail } from "../types/email.js";

export interface ProviderFolder {
  providerId: string;
  name: string;
  type: FolderType;
}

export interface ListMessagesOptions {
  /** Restrict to one folder, by name */
  folder?: string;
  pageSize: number;
  pageToken?: string;
}

export interface MessagePage {
  messages: IncomingEmail[];
  nextPageToken: string | null;
}

/**
 * Action as the provider sees it. `move` names the destination folder by its
 * provider-side id.
 */
export type ProviderAction =
  | { type: "mark_as_read" }
  | { type: "move"; folderProviderId: string; folderName: string };

export interface MailProvider {
  /** Verify credentials; returns the mailbox owner's address */
  authenticate(): Promise<string>;

  listFolders(): Promise<ProviderFolder[]>;

  listMessages(options: ListMessagesOptions): Promise<MessagePage>;

  /**
   * Apply one action to one message. Rejects on failure; no retries.
   */
  applyAction(providerMessageId: string, action: ProviderAction): Promise<void>;
}
