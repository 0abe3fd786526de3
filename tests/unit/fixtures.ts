/**
 * Shared test fixtures: an in-memory mailbox and a scriptable mail provider.
 */

import type { IncomingEmail, User, Folder } from "../../src/types/index.js";
import type {
  ListMessagesOptions,
  MailProvider,
  MessagePage,
  ProviderAction,
  ProviderFolder,
} from "../../src/providers/mail-provider.js";
import { openDatabase, type SqliteDatabase } from "../../src/storage/sqlite.js";
import { createUserRepository, type UserRepository } from "../../src/storage/users.js";
import { createFolderRepository, type FolderRepository } from "../../src/storage/folders.js";
import { createEmailRepository, type EmailRepository } from "../../src/storage/emails.js";
import { createWorkflowStore, type WorkflowStore } from "../../src/storage/workflows.js";

export const OWNER = "owner@example.com";

export interface AppliedAction {
  providerMessageId: string;
  action: ProviderAction;
}

/**
 * In-process MailProvider. Pages are addressed by their index as page token.
 */
export class FakeMailProvider implements MailProvider {
  address = OWNER;
  folders: ProviderFolder[] = [];
  pages: MessagePage[] = [];
  applied: AppliedAction[] = [];
  listCalls: ListMessagesOptions[] = [];
  /** Provider message ids whose actions are rejected */
  failFor = new Set<string>();
  /** Called before each action is applied */
  onApply: ((providerMessageId: string) => void) | null = null;

  async authenticate(): Promise<string> {
    return this.address;
  }

  async listFolders(): Promise<ProviderFolder[]> {
    return this.folders;
  }

  async listMessages(options: ListMessagesOptions): Promise<MessagePage> {
    this.listCalls.push(options);
    const index = options.pageToken ? Number(options.pageToken) : 0;
    return this.pages[index] ?? { messages: [], nextPageToken: null };
  }

  async applyAction(providerMessageId: string, action: ProviderAction): Promise<void> {
    this.onApply?.(providerMessageId);
    if (this.failFor.has(providerMessageId)) {
      throw new Error(`Provider rejected ${providerMessageId}`);
    }
    this.applied.push({ providerMessageId, action });
  }
}

export function incoming(overrides: Partial<IncomingEmail> & { providerId: string }): IncomingEmail {
  return {
    subject: null,
    from: { name: null, email: "sender@example.com" },
    to: [],
    cc: [],
    body: null,
    bodyPlainText: null,
    receivedAt: new Date("2026-01-01T00:00:00.000Z"),
    isRead: false,
    folderProviderIds: [],
    attachments: [],
    ...overrides,
  };
}

export interface Mailbox {
  database: SqliteDatabase;
  users: UserRepository;
  folders: FolderRepository;
  emails: EmailRepository;
  store: WorkflowStore;
  user: User;
  inbox: Folder;
  archive: Folder;
}

/**
 * Fresh in-memory database with one user, an INBOX and an Archive folder.
 */
export async function createMailbox(): Promise<Mailbox> {
  const database = openDatabase(":memory:");
  const users = createUserRepository(database);
  const folders = createFolderRepository(database);
  const emails = createEmailRepository(database);
  const store = createWorkflowStore(database);

  const user = await users.upsertUser(OWNER);
  const inbox = await folders.upsertFolder(user.id, {
    providerId: "INBOX",
    name: "INBOX",
    type: "system",
  });
  const archive = await folders.upsertFolder(user.id, {
    providerId: "Label_1",
    name: "Archive",
    type: "user",
  });

  return { database, users, folders, emails, store, user, inbox, archive };
}

/**
 * Store an email in the INBOX and return its local id.
 */
export async function storeEmail(
  mailbox: Mailbox,
  overrides: Partial<IncomingEmail> & { providerId: string }
): Promise<number> {
  const { email } = await mailbox.emails.upsertEmail(mailbox.user.id, incoming(overrides), [
    mailbox.inbox.id,
  ]);
  return email.id;
}

/**
 * Date `days` days before `reference`.
 */
export function daysBefore(reference: Date, days: number): Date {
  return new Date(reference.getTime() - days * 24 * 60 * 60 * 1000);
}
