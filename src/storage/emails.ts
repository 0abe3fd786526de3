/**
 * Emails Storage
 *
 * The locally mirrored messages with their recipients, attachments and
 * folder links. The fetcher writes here; the rule engine reads candidates
 * and updates read state and folder links after an action.
 */

import type { Email, EmailRecipient, IncomingEmail, RecipientType } from "../types/email.js";
import type { SqlFragment } from "../rules/sql.js";
import { withStorage, toRowId, type SqliteDatabase } from "./sqlite.js";

interface EmailRow {
  id: number;
  user_id: number;
  provider_id: string;
  subject: string | null;
  sender_name: string | null;
  sender_email_address: string;
  body: string | null;
  body_plain_text: string | null;
  received_timestamp: string;
  is_read: number;
}

interface RecipientRow {
  email_id: number;
  name: string | null;
  email_address: string | null;
  type: RecipientType;
}

interface FolderNameRow {
  email_id: number;
  name: string;
}

/** Last row of the previous page */
interface PageCursor {
  receivedTimestamp: string;
  id: number;
}

/** Candidate emails loaded per page while matching */
export const MATCH_BATCH_SIZE = 50;

export interface UpsertEmailResult {
  email: Email;
  /** False when the provider id was already stored for this user */
  created: boolean;
}

export interface EmailRepository {
  /**
   * Store a message unless the user already has one with the same provider id.
   */
  upsertEmail(userId: number, email: IncomingEmail, folderIds: number[]): Promise<UpsertEmailResult>;

  getEmail(id: number): Promise<Email | null>;

  /**
   * Emails of one user matching a rendered filter, oldest first, in pages of
   * at most `batchSize`. Pages are keyed on (received time, id), so rows an
   * action changes between pages are neither repeated nor skipped.
   */
  matchingBatches(userId: number, filter: SqlFragment, batchSize?: number): AsyncGenerator<Email[]>;

  /** Every page of matchingBatches at once */
  findMatching(userId: number, filter: SqlFragment): Promise<Email[]>;

  /** Synchronous so it can run inside a caller's transaction */
  setReadState(emailId: number, isRead: boolean): void;

  /** Replace every folder link of an email. Synchronous, like setReadState. */
  replaceFolders(emailId: number, folderIds: number[]): void;
}

const EMAIL_COLUMNS = `e.id, e.user_id, e.provider_id, e.subject, e.sender_name, e.sender_email_address,
  e.body, e.body_plain_text, e.received_timestamp, e.is_read`;

const TOUCH_SQL = "updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

const PAGE_ORDER = "ORDER BY e.received_timestamp ASC, e.id ASC LIMIT ?";

function groupByEmail<T extends { email_id: number }>(rows: T[]): Map<number, T[]> {
  const groups = new Map<number, T[]>();
  for (const row of rows) {
    const group = groups.get(row.email_id);
    if (group) group.push(row);
    else groups.set(row.email_id, [row]);
  }
  return groups;
}

export function createEmailRepository(database: SqliteDatabase): EmailRepository {
  const selectById = database.prepare<[number], EmailRow>(
    `SELECT ${EMAIL_COLUMNS} FROM emails e WHERE e.id = ?`
  );
  const selectIdByProvider = database.prepare<[number, string], { id: number }>(
    "SELECT id FROM emails WHERE user_id = ? AND provider_id = ? LIMIT 1"
  );
  const insertEmail = database.prepare(
    `INSERT INTO emails (user_id, provider_id, subject, sender_name, sender_email_address,
       body, body_plain_text, received_timestamp, is_read)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const insertRecipient = database.prepare(
    "INSERT INTO email_recipients (email_id, name, email_address, type) VALUES (?, ?, ?, ?)"
  );
  const insertAttachment = database.prepare(
    "INSERT INTO email_attachments (email_id, name, mime_type) VALUES (?, ?, ?)"
  );
  const linkFolder = database.prepare(
    "INSERT INTO email_folders (email_id, folder_id) VALUES (?, ?) ON CONFLICT(email_id, folder_id) DO NOTHING"
  );
  const unlinkFolders = database.prepare("DELETE FROM email_folders WHERE email_id = ?");
  const updateReadState = database.prepare(`UPDATE emails SET is_read = ?, ${TOUCH_SQL} WHERE id = ?`);
  const touchEmail = database.prepare(`UPDATE emails SET ${TOUCH_SQL} WHERE id = ?`);

  // Two queries per page, not per email
  const hydrateAll = (rows: EmailRow[]): Email[] => {
    if (rows.length === 0) return [];
    const ids = rows.map((row) => row.id);
    const placeholders = ids.map(() => "?").join(", ");

    const recipients = groupByEmail(
      database
        .prepare<number[], RecipientRow>(
          `SELECT email_id, name, email_address, type FROM email_recipients
           WHERE email_id IN (${placeholders}) ORDER BY id`
        )
        .all(...ids)
    );
    const folders = groupByEmail(
      database
        .prepare<number[], FolderNameRow>(
          `SELECT ef.email_id, f.name FROM email_folders ef JOIN folders f ON f.id = ef.folder_id
           WHERE ef.email_id IN (${placeholders}) ORDER BY f.name`
        )
        .all(...ids)
    );

    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      providerId: row.provider_id,
      subject: row.subject,
      senderName: row.sender_name,
      senderEmailAddress: row.sender_email_address,
      body: row.body,
      bodyPlainText: row.body_plain_text,
      receivedAt: new Date(row.received_timestamp),
      isRead: row.is_read === 1,
      recipients: (recipients.get(row.id) ?? []).map(
        (r): EmailRecipient => ({ name: r.name, email: r.email_address, type: r.type })
      ),
      folders: (folders.get(row.id) ?? []).map((f) => f.name),
    }));
  };

  const hydrate = (row: EmailRow): Email => {
    const [email] = hydrateAll([row]);
    if (!email) throw new Error(`Email ${row.id} could not be loaded`);
    return email;
  };

  async function* matchingBatches(
    userId: number,
    filter: SqlFragment,
    batchSize: number = MATCH_BATCH_SIZE
  ): AsyncGenerator<Email[]> {
    const limit = Math.max(1, Math.floor(batchSize));
    const select = `SELECT ${EMAIL_COLUMNS} FROM emails e WHERE e.user_id = ? AND (${filter.sql})`;

    let cursor: PageCursor | null = null;
    for (;;) {
      const after: PageCursor | null = cursor;
      const rows: EmailRow[] = withStorage("Resolve matching emails", () =>
        after
          ? database
              .prepare<unknown[], EmailRow>(`${select} AND (e.received_timestamp, e.id) > (?, ?) ${PAGE_ORDER}`)
              .all(userId, ...filter.params, after.receivedTimestamp, after.id, limit)
          : database.prepare<unknown[], EmailRow>(`${select} ${PAGE_ORDER}`).all(userId, ...filter.params, limit)
      );
      const last = rows[rows.length - 1];
      if (!last) return;

      yield withStorage("Load matching emails", () => hydrateAll(rows));
      if (rows.length < limit) return;
      cursor = { receivedTimestamp: last.received_timestamp, id: last.id };
    }
  }

  const insertIncoming = database.transaction(
    (userId: number, email: IncomingEmail, folderIds: number[]): { id: number; created: boolean } => {
      const existing = selectIdByProvider.get(userId, email.providerId);
      if (existing) return { id: existing.id, created: false };

      const result = insertEmail.run(
        userId,
        email.providerId,
        email.subject,
        email.from.name,
        (email.from.email ?? "").toLowerCase(),
        email.body,
        email.bodyPlainText,
        email.receivedAt.toISOString(),
        email.isRead ? 1 : 0
      );
      const emailId = toRowId(result.lastInsertRowid);

      for (const to of email.to) {
        insertRecipient.run(emailId, to.name, to.email?.toLowerCase() ?? null, "to");
      }
      for (const cc of email.cc) {
        insertRecipient.run(emailId, cc.name, cc.email?.toLowerCase() ?? null, "cc");
      }
      for (const folderId of folderIds) {
        linkFolder.run(emailId, folderId);
      }
      for (const attachment of email.attachments) {
        insertAttachment.run(emailId, attachment.filename, attachment.mimeType);
      }

      return { id: emailId, created: true };
    }
  );

  const replace = database.transaction((emailId: number, folderIds: number[]) => {
    unlinkFolders.run(emailId);
    for (const folderId of folderIds) {
      linkFolder.run(emailId, folderId);
    }
    touchEmail.run(emailId);
  });

  return {
    async upsertEmail(userId, email, folderIds): Promise<UpsertEmailResult> {
      return withStorage("Store email", () => {
        const { id, created } = insertIncoming(userId, email, folderIds);
        const row = selectById.get(id);
        if (!row) throw new Error(`Email ${id} vanished after insert`);
        return { email: hydrate(row), created };
      });
    },

    async getEmail(id: number): Promise<Email | null> {
      return withStorage("Load email", () => {
        const row = selectById.get(id);
        return row ? hydrate(row) : null;
      });
    },

    matchingBatches,

    async findMatching(userId: number, filter: SqlFragment): Promise<Email[]> {
      const emails: Email[] = [];
      for await (const batch of matchingBatches(userId, filter)) {
        emails.push(...batch);
      }
      return emails;
    },

    setReadState(emailId: number, isRead: boolean): void {
      updateReadState.run(isRead ? 1 : 0, emailId);
    },

    replaceFolders(emailId: number, folderIds: number[]): void {
      replace(emailId, folderIds);
    },
  };
}
