/**
 * Mailbox mirror types.
 *
 * Shapes of the locally stored copy of a mailbox, as written by the fetcher
 * and read by the rule engine.
 */

export interface User {
  id: number;
  emailAddress: string;
  createdAt: Date;
  updatedAt: Date;
}

export type FolderType = "user" | "system";

export interface Folder {
  id: number;
  userId: number;
  name: string;
  type: FolderType;
  /** Label id on the provider side */
  providerId: string | null;
}

export type RecipientType = "to" | "cc";

/**
 * Parsed address header entry. Either part may be missing.
 */
export interface EmailAddress {
  name: string | null;
  email: string | null;
}

export interface EmailRecipient extends EmailAddress {
  type: RecipientType;
}

export interface Email {
  id: number;
  userId: number;
  /** Message id on the provider side */
  providerId: string;
  subject: string | null;
  senderName: string | null;
  senderEmailAddress: string;
  body: string | null;
  bodyPlainText: string | null;
  receivedAt: Date;
  isRead: boolean;
  recipients: EmailRecipient[];
  /** Names of the folders the email currently sits in */
  folders: string[];
}

/**
 * A message as handed over by a mail provider, before it is stored.
 */
export interface IncomingEmail {
  providerId: string;
  subject: string | null;
  from: EmailAddress;
  to: EmailAddress[];
  cc: EmailAddress[];
  body: string | null;
  bodyPlainText: string | null;
  receivedAt: Date;
  isRead: boolean;
  /** Provider folder (label) ids */
  folderProviderIds: string[];
  attachments: Array<{ filename: string; mimeType: string | null }>;
}
