/**
 * Gmail provider.
 *
 * Talks to the Gmail REST API with a bearer token. Obtaining the token
 * (OAuth consent) happens elsewhere; this client only reads it from config
 * or from a token file.
 */

import * as fs from "node:fs";
import { z } from "zod";
import type { GmailConfig } from "../config.js";
import type { EmailAddress, IncomingEmail } from "../types/email.js";
import type { Logger } from "../logger.js";
import { AuthenticationError, ProviderError, errorMessage } from "../errors.js";
import { mapWithConcurrency } from "../services/concurrency.js";
import { parseAddress, parseAddressList } from "./address-parser.js";
import type {
  ListMessagesOptions,
  MailProvider,
  MessagePage,
  ProviderAction,
  ProviderFolder,
} from "./mail-provider.js";

const GMAIL_API_BASE = "https://gmail.googleapis.com/gmail/v1/users/me";

/** Parallel message detail requests per page */
const DETAIL_CONCURRENCY = 5;

/** Labels that describe message state rather than location */
export const MESSAGE_STATUS_LABELS: readonly string[] = ["SENT", "STARRED", "UNREAD", "IMPORTANT"];

export function isFolderLabel(labelId: string): boolean {
  return !MESSAGE_STATUS_LABELS.includes(labelId) && !labelId.startsWith("CATEGORY_");
}

const tokenFileSchema = z.object({ access_token: z.string().min(1) });

const profileSchema = z.object({ emailAddress: z.string() });

const labelListSchema = z.object({
  labels: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        type: z.enum(["system", "user"]).catch("user"),
      })
    )
    .default([]),
});

const messageListSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).default([]),
  nextPageToken: z.string().optional(),
});

interface GmailPart {
  mimeType?: string | undefined;
  filename?: string | undefined;
  headers?: Array<{ name: string; value: string }> | undefined;
  body?: { data?: string | undefined } | undefined;
  parts?: GmailPart[] | undefined;
}

const partSchema: z.ZodType<GmailPart> = z.lazy(() =>
  z.object({
    mimeType: z.string().optional(),
    filename: z.string().optional(),
    headers: z.array(z.object({ name: z.string(), value: z.string() })).optional(),
    body: z.object({ data: z.string().optional() }).optional(),
    parts: z.array(partSchema).optional(),
  })
);

const messageSchema = z.object({
  id: z.string(),
  labelIds: z.array(z.string()).default([]),
  internalDate: z.string().optional(),
  payload: partSchema.optional(),
});

export type GmailMessage = z.infer<typeof messageSchema>;

export interface GmailProviderOptions {
  config: GmailConfig;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

function decodeBase64Url(data: string): string {
  return Buffer.from(data, "base64url").toString("utf-8");
}

interface ParsedBody {
  html: string | null;
  plain: string | null;
  attachments: Array<{ filename: string; mimeType: string | null }>;
}

function collectBody(part: GmailPart, into: ParsedBody): void {
  if (part.parts && part.parts.length > 0) {
    for (const child of part.parts) collectBody(child, into);
    return;
  }

  if (part.filename) {
    into.attachments.push({ filename: part.filename, mimeType: part.mimeType ?? null });
    return;
  }

  const data = part.body?.data;
  if (!data) return;
  if (part.mimeType === "text/plain") into.plain = decodeBase64Url(data);
  else if (part.mimeType === "text/html") into.html = decodeBase64Url(data);
}

/**
 * Convert a full-format Gmail message into the storage shape.
 */
export function parseGmailMessage(message: GmailMessage): IncomingEmail {
  const headers = new Map<string, string>();
  for (const header of message.payload?.headers ?? []) {
    headers.set(header.name.toLowerCase(), header.value);
  }

  const body: ParsedBody = { html: null, plain: null, attachments: [] };
  if (message.payload) collectBody(message.payload, body);

  const from: EmailAddress = parseAddress(headers.get("from"));
  const receivedMs = Number(message.internalDate ?? "0");

  return {
    providerId: message.id,
    subject: headers.get("subject") ?? null,
    from,
    to: parseAddressList(headers.get("to")),
    cc: parseAddressList(headers.get("cc")),
    body: body.html ?? body.plain,
    bodyPlainText: body.plain,
    receivedAt: new Date(Number.isFinite(receivedMs) ? receivedMs : 0),
    isRead: !message.labelIds.includes("UNREAD"),
    folderProviderIds: message.labelIds.filter(isFolderLabel),
    attachments: body.attachments,
  };
}

export class GmailProvider implements MailProvider {
  private config: GmailConfig;
  private logger: Logger;
  private fetchImpl: typeof fetch;
  private token: string | null = null;

  constructor(options: GmailProviderOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private async getToken(): Promise<string> {
    if (this.token) return this.token;
    if (this.config.accessToken) {
      this.token = this.config.accessToken;
      return this.token;
    }

    let raw: string;
    try {
      raw = await fs.promises.readFile(this.config.tokenPath, "utf-8");
    } catch (err) {
      throw new AuthenticationError(
        `No Gmail access token: set GMAIL_ACCESS_TOKEN or provide ${this.config.tokenPath}`,
        { cause: err }
      );
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (err) {
      throw new AuthenticationError(`Gmail token file is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }
    const parsed = tokenFileSchema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new AuthenticationError(`Gmail token file ${this.config.tokenPath} has no access_token`);
    }
    this.token = parsed.data.access_token;
    return this.token;
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: RequestInit = {}
  ): Promise<T> {
    const token = await this.getToken();
    let res: Response;
    try {
      res = await this.fetchImpl(`${GMAIL_API_BASE}/${path}`, {
        ...init,
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json",
        },
      });
    } catch (err) {
      throw new ProviderError(`Gmail request failed: ${errorMessage(err)}`, null, { cause: err });
    }

    if (res.status === 401) {
      throw new AuthenticationError("Gmail rejected the access token");
    }
    if (!res.ok) {
      const text = await res.text();
      throw new ProviderError(`Gmail API error ${res.status}: ${text}`, res.status);
    }

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderError(`Unexpected Gmail response for ${path}: ${parsed.error.message}`, res.status);
    }
    return parsed.data;
  }

  async authenticate(): Promise<string> {
    const profile = await this.request("profile", profileSchema);
    this.logger.info(`Authenticated as ${profile.emailAddress}`);
    return profile.emailAddress;
  }

  async listFolders(): Promise<ProviderFolder[]> {
    const { labels } = await this.request("labels", labelListSchema);
    return labels
      .filter((label) => isFolderLabel(label.id))
      .map((label) => ({ providerId: label.id, name: label.name, type: label.type }));
  }

  async listMessages(options: ListMessagesOptions): Promise<MessagePage> {
    const params = new URLSearchParams({ maxResults: String(options.pageSize) });
    if (options.folder) params.set("q", `in:${options.folder.toLowerCase()}`);
    if (options.pageToken) params.set("pageToken", options.pageToken);

    const list = await this.request(`messages?${params}`, messageListSchema);
    this.logger.debug(`Listed ${list.messages.length} messages`, { pageToken: options.pageToken ?? null });

    const messages = await mapWithConcurrency(list.messages, DETAIL_CONCURRENCY, (ref) =>
      this.request(`messages/${encodeURIComponent(ref.id)}?format=full`, messageSchema)
    );

    return {
      messages: messages.map(parseGmailMessage),
      nextPageToken: list.nextPageToken ?? null,
    };
  }

  async applyAction(providerMessageId: string, action: ProviderAction): Promise<void> {
    const id = encodeURIComponent(providerMessageId);

    if (action.type === "mark_as_read") {
      await this.modify(id, [], ["UNREAD"]);
      return;
    }

    const current = await this.request(`messages/${id}?format=minimal`, messageSchema);
    const removeLabelIds = current.labelIds
      .filter(isFolderLabel)
      .filter((label) => label !== action.folderProviderId);
    await this.modify(id, [action.folderProviderId], removeLabelIds);
  }

  private async modify(id: string, addLabelIds: string[], removeLabelIds: string[]): Promise<void> {
    await this.request(`messages/${id}/modify`, messageSchema, {
      method: "POST",
      body: JSON.stringify({ addLabelIds, removeLabelIds }),
    });
  }
}
