import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EmailFetcher } from "../../../src/services/email-fetcher.js";
import { createSilentLogger } from "../../../src/logger.js";
import { openDatabase, type SqliteDatabase } from "../../../src/storage/sqlite.js";
import { createUserRepository, type UserRepository } from "../../../src/storage/users.js";
import { createFolderRepository, type FolderRepository } from "../../../src/storage/folders.js";
import { createEmailRepository, type EmailRepository } from "../../../src/storage/emails.js";
import { StorageError } from "../../../src/errors.js";
import { FakeMailProvider, OWNER, incoming } from "../fixtures.js";

describe("EmailFetcher", () => {
  let database: SqliteDatabase;
  let users: UserRepository;
  let folders: FolderRepository;
  let emails: EmailRepository;
  let provider: FakeMailProvider;

  beforeEach(() => {
    database = openDatabase(":memory:");
    users = createUserRepository(database);
    folders = createFolderRepository(database);
    emails = createEmailRepository(database);
    provider = new FakeMailProvider();
    provider.folders = [
      { providerId: "INBOX", name: "INBOX", type: "system" },
      { providerId: "Label_1", name: "Archive", type: "user" },
    ];
    provider.pages = [
      {
        messages: [
          incoming({ providerId: "m1", folderProviderIds: ["INBOX"] }),
          incoming({ providerId: "m2", folderProviderIds: ["INBOX", "Label_1", "Label_404"] }),
        ],
        nextPageToken: "1",
      },
      {
        messages: [incoming({ providerId: "m1" }), incoming({ providerId: "m3", subject: "Third" })],
        nextPageToken: null,
      },
    ];
  });

  afterEach(() => {
    database.close();
  });

  function createFetcher(emailRepository: EmailRepository = emails): EmailFetcher {
    return new EmailFetcher({
      provider,
      users,
      folders,
      emails: emailRepository,
      logger: createSilentLogger(),
      pageSize: 50,
    });
  }

  it("mirrors folders and every page of messages", async () => {
    const summary = await createFetcher().fetch();

    expect(summary).toMatchObject({
      foldersSynced: 2,
      messagesSeen: 4,
      stored: 3,
      alreadyStored: 1,
      failed: 0,
    });
    expect(summary.user.emailAddress).toBe(OWNER);
    expect(provider.listCalls).toEqual([{ pageSize: 50 }, { pageSize: 50, pageToken: "1" }]);

    const all = await emails.findMatching(summary.user.id, { sql: "1 = 1", params: [] });
    expect(all.map((email) => [email.providerId, email.folders])).toEqual([
      ["m1", ["INBOX"]],
      ["m2", ["Archive", "INBOX"]],
      ["m3", []],
    ]);
  });

  it("is idempotent", async () => {
    await createFetcher().fetch();
    const second = await createFetcher().fetch();

    expect(second).toMatchObject({ stored: 0, alreadyStored: 4 });
    expect((await folders.getAllFolders(second.user.id)).length).toBe(2);
  });

  it("honours the folder filter and page limit", async () => {
    const summary = await createFetcher().fetch({ folder: "INBOX", maxPages: 1 });

    expect(summary.messagesSeen).toBe(2);
    expect(provider.listCalls).toEqual([{ pageSize: 50, folder: "INBOX" }]);
  });

  it("counts messages it cannot store and carries on", async () => {
    const failing: EmailRepository = {
      ...emails,
      upsertEmail: async (userId, email, folderIds) => {
        if (email.providerId === "m2") throw new StorageError("Store email failed: disk full");
        return emails.upsertEmail(userId, email, folderIds);
      },
    };

    const summary = await createFetcher(failing).fetch();

    expect(summary).toMatchObject({ messagesSeen: 4, stored: 2, alreadyStored: 1, failed: 1 });
  });
});
