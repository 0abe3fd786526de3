import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createMailbox, type Mailbox } from "../fixtures.js";

describe("Folder and user storage", () => {
  let mailbox: Mailbox;

  beforeEach(async () => {
    mailbox = await createMailbox();
  });

  afterEach(() => {
    mailbox.database.close();
  });

  it("normalizes user addresses", async () => {
    const again = await mailbox.users.upsertUser("  Owner@Example.COM ");

    expect(again.id).toBe(mailbox.user.id);
    expect(again.emailAddress).toBe("owner@example.com");
    expect(await mailbox.users.getUserByEmail("OWNER@example.com")).toEqual(mailbox.user);
    expect(await mailbox.users.getUserByEmail("nobody@example.com")).toBeNull();
  });

  it("updates a folder matched by provider id", async () => {
    const renamed = await mailbox.folders.upsertFolder(mailbox.user.id, {
      providerId: "Label_1",
      name: "Old Stuff",
      type: "user",
    });

    expect(renamed.id).toBe(mailbox.archive.id);
    expect((await mailbox.folders.getAllFolders(mailbox.user.id)).map((f) => f.name)).toEqual([
      "INBOX",
      "Old Stuff",
    ]);
  });

  it("adopts a folder matched by name", async () => {
    const adopted = await mailbox.folders.upsertFolder(mailbox.user.id, {
      providerId: "Label_9",
      name: "archive",
      type: "user",
    });

    expect(adopted).toEqual({ ...mailbox.archive, name: "archive", providerId: "Label_9" });
  });

  it("finds folders by name regardless of case", async () => {
    expect(await mailbox.folders.findFolderByName(mailbox.user.id, " ARCHIVE ")).toEqual(mailbox.archive);
    expect(await mailbox.folders.findFolderByName(mailbox.user.id, "Trash")).toBeNull();
  });

  it("keeps folders per user", async () => {
    const other = await mailbox.users.upsertUser("other@example.com");
    await mailbox.folders.upsertFolder(other.id, { providerId: "INBOX", name: "INBOX", type: "system" });

    expect(await mailbox.folders.getAllFolders(other.id)).toHaveLength(1);
    expect(await mailbox.folders.getAllFolders(mailbox.user.id)).toHaveLength(2);
  });
});
