/**
 * Folders Storage
 *
 * Local copies of the provider's folders (Gmail labels) per user.
 */

import type { Folder, FolderType } from "../types/email.js";
import { withStorage, toRowId, type SqliteDatabase } from "./sqlite.js";

interface FolderRow {
  id: number;
  user_id: number;
  name: string;
  type: FolderType;
  provider_id: string | null;
}

export interface FolderInput {
  providerId: string;
  name: string;
  type: FolderType;
}

export interface FolderRepository {
  /**
   * Insert or update a folder. An existing row is matched by provider id
   * first, then by name.
   */
  upsertFolder(userId: number, folder: FolderInput): Promise<Folder>;

  getAllFolders(userId: number): Promise<Folder[]>;

  /** Case-insensitive lookup by display name */
  findFolderByName(userId: number, name: string): Promise<Folder | null>;
}

const FOLDER_COLUMNS = "id, user_id, name, type, provider_id";

function toFolder(row: FolderRow): Folder {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    type: row.type,
    providerId: row.provider_id,
  };
}

export function createFolderRepository(database: SqliteDatabase): FolderRepository {
  const selectById = database.prepare<[number], FolderRow>(
    `SELECT ${FOLDER_COLUMNS} FROM folders WHERE id = ?`
  );
  const selectByProviderId = database.prepare<[number, string], FolderRow>(
    `SELECT ${FOLDER_COLUMNS} FROM folders WHERE user_id = ? AND provider_id = ? LIMIT 1`
  );
  const selectByName = database.prepare<[number, string], FolderRow>(
    `SELECT ${FOLDER_COLUMNS} FROM folders WHERE user_id = ? AND lower(name) = lower(?)
     ORDER BY id LIMIT 1`
  );

  const upsert = database.transaction((userId: number, folder: FolderInput): FolderRow => {
    const existing =
      selectByProviderId.get(userId, folder.providerId) ?? selectByName.get(userId, folder.name);

    if (existing) {
      database
        .prepare(
          `UPDATE folders
           SET provider_id = ?, name = ?, type = ?, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
           WHERE id = ?`
        )
        .run(folder.providerId, folder.name, folder.type, existing.id);
      return { ...existing, provider_id: folder.providerId, name: folder.name, type: folder.type };
    }

    const result = database
      .prepare("INSERT INTO folders (user_id, provider_id, name, type) VALUES (?, ?, ?, ?)")
      .run(userId, folder.providerId, folder.name, folder.type);
    const inserted = selectById.get(toRowId(result.lastInsertRowid));
    if (!inserted) throw new Error(`Folder ${folder.name} vanished after insert`);
    return inserted;
  });

  return {
    async upsertFolder(userId: number, folder: FolderInput): Promise<Folder> {
      return toFolder(withStorage("Upsert folder", () => upsert(userId, folder)));
    },

    async getAllFolders(userId: number): Promise<Folder[]> {
      const rows = withStorage("List folders", () =>
        database
          .prepare<[number], FolderRow>(`SELECT ${FOLDER_COLUMNS} FROM folders WHERE user_id = ? ORDER BY name`)
          .all(userId)
      );
      return rows.map(toFolder);
    },

    async findFolderByName(userId: number, name: string): Promise<Folder | null> {
      const row = withStorage("Find folder", () => selectByName.get(userId, name.trim()));
      return row ? toFolder(row) : null;
    },
  };
}
