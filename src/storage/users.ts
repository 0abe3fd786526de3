/**
 * Users Storage
 *
 * One row per mailbox owner, keyed by email address.
 */

import type { User } from "../types/email.js";
import { withStorage, type SqliteDatabase } from "./sqlite.js";

interface UserRow {
  id: number;
  email_address: string;
  created_at: string;
  updated_at: string;
}

export interface UserRepository {
  /** Insert the user if missing; return the stored row either way */
  upsertUser(emailAddress: string): Promise<User>;

  getUserByEmail(emailAddress: string): Promise<User | null>;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    emailAddress: row.email_address,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function createUserRepository(database: SqliteDatabase): UserRepository {
  const selectByEmail = database.prepare<[string], UserRow>(
    "SELECT id, email_address, created_at, updated_at FROM users WHERE email_address = ? LIMIT 1"
  );

  return {
    async upsertUser(emailAddress: string): Promise<User> {
      const address = emailAddress.trim().toLowerCase();
      return withStorage("Upsert user", () => {
        database
          .prepare("INSERT INTO users (email_address) VALUES (?) ON CONFLICT(email_address) DO NOTHING")
          .run(address);
        const row = selectByEmail.get(address);
        if (!row) throw new Error(`User ${address} vanished after insert`);
        return toUser(row);
      });
    },

    async getUserByEmail(emailAddress: string): Promise<User | null> {
      const row = withStorage("Load user", () => selectByEmail.get(emailAddress.trim().toLowerCase()));
      return row ? toUser(row) : null;
    },
  };
}
