import type { Kysely } from "kysely";
import type { DB } from "../db/kysely.js";
import type { User } from "./types.js";

export interface UserCredentials {
  id: number;
  username: string;
  password_hash: string;
  salt: string;
  created_at: string;
}

export interface NewUser {
  username: string;
  password_hash: string;
  salt: string;
}

function toUser(row: { id: number; username: string; created_at: string }): User {
  return { id: row.id, username: row.username, created_at: row.created_at };
}

export async function insertUser(db: Kysely<DB>, input: NewUser, now: string): Promise<User> {
  const row = await db
    .insertInto("users")
    .values({ ...input, created_at: now })
    .returning(["id", "username", "created_at"])
    .executeTakeFirstOrThrow();
  return toUser(row);
}

export async function getUserById(db: Kysely<DB>, id: number): Promise<User | null> {
  const row = await db
    .selectFrom("users")
    .select(["id", "username", "created_at"])
    .where("id", "=", id)
    .executeTakeFirst();
  return row ? toUser(row) : null;
}

/** `username` must already be normalized. */
export async function getUserByUsername(db: Kysely<DB>, username: string): Promise<User | null> {
  const row = await db
    .selectFrom("users")
    .select(["id", "username", "created_at"])
    .where("username", "=", username)
    .executeTakeFirst();
  return row ? toUser(row) : null;
}

export async function getCredentials(
  db: Kysely<DB>,
  username: string,
): Promise<UserCredentials | null> {
  const row = await db
    .selectFrom("users")
    .selectAll()
    .where("username", "=", username)
    .executeTakeFirst();
  return row ?? null;
}

export async function listUsers(db: Kysely<DB>): Promise<User[]> {
  const rows = await db
    .selectFrom("users")
    .select(["id", "username", "created_at"])
    .orderBy("username", "asc")
    .execute();
  return rows.map(toUser);
}

export async function findMissingUserIds(db: Kysely<DB>, ids: number[]): Promise<number[]> {
  if (ids.length === 0) {
    return [];
  }
  const rows = await db.selectFrom("users").select("id").where("id", "in", ids).execute();
  const found = new Set(rows.map((r) => r.id));
  return ids.filter((id) => !found.has(id));
}

// --- sessions ---

export async function insertSession(
  db: Kysely<DB>,
  session: { id: string; user_id: number; token_hash: string; expires_at: string },
  now: string,
): Promise<void> {
  await db
    .insertInto("sessions")
    .values({ ...session, created_at: now })
    .execute();
}

export async function getSessionUser(
  db: Kysely<DB>,
  tokenHash: string,
  now: string,
): Promise<User | null> {
  const row = await db
    .selectFrom("sessions")
    .innerJoin("users", "users.id", "sessions.user_id")
    .select(["users.id", "users.username", "users.created_at"])
    .where("sessions.token_hash", "=", tokenHash)
    .where("sessions.expires_at", ">", now)
    .executeTakeFirst();
  return row ? toUser(row) : null;
}

export async function deleteSession(db: Kysely<DB>, tokenHash: string): Promise<boolean> {
  const result = await db
    .deleteFrom("sessions")
    .where("token_hash", "=", tokenHash)
    .executeTakeFirst();
  return BigInt(result.numDeletedRows) > 0n;
}

export async function deleteExpiredSessions(db: Kysely<DB>, now: string): Promise<void> {
  await db.deleteFrom("sessions").where("expires_at", "<=", now).execute();
}
