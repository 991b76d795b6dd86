import type { Kysely } from "kysely";
import type { DB } from "../db/kysely.js";
import type { User, Session } from "./types.js";
import { attempt, ConflictError, NotFoundError, isUniqueViolation, type Result } from "../errors.js";
import { generateId } from "../id.js";
import { normalizeUsername, parseField, passwordSchema, usernameSchema } from "../validation.js";
import {
  generateSalt,
  generateSessionToken,
  hashPassword,
  hashSessionToken,
  verifyPassword,
} from "./password.js";
import {
  insertUser,
  getUserById,
  getUserByUsername,
  getCredentials,
  listUsers,
  insertSession,
  getSessionUser,
  deleteSession,
  deleteExpiredSessions,
} from "./repository.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export class IdentityService {
  constructor(private db: Kysely<DB>) {}

  async register(username: string, password: string): Promise<Result<User>> {
    return attempt(async () => {
      const normalized = parseField(usernameSchema, username, "username");
      parseField(passwordSchema, password, "password");

      if (await getUserByUsername(this.db, normalized)) {
        throw new ConflictError("Username already exists. Please choose another.");
      }

      const salt = generateSalt();
      try {
        return await insertUser(
          this.db,
          { username: normalized, password_hash: hashPassword(password, salt), salt },
          new Date().toISOString(),
        );
      } catch (err) {
        // Lost a race with a concurrent registration of the same name
        if (isUniqueViolation(err)) {
          throw new ConflictError("Username already exists. Please choose another.");
        }
        throw err;
      }
    });
  }

  async authenticate(username: string, password: string): Promise<Result<User | null>> {
    return attempt(async () => {
      const creds = await getCredentials(this.db, normalizeUsername(username));
      if (!creds || !verifyPassword(password, creds.salt, creds.password_hash)) {
        return null;
      }
      return { id: creds.id, username: creds.username, created_at: creds.created_at };
    });
  }

  async listAll(): Promise<Result<User[]>> {
    return attempt(() => listUsers(this.db));
  }

  async getById(id: number): Promise<Result<User | null>> {
    return attempt(() => getUserById(this.db, id));
  }

  async findByUsername(username: string): Promise<Result<User | null>> {
    return attempt(() => getUserByUsername(this.db, normalizeUsername(username)));
  }

  /** Maps usernames to users, failing on the first one that does not exist. */
  async resolveUsernames(usernames: string[]): Promise<Result<User[]>> {
    return attempt(async () => {
      const users: User[] = [];
      for (const name of usernames) {
        const user = await getUserByUsername(this.db, normalizeUsername(name));
        if (!user) {
          throw new NotFoundError(`User '${name}' not found.`);
        }
        users.push(user);
      }
      return users;
    });
  }

  async createSession(userId: number, ttlDays: number): Promise<Result<Session>> {
    return attempt(async () => {
      const user = await getUserById(this.db, userId);
      if (!user) {
        throw new NotFoundError("User not found.");
      }
      const now = new Date();
      const token = generateSessionToken();
      const session: Session = {
        id: generateId(),
        token,
        user_id: userId,
        expires_at: new Date(now.getTime() + ttlDays * DAY_MS).toISOString(),
      };
      await deleteExpiredSessions(this.db, now.toISOString());
      await insertSession(
        this.db,
        {
          id: session.id,
          user_id: session.user_id,
          token_hash: hashSessionToken(token),
          expires_at: session.expires_at,
        },
        now.toISOString(),
      );
      return session;
    });
  }

  async resolveSession(token: string, now?: Date): Promise<Result<User | null>> {
    return attempt(() =>
      getSessionUser(this.db, hashSessionToken(token), (now ?? new Date()).toISOString()),
    );
  }

  async revokeSession(token: string): Promise<Result<boolean>> {
    return attempt(() => deleteSession(this.db, hashSessionToken(token)));
  }
}
