import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import {
  createTestDb,
  createTestTracker,
  registerUsers,
  unwrap,
  TEST_PASSWORD,
} from "../helpers/test-db.js";
import type { Tracker } from "../../src/main.js";

describe("IdentityService", () => {
  let db: Database.Database;
  let tracker: Tracker;

  beforeEach(() => {
    db = createTestDb();
    tracker = createTestTracker(db);
  });

  afterEach(() => {
    db.close();
  });

  describe("register", () => {
    it("stores the username trimmed and lowercased", async () => {
      const user = unwrap(await tracker.identity.register("  Alice ", TEST_PASSWORD));
      expect(user.username).toBe("alice");
      expect(user.id).toBeGreaterThan(0);
    });

    it("treats case and whitespace variants as the same identity", async () => {
      unwrap(await tracker.identity.register("alice", TEST_PASSWORD));
      const again = await tracker.identity.register(" ALICE", "other-secret");
      expect(again.ok).toBe(false);
      if (!again.ok) {
        expect(again.error.kind).toBe("conflict");
        expect(again.error.message).toBe("Username already exists. Please choose another.");
      }
    });

    it("rejects short usernames", async () => {
      const result = await tracker.identity.register("al", TEST_PASSWORD);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("validation");
        expect(result.error.message).toBe("Username must be at least 3 characters long.");
      }
    });

    it("rejects short passwords", async () => {
      const result = await tracker.identity.register("alice", "12345");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("Password must be at least 6 characters long.");
      }
    });

    it("never stores the plain password", async () => {
      await tracker.identity.register("alice", TEST_PASSWORD);
      const row = db.prepare("SELECT password_hash, salt FROM users").get();
      expect(JSON.stringify(row)).not.toContain(TEST_PASSWORD);
    });
  });

  describe("authenticate", () => {
    beforeEach(async () => {
      await registerUsers(tracker, "alice");
    });

    it("returns the user for the right password", async () => {
      const user = unwrap(await tracker.identity.authenticate("alice", TEST_PASSWORD));
      expect(user?.username).toBe("alice");
    });

    it("normalizes the username before lookup", async () => {
      const user = unwrap(await tracker.identity.authenticate(" Alice ", TEST_PASSWORD));
      expect(user?.username).toBe("alice");
    });

    it("returns null for a wrong password", async () => {
      expect(unwrap(await tracker.identity.authenticate("alice", "wrong-secret"))).toBeNull();
    });

    it("returns null for an empty password", async () => {
      expect(unwrap(await tracker.identity.authenticate("alice", ""))).toBeNull();
    });

    it("returns null when the salt is given as the password", async () => {
      const row = db.prepare("SELECT salt FROM users WHERE username = 'alice'").get();
      const salt = row && typeof row === "object" && "salt" in row ? String(row.salt) : "";
      expect(salt).not.toBe("");
      expect(unwrap(await tracker.identity.authenticate("alice", salt))).toBeNull();
    });

    it("returns null for an unknown user", async () => {
      expect(unwrap(await tracker.identity.authenticate("nobody", TEST_PASSWORD))).toBeNull();
    });
  });

  describe("lookups", () => {
    it("lists users ordered by username", async () => {
      await registerUsers(tracker, "carol", "alice", "bob");
      const users = unwrap(await tracker.identity.listAll());
      expect(users.map((u) => u.username)).toEqual(["alice", "bob", "carol"]);
    });

    it("finds users by id and by username", async () => {
      const [alice] = await registerUsers(tracker, "alice");
      expect(unwrap(await tracker.identity.getById(alice.id))?.username).toBe("alice");
      expect(unwrap(await tracker.identity.findByUsername("ALICE"))?.id).toBe(alice.id);
      expect(unwrap(await tracker.identity.getById(999))).toBeNull();
    });

    it("resolves usernames in order and fails on the first unknown one", async () => {
      const [alice, bob] = await registerUsers(tracker, "alice", "bob");
      const users = unwrap(await tracker.identity.resolveUsernames(["bob", "alice"]));
      expect(users.map((u) => u.id)).toEqual([bob.id, alice.id]);

      const missing = await tracker.identity.resolveUsernames(["alice", "zed"]);
      expect(missing.ok).toBe(false);
      if (!missing.ok) {
        expect(missing.error.kind).toBe("not_found");
        expect(missing.error.message).toBe("User 'zed' not found.");
      }
    });
  });

  describe("sessions", () => {
    it("resolves a fresh session token to its user", async () => {
      const [alice] = await registerUsers(tracker, "alice");
      const session = unwrap(await tracker.identity.createSession(alice.id, 30));
      const user = unwrap(await tracker.identity.resolveSession(session.token));
      expect(user?.id).toBe(alice.id);
    });

    it("stores only a hash of the token", async () => {
      const [alice] = await registerUsers(tracker, "alice");
      const session = unwrap(await tracker.identity.createSession(alice.id, 30));
      const row = db.prepare("SELECT * FROM sessions").get();
      expect(JSON.stringify(row)).not.toContain(session.token);
    });

    it("stops resolving after expiry", async () => {
      const [alice] = await registerUsers(tracker, "alice");
      const session = unwrap(await tracker.identity.createSession(alice.id, 1));
      const later = new Date(Date.now() + 2 * 24 * 60 * 60 * 1000);
      expect(unwrap(await tracker.identity.resolveSession(session.token, later))).toBeNull();
    });

    it("stops resolving after revocation", async () => {
      const [alice] = await registerUsers(tracker, "alice");
      const session = unwrap(await tracker.identity.createSession(alice.id, 30));
      expect(unwrap(await tracker.identity.revokeSession(session.token))).toBe(true);
      expect(unwrap(await tracker.identity.resolveSession(session.token))).toBeNull();
      expect(unwrap(await tracker.identity.revokeSession(session.token))).toBe(false);
    });

    it("refuses a session for an unknown user", async () => {
      const result = await tracker.identity.createSession(42, 30);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("not_found");
      }
    });
  });
});
