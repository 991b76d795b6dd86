import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { createTestDb, createTestTracker, registerUsers, unwrap } from "../helpers/test-db.js";
import type { Tracker } from "../../src/main.js";
import type { User } from "../../src/users/types.js";
import type { Project } from "../../src/projects/types.js";

describe("MembershipService", () => {
  let db: Database.Database;
  let tracker: Tracker;
  let alice: User;
  let bob: User;
  let carol: User;
  let project: Project;

  beforeEach(async () => {
    db = createTestDb();
    tracker = createTestTracker(db);
    [alice, bob, carol] = await registerUsers(tracker, "alice", "bob", "carol");
    project = unwrap(await tracker.projects.create("Launch Plan", "", alice.id));
  });

  afterEach(() => {
    db.close();
  });

  function membershipRows(): number {
    const row = db
      .prepare("SELECT COUNT(*) AS n FROM memberships WHERE project_id = ?")
      .get(project.id);
    return row && typeof row === "object" && "n" in row ? Number(row.n) : -1;
  }

  describe("requestToJoin", () => {
    it("succeeds once, then conflicts while pending", async () => {
      const first = unwrap(await tracker.membership.requestToJoin(project.id, bob.id));
      expect(first.status).toBe("pending");
      expect(first.username).toBe("bob");

      const second = await tracker.membership.requestToJoin(project.id, bob.id);
      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error.kind).toBe("conflict");
        expect(second.error.message).toBe("You have already requested to join this project.");
      }
    });

    it("conflicts for the owner and for members", async () => {
      const owner = await tracker.membership.requestToJoin(project.id, alice.id);
      expect(owner.ok).toBe(false);
      if (!owner.ok) {
        expect(owner.error.message).toBe("You are already a member of this project.");
      }

      unwrap(await tracker.membership.addMember(project.id, bob.id, alice.id));
      const member = await tracker.membership.requestToJoin(project.id, bob.id);
      expect(member.ok).toBe(false);
      if (!member.ok) {
        expect(member.error.kind).toBe("conflict");
      }
    });

    it("reports a missing project as not found", async () => {
      const result = await tracker.membership.requestToJoin(999, bob.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("not_found");
      }
    });

    it("allows a new request right after a rejection", async () => {
      const request = unwrap(await tracker.membership.requestToJoin(project.id, bob.id));
      unwrap(await tracker.membership.reject(request.id, alice.id));
      const again = unwrap(await tracker.membership.requestToJoin(project.id, bob.id));
      expect(again.id).not.toBe(request.id);
      expect(again.status).toBe("pending");
    });
  });

  describe("approve and reject", () => {
    it("approval flips one request and creates one membership row", async () => {
      const request = unwrap(await tracker.membership.requestToJoin(project.id, bob.id));
      const approved = unwrap(await tracker.membership.approve(request.id, alice.id));

      expect(approved.status).toBe("approved");
      expect(await tracker.membership.isMember(project.id, bob.id)).toBe(true);
      expect(membershipRows()).toBe(1);
      expect(unwrap(await tracker.membership.listPendingRequests(project.id, alice.id))).toEqual(
        [],
      );
    });

    it("only the owner may resolve requests", async () => {
      const request = unwrap(await tracker.membership.requestToJoin(project.id, bob.id));
      const result = await tracker.membership.approve(request.id, carol.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("permission");
        expect(result.error.message).toBe("Only the project owner can approve requests.");
      }
      const rejected = await tracker.membership.reject(request.id, bob.id);
      expect(rejected.ok).toBe(false);
      expect(await tracker.membership.isMember(project.id, bob.id)).toBe(false);
    });

    it("a resolved request cannot be resolved again", async () => {
      const request = unwrap(await tracker.membership.requestToJoin(project.id, bob.id));
      unwrap(await tracker.membership.reject(request.id, alice.id));

      const approve = await tracker.membership.approve(request.id, alice.id);
      expect(approve.ok).toBe(false);
      if (!approve.ok) {
        expect(approve.error.kind).toBe("conflict");
        expect(approve.error.message).toBe("Request has already been rejected.");
      }
      expect(await tracker.membership.isMember(project.id, bob.id)).toBe(false);
    });

    it("rejection leaves the user a non-member", async () => {
      const request = unwrap(await tracker.membership.requestToJoin(project.id, bob.id));
      const rejected = unwrap(await tracker.membership.reject(request.id, alice.id));
      expect(rejected.status).toBe("rejected");
      expect(await tracker.membership.isMember(project.id, bob.id)).toBe(false);
      expect(membershipRows()).toBe(0);
    });

    it("unknown requests are not found", async () => {
      const result = await tracker.membership.approve(12345, alice.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("not_found");
      }
    });
  });

  describe("addMember", () => {
    it("adds directly and settles a pending request", async () => {
      unwrap(await tracker.membership.requestToJoin(project.id, bob.id));
      const member = unwrap(await tracker.membership.addMember(project.id, bob.id, alice.id));
      expect(member).toMatchObject({ user_id: bob.id, username: "bob", role: "member" });
      expect(unwrap(await tracker.membership.listPendingRequests(project.id, alice.id))).toEqual(
        [],
      );
    });

    it("conflicts for an existing member and for the owner", async () => {
      unwrap(await tracker.membership.addMember(project.id, bob.id, alice.id));
      const again = await tracker.membership.addMember(project.id, bob.id, alice.id);
      expect(again.ok).toBe(false);
      if (!again.ok) {
        expect(again.error.message).toBe("bob is already a member of this project.");
      }
      const owner = await tracker.membership.addMember(project.id, alice.id, alice.id);
      expect(owner.ok).toBe(false);
      if (!owner.ok) {
        expect(owner.error.kind).toBe("conflict");
      }
      expect(membershipRows()).toBe(1);
    });

    it("is owner-only", async () => {
      unwrap(await tracker.membership.addMember(project.id, bob.id, alice.id));
      const result = await tracker.membership.addMember(project.id, carol.id, bob.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("permission");
      }
    });

    it("reports unknown users", async () => {
      const result = await tracker.membership.addMember(project.id, 999, alice.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("not_found");
        expect(result.error.message).toBe("User not found.");
      }
    });
  });

  describe("removeMember", () => {
    beforeEach(async () => {
      unwrap(await tracker.membership.addMember(project.id, bob.id, alice.id));
      unwrap(await tracker.membership.addMember(project.id, carol.id, alice.id));
    });

    it("lets the owner remove a member", async () => {
      unwrap(await tracker.membership.removeMember(project.id, bob.id, alice.id));
      expect(await tracker.membership.isMember(project.id, bob.id)).toBe(false);
    });

    it("lets a member leave", async () => {
      unwrap(await tracker.membership.removeMember(project.id, bob.id, bob.id));
      expect(await tracker.membership.isMember(project.id, bob.id)).toBe(false);
    });

    it("does not let one member remove another", async () => {
      const result = await tracker.membership.removeMember(project.id, carol.id, bob.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("permission");
        expect(result.error.message).toBe(
          "Only the project owner or the member themselves can remove membership.",
        );
      }
      expect(await tracker.membership.isMember(project.id, carol.id)).toBe(true);
    });

    it("never removes the owner", async () => {
      const result = await tracker.membership.removeMember(project.id, alice.id, alice.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("conflict");
        expect(result.error.message).toBe("The project owner cannot leave the project.");
      }
      expect(await tracker.membership.isMember(project.id, alice.id)).toBe(true);
    });

    it("reports a non-member as not found", async () => {
      unwrap(await tracker.membership.removeMember(project.id, bob.id, bob.id));
      const result = await tracker.membership.removeMember(project.id, bob.id, bob.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("not_found");
      }
    });
  });

  describe("listing", () => {
    it("lists the owner first, then members by join time", async () => {
      unwrap(await tracker.membership.addMember(project.id, carol.id, alice.id));
      unwrap(await tracker.membership.addMember(project.id, bob.id, alice.id));
      const members = unwrap(await tracker.membership.listMembers(project.id, bob.id));
      expect(members.map((m) => [m.username, m.role])).toEqual([
        ["alice", "owner"],
        ["carol", "member"],
        ["bob", "member"],
      ]);
    });

    it("hides the team from non-members", async () => {
      const result = await tracker.membership.listMembers(project.id, bob.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("permission");
      }
    });

    it("shows pending requests to the owner only, oldest first", async () => {
      unwrap(await tracker.membership.requestToJoin(project.id, carol.id));
      unwrap(await tracker.membership.requestToJoin(project.id, bob.id));
      const pending = unwrap(await tracker.membership.listPendingRequests(project.id, alice.id));
      expect(pending.map((r) => r.username)).toEqual(["carol", "bob"]);

      const denied = await tracker.membership.listPendingRequests(project.id, carol.id);
      expect(denied.ok).toBe(false);
    });
  });

  it("keeps at most one pending request per user at the store level", () => {
    const now = new Date().toISOString();
    const insert = db.prepare(
      "INSERT INTO join_requests (project_id, user_id, status, requested_at) VALUES (?, ?, 'pending', ?)",
    );
    insert.run(project.id, bob.id, now);
    expect(() => insert.run(project.id, bob.id, now)).toThrow();
  });
});
