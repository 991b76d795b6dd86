import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { createTestDb, createTestTracker, registerUsers, unwrap } from "../helpers/test-db.js";
import type { Tracker } from "../../src/main.js";
import type { User } from "../../src/users/types.js";
import type { Project } from "../../src/projects/types.js";

describe("TaskService", () => {
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
    unwrap(await tracker.membership.addMember(project.id, bob.id, alice.id));
  });

  afterEach(() => {
    db.close();
  });

  describe("create", () => {
    it("applies defaults", async () => {
      const task = unwrap(await tracker.tasks.create(project.id, { title: "Write README" }, alice.id));
      expect(task).toMatchObject({
        project_id: project.id,
        project_name: "Launch Plan",
        title: "Write README",
        description: "",
        status: "todo",
        priority: "medium",
        due_date: null,
        creator_id: alice.id,
        creator_name: "alice",
        assignees: [],
      });
    });

    it("stores assignees sorted by username, ignoring duplicates", async () => {
      const task = unwrap(
        await tracker.tasks.create(
          project.id,
          { title: "Set up CI", assignee_ids: [bob.id, alice.id, bob.id] },
          bob.id,
        ),
      );
      expect(task.assignees).toEqual([
        { id: alice.id, username: "alice" },
        { id: bob.id, username: "bob" },
      ]);
    });

    it("allows assignees who are not members", async () => {
      const task = unwrap(
        await tracker.tasks.create(project.id, { title: "Outside help", assignee_ids: [carol.id] }, alice.id),
      );
      expect(task.assignees.map((a) => a.username)).toEqual(["carol"]);
    });

    it("refuses non-members", async () => {
      const result = await tracker.tasks.create(project.id, { title: "Sneaky" }, carol.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("permission");
        expect(result.error.message).toBe("Only project members can create tasks.");
      }
    });

    it("validates title, enums and due date", async () => {
      const cases: Array<[Parameters<Tracker["tasks"]["create"]>[1], string]> = [
        [{ title: "ab" }, "Task title must be at least 3 characters long."],
        [{ title: "Valid", status: "blocked" }, "Invalid status. Must be one of: todo, in-progress, done"],
        [{ title: "Valid", priority: "urgent" }, "Invalid priority. Must be one of: low, medium, high"],
        [{ title: "Valid", due_date: "2025/01/15" }, "Invalid date format. Use YYYY-MM-DD."],
        [{ title: "Valid", due_date: "2025-02-30" }, "Invalid date format. Use YYYY-MM-DD."],
      ];
      for (const [input, message] of cases) {
        const result = await tracker.tasks.create(project.id, input, alice.id);
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error.kind).toBe("validation");
          expect(result.error.message).toBe(message);
        }
      }
      expect(unwrap(await tracker.tasks.list(project.id, alice.id))).toEqual([]);
    });

    it("treats an empty due date as none", async () => {
      const task = unwrap(
        await tracker.tasks.create(project.id, { title: "Someday", due_date: "  " }, alice.id),
      );
      expect(task.due_date).toBeNull();
    });

    it("writes nothing when an assignee does not exist", async () => {
      const result = await tracker.tasks.create(
        project.id,
        { title: "Ghost work", assignee_ids: [alice.id, 999] },
        alice.id,
      );
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("not_found");
        expect(result.error.message).toBe("User 999 not found.");
      }
      expect(db.prepare("SELECT COUNT(*) AS n FROM tasks").get()).toEqual({ n: 0 });
    });
  });

  describe("update", () => {
    it("changes only the fields given", async () => {
      const task = unwrap(
        await tracker.tasks.create(
          project.id,
          { title: "Write README", description: "Intro", priority: "high", due_date: "2025-01-15" },
          alice.id,
        ),
      );
      const updated = unwrap(await tracker.tasks.update(task.id, alice.id, { status: "in-progress" }));
      expect(updated).toMatchObject({
        title: "Write README",
        description: "Intro",
        status: "in-progress",
        priority: "high",
        due_date: "2025-01-15",
      });
    });

    it("clears the due date with null", async () => {
      const task = unwrap(
        await tracker.tasks.create(project.id, { title: "Dated", due_date: "2025-01-15" }, alice.id),
      );
      const updated = unwrap(await tracker.tasks.update(task.id, alice.id, { due_date: null }));
      expect(updated.due_date).toBeNull();
    });

    it("replaces the assignee set, down to empty", async () => {
      const task = unwrap(
        await tracker.tasks.create(
          project.id,
          { title: "Pairing", assignee_ids: [alice.id, bob.id] },
          alice.id,
        ),
      );
      const swapped = unwrap(await tracker.tasks.update(task.id, alice.id, { assignee_ids: [carol.id] }));
      expect(swapped.assignees.map((a) => a.username)).toEqual(["carol"]);

      const cleared = unwrap(await tracker.tasks.update(task.id, alice.id, { assignee_ids: [] }));
      expect(cleared.assignees).toEqual([]);
    });

    it("rejects an update with no changes", async () => {
      const task = unwrap(await tracker.tasks.create(project.id, { title: "Idle" }, alice.id));
      const result = await tracker.tasks.update(task.id, alice.id, {});
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("No changes provided.");
      }
    });

    it("lets the project owner edit a member's task", async () => {
      const task = unwrap(await tracker.tasks.create(project.id, { title: "Bob's task" }, bob.id));
      const updated = unwrap(await tracker.tasks.update(task.id, alice.id, { priority: "low" }));
      expect(updated.priority).toBe("low");
    });

    it("refuses members who did not create the task", async () => {
      const task = unwrap(await tracker.tasks.create(project.id, { title: "Alice's task" }, alice.id));
      const result = await tracker.tasks.update(task.id, bob.id, { title: "Mine now" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("permission");
        expect(result.error.message).toBe(
          "Only the task creator or project owner can edit this task.",
        );
      }
    });

    it("rolls back field changes when the new assignees are invalid", async () => {
      const task = unwrap(await tracker.tasks.create(project.id, { title: "Atomic" }, alice.id));
      const result = await tracker.tasks.update(task.id, alice.id, {
        title: "Renamed",
        assignee_ids: [999],
      });
      expect(result.ok).toBe(false);
      expect(unwrap(await tracker.tasks.get(task.id, alice.id)).title).toBe("Atomic");
    });
  });

  describe("complete", () => {
    it("lets an assignee finish a task they cannot edit", async () => {
      const task = unwrap(
        await tracker.tasks.create(project.id, { title: "Review PR", assignee_ids: [bob.id] }, alice.id),
      );
      const done = unwrap(await tracker.tasks.complete(task.id, bob.id));
      expect(done.status).toBe("done");
    });

    it("refuses unrelated members", async () => {
      const task = unwrap(await tracker.tasks.create(project.id, { title: "Review PR" }, alice.id));
      const result = await tracker.tasks.complete(task.id, bob.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("You do not have permission to complete this task.");
      }
    });
  });

  describe("list", () => {
    it("filters by status and assignee", async () => {
      await tracker.tasks.create(project.id, { title: "Todo one", assignee_ids: [bob.id] }, alice.id);
      await tracker.tasks.create(project.id, { title: "Doing", status: "in-progress" }, alice.id);
      await tracker.tasks.create(
        project.id,
        { title: "Done one", status: "done", assignee_ids: [bob.id] },
        alice.id,
      );

      const todo = unwrap(await tracker.tasks.list(project.id, alice.id, { status: "todo" }));
      expect(todo.map((t) => t.title)).toEqual(["Todo one"]);

      const bobs = unwrap(await tracker.tasks.list(project.id, alice.id, { assignee_id: bob.id }));
      expect(bobs.map((t) => t.title)).toEqual(["Done one", "Todo one"]);
    });

    it("keeps the due-date range inclusive and drops undated tasks", async () => {
      await tracker.tasks.create(project.id, { title: "January", due_date: "2025-01-15" }, alice.id);
      await tracker.tasks.create(project.id, { title: "February", due_date: "2025-02-01" }, alice.id);
      await tracker.tasks.create(project.id, { title: "Edge", due_date: "2025-01-31" }, alice.id);
      await tracker.tasks.create(project.id, { title: "Undated" }, alice.id);

      const january = unwrap(
        await tracker.tasks.list(project.id, alice.id, {
          due_from: "2025-01-01",
          due_to: "2025-01-31",
        }),
      );
      expect(january.map((t) => t.title)).toEqual(["Edge", "January"]);
    });

    it("rejects malformed filter values", async () => {
      const result = await tracker.tasks.list(project.id, alice.id, { due_from: "January" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("validation");
        expect(result.error.message).toBe("Invalid date format. Use YYYY-MM-DD.");
      }
    });

    it("is members-only", async () => {
      const result = await tracker.tasks.list(project.id, carol.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("permission");
      }
    });
  });

  describe("listAssignedTo", () => {
    it("orders by due date with undated tasks last, across projects", async () => {
      const other = unwrap(await tracker.projects.create("Side Quest", "", bob.id));
      await tracker.tasks.create(project.id, { title: "Undated", assignee_ids: [bob.id] }, alice.id);
      await tracker.tasks.create(
        project.id,
        { title: "Later", due_date: "2025-03-01", assignee_ids: [bob.id] },
        alice.id,
      );
      await tracker.tasks.create(
        other.id,
        { title: "Sooner", due_date: "2025-01-10", assignee_ids: [bob.id] },
        bob.id,
      );
      await tracker.tasks.create(project.id, { title: "Not mine", due_date: "2024-12-01" }, alice.id);

      const mine = unwrap(await tracker.tasks.listAssignedTo(bob.id));
      expect(mine.map((t) => [t.title, t.project_name])).toEqual([
        ["Sooner", "Side Quest"],
        ["Later", "Launch Plan"],
        ["Undated", "Launch Plan"],
      ]);

      const todo = unwrap(await tracker.tasks.listAssignedTo(bob.id, "done"));
      expect(todo).toEqual([]);
    });
  });

  describe("scenarios", () => {
    it("two collaborators export a shared project", async () => {
      db.close();
      db = createTestDb();
      tracker = createTestTracker(db);
      const [a, b] = await registerUsers(tracker, "alice", "bob");

      const plan = unwrap(await tracker.projects.create("Launch Plan", "", a.id));
      unwrap(
        await tracker.tasks.create(
          plan.id,
          { title: "Write README", status: "todo", priority: "medium", assignee_ids: [a.id] },
          a.id,
        ),
      );
      const request = unwrap(await tracker.membership.requestToJoin(plan.id, b.id));
      unwrap(await tracker.membership.approve(request.id, a.id));
      expect(await tracker.membership.isMember(plan.id, b.id)).toBe(true);

      unwrap(
        await tracker.tasks.create(plan.id, { title: "Set up CI", assignee_ids: [b.id, a.id] }, b.id),
      );

      const csv = unwrap(await tracker.tasks.exportCsv(plan.id, a.id));
      const lines = csv.split("\r\n");
      expect(lines[0]).toBe("ID,Title,Description,Status,Priority,Due Date,Assignee,Creator,Created At");
      expect(lines).toHaveLength(4);
      expect(lines[3]).toBe("");
      expect(lines[1]).toMatch(/^2,Set up CI,,todo,medium,,"alice, bob",bob,\d{4}-\d{2}-\d{2}T/);
      expect(lines[2]).toMatch(/^1,Write README,,todo,medium,,alice,alice,\d{4}-\d{2}-\d{2}T/);
    });

    it("only the creator or owner may delete a task", async () => {
      const task = unwrap(await tracker.tasks.create(project.id, { title: "Alice's task" }, alice.id));

      const denied = await tracker.tasks.delete(task.id, bob.id);
      expect(denied.ok).toBe(false);
      if (!denied.ok) {
        expect(denied.error.kind).toBe("permission");
        expect(denied.error.message).toBe(
          "Only the task creator or project owner can delete this task.",
        );
      }

      const deleted = unwrap(await tracker.tasks.delete(task.id, alice.id));
      expect(deleted.id).toBe(task.id);

      const gone = await tracker.tasks.get(task.id, alice.id);
      expect(gone.ok).toBe(false);
      if (!gone.ok) {
        expect(gone.error.kind).toBe("not_found");
        expect(gone.error.message).toBe("Task not found.");
      }
    });
  });

  describe("exportCsv", () => {
    it("returns the header alone for an empty project", async () => {
      expect(unwrap(await tracker.tasks.exportCsv(project.id, alice.id))).toBe(
        "ID,Title,Description,Status,Priority,Due Date,Assignee,Creator,Created At\r\n",
      );
    });

    it("is members-only", async () => {
      const result = await tracker.tasks.exportCsv(project.id, carol.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("Only project members can export tasks.");
      }
    });
  });
});
