import { sql } from "kysely";
import type { Kysely } from "kysely";
import type { DB } from "../db/kysely.js";
import type { Assignee, Task, TaskPriority, TaskStatus } from "./types.js";

export const SORT_ORDERS = ["created", "due"] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

interface TaskRow {
  id: number;
  project_id: number;
  project_name: string;
  title: string;
  description: string;
  status: string;
  priority: string;
  due_date: string | null;
  creator_id: number;
  creator_name: string;
  created_at: string;
}

function rowToTask(row: TaskRow, assignees: Assignee[]): Task {
  return {
    id: row.id,
    project_id: row.project_id,
    project_name: row.project_name,
    title: row.title,
    description: row.description,
    status: row.status as TaskStatus,
    priority: row.priority as TaskPriority,
    due_date: row.due_date,
    creator_id: row.creator_id,
    creator_name: row.creator_name,
    created_at: row.created_at,
    assignees,
  };
}

function selectTasks(db: Kysely<DB>) {
  return db
    .selectFrom("tasks")
    .innerJoin("users as creator", "creator.id", "tasks.creator_id")
    .innerJoin("projects", "projects.id", "tasks.project_id")
    .select([
      "tasks.id",
      "tasks.project_id",
      "projects.name as project_name",
      "tasks.title",
      "tasks.description",
      "tasks.status",
      "tasks.priority",
      "tasks.due_date",
      "tasks.creator_id",
      "creator.username as creator_name",
      "tasks.created_at",
    ]);
}

/** Assignees of each task, sorted by username, in a single query. */
async function loadAssignees(
  db: Kysely<DB>,
  taskIds: number[],
): Promise<Map<number, Assignee[]>> {
  const byTask = new Map<number, Assignee[]>();
  if (taskIds.length === 0) {
    return byTask;
  }
  const rows = await db
    .selectFrom("task_assignees")
    .innerJoin("users", "users.id", "task_assignees.user_id")
    .select(["task_assignees.task_id", "users.id", "users.username"])
    .where("task_assignees.task_id", "in", taskIds)
    .orderBy("users.username", "asc")
    .execute();
  for (const row of rows) {
    const list = byTask.get(row.task_id) ?? [];
    list.push({ id: row.id, username: row.username });
    byTask.set(row.task_id, list);
  }
  return byTask;
}

async function withAssignees(db: Kysely<DB>, rows: TaskRow[]): Promise<Task[]> {
  const assignees = await loadAssignees(
    db,
    rows.map((r) => r.id),
  );
  return rows.map((r) => rowToTask(r, assignees.get(r.id) ?? []));
}

export interface NewTask {
  project_id: number;
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  due_date: string | null;
  creator_id: number;
}

export async function insertTask(db: Kysely<DB>, input: NewTask, now: string): Promise<number> {
  const row = await db
    .insertInto("tasks")
    .values({ ...input, created_at: now })
    .returning("id")
    .executeTakeFirstOrThrow();
  return row.id;
}

export async function insertAssignees(
  db: Kysely<DB>,
  taskId: number,
  userIds: number[],
  now: string,
): Promise<void> {
  if (userIds.length === 0) {
    return;
  }
  await db
    .insertInto("task_assignees")
    .values(userIds.map((userId) => ({ task_id: taskId, user_id: userId, assigned_at: now })))
    .execute();
}

export async function clearAssignees(db: Kysely<DB>, taskId: number): Promise<void> {
  await db.deleteFrom("task_assignees").where("task_id", "=", taskId).execute();
}

export async function getTask(db: Kysely<DB>, id: number): Promise<Task | null> {
  const row = await selectTasks(db).where("tasks.id", "=", id).executeTakeFirst();
  if (!row) {
    return null;
  }
  const [task] = await withAssignees(db, [row]);
  return task;
}

export interface ListFilters {
  projectId?: number;
  status?: TaskStatus;
  assigneeId?: number;
  /** Inclusive bounds on YYYY-MM-DD; compared as text, which sorts like the date. */
  dueFrom?: string;
  dueTo?: string;
  sort?: SortOrder;
}

export async function listTasks(db: Kysely<DB>, filters?: ListFilters): Promise<Task[]> {
  let query = selectTasks(db);

  if (filters?.projectId !== undefined) {
    query = query.where("tasks.project_id", "=", filters.projectId);
  }
  if (filters?.status) {
    query = query.where("tasks.status", "=", filters.status);
  }
  if (filters?.assigneeId !== undefined) {
    const assigneeId = filters.assigneeId;
    query = query.where((eb) =>
      eb.exists(
        eb
          .selectFrom("task_assignees")
          .select("task_assignees.id")
          .whereRef("task_assignees.task_id", "=", "tasks.id")
          .where("task_assignees.user_id", "=", assigneeId),
      ),
    );
  }
  // NULL due dates fail both comparisons, so undated tasks drop out of any range
  if (filters?.dueFrom) {
    query = query.where("tasks.due_date", ">=", filters.dueFrom);
  }
  if (filters?.dueTo) {
    query = query.where("tasks.due_date", "<=", filters.dueTo);
  }

  switch (filters?.sort ?? "created") {
    case "due":
      query = query
        .orderBy(sql`CASE WHEN tasks.due_date IS NULL THEN 1 ELSE 0 END`, "asc")
        .orderBy("tasks.due_date", "asc")
        .orderBy("tasks.created_at", "desc")
        .orderBy("tasks.id", "desc");
      break;
    case "created":
    default:
      query = query.orderBy("tasks.created_at", "desc").orderBy("tasks.id", "desc");
      break;
  }

  const rows = await query.execute();
  return withAssignees(db, rows);
}

export async function updateTaskFields(
  db: Kysely<DB>,
  id: number,
  updates: {
    title?: string;
    description?: string;
    status?: TaskStatus;
    priority?: TaskPriority;
    due_date?: string | null;
  },
): Promise<void> {
  if (Object.values(updates).every((v) => v === undefined)) {
    return;
  }
  await db.updateTable("tasks").set(updates).where("id", "=", id).execute();
}

export async function deleteTask(db: Kysely<DB>, id: number): Promise<boolean> {
  await clearAssignees(db, id);
  const result = await db.deleteFrom("tasks").where("id", "=", id).executeTakeFirst();
  return BigInt(result.numDeletedRows) > 0n;
}

export async function countAssignedByStatus(
  db: Kysely<DB>,
  userId: number,
): Promise<Record<"todo" | "in_progress" | "done", number>> {
  const rows = await db
    .selectFrom("tasks")
    .innerJoin("task_assignees", "task_assignees.task_id", "tasks.id")
    .select(["tasks.status", (eb) => eb.fn.countAll<number>().as("count")])
    .where("task_assignees.user_id", "=", userId)
    .groupBy("tasks.status")
    .execute();

  const counts = { todo: 0, in_progress: 0, done: 0 };
  for (const row of rows) {
    if (row.status === "todo") {
      counts.todo = Number(row.count);
    } else if (row.status === "in-progress") {
      counts.in_progress = Number(row.count);
    } else if (row.status === "done") {
      counts.done = Number(row.count);
    }
  }
  return counts;
}
