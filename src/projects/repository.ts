import { sql } from "kysely";
import type { Kysely, SqlBool } from "kysely";
import type { DB } from "../db/kysely.js";
import type { Project, ProjectStatus, ProjectSummary } from "./types.js";

interface ProjectRow {
  id: number;
  name: string;
  description: string;
  status: string;
  owner_id: number;
  owner_name: string;
  created_at: string;
}

function rowToProject(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    status: row.status as ProjectStatus,
    owner_id: row.owner_id,
    owner_name: row.owner_name,
    created_at: row.created_at,
  };
}

function selectProjects(db: Kysely<DB>) {
  return db
    .selectFrom("projects")
    .innerJoin("users", "users.id", "projects.owner_id")
    .select([
      "projects.id",
      "projects.name",
      "projects.description",
      "projects.status",
      "projects.owner_id",
      "users.username as owner_name",
      "projects.created_at",
    ]);
}

export async function insertProject(
  db: Kysely<DB>,
  input: { name: string; description: string; owner_id: number },
  now: string,
): Promise<number> {
  const row = await db
    .insertInto("projects")
    .values({ ...input, status: "in-progress", created_at: now })
    .returning("id")
    .executeTakeFirstOrThrow();
  return row.id;
}

export async function getProject(db: Kysely<DB>, id: number): Promise<Project | null> {
  const row = await selectProjects(db).where("projects.id", "=", id).executeTakeFirst();
  return row ? rowToProject(row) : null;
}

export interface ProjectListFilters {
  ownerId?: number;
  /** Owner or holder of a membership row. */
  accessibleTo?: number;
  search?: string;
}

/** Newest first. */
export async function listProjects(
  db: Kysely<DB>,
  filters?: ProjectListFilters,
): Promise<Project[]> {
  let query = selectProjects(db);

  if (filters?.ownerId !== undefined) {
    query = query.where("projects.owner_id", "=", filters.ownerId);
  }
  if (filters?.accessibleTo !== undefined) {
    const userId = filters.accessibleTo;
    query = query.where((eb) =>
      eb.or([
        eb("projects.owner_id", "=", userId),
        eb.exists(
          eb
            .selectFrom("memberships")
            .select("memberships.id")
            .whereRef("memberships.project_id", "=", "projects.id")
            .where("memberships.user_id", "=", userId),
        ),
      ]),
    );
  }
  if (filters?.search !== undefined) {
    const escaped = filters.search.replace(/[\\%_]/g, "\\$&");
    query = query.where(
      sql<SqlBool>`projects.name LIKE '%' || ${escaped} || '%' ESCAPE '\\'`,
    );
  }

  const rows = await query
    .orderBy("projects.created_at", "desc")
    .orderBy("projects.id", "desc")
    .execute();
  return rows.map(rowToProject);
}

export async function updateProject(
  db: Kysely<DB>,
  id: number,
  updates: { name?: string; description?: string; status?: ProjectStatus },
): Promise<void> {
  await db.updateTable("projects").set(updates).where("id", "=", id).execute();
}

/**
 * Removes the project and everything hanging off it. Must run inside a
 * transaction. Does not depend on `foreign_keys = ON`.
 */
export async function deleteProjectCascade(db: Kysely<DB>, id: number): Promise<boolean> {
  await db
    .deleteFrom("task_assignees")
    .where("task_id", "in", db.selectFrom("tasks").select("tasks.id").where("project_id", "=", id))
    .execute();
  await db.deleteFrom("tasks").where("project_id", "=", id).execute();
  await db.deleteFrom("join_requests").where("project_id", "=", id).execute();
  await db.deleteFrom("memberships").where("project_id", "=", id).execute();
  const result = await db.deleteFrom("projects").where("id", "=", id).executeTakeFirst();
  return BigInt(result.numDeletedRows) > 0n;
}

export async function countTasksByStatus(
  db: Kysely<DB>,
  projectId: number,
): Promise<ProjectSummary> {
  const rows = await db
    .selectFrom("tasks")
    .select(["status", (eb) => eb.fn.countAll<number>().as("count")])
    .where("project_id", "=", projectId)
    .groupBy("status")
    .execute();

  const summary: ProjectSummary = { total: 0, todo: 0, in_progress: 0, done: 0 };
  for (const row of rows) {
    const count = Number(row.count);
    summary.total += count;
    if (row.status === "todo") {
      summary.todo = count;
    } else if (row.status === "in-progress") {
      summary.in_progress = count;
    } else if (row.status === "done") {
      summary.done = count;
    }
  }
  return summary;
}
