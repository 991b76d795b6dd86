import type { Kysely } from "kysely";
import type { DB } from "../db/kysely.js";
import type { ProjectAccess } from "../access/policy.js";
import type { JoinRequest, Member, RequestStatus } from "./types.js";

interface JoinRequestRow {
  id: number;
  project_id: number;
  user_id: number;
  username: string;
  status: string;
  requested_at: string;
}

function rowToRequest(row: JoinRequestRow): JoinRequest {
  return {
    id: row.id,
    project_id: row.project_id,
    user_id: row.user_id,
    username: row.username,
    status: row.status as RequestStatus,
    requested_at: row.requested_at,
  };
}

/**
 * Reads ownership and the membership row in one go. Returns null when the
 * project does not exist. Never cached: every permission check calls this.
 */
export async function loadAccess(
  db: Kysely<DB>,
  projectId: number,
  requesterId: number,
): Promise<ProjectAccess | null> {
  const row = await db
    .selectFrom("projects")
    .leftJoin("memberships", (join) =>
      join
        .onRef("memberships.project_id", "=", "projects.id")
        .on("memberships.user_id", "=", requesterId),
    )
    .select(["projects.id", "projects.owner_id", "memberships.id as membership_id"])
    .where("projects.id", "=", projectId)
    .executeTakeFirst();

  if (!row) {
    return null;
  }
  return {
    projectId: row.id,
    ownerId: row.owner_id,
    requesterId,
    hasMembership: row.membership_id !== null,
  };
}

export async function hasMembershipRow(
  db: Kysely<DB>,
  projectId: number,
  userId: number,
): Promise<boolean> {
  const row = await db
    .selectFrom("memberships")
    .select("id")
    .where("project_id", "=", projectId)
    .where("user_id", "=", userId)
    .executeTakeFirst();
  return row !== undefined;
}

/** Returns false when the row already existed. */
export async function insertMembership(
  db: Kysely<DB>,
  projectId: number,
  userId: number,
  now: string,
): Promise<boolean> {
  const result = await db
    .insertInto("memberships")
    .values({ project_id: projectId, user_id: userId, joined_at: now })
    .onConflict((oc) => oc.columns(["project_id", "user_id"]).doNothing())
    .executeTakeFirst();
  return BigInt(result.numInsertedOrUpdatedRows ?? 0n) > 0n;
}

export async function deleteMembership(
  db: Kysely<DB>,
  projectId: number,
  userId: number,
): Promise<boolean> {
  const result = await db
    .deleteFrom("memberships")
    .where("project_id", "=", projectId)
    .where("user_id", "=", userId)
    .executeTakeFirst();
  return BigInt(result.numDeletedRows) > 0n;
}

/** Owner first (joined when the project was created), then members by join time. */
export async function listMembers(db: Kysely<DB>, projectId: number): Promise<Member[]> {
  const owner = await db
    .selectFrom("projects")
    .innerJoin("users", "users.id", "projects.owner_id")
    .select(["users.id", "users.username", "projects.created_at"])
    .where("projects.id", "=", projectId)
    .executeTakeFirst();
  if (!owner) {
    return [];
  }

  const rows = await db
    .selectFrom("memberships")
    .innerJoin("users", "users.id", "memberships.user_id")
    .select(["users.id", "users.username", "memberships.joined_at"])
    .where("memberships.project_id", "=", projectId)
    .orderBy("memberships.joined_at", "asc")
    .orderBy("memberships.id", "asc")
    .execute();

  return [
    { user_id: owner.id, username: owner.username, role: "owner", joined_at: owner.created_at },
    ...rows.map(
      (r): Member => ({
        user_id: r.id,
        username: r.username,
        role: "member",
        joined_at: r.joined_at,
      }),
    ),
  ];
}

// --- join requests ---

function selectRequests(db: Kysely<DB>) {
  return db
    .selectFrom("join_requests")
    .innerJoin("users", "users.id", "join_requests.user_id")
    .select([
      "join_requests.id",
      "join_requests.project_id",
      "join_requests.user_id",
      "users.username",
      "join_requests.status",
      "join_requests.requested_at",
    ]);
}

export async function insertJoinRequest(
  db: Kysely<DB>,
  projectId: number,
  userId: number,
  now: string,
): Promise<number> {
  const row = await db
    .insertInto("join_requests")
    .values({ project_id: projectId, user_id: userId, status: "pending", requested_at: now })
    .returning("id")
    .executeTakeFirstOrThrow();
  return row.id;
}

export async function getJoinRequest(db: Kysely<DB>, id: number): Promise<JoinRequest | null> {
  const row = await selectRequests(db).where("join_requests.id", "=", id).executeTakeFirst();
  return row ? rowToRequest(row) : null;
}

export async function hasPendingRequest(
  db: Kysely<DB>,
  projectId: number,
  userId: number,
): Promise<boolean> {
  const row = await db
    .selectFrom("join_requests")
    .select("id")
    .where("project_id", "=", projectId)
    .where("user_id", "=", userId)
    .where("status", "=", "pending")
    .executeTakeFirst();
  return row !== undefined;
}

/**
 * Moves a pending request to a terminal state. The status guard makes a second
 * resolution of the same request a no-op, reported by returning false.
 */
export async function resolveRequest(
  db: Kysely<DB>,
  id: number,
  status: Exclude<RequestStatus, "pending">,
): Promise<boolean> {
  const result = await db
    .updateTable("join_requests")
    .set({ status })
    .where("id", "=", id)
    .where("status", "=", "pending")
    .executeTakeFirst();
  return BigInt(result.numUpdatedRows) > 0n;
}

export async function approvePendingRequestsFor(
  db: Kysely<DB>,
  projectId: number,
  userId: number,
): Promise<void> {
  await db
    .updateTable("join_requests")
    .set({ status: "approved" })
    .where("project_id", "=", projectId)
    .where("user_id", "=", userId)
    .where("status", "=", "pending")
    .execute();
}

export async function listPendingRequests(
  db: Kysely<DB>,
  projectId: number,
): Promise<JoinRequest[]> {
  const rows = await selectRequests(db)
    .where("join_requests.project_id", "=", projectId)
    .where("join_requests.status", "=", "pending")
    .orderBy("join_requests.requested_at", "asc")
    .orderBy("join_requests.id", "asc")
    .execute();
  return rows.map(rowToRequest);
}
