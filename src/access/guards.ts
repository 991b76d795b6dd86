import type { Kysely } from "kysely";
import type { DB } from "../db/kysely.js";
import { NotFoundError, PermissionError } from "../errors.js";
import { loadAccess } from "../membership/repository.js";
import type { ProjectAccess } from "./policy.js";

export async function requireProject(
  db: Kysely<DB>,
  projectId: number,
  requesterId: number,
): Promise<ProjectAccess> {
  const access = await loadAccess(db, projectId, requesterId);
  if (!access) {
    throw new NotFoundError("Project not found.");
  }
  return access;
}

export function ensure(allowed: boolean, message: string): void {
  if (!allowed) {
    throw new PermissionError(message);
  }
}
