/**
 * Authorization rules. Nothing here touches the store: callers load a fresh
 * ProjectAccess snapshot (membership/repository.ts `loadAccess`) for every
 * request and ask these functions what it permits.
 */

export interface ProjectAccess {
  projectId: number;
  ownerId: number;
  requesterId: number;
  /** Whether a membership row exists for the requester. The owner never has one. */
  hasMembership: boolean;
}

export function isOwner(access: ProjectAccess): boolean {
  return access.requesterId === access.ownerId;
}

/** Owner membership is derived, never stored. */
export function isMember(access: ProjectAccess): boolean {
  return isOwner(access) || access.hasMembership;
}

/** Viewing members and tasks, creating, listing and exporting tasks. */
export function canView(access: ProjectAccess): boolean {
  return isMember(access);
}

/** Editing, deleting and closing the project; adding members; resolving requests. */
export function canManage(access: ProjectAccess): boolean {
  return isOwner(access);
}

export function canRemoveMember(access: ProjectAccess, targetUserId: number): boolean {
  return isOwner(access) || access.requesterId === targetUserId;
}

export function canEditTask(access: ProjectAccess, creatorId: number): boolean {
  return isOwner(access) || access.requesterId === creatorId;
}

/** Assignees may mark their task done even though they cannot otherwise edit it. */
export function canCompleteTask(
  access: ProjectAccess,
  creatorId: number,
  assigneeIds: readonly number[],
): boolean {
  return canEditTask(access, creatorId) || assigneeIds.includes(access.requesterId);
}
