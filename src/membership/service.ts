import type { Kysely } from "kysely";
import type { DB } from "../db/kysely.js";
import type { JoinRequest, Member } from "./types.js";
import {
  attempt,
  guardStorage,
  ConflictError,
  NotFoundError,
  isUniqueViolation,
  type Result,
} from "../errors.js";
import { requireProject, ensure } from "../access/guards.js";
import { canManage, canRemoveMember, canView, isMember, isOwner } from "../access/policy.js";
import { getUserById } from "../users/repository.js";
import {
  loadAccess,
  insertMembership,
  deleteMembership,
  hasMembershipRow,
  listMembers,
  insertJoinRequest,
  getJoinRequest,
  hasPendingRequest,
  resolveRequest,
  approvePendingRequestsFor,
  listPendingRequests,
} from "./repository.js";

const ALREADY_MEMBER = "You are already a member of this project.";
const ALREADY_REQUESTED = "You have already requested to join this project.";

/**
 * Per (project, user) the ledger is in exactly one of: non-member, pending,
 * member. Owners are members by definition and never leave.
 */
export class MembershipService {
  constructor(private db: Kysely<DB>) {}

  async isMember(projectId: number, userId: number): Promise<boolean> {
    return guardStorage(async () => {
      const access = await loadAccess(this.db, projectId, userId);
      return access !== null && isMember(access);
    });
  }

  async requestToJoin(projectId: number, userId: number): Promise<Result<JoinRequest>> {
    return attempt(async () => {
      const access = await requireProject(this.db, projectId, userId);
      if (isMember(access)) {
        throw new ConflictError(ALREADY_MEMBER);
      }
      if (await hasPendingRequest(this.db, projectId, userId)) {
        throw new ConflictError(ALREADY_REQUESTED);
      }

      let id: number;
      try {
        id = await insertJoinRequest(this.db, projectId, userId, new Date().toISOString());
      } catch (err) {
        // A concurrent request for the same pair won the partial unique index
        if (isUniqueViolation(err)) {
          throw new ConflictError(ALREADY_REQUESTED);
        }
        throw err;
      }

      const created = await getJoinRequest(this.db, id);
      if (!created) {
        throw new NotFoundError("Request not found.");
      }
      return created;
    });
  }

  async approve(requestId: number, approverId: number): Promise<Result<JoinRequest>> {
    return attempt(() =>
      this.db.transaction().execute(async (trx) => {
        const request = await getJoinRequest(trx, requestId);
        if (!request) {
          throw new NotFoundError("Request not found.");
        }
        const access = await requireProject(trx, request.project_id, approverId);
        ensure(canManage(access), "Only the project owner can approve requests.");

        if (!(await resolveRequest(trx, requestId, "approved"))) {
          throw new ConflictError(`Request has already been ${request.status}.`);
        }
        // The user may have been added directly meanwhile; keep a single row
        await insertMembership(trx, request.project_id, request.user_id, new Date().toISOString());
        return { ...request, status: "approved" as const };
      }),
    );
  }

  async reject(requestId: number, approverId: number): Promise<Result<JoinRequest>> {
    return attempt(async () => {
      const request = await getJoinRequest(this.db, requestId);
      if (!request) {
        throw new NotFoundError("Request not found.");
      }
      const access = await requireProject(this.db, request.project_id, approverId);
      ensure(canManage(access), "Only the project owner can reject requests.");

      if (!(await resolveRequest(this.db, requestId, "rejected"))) {
        throw new ConflictError(`Request has already been ${request.status}.`);
      }
      return { ...request, status: "rejected" as const };
    });
  }

  async addMember(
    projectId: number,
    targetUserId: number,
    requesterId: number,
  ): Promise<Result<Member>> {
    return attempt(() =>
      this.db.transaction().execute(async (trx) => {
        const access = await requireProject(trx, projectId, requesterId);
        ensure(canManage(access), "Only the project owner can add members.");

        const target = await getUserById(trx, targetUserId);
        if (!target) {
          throw new NotFoundError("User not found.");
        }
        if (target.id === access.ownerId) {
          throw new ConflictError("The project owner is already a member.");
        }

        const now = new Date().toISOString();
        if (!(await insertMembership(trx, projectId, target.id, now))) {
          throw new ConflictError(`${target.username} is already a member of this project.`);
        }
        await approvePendingRequestsFor(trx, projectId, target.id);

        return {
          user_id: target.id,
          username: target.username,
          role: "member" as const,
          joined_at: now,
        };
      }),
    );
  }

  async removeMember(
    projectId: number,
    targetUserId: number,
    requesterId: number,
  ): Promise<Result<void>> {
    return attempt(async () => {
      const access = await requireProject(this.db, projectId, requesterId);
      ensure(
        canRemoveMember(access, targetUserId),
        "Only the project owner or the member themselves can remove membership.",
      );
      if (targetUserId === access.ownerId) {
        throw new ConflictError("The project owner cannot leave the project.");
      }
      if (!(await deleteMembership(this.db, projectId, targetUserId))) {
        throw new NotFoundError("User is not a member of this project.");
      }
    });
  }

  async listMembers(projectId: number, requesterId: number): Promise<Result<Member[]>> {
    return attempt(async () => {
      const access = await requireProject(this.db, projectId, requesterId);
      ensure(canView(access), "Only project members can view the team.");
      return listMembers(this.db, projectId);
    });
  }

  async listPendingRequests(
    projectId: number,
    requesterId: number,
  ): Promise<Result<JoinRequest[]>> {
    return attempt(async () => {
      const access = await requireProject(this.db, projectId, requesterId);
      ensure(isOwner(access), "Only the project owner can view join requests.");
      return listPendingRequests(this.db, projectId);
    });
  }

  /** Membership row only; used by tests and diagnostics to check the owner is never stored. */
  async hasMembershipRow(projectId: number, userId: number): Promise<boolean> {
    return guardStorage(() => hasMembershipRow(this.db, projectId, userId));
  }
}
