import type { Kysely } from "kysely";
import type { DB } from "./db/kysely.js";
import { IdentityService } from "./users/service.js";
import { ProjectService } from "./projects/service.js";
import { MembershipService } from "./membership/service.js";
import { TaskService } from "./tasks/service.js";

/** Everything the CLI and the HTTP server call into, over one store. */
export interface Tracker {
  identity: IdentityService;
  projects: ProjectService;
  membership: MembershipService;
  tasks: TaskService;
}

export function createTracker(db: Kysely<DB>): Tracker {
  return {
    identity: new IdentityService(db),
    projects: new ProjectService(db),
    membership: new MembershipService(db),
    tasks: new TaskService(db),
  };
}

export { IdentityService, ProjectService, MembershipService, TaskService };
export * from "./errors.js";
export type { User, Session } from "./users/types.js";
export type { Project, ProjectStatus, ProjectSummary, Dashboard } from "./projects/types.js";
export type { Member, JoinRequest, RequestStatus } from "./membership/types.js";
export type {
  Task,
  TaskStatus,
  TaskPriority,
  CreateTaskInput,
  UpdateTaskInput,
  TaskFilters,
} from "./tasks/types.js";
