import type { Kysely } from "kysely";
import type { DB } from "../db/kysely.js";
import type {
  Dashboard,
  Project,
  ProjectStatus,
  ProjectSummary,
  UpdateProjectInput,
} from "./types.js";
import { attempt, NotFoundError, ValidationError, type Result } from "../errors.js";
import { requireProject, ensure } from "../access/guards.js";
import { canManage, canView } from "../access/policy.js";
import { getUserById } from "../users/repository.js";
import { countAssignedByStatus } from "../tasks/repository.js";
import { parseField, projectNameSchema, ProjectStatusEnum } from "../validation.js";
import {
  insertProject,
  getProject,
  listProjects,
  updateProject,
  deleteProjectCascade,
  countTasksByStatus,
} from "./repository.js";

export class ProjectService {
  constructor(private db: Kysely<DB>) {}

  async create(name: string, description: string, ownerId: number): Promise<Result<Project>> {
    return attempt(async () => {
      const cleanName = parseField(projectNameSchema, name, "name");
      if (!(await getUserById(this.db, ownerId))) {
        throw new NotFoundError("User not found.");
      }
      const id = await insertProject(
        this.db,
        { name: cleanName, description: description.trim(), owner_id: ownerId },
        new Date().toISOString(),
      );
      return this.mustGet(id);
    });
  }

  async get(projectId: number): Promise<Result<Project | null>> {
    return attempt(() => getProject(this.db, projectId));
  }

  async update(
    projectId: number,
    requesterId: number,
    input: UpdateProjectInput,
  ): Promise<Result<Project>> {
    return attempt(async () => {
      const access = await requireProject(this.db, projectId, requesterId);
      ensure(canManage(access), "Only the project owner can edit this project.");

      if (input.name === undefined && input.description === undefined) {
        throw new ValidationError("No valid updates provided.");
      }
      const updates: UpdateProjectInput = {};
      if (input.name !== undefined) {
        updates.name = parseField(projectNameSchema, input.name, "name");
      }
      if (input.description !== undefined) {
        updates.description = input.description.trim();
      }

      await updateProject(this.db, projectId, updates);
      return this.mustGet(projectId);
    });
  }

  async updateStatus(
    projectId: number,
    requesterId: number,
    status: string,
  ): Promise<Result<Project>> {
    return attempt(async () => {
      const parsed: ProjectStatus = parseField(ProjectStatusEnum, status, "status");
      const access = await requireProject(this.db, projectId, requesterId);
      ensure(canManage(access), "Only the project owner can update project status.");

      await updateProject(this.db, projectId, { status: parsed });
      return this.mustGet(projectId);
    });
  }

  async delete(projectId: number, requesterId: number): Promise<Result<Project>> {
    return attempt(() =>
      this.db.transaction().execute(async (trx) => {
        const access = await requireProject(trx, projectId, requesterId);
        ensure(canManage(access), "Only the project owner can delete this project.");

        const project = await getProject(trx, projectId);
        if (!project || !(await deleteProjectCascade(trx, projectId))) {
          throw new NotFoundError("Project not found.");
        }
        return project;
      }),
    );
  }

  async search(term: string): Promise<Result<Project[]>> {
    return attempt(() => listProjects(this.db, { search: term }));
  }

  async listAll(): Promise<Result<Project[]>> {
    return attempt(() => listProjects(this.db));
  }

  async listOwnedBy(userId: number): Promise<Result<Project[]>> {
    return attempt(() => listProjects(this.db, { ownerId: userId }));
  }

  async listAccessibleTo(userId: number): Promise<Result<Project[]>> {
    return attempt(() => listProjects(this.db, { accessibleTo: userId }));
  }

  /** Task counts per status; members only. */
  async summary(projectId: number, requesterId: number): Promise<Result<ProjectSummary>> {
    return attempt(async () => {
      const access = await requireProject(this.db, projectId, requesterId);
      ensure(canView(access), "Only project members can view tasks.");
      return countTasksByStatus(this.db, projectId);
    });
  }

  async dashboard(userId: number): Promise<Result<Dashboard>> {
    return attempt(async () => {
      const projects = await listProjects(this.db, { accessibleTo: userId });
      const assigned = await countAssignedByStatus(this.db, userId);
      return {
        active_projects: projects.filter((p) => p.status === "in-progress").length,
        tasks_todo: assigned.todo,
        tasks_in_progress: assigned.in_progress,
      };
    });
  }

  private async mustGet(projectId: number): Promise<Project> {
    const project = await getProject(this.db, projectId);
    if (!project) {
      throw new NotFoundError("Project not found.");
    }
    return project;
  }
}
