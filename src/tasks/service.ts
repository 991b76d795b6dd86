import type { Kysely } from "kysely";
import type { DB } from "../db/kysely.js";
import type {
  CreateTaskInput,
  Task,
  TaskFilters,
  TaskPriority,
  TaskStatus,
  UpdateTaskInput,
} from "./types.js";
import { attempt, NotFoundError, ValidationError, type Result } from "../errors.js";
import { requireProject, ensure } from "../access/guards.js";
import { canCompleteTask, canEditTask, canView } from "../access/policy.js";
import { findMissingUserIds } from "../users/repository.js";
import { formatTasksCsv } from "../format/csv.js";
import {
  dueDateSchema,
  parseField,
  taskTitleSchema,
  TaskPriorityEnum,
  TaskStatusEnum,
} from "../validation.js";
import {
  insertTask,
  insertAssignees,
  clearAssignees,
  getTask,
  listTasks,
  updateTaskFields,
  deleteTask,
} from "./repository.js";

interface TaskFieldUpdates {
  title?: string;
  description?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  due_date?: string | null;
}

function parseDueDate(value: string | null | undefined): string | null | undefined {
  if (value === undefined || value === null) {
    return value;
  }
  const trimmed = value.trim();
  // An empty string from a form or prompt means "no date"
  if (trimmed === "") {
    return null;
  }
  return parseField(dueDateSchema, trimmed, "due_date");
}

function uniqueIds(ids: number[]): number[] {
  return [...new Set(ids)];
}

export class TaskService {
  constructor(private db: Kysely<DB>) {}

  async create(
    projectId: number,
    input: CreateTaskInput,
    creatorId: number,
  ): Promise<Result<Task>> {
    return attempt(() =>
      this.db.transaction().execute(async (trx) => {
        const access = await requireProject(trx, projectId, creatorId);
        ensure(canView(access), "Only project members can create tasks.");

        const title = parseField(taskTitleSchema, input.title, "title");
        const status = parseField(TaskStatusEnum, input.status ?? "todo", "status");
        const priority = parseField(TaskPriorityEnum, input.priority ?? "medium", "priority");
        const dueDate = parseDueDate(input.due_date) ?? null;
        const assigneeIds = uniqueIds(input.assignee_ids ?? []);
        await this.requireUsers(trx, assigneeIds);

        const now = new Date().toISOString();
        const id = await insertTask(
          trx,
          {
            project_id: projectId,
            title,
            description: (input.description ?? "").trim(),
            status,
            priority,
            due_date: dueDate,
            creator_id: creatorId,
          },
          now,
        );
        await insertAssignees(trx, id, assigneeIds, now);
        return this.mustGet(trx, id);
      }),
    );
  }

  async get(taskId: number, requesterId: number): Promise<Result<Task>> {
    return attempt(async () => {
      const task = await this.mustGet(this.db, taskId);
      const access = await requireProject(this.db, task.project_id, requesterId);
      ensure(canView(access), "Only project members can view this task.");
      return task;
    });
  }

  async list(
    projectId: number,
    requesterId: number,
    filters: TaskFilters = {},
  ): Promise<Result<Task[]>> {
    return attempt(async () => {
      const access = await requireProject(this.db, projectId, requesterId);
      ensure(canView(access), "Only project members can view tasks.");
      const { status, assignee_id, due_from, due_to } = filters;
      return listTasks(this.db, {
        projectId,
        status: status ? parseField(TaskStatusEnum, status, "status") : undefined,
        assigneeId: assignee_id,
        dueFrom: due_from ? parseField(dueDateSchema, due_from, "due_from") : undefined,
        dueTo: due_to ? parseField(dueDateSchema, due_to, "due_to") : undefined,
      });
    });
  }

  async update(
    taskId: number,
    requesterId: number,
    input: UpdateTaskInput,
  ): Promise<Result<Task>> {
    return attempt(() =>
      this.db.transaction().execute(async (trx) => {
        const task = await this.mustGet(trx, taskId);
        const access = await requireProject(trx, task.project_id, requesterId);
        ensure(
          canEditTask(access, task.creator_id),
          "Only the task creator or project owner can edit this task.",
        );

        const updates: TaskFieldUpdates = {};
        if (input.title !== undefined) {
          updates.title = parseField(taskTitleSchema, input.title, "title");
        }
        if (input.description !== undefined) {
          updates.description = input.description.trim();
        }
        if (input.status !== undefined) {
          updates.status = parseField(TaskStatusEnum, input.status, "status");
        }
        if (input.priority !== undefined) {
          updates.priority = parseField(TaskPriorityEnum, input.priority, "priority");
        }
        if (input.due_date !== undefined) {
          updates.due_date = parseDueDate(input.due_date);
        }
        const hasFields = Object.keys(updates).length > 0;
        if (!hasFields && input.assignee_ids === undefined) {
          throw new ValidationError("No changes provided.");
        }

        await updateTaskFields(trx, taskId, updates);
        if (input.assignee_ids !== undefined) {
          // Full replace, never a merge
          const assigneeIds = uniqueIds(input.assignee_ids);
          await this.requireUsers(trx, assigneeIds);
          await clearAssignees(trx, taskId);
          await insertAssignees(trx, taskId, assigneeIds, new Date().toISOString());
        }
        return this.mustGet(trx, taskId);
      }),
    );
  }

  /** Marks the task done. Unlike update, assignees may do this too. */
  async complete(taskId: number, requesterId: number): Promise<Result<Task>> {
    return attempt(() =>
      this.db.transaction().execute(async (trx) => {
        const task = await this.mustGet(trx, taskId);
        const access = await requireProject(trx, task.project_id, requesterId);
        ensure(
          canCompleteTask(
            access,
            task.creator_id,
            task.assignees.map((a) => a.id),
          ),
          "You do not have permission to complete this task.",
        );
        await updateTaskFields(trx, taskId, { status: "done" });
        return this.mustGet(trx, taskId);
      }),
    );
  }

  async delete(taskId: number, requesterId: number): Promise<Result<Task>> {
    return attempt(() =>
      this.db.transaction().execute(async (trx) => {
        const task = await this.mustGet(trx, taskId);
        const access = await requireProject(trx, task.project_id, requesterId);
        ensure(
          canEditTask(access, task.creator_id),
          "Only the task creator or project owner can delete this task.",
        );
        await deleteTask(trx, taskId);
        return task;
      }),
    );
  }

  /** Due date ascending with undated tasks last, then newest first. */
  async listAssignedTo(userId: number, status?: string): Promise<Result<Task[]>> {
    return attempt(async () =>
      listTasks(this.db, {
        assigneeId: userId,
        status: status ? parseField(TaskStatusEnum, status, "status") : undefined,
        sort: "due",
      }),
    );
  }

  async exportCsv(projectId: number, requesterId: number): Promise<Result<string>> {
    return attempt(async () => {
      const access = await requireProject(this.db, projectId, requesterId);
      ensure(canView(access), "Only project members can export tasks.");
      return formatTasksCsv(await listTasks(this.db, { projectId }));
    });
  }

  private async requireUsers(db: Kysely<DB>, userIds: number[]): Promise<void> {
    const missing = await findMissingUserIds(db, userIds);
    if (missing.length > 0) {
      throw new NotFoundError(`User ${missing[0]} not found.`);
    }
  }

  private async mustGet(db: Kysely<DB>, taskId: number): Promise<Task> {
    const task = await getTask(db, taskId);
    if (!task) {
      throw new NotFoundError("Task not found.");
    }
    return task;
  }
}
