export const TASK_STATUSES = ["todo", "in-progress", "done"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ["low", "medium", "high"] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export interface Assignee {
  id: number;
  username: string;
}

export interface Task {
  id: number;
  project_id: number;
  project_name: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  due_date: string | null;
  creator_id: number;
  creator_name: string;
  created_at: string;
  assignees: Assignee[];
}

/**
 * Raw input as it arrives from the CLI or an HTTP body. Status and priority
 * are checked against the closed enums before anything is written.
 */
export interface CreateTaskInput {
  title: string;
  description?: string;
  status?: string;
  priority?: string;
  due_date?: string | null;
  assignee_ids?: number[];
}

/**
 * Every field is optional: undefined leaves it untouched. `due_date: null`
 * clears the date; `assignee_ids` replaces the whole assignee set.
 */
export interface UpdateTaskInput {
  title?: string;
  description?: string;
  status?: string;
  priority?: string;
  due_date?: string | null;
  assignee_ids?: number[];
}

export interface TaskFilters {
  status?: string;
  assignee_id?: number;
  due_from?: string;
  due_to?: string;
}
