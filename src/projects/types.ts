export const PROJECT_STATUSES = ["in-progress", "completed"] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export interface Project {
  id: number;
  name: string;
  description: string;
  status: ProjectStatus;
  owner_id: number;
  owner_name: string;
  created_at: string;
}

export interface UpdateProjectInput {
  name?: string;
  description?: string;
}

export interface ProjectSummary {
  total: number;
  todo: number;
  in_progress: number;
  done: number;
}

export interface Dashboard {
  active_projects: number;
  tasks_todo: number;
  tasks_in_progress: number;
}
