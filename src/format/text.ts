import type { User } from "../users/types.js";
import type { Dashboard, Project, ProjectSummary } from "../projects/types.js";
import type { JoinRequest, Member } from "../membership/types.js";
import type { Task } from "../tasks/types.js";
import { bold, dim, green, italic, red, yellow } from "./colors.js";
import { assigneeNames } from "./csv.js";

function localDate(ref: Date): string {
  return `${ref.getFullYear()}-${String(ref.getMonth() + 1).padStart(2, "0")}-${String(ref.getDate()).padStart(2, "0")}`;
}

/** Due dates are whole days: a task is overdue once its day has passed. */
export function isOverdue(dueDate: string, now?: Date): boolean {
  return dueDate < localDate(now ?? new Date());
}

function colorPriority(p: string): string {
  switch (p) {
    case "high":
      return red(p);
    case "low":
      return dim(p);
    default:
      return p;
  }
}

function colorStatus(s: string): string {
  switch (s) {
    case "done":
      return dim(s);
    case "in-progress":
      return bold(s);
    default:
      return s;
  }
}

function colorCheck(status: string): string {
  switch (status) {
    case "done":
      return dim("[x]");
    case "in-progress":
      return bold("[~]");
    default:
      return dim("[ ]");
  }
}

export function formatUsersText(users: User[]): string {
  if (users.length === 0) {
    return dim("No users found.");
  }
  const idW = Math.max(2, ...users.map((u) => String(u.id).length));
  return users.map((u) => `${dim(String(u.id).padStart(idW))}  ${u.username}`).join("\n");
}

export interface ProjectDetail {
  summary?: ProjectSummary;
  members?: Member[];
  requests?: JoinRequest[];
}

export function formatProjectText(project: Project, detail: ProjectDetail = {}): string {
  const lines: string[] = [];
  lines.push(`${dim(`#${project.id}`)}  ${bold(project.name)}`);
  const status = project.status === "completed" ? green(project.status) : project.status;
  lines.push(`  Owner: ${project.owner_name}  Status: ${status}`);
  lines.push(`  Created: ${project.created_at.slice(0, 10)}`);
  if (project.description) {
    lines.push(`  ${italic(project.description)}`);
  }
  if (detail.summary) {
    const s = detail.summary;
    lines.push(`  Tasks: ${s.total} total (${s.todo} todo, ${s.in_progress} in progress, ${s.done} done)`);
  }
  if (detail.members && detail.members.length > 0) {
    lines.push(`  ${dim("Members:")}`);
    for (const m of detail.members) {
      lines.push(`    ${dim("-")} ${m.username}${m.role === "owner" ? dim(" (owner)") : ""}`);
    }
  }
  if (detail.requests && detail.requests.length > 0) {
    lines.push(`  ${dim("Pending requests:")}`);
    for (const r of detail.requests) {
      lines.push(`    ${dim(`#${r.id}`)} ${r.username} ${dim(r.requested_at.slice(0, 10))}`);
    }
  }
  return lines.join("\n");
}

export function formatProjectsText(projects: Project[]): string {
  if (projects.length === 0) {
    return `${dim("No projects found.")}\n${dim('Create one with: tandem project create "Name"')}`;
  }

  const idW = Math.max(2, ...projects.map((p) => String(p.id).length));
  const nameW = Math.max(4, ...projects.map((p) => p.name.length));
  const ownerW = Math.max(5, ...projects.map((p) => p.owner_name.length));
  const statusW = Math.max(6, ...projects.map((p) => p.status.length));

  const header = dim(
    `${"ID".padEnd(idW)}  ${"NAME".padEnd(nameW)}  ${"OWNER".padEnd(ownerW)}  ${"STATUS".padEnd(statusW)}  CREATED`,
  );
  const rows = projects.map(
    (p) =>
      `${dim(String(p.id).padEnd(idW))}  ${bold(p.name.padEnd(nameW))}  ${p.owner_name.padEnd(ownerW)}  ${p.status.padEnd(statusW)}  ${p.created_at.slice(0, 10)}`,
  );
  return [header, ...rows].join("\n");
}

export function formatMembersText(members: Member[]): string {
  return members
    .map((m) => `${m.username.padEnd(16)} ${m.role === "owner" ? bold(m.role) : m.role}`)
    .join("\n");
}

export function formatRequestsText(requests: JoinRequest[]): string {
  if (requests.length === 0) {
    return dim("No pending requests.");
  }
  return requests
    .map((r) => `${dim(`#${r.id}`)}  ${r.username}  ${dim(r.requested_at.slice(0, 10))}`)
    .join("\n");
}

export function formatTaskText(task: Task, now?: Date): string {
  const lines: string[] = [];
  lines.push(`${dim(`#${task.id}`)}  ${bold(task.title)}`);
  let statusLine = `  Status: ${colorStatus(task.status)}  Priority: ${colorPriority(task.priority)}`;
  if (task.due_date) {
    const due = isOverdue(task.due_date, now) ? bold(yellow(task.due_date)) : task.due_date;
    statusLine += `  Due: ${due}`;
  }
  lines.push(statusLine);
  lines.push(`  Project: ${task.project_name}  Creator: ${task.creator_name}`);
  lines.push(`  Assignees: ${task.assignees.length > 0 ? assigneeNames(task) : dim("Unassigned")}`);
  if (task.description) {
    lines.push(`  ${italic(task.description)}`);
  }
  return lines.join("\n");
}

export function formatTasksText(tasks: Task[], now?: Date): string {
  if (tasks.length === 0) {
    return dim("No tasks found.");
  }

  const idW = Math.max(2, ...tasks.map((t) => String(t.id).length));
  const titleW = Math.max(5, ...tasks.map((t) => t.title.length));
  const priW = Math.max(3, ...tasks.map((t) => t.priority.length));
  const dueW = Math.max(3, ...tasks.map((t) => (t.due_date ?? "").length));

  const header = dim(
    `     ${"ID".padEnd(idW)}  ${"TITLE".padEnd(titleW)}  ${"PRI".padEnd(priW)}  ${"DUE".padEnd(dueW)}  ASSIGNEES`,
  );
  const rows = tasks.map((t) => {
    const duePadded = (t.due_date ?? "").padEnd(dueW);
    const dueCol = t.due_date && isOverdue(t.due_date, now) ? bold(duePadded) : duePadded;
    return `${colorCheck(t.status)}  ${dim(String(t.id).padEnd(idW))}  ${bold(t.title.padEnd(titleW))}  ${colorPriority(t.priority.padEnd(priW))}  ${dueCol}  ${assigneeNames(t)}`;
  });
  return [header, ...rows].join("\n");
}

export function formatDashboardText(user: User, dashboard: Dashboard): string {
  return [
    bold(`Welcome back, ${user.username}!`),
    `  Active projects:     ${dashboard.active_projects}`,
    `  Tasks to do:         ${dashboard.tasks_todo}`,
    `  Tasks in progress:   ${dashboard.tasks_in_progress}`,
  ].join("\n");
}
