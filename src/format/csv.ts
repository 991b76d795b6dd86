import type { Task } from "../tasks/types.js";

export const CSV_HEADER = [
  "ID",
  "Title",
  "Description",
  "Status",
  "Priority",
  "Due Date",
  "Assignee",
  "Creator",
  "Created At",
] as const;

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

function csvLine(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(",") + "\r\n";
}

export function assigneeNames(task: Task): string {
  return task.assignees.map((a) => a.username).join(", ");
}

/** One row per task, in the order given. Lines end in CRLF. */
export function formatTasksCsv(tasks: Task[]): string {
  let out = csvLine(CSV_HEADER);
  for (const task of tasks) {
    out += csvLine([
      String(task.id),
      task.title,
      task.description,
      task.status,
      task.priority,
      task.due_date ?? "",
      assigneeNames(task),
      task.creator_name,
      task.created_at,
    ]);
  }
  return out;
}
