// Constants, checks and zod schemas shared by the services, the CLI (cli.ts)
// and the HTTP routes (server/routes.ts).

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { TASK_STATUSES, TASK_PRIORITIES } from "./tasks/types.js";
import { PROJECT_STATUSES } from "./projects/types.js";

export const DUE_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export const MIN_USERNAME_LENGTH = 3;
export const MIN_PASSWORD_LENGTH = 6;
export const MIN_PROJECT_NAME_LENGTH = 3;
export const MIN_TASK_TITLE_LENGTH = 3;

export function normalizeUsername(username: string): string {
  return username.trim().toLowerCase();
}

export function sanitizeTitle(title: string): string {
  return title.replace(/[\r\n]+/g, " ").trim();
}

/** True for a real calendar day written as YYYY-MM-DD (rejects 2025-02-30). */
export function isCalendarDate(value: string): boolean {
  if (!DUE_DATE_REGEX.test(value)) {
    return false;
  }
  const [year, month, day] = value.split("-").map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

export const TaskStatusEnum = z.enum(TASK_STATUSES, {
  errorMap: () => ({ message: `Invalid status. Must be one of: ${TASK_STATUSES.join(", ")}` }),
});

export const TaskPriorityEnum = z.enum(TASK_PRIORITIES, {
  errorMap: () => ({
    message: `Invalid priority. Must be one of: ${TASK_PRIORITIES.join(", ")}`,
  }),
});

export const ProjectStatusEnum = z.enum(PROJECT_STATUSES, {
  errorMap: () => ({
    message: `Invalid status. Must be one of: ${PROJECT_STATUSES.join(", ")}`,
  }),
});

export const usernameSchema = z
  .string()
  .transform(normalizeUsername)
  .pipe(
    z
      .string()
      .min(
        MIN_USERNAME_LENGTH,
        `Username must be at least ${MIN_USERNAME_LENGTH} characters long.`,
      ),
  );

export const passwordSchema = z
  .string()
  .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters long.`);

export const projectNameSchema = z
  .string()
  .transform(sanitizeTitle)
  .pipe(
    z
      .string()
      .min(
        MIN_PROJECT_NAME_LENGTH,
        `Project name must be at least ${MIN_PROJECT_NAME_LENGTH} characters long.`,
      ),
  );

export const taskTitleSchema = z
  .string()
  .transform(sanitizeTitle)
  .pipe(
    z
      .string()
      .min(
        MIN_TASK_TITLE_LENGTH,
        `Task title must be at least ${MIN_TASK_TITLE_LENGTH} characters long.`,
      ),
  );

export const dueDateSchema = z
  .string()
  .refine(isCalendarDate, "Invalid date format. Use YYYY-MM-DD.");

/** Parses one field, turning the first zod issue into a ValidationError naming it. */
export function parseField<T, I>(
  schema: z.ZodType<T, z.ZodTypeDef, I>,
  value: unknown,
  field: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? `Invalid ${field}.`, field);
  }
  return result.data;
}

// --- HTTP request bodies ---

const idSchema = z.number().int().positive();

export const credentialsBody = z.object({
  username: z.string(),
  password: z.string(),
});

export const projectCreateBody = z.object({
  name: z.string(),
  description: z.string().optional(),
});

export const projectUpdateBody = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
});

export const projectStatusBody = z.object({
  status: z.string(),
});

export const memberAddBody = z
  .object({
    user_id: idSchema.optional(),
    username: z.string().optional(),
  })
  .refine((b) => b.user_id !== undefined || b.username !== undefined, {
    message: "Either user_id or username is required.",
  });

export const taskCreateBody = z.object({
  title: z.string(),
  description: z.string().optional(),
  status: z.string().optional(),
  priority: z.string().optional(),
  due_date: z.string().nullable().optional(),
  assignee_ids: z.array(idSchema).optional(),
});

export const taskUpdateBody = taskCreateBody.partial();

export const taskListQuery = z.object({
  status: z.string().optional(),
  assignee: z.coerce.number().int().positive().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
});
