import { Hono, type Context } from "hono";
import { getCookie, setCookie, deleteCookie } from "hono/cookie";
import { logger } from "hono/logger";
import type { z } from "zod";
import type { Tracker } from "../main.js";
import type { User } from "../users/types.js";
import {
  NotFoundError,
  TrackerError,
  ValidationError,
  type ErrorKind,
  type Result,
} from "../errors.js";
import {
  credentialsBody,
  projectCreateBody,
  projectUpdateBody,
  projectStatusBody,
  memberAddBody,
  taskCreateBody,
  taskUpdateBody,
  taskListQuery,
} from "../validation.js";

export const SESSION_COOKIE = "tandem_session";

const STATUS_BY_KIND = {
  validation: 400,
  permission: 403,
  not_found: 404,
  conflict: 409,
  storage: 503,
} as const satisfies Record<ErrorKind, number>;

type AppEnv = { Variables: { user: User } };

export interface AppOptions {
  sessionDays: number;
  /** Request log sink; no request logging when omitted. */
  log?: (message: string, ...rest: string[]) => void;
}

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function found<T>(value: T | null, message: string): T {
  if (value === null) {
    throw new NotFoundError(message);
  }
  return value;
}

function pathId(raw: string, field = "id"): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${field}: ${raw}`, field);
  }
  return id;
}

function parseInput<T, I>(schema: z.ZodType<T, z.ZodTypeDef, I>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join(".") : undefined;
    throw new ValidationError(field ? `${field}: ${issue.message}` : issue.message, field);
  }
  return parsed.data;
}

async function readBody<T, I>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, I>): Promise<T> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON.");
  }
  return parseInput(schema, raw);
}

function sessionToken(c: Context): string | undefined {
  const auth = c.req.header("Authorization");
  if (auth?.startsWith("Bearer ")) {
    return auth.slice(7);
  }
  return getCookie(c, SESSION_COOKIE);
}

export function createApp(tracker: Tracker, options: AppOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { identity, projects, membership, tasks } = tracker;

  if (options.log) {
    app.use("*", logger(options.log));
  }

  app.onError((err, c) => {
    if (err instanceof TrackerError) {
      return c.json(
        {
          error: err.kind,
          message: err.message,
          ...(err instanceof ValidationError && err.field !== undefined ? { field: err.field } : {}),
        },
        STATUS_BY_KIND[err.kind],
      );
    }
    console.error(err);
    return c.json({ error: "internal", message: "Internal server error" }, 500);
  });

  // --- sessions ---

  app.post("/register", async (c) => {
    const body = await readBody(c, credentialsBody);
    return c.json(unwrap(await identity.register(body.username, body.password)), 201);
  });

  app.post("/login", async (c) => {
    const body = await readBody(c, credentialsBody);
    const user = unwrap(await identity.authenticate(body.username, body.password));
    if (!user) {
      return c.json({ error: "unauthorized", message: "Invalid username or password." }, 401);
    }
    const session = unwrap(await identity.createSession(user.id, options.sessionDays));
    setCookie(c, SESSION_COOKIE, session.token, {
      httpOnly: true,
      sameSite: "Lax",
      path: "/",
      expires: new Date(session.expires_at),
    });
    return c.json({ token: session.token, user });
  });

  app.post("/logout", async (c) => {
    const token = sessionToken(c);
    if (token) {
      unwrap(await identity.revokeSession(token));
    }
    deleteCookie(c, SESSION_COOKIE, { path: "/" });
    return c.json({ logged_out: token !== undefined });
  });

  app.use("*", async (c, next) => {
    const token = sessionToken(c);
    const user = token ? unwrap(await identity.resolveSession(token)) : null;
    if (!user) {
      return c.json({ error: "unauthorized", message: "Missing or invalid session" }, 401);
    }
    c.set("user", user);
    await next();
  });

  app.get("/me", (c) => c.json(c.get("user")));

  app.get("/dashboard", async (c) => {
    return c.json(unwrap(await projects.dashboard(c.get("user").id)));
  });

  app.get("/users", async (c) => c.json(unwrap(await identity.listAll())));

  // --- projects ---

  app.get("/projects", async (c) => c.json(unwrap(await projects.listAll())));

  app.get("/projects/mine", async (c) => {
    return c.json(unwrap(await projects.listAccessibleTo(c.get("user").id)));
  });

  app.get("/projects/search", async (c) => {
    return c.json(unwrap(await projects.search(c.req.query("q") ?? "")));
  });

  app.post("/projects", async (c) => {
    const body = await readBody(c, projectCreateBody);
    const created = await projects.create(body.name, body.description ?? "", c.get("user").id);
    return c.json(unwrap(created), 201);
  });

  app.get("/projects/:id", async (c) => {
    const project = unwrap(await projects.get(pathId(c.req.param("id"))));
    return c.json(found(project, "Project not found."));
  });

  app.patch("/projects/:id", async (c) => {
    const id = pathId(c.req.param("id"));
    const body = await readBody(c, projectUpdateBody);
    return c.json(unwrap(await projects.update(id, c.get("user").id, body)));
  });

  app.put("/projects/:id/status", async (c) => {
    const id = pathId(c.req.param("id"));
    const body = await readBody(c, projectStatusBody);
    return c.json(unwrap(await projects.updateStatus(id, c.get("user").id, body.status)));
  });

  app.delete("/projects/:id", async (c) => {
    const id = pathId(c.req.param("id"));
    return c.json(unwrap(await projects.delete(id, c.get("user").id)));
  });

  // --- membership ---

  app.get("/projects/:id/members", async (c) => {
    const id = pathId(c.req.param("id"));
    return c.json(unwrap(await membership.listMembers(id, c.get("user").id)));
  });

  app.post("/projects/:id/members", async (c) => {
    const id = pathId(c.req.param("id"));
    const body = await readBody(c, memberAddBody);
    let targetId = body.user_id;
    if (targetId === undefined && body.username !== undefined) {
      const target = unwrap(await identity.findByUsername(body.username));
      targetId = found(target, `User '${body.username}' not found.`).id;
    }
    if (targetId === undefined) {
      throw new ValidationError("Either user_id or username is required.");
    }
    return c.json(unwrap(await membership.addMember(id, targetId, c.get("user").id)), 201);
  });

  app.delete("/projects/:id/members/:userId", async (c) => {
    const id = pathId(c.req.param("id"));
    const userId = pathId(c.req.param("userId"), "userId");
    unwrap(await membership.removeMember(id, userId, c.get("user").id));
    return c.body(null, 204);
  });

  app.post("/projects/:id/join", async (c) => {
    const id = pathId(c.req.param("id"));
    return c.json(unwrap(await membership.requestToJoin(id, c.get("user").id)), 201);
  });

  app.get("/projects/:id/requests", async (c) => {
    const id = pathId(c.req.param("id"));
    return c.json(unwrap(await membership.listPendingRequests(id, c.get("user").id)));
  });

  app.post("/requests/:id/approve", async (c) => {
    const id = pathId(c.req.param("id"));
    return c.json(unwrap(await membership.approve(id, c.get("user").id)));
  });

  app.post("/requests/:id/reject", async (c) => {
    const id = pathId(c.req.param("id"));
    return c.json(unwrap(await membership.reject(id, c.get("user").id)));
  });

  // --- tasks ---

  app.get("/projects/:id/tasks", async (c) => {
    const id = pathId(c.req.param("id"));
    const query = parseInput(taskListQuery, c.req.query());
    const listed = await tasks.list(id, c.get("user").id, {
      status: query.status,
      assignee_id: query.assignee,
      due_from: query.from,
      due_to: query.to,
    });
    return c.json(unwrap(listed));
  });

  app.post("/projects/:id/tasks", async (c) => {
    const id = pathId(c.req.param("id"));
    const body = await readBody(c, taskCreateBody);
    return c.json(unwrap(await tasks.create(id, body, c.get("user").id)), 201);
  });

  app.get("/projects/:id/export", async (c) => {
    const id = pathId(c.req.param("id"));
    const csv = unwrap(await tasks.exportCsv(id, c.get("user").id));
    return c.body(csv, 200, {
      "Content-Type": "text/csv; charset=utf-8",
      "Content-Disposition": `attachment; filename="project-${id}-tasks.csv"`,
    });
  });

  app.get("/tasks/mine", async (c) => {
    return c.json(unwrap(await tasks.listAssignedTo(c.get("user").id, c.req.query("status"))));
  });

  app.get("/tasks/:id", async (c) => {
    const id = pathId(c.req.param("id"));
    return c.json(unwrap(await tasks.get(id, c.get("user").id)));
  });

  app.patch("/tasks/:id", async (c) => {
    const id = pathId(c.req.param("id"));
    const body = await readBody(c, taskUpdateBody);
    return c.json(unwrap(await tasks.update(id, c.get("user").id, body)));
  });

  app.post("/tasks/:id/complete", async (c) => {
    const id = pathId(c.req.param("id"));
    return c.json(unwrap(await tasks.complete(id, c.get("user").id)));
  });

  app.delete("/tasks/:id", async (c) => {
    const id = pathId(c.req.param("id"));
    return c.json(unwrap(await tasks.delete(id, c.get("user").id)));
  });

  return app;
}
