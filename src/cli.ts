import { fileURLToPath } from "url";
import fs from "fs";
import path from "path";
import readline from "readline";
import { spawn } from "child_process";
import { Command, Option } from "commander";
import type Database from "better-sqlite3";
import { createTracker } from "./main.js";
import { createKysely } from "./db/kysely.js";
import { openDb } from "./db/connection.js";
import { initSchema } from "./db/schema.js";
import { NotFoundError, ValidationError, type Result, type TrackerError } from "./errors.js";
import type { User } from "./users/types.js";
import type { UpdateTaskInput } from "./tasks/types.js";
import { TASK_STATUSES, TASK_PRIORITIES } from "./tasks/types.js";
import { PROJECT_STATUSES } from "./projects/types.js";
import {
  formatUsersText,
  formatProjectText,
  formatProjectsText,
  formatMembersText,
  formatRequestsText,
  formatTaskText,
  formatTasksText,
  formatDashboardText,
  type ProjectDetail,
} from "./format/text.js";
import { formatJson, formatErrorJson } from "./format/json.js";
import { loadConfig, getConfigPath, DEFAULT_CONFIG_TOML, type Config } from "./config/config.js";
import {
  getSessionPath,
  readSessionToken,
  writeSessionToken,
  clearSessionToken,
} from "./config/session.js";

interface FormatOpts {
  json?: boolean;
  plaintext?: boolean;
}

export interface ProgramOptions {
  /** Where the login token is kept between invocations. */
  sessionPath?: string;
  /** Reads a line from the terminal (passwords, confirmations). */
  prompt?: (question: string) => Promise<string>;
}

export function ask(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input, output });
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

function withFormat(cmd: Command): Command {
  return cmd
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)");
}

export function createProgram(
  db: Database.Database,
  write: (text: string) => void = (t) => process.stdout.write(t + "\n"),
  config?: Config,
  options: ProgramOptions = {},
): Command {
  const resolvedConfig = config ?? loadConfig();
  const sessionPath = options.sessionPath ?? getSessionPath();
  const prompt = options.prompt ?? ((q: string) => ask(q));
  const tracker = createTracker(createKysely(db));
  const program = new Command("tandem")
    .description(
      "tandem: shared projects and tasks for small teams\n\nUse --json on any command for machine-readable output (or set TANDEM_FORMAT=json, or output_format in config). Run 'tandem config init' to create a config file.",
    )
    .version("0.1.0");

  program.configureOutput({
    writeOut: write,
    writeErr: write,
  });

  // Override exit to not actually exit during tests
  program.exitOverride();

  function useJson(opts: FormatOpts): boolean {
    if (opts.plaintext) {
      return false;
    }
    return !!(
      opts.json ||
      process.env.TANDEM_FORMAT === "json" ||
      resolvedConfig.output_format === "json"
    );
  }

  function report(error: TrackerError, json: boolean): void {
    write(json ? formatErrorJson(error) : error.message);
    process.exitCode = 1;
  }

  function emit<T>(result: Result<T>, json: boolean, text: (value: T) => string): void {
    if (!result.ok) {
      report(result.error, json);
      return;
    }
    write(json ? formatJson(result.value) : text(result.value));
  }

  function parseId(value: string, label: string, json: boolean): number | null {
    const id = Number(value);
    if (!Number.isInteger(id) || id <= 0) {
      report(new ValidationError(`Invalid ${label}: ${value}`, label), json);
      return null;
    }
    return id;
  }

  async function currentUser(json: boolean): Promise<User | null> {
    const token = readSessionToken(sessionPath);
    if (token) {
      const resolved = await tracker.identity.resolveSession(token);
      if (!resolved.ok) {
        report(resolved.error, json);
        return null;
      }
      if (resolved.value) {
        return resolved.value;
      }
    }
    if (json) {
      write(JSON.stringify({ error: "unauthorized", message: "Not logged in." }));
    } else {
      write("Not logged in. Run 'tandem login <username>' first.");
    }
    process.exitCode = 1;
    return null;
  }

  async function lookupUser(username: string, json: boolean): Promise<User | null> {
    const found = await tracker.identity.findByUsername(username);
    if (!found.ok) {
      report(found.error, json);
      return null;
    }
    if (!found.value) {
      report(new NotFoundError(`User '${username}' not found.`), json);
      return null;
    }
    return found.value;
  }

  async function lookupUserIds(usernames: string[], json: boolean): Promise<number[] | null> {
    const resolved = await tracker.identity.resolveUsernames(usernames);
    if (!resolved.ok) {
      report(resolved.error, json);
      return null;
    }
    return resolved.value.map((u) => u.id);
  }

  async function readPassword(given: string | undefined): Promise<string> {
    return given ?? (await prompt("Password: "));
  }

  // --- accounts ---

  withFormat(
    program
      .command("register <username>")
      .description("Create an account")
      .option("--password <password>", "Password (prompted when omitted)"),
  ).action(async (username: string, opts: FormatOpts & { password?: string }) => {
    const json = useJson(opts);
    const password = await readPassword(opts.password);
    emit(await tracker.identity.register(username, password), json, (u) => {
      return `Registered ${u.username}. Run 'tandem login ${u.username}' to sign in.`;
    });
  });

  withFormat(
    program
      .command("login <username>")
      .description("Sign in and remember the session on this machine")
      .option("--password <password>", "Password (prompted when omitted)"),
  ).action(async (username: string, opts: FormatOpts & { password?: string }) => {
    const json = useJson(opts);
    const password = await readPassword(opts.password);
    const auth = await tracker.identity.authenticate(username, password);
    if (!auth.ok) {
      report(auth.error, json);
      return;
    }
    if (!auth.value) {
      if (json) {
        write(JSON.stringify({ error: "unauthorized", message: "Invalid username or password." }));
      } else {
        write("Invalid username or password.");
      }
      process.exitCode = 1;
      return;
    }
    const user = auth.value;
    const session = await tracker.identity.createSession(user.id, resolvedConfig.session_days);
    if (!session.ok) {
      report(session.error, json);
      return;
    }
    writeSessionToken(session.value.token, sessionPath);
    if (json) {
      write(formatJson({ user, expires_at: session.value.expires_at }));
    } else {
      write(`Logged in as ${user.username}.`);
    }
  });

  withFormat(program.command("logout").description("Forget the stored session")).action(
    async (opts: FormatOpts) => {
      const json = useJson(opts);
      const token = readSessionToken(sessionPath);
      if (token) {
        const revoked = await tracker.identity.revokeSession(token);
        if (!revoked.ok) {
          report(revoked.error, json);
          return;
        }
      }
      clearSessionToken(sessionPath);
      write(json ? formatJson({ logged_out: token !== null }) : "Logged out.");
    },
  );

  withFormat(program.command("whoami").description("Show the signed-in user")).action(
    async (opts: FormatOpts) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (user) {
        write(json ? formatJson(user) : user.username);
      }
    },
  );

  withFormat(program.command("users").description("List registered users")).action(
    async (opts: FormatOpts) => {
      const json = useJson(opts);
      if (!(await currentUser(json))) {
        return;
      }
      emit(await tracker.identity.listAll(), json, formatUsersText);
    },
  );

  withFormat(
    program.command("dashboard").description("Counts of your active projects and open tasks"),
  ).action(async (opts: FormatOpts) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    emit(await tracker.projects.dashboard(user.id), json, (d) => formatDashboardText(user, d));
  });

  // --- projects ---

  const projectCmd = program.command("project").description("Create, browse and manage projects");

  withFormat(
    projectCmd
      .command("create <name>")
      .description("Create a project owned by you")
      .option("-d, --description <text>", "Project description", ""),
  ).action(async (name: string, opts: FormatOpts & { description: string }) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    emit(await tracker.projects.create(name, opts.description, user.id), json, (p) =>
      formatProjectText(p),
    );
  });

  withFormat(
    projectCmd
      .command("list")
      .description("List projects (all by default)")
      .option("--mine", "Only projects you own or belong to")
      .option("--owned", "Only projects you own"),
  ).action(async (opts: FormatOpts & { mine?: boolean; owned?: boolean }) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const result = opts.owned
      ? await tracker.projects.listOwnedBy(user.id)
      : opts.mine
        ? await tracker.projects.listAccessibleTo(user.id)
        : await tracker.projects.listAll();
    emit(result, json, formatProjectsText);
  });

  withFormat(
    projectCmd.command("search <term>").description("Find projects whose name contains <term>"),
  ).action(async (term: string, opts: FormatOpts) => {
    const json = useJson(opts);
    if (!(await currentUser(json))) {
      return;
    }
    emit(await tracker.projects.search(term), json, formatProjectsText);
  });

  withFormat(
    projectCmd.command("show <id>").description("Show a project, its members and task counts"),
  ).action(async (idArg: string, opts: FormatOpts) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const id = parseId(idArg, "project id", json);
    if (id === null) {
      return;
    }
    const found = await tracker.projects.get(id);
    if (!found.ok) {
      report(found.error, json);
      return;
    }
    if (!found.value) {
      report(new NotFoundError("Project not found."), json);
      return;
    }

    // Non-members see the project card only
    const detail: ProjectDetail = {};
    const summary = await tracker.projects.summary(id, user.id);
    if (summary.ok) {
      detail.summary = summary.value;
    }
    const members = await tracker.membership.listMembers(id, user.id);
    if (members.ok) {
      detail.members = members.value;
    }
    const requests = await tracker.membership.listPendingRequests(id, user.id);
    if (requests.ok) {
      detail.requests = requests.value;
    }

    write(json ? formatJson({ ...found.value, ...detail }) : formatProjectText(found.value, detail));
  });

  withFormat(
    projectCmd
      .command("edit <id>")
      .description("Rename a project or change its description")
      .option("--name <name>", "New name")
      .option("--description <text>", "New description"),
  ).action(async (idArg: string, opts: FormatOpts & { name?: string; description?: string }) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const id = parseId(idArg, "project id", json);
    if (id === null) {
      return;
    }
    emit(
      await tracker.projects.update(id, user.id, {
        name: opts.name,
        description: opts.description,
      }),
      json,
      (p) => formatProjectText(p),
    );
  });

  withFormat(
    projectCmd
      .command("status <id> <status>")
      .description(`Set project status (${PROJECT_STATUSES.join(", ")})`),
  ).action(async (idArg: string, status: string, opts: FormatOpts) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const id = parseId(idArg, "project id", json);
    if (id === null) {
      return;
    }
    emit(await tracker.projects.updateStatus(id, user.id, status), json, (p) => {
      return `Project ${p.name} is now ${p.status}.`;
    });
  });

  withFormat(
    projectCmd
      .command("delete <id>")
      .description("Delete a project with all its tasks and memberships")
      .option("-y, --yes", "Skip the confirmation prompt"),
  ).action(async (idArg: string, opts: FormatOpts & { yes?: boolean }) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const id = parseId(idArg, "project id", json);
    if (id === null) {
      return;
    }
    if (!opts.yes) {
      const answer = (await prompt(`Delete project ${id} and all of its tasks? [y/N] `))
        .trim()
        .toLowerCase();
      if (answer !== "y" && answer !== "yes") {
        write("Aborted.");
        return;
      }
    }
    emit(await tracker.projects.delete(id, user.id), json, (p) => `Deleted project ${p.name}.`);
  });

  // --- members ---

  const memberCmd = program.command("member").description("Manage project members");

  withFormat(memberCmd.command("list <projectId>").description("List project members")).action(
    async (projectArg: string, opts: FormatOpts) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const projectId = parseId(projectArg, "project id", json);
      if (projectId === null) {
        return;
      }
      emit(await tracker.membership.listMembers(projectId, user.id), json, formatMembersText);
    },
  );

  withFormat(
    memberCmd.command("add <projectId> <username>").description("Add a user to your project"),
  ).action(async (projectArg: string, username: string, opts: FormatOpts) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const projectId = parseId(projectArg, "project id", json);
    if (projectId === null) {
      return;
    }
    const target = await lookupUser(username, json);
    if (!target) {
      return;
    }
    emit(await tracker.membership.addMember(projectId, target.id, user.id), json, (m) => {
      return `Added ${m.username} to the project.`;
    });
  });

  withFormat(
    memberCmd
      .command("remove <projectId> <username>")
      .description("Remove a member from your project"),
  ).action(async (projectArg: string, username: string, opts: FormatOpts) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const projectId = parseId(projectArg, "project id", json);
    if (projectId === null) {
      return;
    }
    const target = await lookupUser(username, json);
    if (!target) {
      return;
    }
    const removed = await tracker.membership.removeMember(projectId, target.id, user.id);
    if (!removed.ok) {
      report(removed.error, json);
      return;
    }
    write(
      json
        ? formatJson({ project_id: projectId, removed: target.username })
        : `Removed ${target.username} from the project.`,
    );
  });

  withFormat(memberCmd.command("leave <projectId>").description("Leave a project")).action(
    async (projectArg: string, opts: FormatOpts) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const projectId = parseId(projectArg, "project id", json);
      if (projectId === null) {
        return;
      }
      const left = await tracker.membership.removeMember(projectId, user.id, user.id);
      if (!left.ok) {
        report(left.error, json);
        return;
      }
      write(json ? formatJson({ project_id: projectId, removed: user.username }) : "You left the project.");
    },
  );

  // --- join requests ---

  const requestCmd = program.command("request").description("Ask to join projects and review asks");

  withFormat(
    requestCmd.command("join <projectId>").description("Ask the owner to let you join"),
  ).action(async (projectArg: string, opts: FormatOpts) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const projectId = parseId(projectArg, "project id", json);
    if (projectId === null) {
      return;
    }
    emit(await tracker.membership.requestToJoin(projectId, user.id), json, (r) => {
      return `Request #${r.id} sent. The project owner will review it.`;
    });
  });

  withFormat(
    requestCmd.command("list <projectId>").description("Pending requests for your project"),
  ).action(async (projectArg: string, opts: FormatOpts) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const projectId = parseId(projectArg, "project id", json);
    if (projectId === null) {
      return;
    }
    emit(
      await tracker.membership.listPendingRequests(projectId, user.id),
      json,
      formatRequestsText,
    );
  });

  withFormat(requestCmd.command("approve <requestId>").description("Approve a request")).action(
    async (requestArg: string, opts: FormatOpts) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const requestId = parseId(requestArg, "request id", json);
      if (requestId === null) {
        return;
      }
      emit(await tracker.membership.approve(requestId, user.id), json, (r) => {
        return `Approved ${r.username}.`;
      });
    },
  );

  withFormat(requestCmd.command("reject <requestId>").description("Reject a request")).action(
    async (requestArg: string, opts: FormatOpts) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const requestId = parseId(requestArg, "request id", json);
      if (requestId === null) {
        return;
      }
      emit(await tracker.membership.reject(requestId, user.id), json, (r) => {
        return `Rejected ${r.username}.`;
      });
    },
  );

  // --- tasks ---

  const taskCmd = program.command("task").description("Create and track tasks");

  withFormat(
    taskCmd
      .command("add <projectId> <title>")
      .description("Add a task to a project")
      .option("-d, --description <text>", "Task description", "")
      .addOption(
        new Option("-s, --status <status>", "Initial status").choices(TASK_STATUSES).default("todo"),
      )
      .addOption(
        new Option("-p, --priority <priority>", "Priority level")
          .choices(TASK_PRIORITIES)
          .default("medium"),
      )
      .option("--due <date>", "Due date (YYYY-MM-DD)")
      .option("-a, --assign <usernames...>", "Assign users"),
  ).action(
    async (
      projectArg: string,
      title: string,
      opts: FormatOpts & {
        description: string;
        status: string;
        priority: string;
        due?: string;
        assign?: string[];
      },
    ) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const projectId = parseId(projectArg, "project id", json);
      if (projectId === null) {
        return;
      }
      const assigneeIds = await lookupUserIds(opts.assign ?? [], json);
      if (assigneeIds === null) {
        return;
      }
      emit(
        await tracker.tasks.create(
          projectId,
          {
            title,
            description: opts.description,
            status: opts.status,
            priority: opts.priority,
            due_date: opts.due ?? null,
            assignee_ids: assigneeIds,
          },
          user.id,
        ),
        json,
        (t) => formatTaskText(t),
      );
    },
  );

  withFormat(
    taskCmd
      .command("list <projectId>")
      .description("List a project's tasks")
      .addOption(new Option("-s, --status <status>", "Filter by status").choices(TASK_STATUSES))
      .option("-a, --assignee <username>", "Filter by assignee")
      .option("--from <date>", "Due on or after (YYYY-MM-DD)")
      .option("--to <date>", "Due on or before (YYYY-MM-DD)"),
  ).action(
    async (
      projectArg: string,
      opts: FormatOpts & { status?: string; assignee?: string; from?: string; to?: string },
    ) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const projectId = parseId(projectArg, "project id", json);
      if (projectId === null) {
        return;
      }
      let assigneeId: number | undefined;
      if (opts.assignee) {
        const assignee = await lookupUser(opts.assignee, json);
        if (!assignee) {
          return;
        }
        assigneeId = assignee.id;
      }
      emit(
        await tracker.tasks.list(projectId, user.id, {
          status: opts.status,
          assignee_id: assigneeId,
          due_from: opts.from,
          due_to: opts.to,
        }),
        json,
        (tasks) => formatTasksText(tasks),
      );
    },
  );

  withFormat(taskCmd.command("get <id>").description("Show a task")).action(
    async (idArg: string, opts: FormatOpts) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const id = parseId(idArg, "task id", json);
      if (id === null) {
        return;
      }
      emit(await tracker.tasks.get(id, user.id), json, (t) => formatTaskText(t));
    },
  );

  withFormat(
    taskCmd
      .command("update <id>")
      .description("Change a task's fields or assignees")
      .option("-t, --title <title>", "New title")
      .option("-d, --description <text>", "New description")
      .addOption(new Option("-s, --status <status>", "New status").choices(TASK_STATUSES))
      .addOption(new Option("-p, --priority <priority>", "New priority").choices(TASK_PRIORITIES))
      .option("--due <date>", "New due date (YYYY-MM-DD, or 'none' to clear)")
      .option("-a, --assign <usernames...>", "Replace assignees")
      .option("--unassign", "Remove all assignees"),
  ).action(
    async (
      idArg: string,
      opts: FormatOpts & {
        title?: string;
        description?: string;
        status?: string;
        priority?: string;
        due?: string;
        assign?: string[];
        unassign?: boolean;
      },
    ) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const id = parseId(idArg, "task id", json);
      if (id === null) {
        return;
      }
      const input: UpdateTaskInput = {
        title: opts.title,
        description: opts.description,
        status: opts.status,
        priority: opts.priority,
      };
      if (opts.due !== undefined) {
        input.due_date = opts.due === "none" ? null : opts.due;
      }
      if (opts.unassign) {
        input.assignee_ids = [];
      } else if (opts.assign) {
        const ids = await lookupUserIds(opts.assign, json);
        if (ids === null) {
          return;
        }
        input.assignee_ids = ids;
      }
      emit(await tracker.tasks.update(id, user.id, input), json, (t) => formatTaskText(t));
    },
  );

  withFormat(taskCmd.command("done <id>").description("Mark a task done")).action(
    async (idArg: string, opts: FormatOpts) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const id = parseId(idArg, "task id", json);
      if (id === null) {
        return;
      }
      emit(await tracker.tasks.complete(id, user.id), json, (t) => `Completed: ${t.title}`);
    },
  );

  withFormat(taskCmd.command("delete <id>").description("Delete a task")).action(
    async (idArg: string, opts: FormatOpts) => {
      const json = useJson(opts);
      const user = await currentUser(json);
      if (!user) {
        return;
      }
      const id = parseId(idArg, "task id", json);
      if (id === null) {
        return;
      }
      emit(await tracker.tasks.delete(id, user.id), json, (t) => `Deleted task: ${t.title}`);
    },
  );

  withFormat(
    taskCmd
      .command("mine")
      .description("Tasks assigned to you across projects, soonest due first")
      .addOption(new Option("-s, --status <status>", "Filter by status").choices(TASK_STATUSES)),
  ).action(async (opts: FormatOpts & { status?: string }) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    emit(await tracker.tasks.listAssignedTo(user.id, opts.status), json, (tasks) =>
      formatTasksText(tasks),
    );
  });

  // --- export ---

  withFormat(
    program
      .command("export <projectId>")
      .description("Export a project's tasks as CSV")
      .option("-o, --output <file>", "Write to a file instead of stdout"),
  ).action(async (projectArg: string, opts: FormatOpts & { output?: string }) => {
    const json = useJson(opts);
    const user = await currentUser(json);
    if (!user) {
      return;
    }
    const projectId = parseId(projectArg, "project id", json);
    if (projectId === null) {
      return;
    }
    const tasks = await tracker.tasks.list(projectId, user.id);
    if (!tasks.ok) {
      report(tasks.error, json);
      return;
    }
    if (tasks.value.length === 0) {
      write(json ? formatJson({ tasks: 0 }) : "No tasks to export.");
      return;
    }
    const csv = await tracker.tasks.exportCsv(projectId, user.id);
    if (!csv.ok) {
      report(csv.error, json);
      return;
    }
    if (!opts.output) {
      write(csv.value.trimEnd());
      return;
    }
    fs.writeFileSync(opts.output, csv.value);
    if (json) {
      write(formatJson({ file: opts.output, tasks: tasks.value.length }));
    } else {
      write(`Exported ${tasks.value.length} tasks to ${opts.output}`);
    }
  });

  // --- config ---

  const configCmd = program.command("config").description("Manage configuration");

  configCmd
    .command("init")
    .description("Create a default config file with documented options")
    .action(() => {
      const configPath = getConfigPath();
      if (fs.existsSync(configPath)) {
        write(`Config file already exists at ${configPath}`);
        return;
      }
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, DEFAULT_CONFIG_TOML);
      write(`Created ${configPath}`);
    });

  configCmd
    .command("path")
    .description("Print the config file path")
    .action(() => {
      write(getConfigPath());
    });

  // --- server ---

  const server = program.command("server").description("Run the HTTP API");

  server
    .command("start")
    .description("Start the server (runs in foreground, Ctrl+C to stop)")
    .option("--port <port>", "Port to listen on", String(resolvedConfig.port))
    .action((opts: { port: string }) => {
      const serverScript = path.join(
        path.dirname(fileURLToPath(import.meta.url)),
        "server",
        "index.js",
      );

      const child = spawn("node", [serverScript], {
        stdio: "inherit",
        env: { ...process.env, TANDEM_PORT: opts.port },
      });

      const forward = (signal: NodeJS.Signals) => {
        child.kill(signal);
      };
      process.on("SIGINT", () => forward("SIGINT"));
      process.on("SIGTERM", () => forward("SIGTERM"));

      child.on("exit", (code) => {
        process.exit(code ?? 0);
      });
    });

  return program;
}

// Entry point when run directly
async function main() {
  const db = openDb();
  initSchema(db);
  const config = loadConfig();
  const program = createProgram(db, undefined, config);

  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    // Commander throws on --help, --version, etc.
    if (err instanceof Error && "exitCode" in err && typeof err.exitCode === "number") {
      process.exit(err.exitCode);
    }
    throw err;
  } finally {
    db.close();
  }
}

const currentFile = fileURLToPath(import.meta.url);
const isEntryPoint = process.argv[1] && currentFile === process.argv[1];

if (isEntryPoint) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
