import type Database from "better-sqlite3";
import { runMigrations, type Migration } from "./migrations.js";

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      salt TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS projects (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      owner_id INTEGER NOT NULL REFERENCES users(id),
      status TEXT NOT NULL DEFAULT 'in-progress',
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS memberships (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
      user_id INTEGER NOT NULL REFERENCES users(id),
      joined_at TEXT NOT NULL,
      UNIQUE (project_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS join_requests (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
      user_id INTEGER NOT NULL REFERENCES users(id),
      status TEXT NOT NULL DEFAULT 'pending',
      requested_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      status TEXT NOT NULL DEFAULT 'todo',
      priority TEXT NOT NULL DEFAULT 'medium',
      due_date TEXT,
      creator_id INTEGER NOT NULL REFERENCES users(id),
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS task_assignees (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
      user_id INTEGER NOT NULL REFERENCES users(id),
      assigned_at TEXT NOT NULL,
      UNIQUE (task_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    INSERT OR IGNORE INTO meta (key, value) VALUES ('schema_version', '1');
  `);

  runMigrations(db, appMigrations);
}

export const appMigrations: Migration[] = [
  {
    version: 2,
    up: (d) => {
      d.exec("CREATE INDEX IF NOT EXISTS idx_projects_owner ON projects(owner_id)");
      d.exec("CREATE INDEX IF NOT EXISTS idx_projects_status ON projects(status)");
      d.exec("CREATE INDEX IF NOT EXISTS idx_memberships_project ON memberships(project_id)");
      d.exec("CREATE INDEX IF NOT EXISTS idx_memberships_user ON memberships(user_id)");
      d.exec("CREATE INDEX IF NOT EXISTS idx_tasks_project ON tasks(project_id)");
      d.exec("CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status)");
      d.exec("CREATE INDEX IF NOT EXISTS idx_task_assignees_task ON task_assignees(task_id)");
      d.exec("CREATE INDEX IF NOT EXISTS idx_task_assignees_user ON task_assignees(user_id)");
    },
  },
  {
    version: 3,
    up: (d) => {
      // At most one pending request per (project, user); resolved ones may pile up
      d.exec(
        "CREATE UNIQUE INDEX IF NOT EXISTS idx_join_requests_pending ON join_requests(project_id, user_id) WHERE status = 'pending'",
      );
      d.exec("CREATE INDEX IF NOT EXISTS idx_join_requests_project ON join_requests(project_id)");
    },
  },
  {
    version: 4,
    up: (d) => {
      d.exec(`
        CREATE TABLE IF NOT EXISTS sessions (
          id TEXT PRIMARY KEY,
          user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
          token_hash TEXT NOT NULL UNIQUE,
          expires_at TEXT NOT NULL,
          created_at TEXT NOT NULL
        )
      `);
      d.exec("CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id)");
    },
  },
];
