import { Kysely, SqliteDialect } from "kysely";
import type { Generated } from "kysely";
import type BetterSqlite3 from "better-sqlite3";

export interface UserTable {
  id: Generated<number>;
  username: string;
  password_hash: string;
  salt: string;
  created_at: string;
}

export interface ProjectTable {
  id: Generated<number>;
  name: string;
  description: string;
  owner_id: number;
  status: string;
  created_at: string;
}

export interface MembershipTable {
  id: Generated<number>;
  project_id: number;
  user_id: number;
  joined_at: string;
}

export interface JoinRequestTable {
  id: Generated<number>;
  project_id: number;
  user_id: number;
  status: string;
  requested_at: string;
}

export interface TaskTable {
  id: Generated<number>;
  project_id: number;
  title: string;
  description: string;
  status: string;
  priority: string;
  due_date: string | null;
  creator_id: number;
  created_at: string;
}

export interface TaskAssigneeTable {
  id: Generated<number>;
  task_id: number;
  user_id: number;
  assigned_at: string;
}

export interface SessionTable {
  id: string;
  user_id: number;
  token_hash: string;
  expires_at: string;
  created_at: string;
}

export interface MetaTable {
  key: string;
  value: string;
}

export interface DB {
  users: UserTable;
  projects: ProjectTable;
  memberships: MembershipTable;
  join_requests: JoinRequestTable;
  tasks: TaskTable;
  task_assignees: TaskAssigneeTable;
  sessions: SessionTable;
  meta: MetaTable;
}

export function createKysely(db: BetterSqlite3.Database): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new SqliteDialect({ database: db }),
  });
}
