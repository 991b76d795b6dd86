import Database from "better-sqlite3";
import path from "path";
import os from "os";
import fs from "fs";

export function getDataDir(): string {
  return path.join(os.homedir(), ".tandem");
}

export function getDbPath(): string {
  if (process.env.TANDEM_DB_PATH) {
    return process.env.TANDEM_DB_PATH;
  }
  return path.join(getDataDir(), "tandem.db");
}

export function openDb(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? getDbPath();
  const dir = path.dirname(resolvedPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  const db = new Database(resolvedPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  // Concurrent web requests and a CLI session may share the file
  db.pragma("busy_timeout = 5000");

  // Password hashes and session tokens live here: owner-only
  try {
    fs.chmodSync(resolvedPath, 0o600);
  } catch {
    // May fail on some platforms
  }

  return db;
}
