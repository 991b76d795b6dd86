import fs from "fs";
import path from "path";
import { getConfigDir } from "./config.js";

export function getSessionPath(): string {
  return path.join(getConfigDir(), "session");
}

export function readSessionToken(sessionPath: string = getSessionPath()): string | null {
  if (!fs.existsSync(sessionPath)) {
    return null;
  }
  const token = fs.readFileSync(sessionPath, "utf-8").trim();
  return token.length > 0 ? token : null;
}

export function writeSessionToken(token: string, sessionPath: string = getSessionPath()): void {
  fs.mkdirSync(path.dirname(sessionPath), { recursive: true, mode: 0o700 });
  fs.writeFileSync(sessionPath, token + "\n", { mode: 0o600 });
}

export function clearSessionToken(sessionPath: string = getSessionPath()): void {
  fs.rmSync(sessionPath, { force: true });
}
