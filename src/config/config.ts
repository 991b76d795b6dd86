import fs from "fs";
import path from "path";
import { parse } from "smol-toml";
import { getDataDir } from "../db/connection.js";

export type OutputFormat = "text" | "json";

export interface Config {
  output_format: OutputFormat;
  port: number;
  session_days: number;
}

const DEFAULTS: Config = {
  output_format: "text",
  port: 4680,
  session_days: 30,
};

const VALID_OUTPUT_FORMATS = new Set<string>(["text", "json"]);

export function getConfigDir(): string {
  return process.env.TANDEM_CONFIG_DIR ?? getDataDir();
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.toml");
}

export const DEFAULT_CONFIG_TOML = `# tandem configuration

# Default output format for CLI commands
# "text" = human-readable (default)
# "json" = machine-readable (overridable per-command with --json / --plaintext)
output_format = "text"

# Port for "tandem server start" (TANDEM_PORT overrides)
port = 4680

# How long a login stays valid, in days
session_days = 30
`;

export function loadConfig(configPath?: string): Config {
  const resolved = configPath ?? getConfigPath();

  if (!fs.existsSync(resolved)) {
    return { ...DEFAULTS };
  }

  const raw = fs.readFileSync(resolved, "utf-8");
  let parsed;
  try {
    parsed = parse(raw);
  } catch (err) {
    process.stderr.write(
      `Warning: Could not parse config file at ${resolved}: ${err instanceof Error ? err.message : String(err)}. Using defaults.\n`,
    );
    return { ...DEFAULTS };
  }
  const config = { ...DEFAULTS };

  if (typeof parsed.output_format === "string" && VALID_OUTPUT_FORMATS.has(parsed.output_format)) {
    config.output_format = parsed.output_format as OutputFormat;
  }

  if (
    typeof parsed.port === "number" &&
    Number.isInteger(parsed.port) &&
    parsed.port > 0 &&
    parsed.port < 65536
  ) {
    config.port = parsed.port;
  }

  if (typeof parsed.session_days === "number" && parsed.session_days > 0) {
    config.session_days = parsed.session_days;
  }

  return config;
}
