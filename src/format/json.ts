import type { TrackerError } from "../errors.js";

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatErrorJson(error: TrackerError): string {
  return JSON.stringify({
    error: error.kind,
    message: error.message,
    ...("field" in error && error.field !== undefined ? { field: error.field } : {}),
  });
}
