import { stringify } from "yaml";
import type { OutputFormat } from "../types.js";

/**
 * Render plain data as JSON or YAML (the default). Key order is kept as
 * built and non-ASCII text is written as-is.
 */
export function formatOutput(data: unknown, format: OutputFormat = "yaml"): string {
  if (format === "json") {
    return JSON.stringify(data ?? null);
  }
  return stringify(data ?? null, { lineWidth: 0 });
}
