/**
 * Terminal output helpers for the agent's commands.
 */

import pc from "picocolors";
import { ConfigError, EdgeFleetError } from "@edge-fleet/shared";

/** Regex to match ANSI escape sequences */
const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, "");
}

/** Visible width of a string, ignoring colour codes */
function displayWidth(str: string): number {
  return stripAnsi(str).length;
}

export interface ColumnDef {
  header: string;
  align?: "left" | "right";
}

/**
 * Render rows as an aligned table with a dimmed header row.
 * Columns are sized to their widest cell and separated by two spaces.
 */
export function renderTable(columns: ColumnDef[], rows: string[][]): string {
  const gap = "  ";
  const widths = columns.map((col, i) =>
    Math.max(displayWidth(col.header), ...rows.map((row) => displayWidth(row[i] ?? ""))),
  );

  const formatCell = (value: string, i: number): string => {
    const padding = " ".repeat(Math.max(0, (widths[i] ?? 0) - displayWidth(value)));
    return columns[i]?.align === "right" ? padding + value : value + padding;
  };

  const header = columns.map((col, i) => formatCell(pc.dim(col.header), i)).join(gap).trimEnd();
  const lines = rows.map((row) => columns.map((_, i) => formatCell(row[i] ?? "", i)).join(gap).trimEnd());
  return [header, ...lines].join("\n");
}

export function formatError(error: unknown): string {
  if (error instanceof ConfigError) {
    return pc.red(`Config error: ${error.message}`);
  }
  if (error instanceof EdgeFleetError) {
    return pc.red(`Error (${error.code}): ${error.message}`);
  }
  if (error instanceof Error) {
    return pc.red(`Error: ${error.message}`);
  }
  return pc.red(`Error: ${String(error)}`);
}

/** Write `data` to stdout as 2-space JSON, or through `format` */
export function outputResult<T>(data: T, opts: { json?: boolean; format: (data: T) => string }): void {
  if (opts.json) {
    process.stdout.write(JSON.stringify(data, null, 2) + "\n");
  } else {
    process.stdout.write(opts.format(data) + "\n");
  }
}
