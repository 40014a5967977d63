/**
 * Output rendering helpers
 */

import type { DatabaseInfo, TableInfo } from "@tabledb/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 * @param options - `raw` prints on a single line
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: readonly string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Format bytes to human-readable string
 * @returns Formatted string (e.g., "1.23 KB")
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";

  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const magnitude = Math.floor(Math.log(bytes) / Math.log(k));
  const i = Math.min(Math.max(magnitude, 0), sizes.length - 1);
  const value = bytes / Math.pow(k, i);

  return `${value.toFixed(2)} ${sizes[i]}`;
}

export function tableInfoLines(info: TableInfo): string[] {
  return [
    `Table: ${info.name}`,
    `Records: ${info.recordCount}`,
    `Size: ${formatBytes(info.sizeBytes)}`,
    `Indexes: ${info.indexes.length > 0 ? info.indexes.join(", ") : "(none)"}`,
    `Schema: ${JSON.stringify(info.schema)}`,
  ];
}

/**
 * Database summary followed by one indented line per table
 */
export function databaseInfoLines(info: DatabaseInfo): string[] {
  const lines = [
    `Path: ${info.path}`,
    `Tables: ${info.tableCount}`,
    `Records: ${info.totalRecords}`,
    `Indexes: ${info.totalIndexes}`,
    `File size: ${info.fileSizeBytes === undefined ? "(not written)" : formatBytes(info.fileSizeBytes)}`,
  ];
  for (const table of Object.values(info.tables)) {
    lines.push(`  ${table.name}: ${table.recordCount} ${table.recordCount === 1 ? "record" : "records"}`);
  }
  return lines;
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
