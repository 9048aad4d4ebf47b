/**
 * Shared formatting utilities
 */

import { formatTimestamp } from "./diagnostics.js";

/** Longest error message shown on the console; the full text goes to the diagnostic log. */
export const MAX_CONSOLE_ERROR = 200;

/** Characters of an export shown before it is written to disk. */
export const PREVIEW_CHARS = 2000;

/**
 * Cut text to `maxLen` characters, marking the cut with "...".
 */
export function truncate(text: string, maxLen: number): string {
  const clean = text.replace(/\n/g, " ").trim();
  return clean.length > maxLen ? clean.slice(0, maxLen) + "..." : clean;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * First `PREVIEW_CHARS` characters, with a note of the full length when cut.
 */
export function preview(content: string, maxChars = PREVIEW_CHARS): string {
  if (content.length <= maxChars) return content;
  return `${content.slice(0, maxChars)}\n\n... [truncated, ${content.length} total chars]`;
}

/**
 * Format bytes as "1.2KB", "3.4MB" or "512B".
 */
export function formatBytes(bytes: number): string {
  if (bytes >= 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
  } else if (bytes >= 1024) {
    return `${(bytes / 1024).toFixed(1)}KB`;
  }
  return `${bytes}B`;
}

/**
 * "Vehicle Model" -> "Vehicle_Model"; anything but letters and digits becomes "_".
 */
export function safeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9]/g, "_");
}

/**
 * sysml_export_Vehicle_20260301_103000.sysml
 */
export function exportFileName(projectName: string, date: Date): string {
  return `sysml_export_${safeName(projectName)}_${formatTimestamp(date, "file")}.sysml`;
}
