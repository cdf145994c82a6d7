/**
 * Application Constants
 *
 * Centralized configuration values used across the application.
 */

/**
 * Session store limits
 */
export const STORE_LIMITS = {
  /** Sessions returned by the sidebar listing. */
  MAX_SESSIONS: 50,
} as const;

/**
 * Store file names under DATA_DIR. Each concern keeps its own SQLite file.
 */
export const STORE_FILES = {
  INTERACTIONS: "interactions.db",
  NOTES: "notes.db",
  CHAT_HISTORY: "chat_history.db",
  ACCURACY_FEEDBACK: "accuracy_feedback.db",
  USER_FEEDBACK: "feedback.db",
} as const;

export type StoreName = keyof typeof STORE_FILES;

export const AUDIT_CONSTANTS = {
  /** Three years of claims. */
  WINDOW_DAYS: 1095,
  DATE_FORMAT: "yyyy-MM-dd",
} as const;

export const EXPORT_CONSTANTS = {
  /** Lines per Analysis_Part sheet. */
  LINES_PER_SHEET: 50,
  REPORT_DATE_FORMAT: "yyyy-MM-dd HH:mm",
  FILE_DATE_FORMAT: "yyyyMMdd",
  FILE_PREFIX: "apc_research",
} as const;

export function getDataDir(): string {
  return process.env.DATA_DIR || "./data";
}

export function getPort(): number {
  const port = Number.parseInt(process.env.PORT || "5000", 10);
  return Number.isNaN(port) ? 5000 : port;
}
