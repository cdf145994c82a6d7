import { format, subDays } from "date-fns";
import type { AuditWindow } from "@shared/schema";
import { AUDIT_CONSTANTS } from "../config/constants";

/**
 * Trailing audit window: `now` minus exactly 1095 calendar days through
 * `now`. Computed on every call, never cached.
 */
export function computeAuditWindow(now: Date = new Date()): AuditWindow {
  return {
    start: format(subDays(now, AUDIT_CONSTANTS.WINDOW_DAYS), AUDIT_CONSTANTS.DATE_FORMAT),
    end: format(now, AUDIT_CONSTANTS.DATE_FORMAT),
  };
}
