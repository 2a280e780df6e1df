import { join } from "path";
import type { Activity } from "../shared/types.js";
import { activityLogDaySchema } from "../shared/schemas.js";
import { daysBetween, localDay } from "../shared/time.js";
import { activityKey } from "./aggregator.js";
import { ACTIVITIES_DIR, readJsonFile } from "./store.js";

// Append-only log, one file per local day: activities/YYYY-MM-DD.json

export interface ActivityLogDay {
  date: string;
  updatedAt: string;
  activities: Activity[];
}

export function activityLogPath(dataDir: string, day: string): string {
  return join(dataDir, ACTIVITIES_DIR, `${day}.json`);
}

/** Activities recorded for one day; empty when nothing was recorded. Throws StoreCorrupt. */
export function readActivityDay(dataDir: string, day: string): Activity[] {
  return readJsonFile(activityLogPath(dataDir, day), activityLogDaySchema)?.activities ?? [];
}

/** Days a run over [since, until) must read: the window plus the day before it. */
export function logDaysFor(since: Date, until: Date): string[] {
  const dayBefore = new Date(since.getFullYear(), since.getMonth(), since.getDate() - 1);
  return daysBetween(dayBefore, until);
}

export function readActivityLog(dataDir: string, days: readonly string[]): Map<string, Activity[]> {
  const log = new Map<string, Activity[]>();
  for (const day of days) log.set(day, readActivityDay(dataDir, day));
  return log;
}

/**
 * Day files to rewrite so that `fresh` activities are recorded. Activities
 * already present in their day file are skipped; existing entries are kept
 * as they are. Days with nothing new produce no write.
 */
export function planActivityLogWrites(
  dataDir: string,
  existing: ReadonlyMap<string, readonly Activity[]>,
  fresh: readonly Activity[],
  now: Date,
): Array<{ file: string; data: ActivityLogDay }> {
  const byDay = new Map<string, Activity[]>();
  for (const activity of fresh) {
    const day = localDay(new Date(activity.timestamp));
    const list = byDay.get(day);
    if (list) list.push(activity);
    else byDay.set(day, [activity]);
  }

  const writes: Array<{ file: string; data: ActivityLogDay }> = [];
  for (const [day, added] of byDay) {
    const current = existing.get(day) ?? readActivityDay(dataDir, day);
    const known = new Set(current.map(activityKey));
    const appended = added.filter((a) => !known.has(activityKey(a)));
    if (appended.length === 0) continue;
    writes.push({
      file: activityLogPath(dataDir, day),
      data: { date: day, updatedAt: now.toISOString(), activities: [...current, ...appended] },
    });
  }
  return writes.sort((a, b) => a.data.date.localeCompare(b.data.date));
}
