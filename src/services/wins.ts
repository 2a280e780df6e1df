import type { Activity } from "../shared/types.js";
import { daysBetween } from "../shared/time.js";
import { readActivityLog } from "./activity-log.js";

export type WinKind = "logged_win" | "git_milestone" | "significant_session" | "sustained_effort";

export interface Win {
  kind: WinKind;
  projectId: string | null;
  description: string;
  fileCount: number;
  timestamp: string;
  confidence: number;
}

export interface WinsReport {
  from: string;   // first local day read, YYYY-MM-DD
  to: string;
  days: number;
  activityCount: number;
  wins: Win[];
}

const CONFIDENCE: Record<WinKind, number> = {
  logged_win: 0.9,
  git_milestone: 0.8,
  significant_session: 0.7,
  sustained_effort: 0.6,
};

const SESSION_MIN_FILES = 5;
const SESSION_MIN_TASKS = 3;
const MILESTONE_MIN_FILES = 3;
const SUSTAINED_MIN_FILES = 10;
/** Projects with fewer recorded activities yield only hand-logged wins. */
const MIN_PROJECT_ACTIVITIES = 2;

const MILESTONE_RE = /\b(complete|finish|ship|launch|deploy|release|fix|implement|add|create|build)/i;
const DONE_RE = /\b(complete|finish|ship|launch|release)/i;

export function fileCount(activity: Activity): number {
  switch (activity.source) {
    case "filesystem":
      return activity.rawMetadata.files.length;
    case "git":
      return activity.rawMetadata.filesChanged.length;
    case "claude":
      return activity.rawMetadata.filesEdited.length;
    case "manual":
      return 0;
  }
}

function win(kind: WinKind, activity: Activity, description: string): Win {
  return {
    kind,
    projectId: activity.projectId,
    description,
    fileCount: fileCount(activity),
    timestamp: activity.timestamp,
    confidence: CONFIDENCE[kind],
  };
}

function activityWin(activity: Activity): Win | null {
  switch (activity.source) {
    case "manual":
      return activity.rawMetadata.kind === "win" ? win("logged_win", activity, activity.description) : null;
    case "git": {
      const { subject, filesChanged } = activity.rawMetadata;
      if (!MILESTONE_RE.test(subject)) return null;
      if (filesChanged.length < MILESTONE_MIN_FILES && !DONE_RE.test(subject)) return null;
      return win("git_milestone", activity, subject);
    }
    case "claude": {
      const { filesEdited, taskDescriptions } = activity.rawMetadata;
      if (filesEdited.length < SESSION_MIN_FILES && taskDescriptions.length < SESSION_MIN_TASKS) return null;
      return win("significant_session", activity, taskDescriptions[0] ?? activity.description);
    }
    case "filesystem":
      return null;
  }
}

function byConfidenceThenNewest(a: Win, b: Win): number {
  return b.confidence - a.confidence || b.timestamp.localeCompare(a.timestamp);
}

/**
 * Picks out what is worth reporting: hand-logged wins, milestone commits,
 * sessions that edited many files or worked through several tasks, and
 * projects with many files touched overall.
 */
export function findWins(activities: readonly Activity[]): Win[] {
  const byProject = new Map<string | null, Activity[]>();
  for (const activity of activities) {
    byProject.set(activity.projectId, [...(byProject.get(activity.projectId) ?? []), activity]);
  }

  const wins: Win[] = [];
  for (const [projectId, group] of byProject) {
    const busy = group.length >= MIN_PROJECT_ACTIVITIES;
    for (const activity of group) {
      const found = activityWin(activity);
      if (found && (busy || found.kind === "logged_win")) wins.push(found);
    }

    const files = group.reduce((sum, a) => sum + fileCount(a), 0);
    if (busy && files >= SUSTAINED_MIN_FILES) {
      const latest = group.reduce((a, b) => (b.timestamp > a.timestamp ? b : a));
      wins.push({
        kind: "sustained_effort",
        projectId,
        description: `Sustained work across ${group.length} activities`,
        fileCount: files,
        timestamp: latest.timestamp,
        confidence: CONFIDENCE.sustained_effort,
      });
    }
  }
  return wins.sort(byConfidenceThenNewest);
}

/** Wins in the activity log over the last `days` local days, today included. Throws StoreCorrupt. */
export function buildWinsReport(dataDir: string, now: Date, days: number): WinsReport {
  const first = new Date(now.getFullYear(), now.getMonth(), now.getDate() - (days - 1));
  const logDays = daysBetween(first, now);
  const activities = [...readActivityLog(dataDir, logDays).values()].flat();
  return {
    from: logDays[0],
    to: logDays[logDays.length - 1],
    days,
    activityCount: activities.length,
    wins: findWins(activities),
  };
}
