import type { Activity, ActivitySource, DailySummary, Project, TeamShare } from "../shared/types.js";
import { byTimestamp } from "../collectors/collector.js";
import { resolveProject } from "./attribution.js";

export function activityKey(activity: Activity): string {
  return `${activity.source}\0${activity.naturalKey}`;
}

export interface DedupResult {
  activities: Activity[];
  discarded: number;
}

/** First occurrence of each (source, naturalKey) wins; later ones are dropped. */
export function dedupActivities(batches: readonly (readonly Activity[])[]): DedupResult {
  const seen = new Set<string>();
  const activities: Activity[] = [];
  let discarded = 0;
  for (const batch of batches) {
    for (const activity of batch) {
      const key = activityKey(activity);
      if (seen.has(key)) {
        discarded++;
        continue;
      }
      seen.add(key);
      activities.push(activity);
    }
  }
  return { activities, discarded };
}

/** Distinct paths touched by filesystem and coding-assistant activities. */
export function countFiles(batches: readonly (readonly Activity[])[]): number {
  const files = new Set<string>();
  for (const batch of batches) {
    for (const activity of batch) {
      if (activity.source === "filesystem") activity.rawMetadata.files.forEach((f) => files.add(f));
      else if (activity.source === "claude") activity.rawMetadata.filesEdited.forEach((f) => files.add(f));
    }
  }
  return files.size;
}

function withProject(activity: Activity, projects: readonly Project[]): Activity {
  if (activity.projectId !== null && projects.some((p) => p.id === activity.projectId)) return activity;
  const projectId = resolveProject(activity, projects)?.id ?? null;
  return projectId === activity.projectId ? activity : { ...activity, projectId };
}

export function teamDistribution(countsByTeam: Readonly<Record<string, number>>): TeamShare[] {
  const entries = Object.entries(countsByTeam);
  const matched = entries.reduce((sum, [, count]) => sum + count, 0);
  if (matched === 0) return [];
  // Array.prototype.sort is stable, so equal counts keep first-appearance order.
  return entries
    .map(([team, count]) => ({ team, count, percent: Math.round((count / matched) * 100) }))
    .sort((a, b) => b.count - a.count);
}

export interface AggregateOptions {
  date: string;
  now: Date;
}

/**
 * Merges collector batches into one summary. Batches are deduplicated in the
 * order given, so pass previously persisted activities first.
 */
export function aggregate(
  batches: readonly (readonly Activity[])[],
  projects: readonly Project[],
  options: AggregateOptions,
): DailySummary {
  const fileCount = countFiles(batches);
  const { activities: unique, discarded } = dedupActivities(batches);
  const activities = unique.map((a) => withProject(a, projects)).sort(byTimestamp);

  const teamOf = new Map(projects.map((p) => [p.id, p.team]));
  const countsBySource: Partial<Record<ActivitySource, number>> = {};
  const countsByProject: Record<string, number> = {};
  const countsByTeam: Record<string, number> = {};
  let unmatchedCount = 0;

  for (const activity of activities) {
    countsBySource[activity.source] = (countsBySource[activity.source] ?? 0) + 1;
    const team = activity.projectId !== null ? teamOf.get(activity.projectId) : undefined;
    if (activity.projectId === null || team === undefined) {
      unmatchedCount++;
      continue;
    }
    countsByProject[activity.projectId] = (countsByProject[activity.projectId] ?? 0) + 1;
    countsByTeam[team] = (countsByTeam[team] ?? 0) + 1;
  }

  return {
    date: options.date,
    generatedAt: options.now.toISOString(),
    activities,
    countsBySource,
    countsByProject,
    countsByTeam,
    teamDistribution: teamDistribution(countsByTeam),
    unmatchedCount,
    fileCount,
    duplicatesDiscarded: discarded,
  };
}
