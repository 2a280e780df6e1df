import type { ActivitySource, DailySummary, DaybookConfig } from "../shared/types.js";
import { hoursBefore, inWindow, localDay } from "../shared/time.js";
import { COLLECTORS, runCollectors, type CollectorFactory, type SourceStatus } from "../collectors/index.js";
import { logDaysFor, planActivityLogWrites, readActivityLog } from "./activity-log.js";
import { activityKey, aggregate } from "./aggregator.js";
import { acquireLock, lockPath, readLock } from "./lock.js";
import * as log from "./log.js";
import { generateProposals, UNTRACKED } from "./proposals.js";
import { listProposals, loadProposals, proposalsPath, stageProposals } from "./review.js";
import { loadRoadmap } from "./roadmap.js";
import { writeJsonFilesAtomically } from "./store.js";

export interface RunOptions {
  dataDir: string;
  config: DaybookConfig;
  /** Look-back window; defaults to the configured `lookback_hours`. */
  hours?: number;
  now?: Date;
  collectors?: Readonly<Partial<Record<ActivitySource, CollectorFactory>>>;
}

export interface ProposalCounts {
  generated: number;
  staged: number;
  refreshed: number;
  unchanged: number;
  pending: number;
}

export interface RunReport {
  status: "completed" | "skipped";
  since: string;
  until: string;
  sources: SourceStatus[];
  summary: DailySummary | null;
  newActivities: number;
  /** Activities per theme name, with unattributed ones under "untracked". */
  themeCounts: Record<string, number>;
  proposals: ProposalCounts;
  message: string | null;
}

const NO_PROPOSALS: ProposalCounts = { generated: 0, staged: 0, refreshed: 0, unchanged: 0, pending: 0 };

/**
 * Collects the window, merges it with what earlier runs recorded, stages
 * proposals, and persists the new log entries and the proposal queue in one
 * go. A run that finds the lock held is skipped.
 */
export function runAggregation(options: RunOptions): RunReport {
  const { dataDir, config } = options;
  const until = options.now ?? new Date();
  const since = hoursBefore(until, options.hours ?? config.settings.lookbackHours);
  const window = { since: since.toISOString(), until: until.toISOString() };

  const lock = acquireLock(dataDir, config.settings.lockStaleMinutes, until);
  if (!lock) {
    const holder = readLock(lockPath(dataDir));
    const message = `Another run is in progress${holder ? ` (pid ${holder.pid} since ${holder.acquiredAt})` : ""}`;
    log.info(message);
    return {
      status: "skipped", ...window, sources: [], summary: null, newActivities: 0,
      themeCounts: {}, proposals: NO_PROPOSALS, message,
    };
  }

  try {
    log.debug(`Collecting ${window.since} .. ${window.until}`);
    const { batches, statuses } = runCollectors({ config, dataDir }, since, until, options.collectors ?? COLLECTORS);

    const existingLog = readActivityLog(dataDir, logDaysFor(since, until));
    const prior = [...existingLog.values()].flat();
    const known = new Set(prior.map(activityKey));
    const priorInWindow = prior.filter((a) => inWindow(Date.parse(a.timestamp), since, until));

    const summary = aggregate([priorInWindow, ...batches], config.projects, { date: localDay(until), now: until });
    const fresh = summary.activities.filter((a) => !known.has(activityKey(a)));

    const roadmap = loadRoadmap(dataDir);
    const { proposals, attributions } = generateProposals(summary, roadmap, config.projects, {
      newThemeThreshold: config.settings.newThemeThreshold,
      overlapThreshold: config.settings.overlapThreshold,
      freshActivityIds: new Set(fresh.map((a) => a.id)),
    });
    const stage = stageProposals(loadProposals(dataDir), proposals);

    const writes: Array<{ file: string; data: unknown }> = planActivityLogWrites(dataDir, existingLog, fresh, until);
    if (stage.staged > 0 || stage.refreshed > 0) {
      writes.push({ file: proposalsPath(dataDir), data: stage.proposals });
    }
    writeJsonFilesAtomically(writes);

    const themeNames = new Map(roadmap.themes.map((t) => [t.id, t.name]));
    const themeCounts: Record<string, number> = {};
    for (const activity of summary.activities) {
      const themeId = attributions.get(activity.id)?.themeId ?? null;
      const name = themeId === null ? UNTRACKED : themeNames.get(themeId) ?? themeId;
      themeCounts[name] = (themeCounts[name] ?? 0) + 1;
    }

    log.info(`Run complete: ${summary.activities.length} activities (${fresh.length} new), ${stage.staged} proposal(s) staged`);
    return {
      status: "completed",
      ...window,
      sources: statuses,
      summary,
      newActivities: fresh.length,
      themeCounts,
      proposals: {
        generated: proposals.length,
        staged: stage.staged,
        refreshed: stage.refreshed,
        unchanged: stage.unchanged,
        pending: listProposals(stage.proposals, "pending").length,
      },
      message: null,
    };
  } finally {
    lock.release();
  }
}
