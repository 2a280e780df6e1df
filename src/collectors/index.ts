import type { Activity, ActivitySource } from "../shared/types.js";
import { errorMessage, SourceUnavailable } from "../services/errors.js";
import * as log from "../services/log.js";
import type { Collector, CollectorContext } from "./collector.js";
import { createClaudeCollector } from "./claude.js";
import { createFilesystemCollector } from "./filesystem.js";
import { createGitCollector } from "./git.js";
import { createManualCollector } from "./manual.js";

export type { Collector, CollectorContext, CollectorResult } from "./collector.js";

export type CollectorFactory = (ctx: CollectorContext) => Collector;

/** Registry dispatched by source tag. Run order follows declaration order. */
export const COLLECTORS: Readonly<Record<ActivitySource, CollectorFactory>> = {
  filesystem: createFilesystemCollector,
  git: createGitCollector,
  claude: createClaudeCollector,
  manual: createManualCollector,
};

export type SourceState = "ok" | "partial" | "failed";

export interface SourceStatus {
  source: ActivitySource;
  state: SourceState;
  activityCount: number;
  warnings: string[];
}

export interface CollectionOutcome {
  batches: Activity[][];
  statuses: SourceStatus[];
}

/**
 * Runs the given collectors one after another. A collector that throws is
 * reported as failed; the others still run.
 */
export function runCollectors(
  ctx: CollectorContext,
  since: Date,
  until: Date,
  factories: Readonly<Partial<Record<ActivitySource, CollectorFactory>>> = COLLECTORS,
): CollectionOutcome {
  const batches: Activity[][] = [];
  const statuses: SourceStatus[] = [];

  for (const [source, factory] of Object.entries(factories)) {
    if (!factory) continue;
    const collector = factory(ctx);
    try {
      const result = collector.collect(since, until);
      for (const w of result.warnings) log.warn(`[${w.source}] ${w.message}`);
      batches.push(result.activities);
      statuses.push({
        source: collector.source,
        state: result.warnings.length > 0 ? "partial" : "ok",
        activityCount: result.activities.length,
        warnings: result.warnings.map((w) => w.message),
      });
    } catch (error) {
      const failure = new SourceUnavailable(collector.source, `${source} collector failed: ${errorMessage(error)}`);
      log.warn(failure.message);
      batches.push([]);
      statuses.push({ source: collector.source, state: "failed", activityCount: 0, warnings: [failure.message] });
    }
  }

  return { batches, statuses };
}
