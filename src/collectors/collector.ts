import { createHash } from "crypto";
import type { Activity, ActivitySource, DaybookConfig } from "../shared/types.js";
import { isWithin } from "../shared/paths.js";
import type { SourceUnavailable } from "../services/errors.js";

export interface CollectorResult {
  source: ActivitySource;
  activities: Activity[];
  warnings: SourceUnavailable[];
}

/**
 * One source of activity. `collect` reads `[since, until)` and has no side
 * effects beyond reading its source; unreadable parts become warnings.
 */
export interface Collector {
  readonly source: ActivitySource;
  collect(since: Date, until: Date): CollectorResult;
}

export interface CollectorContext {
  config: DaybookConfig;
  dataDir: string;
}

const ID_PREFIX: Record<ActivitySource, string> = {
  filesystem: "fs",
  git: "git",
  claude: "cc",
  manual: "man",
};

/** Stable id derived from the (source, naturalKey) pair. */
export function makeActivityId(source: ActivitySource, naturalKey: string): string {
  const digest = createHash("sha1").update(`${source}\0${naturalKey}`).digest("hex");
  return `${ID_PREFIX[source]}_${digest.slice(0, 10)}`;
}

/** Directory pruning shared by the filesystem and git collectors. */
export function makeDirectoryFilter(config: DaybookConfig): (dir: string, name: string) => boolean {
  const patterns = new Set(config.settings.excludedPatterns);
  return (dir, name) =>
    patterns.has(name) || config.excludedFolders.some((excluded) => isWithin(dir, excluded));
}

export function byTimestamp(a: Activity, b: Activity): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
  return a.naturalKey < b.naturalKey ? -1 : a.naturalKey > b.naturalKey ? 1 : 0;
}
