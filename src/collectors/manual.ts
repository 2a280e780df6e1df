import { randomBytes } from "crypto";
import { appendFileSync, existsSync, readFileSync } from "fs";
import { join } from "path";
import type { ManualActivity, ManualEntry, ManualEntryKind } from "../shared/types.js";
import { manualEntrySchema } from "../shared/schemas.js";
import { inWindow } from "../shared/time.js";
import { errorMessage, SourceUnavailable } from "../services/errors.js";
import { ensureDir, MANUAL_LOG } from "../services/store.js";
import {
  byTimestamp, makeActivityId,
  type Collector, type CollectorContext, type CollectorResult,
} from "./collector.js";

// ── Manual entry log ────────────────────────────────────────

export interface ManualEntryInput {
  kind: ManualEntryKind;
  text: string;
  project?: string;
  theme?: string;
}

export function appendManualEntry(dataDir: string, input: ManualEntryInput, now: Date = new Date()): ManualEntry {
  ensureDir(dataDir);
  const entry: ManualEntry = {
    id: `m_${randomBytes(5).toString("hex")}`,
    timestamp: now.toISOString(),
    kind: input.kind,
    text: input.text.trim(),
    ...(input.project ? { project: input.project } : {}),
    ...(input.theme ? { theme: input.theme } : {}),
  };
  appendFileSync(join(dataDir, MANUAL_LOG), JSON.stringify(entry) + "\n");
  return entry;
}

export interface ManualEntryRead {
  entries: ManualEntry[];
  badLines: number;
}

export function readManualEntries(dataDir: string): ManualEntryRead {
  const file = join(dataDir, MANUAL_LOG);
  if (!existsSync(file)) return { entries: [], badLines: 0 };

  const entries: ManualEntry[] = [];
  let badLines = 0;
  for (const line of readFileSync(file, "utf-8").split("\n")) {
    if (!line.trim()) continue;
    try {
      const parsed = manualEntrySchema.safeParse(JSON.parse(line));
      if (parsed.success) entries.push(parsed.data);
      else badLines++;
    } catch {
      badLines++;
    }
  }
  return { entries, badLines };
}

// ── Collector ───────────────────────────────────────────────

/** One activity per win, blocker or note logged by hand inside the window. */
export function createManualCollector({ dataDir }: CollectorContext): Collector {
  return {
    source: "manual",

    collect(since: Date, until: Date): CollectorResult {
      const warnings: SourceUnavailable[] = [];
      const file = join(dataDir, MANUAL_LOG);

      let read: ManualEntryRead;
      try {
        read = readManualEntries(dataDir);
      } catch (error) {
        warnings.push(new SourceUnavailable("manual", `Cannot read ${file}: ${errorMessage(error)}`, file));
        return { source: "manual", activities: [], warnings };
      }
      if (read.badLines > 0) {
        warnings.push(new SourceUnavailable("manual", `${read.badLines} unreadable entr${read.badLines === 1 ? "y" : "ies"} in ${file}`, file));
      }

      const activities: ManualActivity[] = read.entries
        .filter((e) => inWindow(new Date(e.timestamp).getTime(), since, until))
        .map((e): ManualActivity => ({
          id: makeActivityId("manual", e.id),
          source: "manual",
          naturalKey: e.id,
          timestamp: new Date(e.timestamp).toISOString(),
          projectId: null,
          description: e.text,
          rawMetadata: {
            kind: e.kind,
            ...(e.project ? { project: e.project } : {}),
            ...(e.theme ? { theme: e.theme } : {}),
          },
        }));

      return { source: "manual", activities: activities.sort(byTimestamp), warnings };
    },
  };
}
