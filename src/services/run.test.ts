import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, readdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import type { Activity, ClaudeActivity, ManualActivity } from "../shared/types.js";
import { localDay } from "../shared/time.js";
import { makeActivityId, type Collector } from "../collectors/collector.js";
import { parseConfig } from "./config.js";
import { readActivityDay } from "./activity-log.js";
import { reviewApprove } from "./commands.js";
import { acquireLock } from "./lock.js";
import { loadProposals } from "./review.js";
import { addTheme, emptyRoadmap, loadRoadmap, saveRoadmap } from "./roadmap.js";
import { runAggregation } from "./run.js";

let tmpDirs: string[] = [];

function makeTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "daybook-run-"));
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
  vi.restoreAllMocks();
});

const NOW = new Date("2026-03-10T18:00:00Z");
const config = parseConfig({
  projects: [{ id: "api", name: "API", team: "Platform", folder_path: "/work/api" }],
});

function entry(key: string, description: string, timestamp: string): ManualActivity {
  return {
    id: makeActivityId("manual", key),
    source: "manual",
    naturalKey: key,
    timestamp,
    projectId: null,
    description,
    rawMetadata: { kind: "note", project: "api" },
  };
}

const ENTRIES = [
  entry("m_1", "Login redirect", "2026-03-10T10:00:00.000Z"),
  entry("m_2", "Login copy", "2026-03-10T12:00:00.000Z"),
];

function fixedCollector(activities: ManualActivity[]): () => Collector {
  return () => ({
    source: "manual",
    collect: () => ({ source: "manual", activities, warnings: [] }),
  });
}

function session(messages: number): ClaudeActivity {
  return {
    id: makeActivityId("claude", "sess-1:0"),
    source: "claude",
    naturalKey: "sess-1:0",
    timestamp: "2026-03-10T09:00:00.000Z",
    projectId: null,
    description: "Implement the login flow",
    rawMetadata: {
      sessionId: "sess-1",
      sessionFile: "/logs/sess-1.jsonl",
      cwd: "/work/api",
      messages,
      tools: {},
      filesEdited: [],
      taskDescriptions: [],
      durationMinutes: messages * 5,
    },
  };
}

function sessionCollector(activity: ClaudeActivity): () => Collector {
  return () => ({
    source: "claude",
    collect: () => ({ source: "claude", activities: [activity], warnings: [] }),
  });
}

function approveAll(dataDir: string, now: Date): void {
  reviewApprove({ dataDir, configPath: join(dataDir, "config.json"), now: () => now }, "all");
}

function messagesOf(activities: readonly Activity[] | undefined): Array<number | null> {
  return (activities ?? []).map((a) => (a.source === "claude" ? a.rawMetadata.messages : null));
}

function run(dataDir: string, activities: ManualActivity[] = ENTRIES) {
  return runAggregation({ dataDir, config, now: NOW, collectors: { manual: fixedCollector(activities) } });
}

describe("runAggregation", () => {
  it("summarizes the window and stages an activity note", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dataDir = makeTempDir();

    const report = run(dataDir);

    expect(report.status).toBe("completed");
    expect(report.since).toBe("2026-03-09T18:00:00.000Z");
    expect(report.until).toBe("2026-03-10T18:00:00.000Z");
    expect(report.sources).toEqual([{ source: "manual", state: "ok", activityCount: 2, warnings: [] }]);
    expect(report.summary?.countsByProject).toEqual({ api: 2 });
    expect(report.newActivities).toBe(2);
    expect(report.themeCounts).toEqual({ untracked: 2 });
    expect(report.proposals).toEqual({ generated: 1, staged: 1, refreshed: 0, unchanged: 0, pending: 1 });

    const proposals = loadProposals(dataDir);
    expect(proposals.map((p) => p.kind)).toEqual(["activity_note"]);
    expect(proposals[0].payload).toEqual({
      date: localDay(NOW),
      countsByTheme: { untracked: 2 },
      total: 2,
      activities: { [ENTRIES[0].id]: "untracked", [ENTRIES[1].id]: "untracked" },
    });
  });

  it("records each activity once across runs", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dataDir = makeTempDir();

    run(dataDir);
    const second = run(dataDir);

    expect(second.newActivities).toBe(0);
    expect(second.summary?.activities).toHaveLength(2);
    expect(second.proposals).toEqual({ generated: 1, staged: 0, refreshed: 0, unchanged: 1, pending: 1 });

    const days = [...new Set(ENTRIES.map((e) => localDay(new Date(e.timestamp))))];
    const recorded = days.flatMap((day) => readActivityDay(dataDir, day));
    expect(recorded.map((a) => a.naturalKey).sort()).toEqual(["m_1", "m_2"]);
    expect(recorded.every((a) => a.projectId === "api")).toBe(true);
  });

  it("appends activities that show up later", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dataDir = makeTempDir();

    run(dataDir, ENTRIES.slice(0, 1));
    const report = run(dataDir);

    expect(report.newActivities).toBe(1);
    expect(report.proposals.refreshed).toBe(1);
    expect(loadProposals(dataDir)[0].payload).toMatchObject({ date: localDay(NOW), countsByTheme: { untracked: 2 }, total: 2 });
  });

  it("records a session once while it keeps growing", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dataDir = makeTempDir();
    const later = new Date(NOW.getTime() + 60 * 60 * 1000);

    runAggregation({ dataDir, config, now: NOW, collectors: { claude: sessionCollector(session(2)) } });
    const second = runAggregation({ dataDir, config, now: later, collectors: { claude: sessionCollector(session(6)) } });

    expect(second.newActivities).toBe(0);
    expect(second.summary?.activities).toHaveLength(1);
    const recorded = readActivityDay(dataDir, localDay(new Date("2026-03-10T09:00:00.000Z")));
    expect(messagesOf(recorded)).toEqual([2]);
    expect(recorded[0].projectId).toBe("api");
  });

  it("counts an activity once when the window spans midnight", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dataDir = makeTempDir();
    const evening = new Date(2026, 2, 10, 20);
    const morning = new Date(2026, 2, 11, 9);
    const project = { id: "api", name: "API", team: "Platform" };
    saveRoadmap(dataDir, addTheme(emptyRoadmap(), { project, name: "Login" }, evening));
    const activities = [entry("m_1", "Login redirect", new Date(2026, 2, 10, 19).toISOString())];

    runAggregation({ dataDir, config, now: evening, collectors: { manual: fixedCollector(activities) } });
    approveAll(dataDir, evening);
    const next = runAggregation({ dataDir, config, now: morning, collectors: { manual: fixedCollector(activities) } });
    approveAll(dataDir, morning);

    expect(next.proposals.generated).toBe(0);
    const roadmap = loadRoadmap(dataDir);
    expect(roadmap.themes[0].activityCount).toBe(1);
    expect(roadmap.notes.map((n) => [n.date, n.total])).toEqual([["2026-03-10", 1]]);
  });

  it("notes what arrived after the day's note was approved", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dataDir = makeTempDir();
    const evening = new Date(2026, 2, 10, 20);
    const later = new Date(2026, 2, 10, 22);
    const project = { id: "api", name: "API", team: "Platform" };
    saveRoadmap(dataDir, addTheme(emptyRoadmap(), { project, name: "Login" }, evening));
    const first = entry("m_1", "Login redirect", new Date(2026, 2, 10, 19).toISOString());
    const second = entry("m_2", "Login copy", new Date(2026, 2, 10, 21).toISOString());

    runAggregation({ dataDir, config, now: evening, collectors: { manual: fixedCollector([first]) } });
    approveAll(dataDir, evening);
    runAggregation({ dataDir, config, now: later, collectors: { manual: fixedCollector([first, second]) } });

    const notes = loadProposals(dataDir).filter((p) => p.kind === "activity_note");
    expect(notes.map((p) => p.state)).toEqual(["approved", "pending"]);
    expect(notes[1].payload).toMatchObject({ date: "2026-03-10", total: 1 });

    approveAll(dataDir, later);
    expect(loadRoadmap(dataDir).themes[0].activityCount).toBe(2);
  });

  it("is skipped while another run holds the lock", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dataDir = makeTempDir();
    const held = acquireLock(dataDir, 120, NOW);

    const report = run(dataDir);

    expect(report.status).toBe("skipped");
    expect(report.summary).toBeNull();
    expect(report.message).toBe(`Another run is in progress (pid ${process.pid} since ${NOW.toISOString()})`);
    expect(readdirSync(dataDir)).toEqual(["daybook.lock"]);
    held?.release();
  });

  it("completes when a collector fails", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const dataDir = makeTempDir();
    const broken = (): Collector => ({
      source: "git",
      collect: () => {
        throw new Error("not a repository");
      },
    });

    const report = runAggregation({
      dataDir, config, now: NOW,
      collectors: { git: broken, manual: fixedCollector(ENTRIES) },
    });

    expect(report.status).toBe("completed");
    expect(report.sources.map((s) => [s.source, s.state])).toEqual([["git", "failed"], ["manual", "ok"]]);
    expect(report.newActivities).toBe(2);
  });
});
