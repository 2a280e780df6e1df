import { describe, it, expect } from "vitest";
import type { ManualActivity, Proposal } from "../shared/types.js";
import { makeActivityId } from "../collectors/collector.js";
import { parseConfig } from "./config.js";
import { aggregate } from "./aggregator.js";
import type { StatusReport } from "./commands.js";
import { formatProposalList, formatReviewResults, formatRunReport, formatStatus, formatWinsReport } from "./format.js";
import type { RunReport } from "./run.js";
import type { Win, WinKind } from "./wins.js";

const config = parseConfig({
  projects: [
    { id: "api", name: "API", team: "Platform", folder_path: "/work/api" },
    { id: "diary", name: "Diary", team: "Me", folder_path: "/home/me/diary", privacy: "private" },
  ],
});

function note(key: string, project: string, description: string): ManualActivity {
  return {
    id: makeActivityId("manual", key),
    source: "manual",
    naturalKey: key,
    timestamp: "2026-03-10T10:00:00.000Z",
    projectId: null,
    description,
    rawMetadata: { kind: "note", project },
  };
}

function report(): RunReport {
  const summary = aggregate(
    [[note("m_1", "api", "Fix login redirect"), note("m_2", "diary", "Therapy notes")]],
    config.projects,
    { date: "2026-03-10", now: new Date("2026-03-10T18:00:00Z") },
  );
  return {
    status: "completed",
    since: "2026-03-09T18:00:00.000Z",
    until: "2026-03-10T18:00:00.000Z",
    sources: [{ source: "manual", state: "ok", activityCount: 2, warnings: [] }],
    summary,
    newActivities: 2,
    themeCounts: { untracked: 2 },
    proposals: { generated: 1, staged: 1, refreshed: 0, unchanged: 0, pending: 1 },
    message: null,
  };
}

const time = new Date("2026-03-10T10:00:00.000Z").toLocaleTimeString();

describe("formatRunReport", () => {
  it("hides private projects by default", () => {
    const lines = formatRunReport(report(), config).split("\n");
    expect(lines).toContain("- API: 1");
    expect(lines).toContain("- 🔒 private: 1");
    expect(lines).toContain(`- 📝 ${time} Fix login redirect`);
    expect(lines).toContain(`- 📝 ${time} (private)`);
    expect(lines).not.toContain(`- 📝 ${time} Therapy notes`);
  });

  it("shows private projects on request", () => {
    const lines = formatRunReport(report(), config, { showPrivate: true }).split("\n");
    expect(lines).toContain("- Diary: 1");
    expect(lines).toContain(`- 📝 ${time} Therapy notes`);
  });

  it("summarizes sources and proposals", () => {
    const lines = formatRunReport(report(), config).split("\n");
    expect(lines).toContain("- ✅ **manual**: 2 activities");
    expect(lines).toContain("- **Activities:** 2 (2 new)");
    expect(lines).toContain("- untracked: 2");
    expect(lines[lines.length - 1]).toBe("*1 proposal(s) staged, 0 refreshed, 1 pending review.*");
  });

  it("says so when nothing was found", () => {
    const empty = { ...report(), summary: aggregate([[]], [], { date: "2026-03-10", now: new Date() }) };
    const failed: RunReport = {
      ...empty,
      sources: [{ source: "git", state: "failed", activityCount: 0, warnings: ["git collector failed: boom"] }],
    };
    expect(formatRunReport(empty, config).split("\n").pop()).toBe("No activities found in this window.");
    expect(formatRunReport(failed, config).split("\n").pop()).toBe("No activities found; 1 source(s) failed to scan.");
  });

  it("reports a skipped run", () => {
    const skipped: RunReport = { ...report(), status: "skipped", summary: null, message: "Another run is in progress" };
    expect(formatRunReport(skipped, config)).toBe("⏭️ Run skipped: Another run is in progress");
  });
});

describe("formatProposalList", () => {
  it("shows the apply error of an approved proposal", () => {
    const proposal: Proposal = {
      id: "p_0123456789",
      kind: "theme_status_change",
      state: "approved",
      applied: false,
      createdAt: "2026-03-10T18:00:00.000Z",
      decidedAt: "2026-03-10T19:00:00.000Z",
      appliedAt: null,
      lastError: "Theme t2 no longer exists",
      payload: { themeId: "t2", themeName: "Search", projectId: "api", from: "paused", to: "active", activityCount: 2 },
    };
    expect(formatProposalList([proposal], "unapplied")).toBe([
      "# 📋 Proposals (1)",
      "",
      '- `p_0123456789` [approved, not applied] Set theme "Search" paused → active (2 matching activities)',
      "  - ⚠️ Theme t2 no longer exists",
    ].join("\n"));
  });

  it("has a message for an empty list", () => {
    expect(formatProposalList([], "all")).toBe("No proposals.");
  });
});

describe("formatReviewResults", () => {
  it("prints one line per result", () => {
    expect(formatReviewResults([
      { id: "p_a", outcome: "applied", message: null },
      { id: "p_b", outcome: "conflict", message: "Theme t2 no longer exists" },
    ])).toBe("✅ `p_a` applied\n⚠️ `p_b` conflict: Theme t2 no longer exists");
  });
});

function win(kind: WinKind, projectId: string, description: string, fileCount = 0): Win {
  return { kind, projectId, description, fileCount, timestamp: "2026-03-10T10:00:00.000Z", confidence: 0.9 };
}

describe("formatWinsReport", () => {
  const report = {
    from: "2026-03-04",
    to: "2026-03-10",
    days: 7,
    activityCount: 9,
    wins: [
      win("logged_win", "api", "Shipped the login page"),
      win("git_milestone", "api", "Add login form", 3),
      win("significant_session", "api", "Implement the login flow", 6),
      win("sustained_effort", "api", "Sustained work across 5 activities", 14),
      win("logged_win", "diary", "Finished the draft"),
    ],
  };

  it("lists the top wins per project and masks private ones", () => {
    expect(formatWinsReport(report, config)).toBe([
      "# 🏆 Wins — 2026-03-04 → 2026-03-10",
      "",
      "## API",
      "- 🏆 Shipped the login page",
      "- 🚀 Add login form (3 files)",
      "- 🤖 Implement the login flow (6 files)",
      "- …and 1 more",
      "",
      "## 🔒 private",
      "- 🏆 (private)",
      "",
      "---",
      "*5 win(s) across 2 project(s) from 9 activities.*",
    ].join("\n"));
  });

  it("says so when nothing stood out", () => {
    expect(formatWinsReport({ ...report, wins: [] }, config)).toBe("No wins found for 2026-03-04 → 2026-03-10 (9 activities recorded).");
  });
});

describe("formatStatus", () => {
  it("shows active themes and the review queue", () => {
    const status: StatusReport = {
      roadmapVersion: 0,
      roadmapUpdatedAt: null,
      activeThemes: [{
        id: "t1", name: "Search", projectId: "api", status: "active", activityCount: 4,
        updatedAt: "2026-03-10T10:00:00.000Z", isDefault: false, mergedInto: null,
      }],
      projects: [{ id: "api", name: "API", team: "Platform" }],
      pending: 2,
      unapplied: 1,
    };
    expect(formatStatus(status)).toBe([
      "# 📌 Status",
      "Roadmap is empty.",
      "",
      "## 🟢 Active themes",
      "- [Platform] **Search** — 4 activities",
      "",
      "## 📋 Review",
      "- 2 pending proposal(s)",
      "- ⚠️ 1 approved but not applied",
    ].join("\n"));
  });
});
