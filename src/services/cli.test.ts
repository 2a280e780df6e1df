import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { EXIT_CONFIG, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, parseArgs, runCli, USAGE } from "./cli.js";
import type { Workspace } from "./commands.js";
import type { ManualActivity } from "../shared/types.js";
import { localDay } from "../shared/time.js";
import { makeActivityId } from "../collectors/collector.js";
import { planActivityLogWrites } from "./activity-log.js";
import { themeIdFor } from "./roadmap.js";
import { writeJsonFilesAtomically } from "./store.js";

let root: string;
let ws: Workspace;
let output: string[];

const io = { out: (text: string) => output.push(text) };
const NOW = new Date("2026-03-10T18:00:00Z");

function writeConfig(): void {
  const projectDir = join(root, "work", "api");
  mkdirSync(projectDir, { recursive: true });
  writeFileSync(ws.configPath, JSON.stringify({
    projects: [{ id: "api", name: "API", team: "Platform", folder_path: projectDir }],
    settings: { claude_projects_dir: join(root, "claude") },
  }));
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "daybook-cli-"));
  ws = { dataDir: join(root, "data"), configPath: join(root, "config.json"), now: () => NOW };
  output = [];
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("parseArgs", () => {
  it("separates flags from positional arguments", () => {
    const parsed = parseArgs(["log", "win", "--project", "api", "--json", "--theme=Search", "--", "--not-a-flag"]);
    expect(parsed.positional).toEqual(["log", "win", "--not-a-flag"]);
    expect([...parsed.flags]).toEqual([["--project", "api"], ["--json", true], ["--theme", "Search"]]);
  });
});

describe("runCli", () => {
  it("prints usage and exits 64 without a command", () => {
    expect(runCli([], ws, io)).toBe(EXIT_USAGE);
    expect(output).toEqual([USAGE]);
  });

  it("exits 0 for help", () => {
    expect(runCli(["help"], ws, io)).toBe(EXIT_OK);
  });

  it("exits 64 for unknown commands and bad arguments", () => {
    expect(runCli(["frobnicate"], ws, io)).toBe(EXIT_USAGE);
    expect(runCli(["run", "--hours", "0"], ws, io)).toBe(EXIT_USAGE);
    expect(runCli(["run", "--hours"], ws, io)).toBe(EXIT_USAGE);
    expect(runCli(["review", "list", "someday"], ws, io)).toBe(EXIT_USAGE);
    expect(runCli(["log", "win"], ws, io)).toBe(EXIT_USAGE);
    expect(runCli(["wins", "--days", "0"], ws, io)).toBe(EXIT_USAGE);
    expect(runCli(["wins", "--days", "1.5"], ws, io)).toBe(EXIT_USAGE);
    expect(output).toEqual([]);
  });

  it("exits 2 when the configuration is missing", () => {
    expect(runCli(["run"], ws, io)).toBe(EXIT_CONFIG);
    expect(console.error).toHaveBeenCalledWith("daybook [error]:", `Configuration file not found: ${ws.configPath}`);
  });

  it("exits 2 when the configuration is invalid", () => {
    writeFileSync(ws.configPath, JSON.stringify({ projects: [{ id: "api" }] }));
    expect(runCli(["themes"], ws, io)).toBe(EXIT_OK);
    expect(runCli(["theme", "add", "api", "Search"], ws, io)).toBe(EXIT_CONFIG);
  });

  it("exits 1 when approving an unknown proposal", () => {
    expect(runCli(["review", "approve", "p_missing"], ws, io)).toBe(EXIT_FAILURE);
    expect(output).toEqual(["❓ `p_missing` not found: Proposal not found: p_missing"]);
  });

  it("reports an empty queue", () => {
    expect(runCli(["review", "list"], ws, io)).toBe(EXIT_OK);
    expect(output).toEqual(["No pending proposals."]);
  });

  it("logs a manual entry", () => {
    expect(runCli(["log", "win", "Shipped", "the", "login", "page", "--project", "api"], ws, io)).toBe(EXIT_OK);
    expect(output).toHaveLength(1);
    expect(output[0]).toMatch(/^🏆 Logged win `m_[0-9a-f]{10}` \(api\): Shipped the login page$/);
  });

  it("adds, lists and edits themes", () => {
    writeConfig();
    const id = themeIdFor("api", "Search");

    expect(runCli(["theme", "add", "api", "Search"], ws, io)).toBe(EXIT_OK);
    expect(output.pop()).toBe(`Added theme **Search** \`${id}\``);

    expect(runCli(["theme", "status", "Search", "paused"], ws, io)).toBe(EXIT_OK);
    expect(output.pop()).toBe("Theme Search is now paused");

    expect(runCli(["themes", "--status", "paused"], ws, io)).toBe(EXIT_OK);
    expect(output.pop()).toBe(
      ["# 🎯 Themes (1)", "", "## API (Platform)", `- ⏸️ **Search** — 0 activities \`${id}\``].join("\n"),
    );

    expect(runCli(["theme", "add", "api", "search"], ws, io)).toBe(EXIT_FAILURE);
    expect(runCli(["theme", "remove", "nope"], ws, io)).toBe(EXIT_FAILURE);
    expect(runCli(["theme", "status", "Search", "sleeping"], ws, io)).toBe(EXIT_USAGE);
  });

  it("prints a run report as JSON", () => {
    writeConfig();
    expect(runCli(["run", "--json"], ws, io)).toBe(EXIT_OK);
    const report: unknown = JSON.parse(output[0]);
    expect(report).toMatchObject({
      status: "completed",
      since: "2026-03-09T18:00:00.000Z",
      until: "2026-03-10T18:00:00.000Z",
      newActivities: 0,
    });
  });

  it("reports wins from the activity log", () => {
    writeConfig();
    const shipped: ManualActivity = {
      id: makeActivityId("manual", "m_1"),
      source: "manual",
      naturalKey: "m_1",
      timestamp: NOW.toISOString(),
      projectId: "api",
      description: "Shipped the login page",
      rawMetadata: { kind: "win", project: "api" },
    };
    writeJsonFilesAtomically(planActivityLogWrites(ws.dataDir, new Map(), [shipped], NOW));
    const day = localDay(NOW);

    expect(runCli(["wins", "--days", "1"], ws, io)).toBe(EXIT_OK);
    expect(output).toEqual([[
      `# 🏆 Wins — ${day} → ${day}`,
      "",
      "## API",
      "- 🏆 Shipped the login page",
      "",
      "---",
      "*1 win(s) across 1 project(s) from 1 activities.*",
    ].join("\n")]);
  });

  it("shows status without a configuration", () => {
    expect(runCli(["status"], ws, io)).toBe(EXIT_OK);
    expect(output).toEqual([[
      "# 📌 Status",
      "Roadmap is empty.",
      "",
      "## 🟢 Active themes",
      "- none",
      "",
      "## 📋 Review",
      "- 0 pending proposal(s)",
    ].join("\n")]);
  });
});
