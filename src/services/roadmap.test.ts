import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import type { RoadmapSnapshot, Theme } from "../shared/types.js";
import {
  addTheme, emptyRoadmap, listThemes, loadRoadmap, removeTheme, roadmapPath, saveRoadmap,
  setDefaultTheme, setThemeStatus, themeIdFor,
} from "./roadmap.js";
import { RoadmapEditInvalid, StoreCorrupt } from "./errors.js";

let tmpDirs: string[] = [];

function makeTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "daybook-roadmap-"));
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
});

const NOW = new Date("2026-03-10T12:00:00Z");
const api = { id: "api", name: "API", team: "Platform" };
const web = { id: "web", name: "Web", team: "Product" };

function withThemes(...names: Array<[typeof api, string]>): RoadmapSnapshot {
  return names.reduce((snapshot, [project, name]) => addTheme(snapshot, { project, name }, NOW), emptyRoadmap());
}

function byName(snapshot: RoadmapSnapshot, name: string): Theme | undefined {
  return snapshot.themes.find((t) => t.name === name);
}

describe("addTheme", () => {
  it("adds an active theme and records its project", () => {
    const next = addTheme(emptyRoadmap(), { project: api, name: "  Search  " }, NOW);
    expect(next.version).toBe(1);
    expect(next.updatedAt).toBe(NOW.toISOString());
    expect(next.projects).toEqual([api]);
    expect(next.themes).toEqual([{
      id: themeIdFor("api", "Search"),
      name: "Search",
      projectId: "api",
      status: "active",
      activityCount: 0,
      updatedAt: NOW.toISOString(),
      isDefault: false,
      mergedInto: null,
    }]);
  });

  it("rejects a duplicate name within a project", () => {
    const snapshot = withThemes([api, "Search"]);
    expect(() => addTheme(snapshot, { project: api, name: "search" }, NOW)).toThrow(RoadmapEditInvalid);
    expect(addTheme(snapshot, { project: web, name: "Search" }, NOW).themes).toHaveLength(2);
  });

  it("rejects an empty name", () => {
    expect(() => addTheme(emptyRoadmap(), { project: api, name: "   " }, NOW)).toThrow("Theme name is required");
  });

  it("can add the default theme in one version", () => {
    const next = addTheme(emptyRoadmap(), { project: api, name: "Misc", isDefault: true }, NOW);
    expect(next.version).toBe(1);
    expect(next.themes[0].isDefault).toBe(true);
  });
});

describe("setDefaultTheme", () => {
  it("moves the default within a project only", () => {
    let snapshot = withThemes([api, "Search"], [api, "Misc"], [web, "Landing"]);
    snapshot = setDefaultTheme(snapshot, "Search", NOW);
    snapshot = setDefaultTheme(snapshot, "Landing", NOW);
    snapshot = setDefaultTheme(snapshot, "Misc", NOW);

    expect(snapshot.themes.map((t) => [t.name, t.isDefault])).toEqual([
      ["Search", false],
      ["Misc", true],
      ["Landing", true],
    ]);
    expect(snapshot.version).toBe(6);
  });

  it("refuses a done theme", () => {
    const snapshot = setThemeStatus(withThemes([api, "Search"]), "Search", "done", NOW);
    expect(() => setDefaultTheme(snapshot, "Search", NOW)).toThrow(RoadmapEditInvalid);
  });
});

describe("setThemeStatus and removeTheme", () => {
  it("updates a theme found by id or name", () => {
    const snapshot = withThemes([api, "Search"]);
    const paused = setThemeStatus(snapshot, themeIdFor("api", "Search"), "paused", NOW);
    expect(byName(paused, "Search")?.status).toBe("paused");

    const removed = removeTheme(paused, "SEARCH", NOW);
    expect(removed.themes).toEqual([]);
    expect(removed.version).toBe(3);
  });

  it("throws for an unknown theme", () => {
    expect(() => removeTheme(emptyRoadmap(), "nope", NOW)).toThrow("Theme not found: nope");
  });
});

describe("listThemes", () => {
  it("filters by project and status", () => {
    let snapshot = withThemes([api, "Search"], [api, "Billing"], [web, "Landing"]);
    snapshot = setThemeStatus(snapshot, "Billing", "paused", NOW);

    expect(listThemes(snapshot, { projectId: "api" }).map((t) => t.name)).toEqual(["Search", "Billing"]);
    expect(listThemes(snapshot, { status: "active" }).map((t) => t.name)).toEqual(["Search", "Landing"]);
    expect(listThemes(snapshot, { projectId: "api", status: "paused" }).map((t) => t.name)).toEqual(["Billing"]);
  });
});

describe("loadRoadmap", () => {
  it("returns an empty roadmap when nothing was saved", () => {
    expect(loadRoadmap(makeTempDir())).toEqual(emptyRoadmap());
  });

  it("reads back a saved snapshot", () => {
    const dir = makeTempDir();
    const snapshot = withThemes([api, "Search"]);
    saveRoadmap(dir, snapshot);
    expect(loadRoadmap(dir)).toEqual(snapshot);
  });

  it("throws StoreCorrupt for a malformed file", () => {
    const dir = makeTempDir();
    writeFileSync(roadmapPath(dir), JSON.stringify({ version: "one" }));
    expect(() => loadRoadmap(dir)).toThrow(StoreCorrupt);
  });
});
