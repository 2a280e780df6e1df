import { createHash } from "crypto";
import { join } from "path";
import type { Project, RoadmapProject, RoadmapSnapshot, Theme, ThemeStatus } from "../shared/types.js";
import { roadmapSchema } from "../shared/schemas.js";
import { RoadmapEditInvalid } from "./errors.js";
import { readJsonFile, ROADMAP_FILE, writeJsonAtomic } from "./store.js";

// ── Persistence ─────────────────────────────────────────────

export function roadmapPath(dataDir: string): string {
  return join(dataDir, ROADMAP_FILE);
}

export function emptyRoadmap(now: Date = new Date(0)): RoadmapSnapshot {
  return {
    version: 0,
    updatedAt: now.toISOString(),
    projects: [],
    themes: [],
    notes: [],
    appliedProposalIds: [],
  };
}

/** Loads the current snapshot; an absent file is an empty roadmap. Throws StoreCorrupt. */
export function loadRoadmap(dataDir: string): RoadmapSnapshot {
  return readJsonFile(roadmapPath(dataDir), roadmapSchema) ?? emptyRoadmap();
}

export function saveRoadmap(dataDir: string, snapshot: RoadmapSnapshot): void {
  writeJsonAtomic(roadmapPath(dataDir), snapshot);
}

// ── Snapshot helpers ────────────────────────────────────────

/** Next version of `snapshot` with `changes` applied. */
export function nextSnapshot(
  snapshot: RoadmapSnapshot,
  now: Date,
  changes: Partial<Omit<RoadmapSnapshot, "version" | "updatedAt">>,
): RoadmapSnapshot {
  return { ...snapshot, ...changes, version: snapshot.version + 1, updatedAt: now.toISOString() };
}

export function withProject(projects: readonly RoadmapProject[], project: RoadmapProject): RoadmapProject[] {
  if (!projects.some((p) => p.id === project.id)) return [...projects, project];
  return projects.map((p) => (p.id === project.id ? project : p));
}

export function replaceTheme(themes: readonly Theme[], updated: Theme): Theme[] {
  return themes.map((t) => (t.id === updated.id ? updated : t));
}

export function themeIdFor(projectId: string, name: string): string {
  const digest = createHash("sha1").update(`${projectId}\0${name.trim().toLowerCase()}`).digest("hex");
  return `t_${digest.slice(0, 10)}`;
}

/** Resolves a theme by id, or by case-insensitive name within an optional project. */
export function findTheme(snapshot: RoadmapSnapshot, ref: string, projectId?: string): Theme | undefined {
  const byId = snapshot.themes.find((t) => t.id === ref);
  if (byId) return byId;
  const needle = ref.trim().toLowerCase();
  return snapshot.themes.find(
    (t) => t.name.toLowerCase() === needle && (projectId === undefined || t.projectId === projectId),
  );
}

function requireTheme(snapshot: RoadmapSnapshot, ref: string, projectId?: string): Theme {
  const theme = findTheme(snapshot, ref, projectId);
  if (!theme) throw new RoadmapEditInvalid(`Theme not found: ${ref}`);
  return theme;
}

// ── Manual edits ────────────────────────────────────────────

export interface AddThemeInput {
  project: Pick<Project, "id" | "name" | "team">;
  name: string;
  status?: ThemeStatus;
  isDefault?: boolean;
}

export function addTheme(snapshot: RoadmapSnapshot, input: AddThemeInput, now: Date): RoadmapSnapshot {
  const name = input.name.trim();
  if (!name) throw new RoadmapEditInvalid("Theme name is required");
  const { id: projectId, name: projectName, team } = input.project;
  if (snapshot.themes.some((t) => t.projectId === projectId && t.name.toLowerCase() === name.toLowerCase())) {
    throw new RoadmapEditInvalid(`Project ${projectId} already has a theme named "${name}"`);
  }

  const theme: Theme = {
    id: themeIdFor(projectId, name),
    name,
    projectId,
    status: input.status ?? "active",
    activityCount: 0,
    updatedAt: now.toISOString(),
    isDefault: false,
    mergedInto: null,
  };
  const next = nextSnapshot(snapshot, now, {
    projects: withProject(snapshot.projects, { id: projectId, name: projectName, team }),
    themes: [...snapshot.themes, theme],
  });
  return input.isDefault ? setDefaultTheme(next, theme.id, now, false) : next;
}

export function setThemeStatus(snapshot: RoadmapSnapshot, ref: string, status: ThemeStatus, now: Date): RoadmapSnapshot {
  const theme = requireTheme(snapshot, ref);
  return nextSnapshot(snapshot, now, {
    themes: replaceTheme(snapshot.themes, { ...theme, status, updatedAt: now.toISOString() }),
  });
}

export function removeTheme(snapshot: RoadmapSnapshot, ref: string, now: Date): RoadmapSnapshot {
  const theme = requireTheme(snapshot, ref);
  return nextSnapshot(snapshot, now, { themes: snapshot.themes.filter((t) => t.id !== theme.id) });
}

/** Marks one theme as its project's default; any previous default loses the flag. */
export function setDefaultTheme(snapshot: RoadmapSnapshot, ref: string, now: Date, bump = true): RoadmapSnapshot {
  const theme = requireTheme(snapshot, ref);
  if (theme.status === "done") throw new RoadmapEditInvalid(`Theme ${theme.id} is done and cannot be the default`);
  const stamp = now.toISOString();
  const themes = snapshot.themes.map((t) => {
    if (t.projectId !== theme.projectId) return t;
    const isDefault = t.id === theme.id;
    return t.isDefault === isDefault ? t : { ...t, isDefault, updatedAt: stamp };
  });
  return bump ? nextSnapshot(snapshot, now, { themes }) : { ...snapshot, themes };
}

// ── Queries ─────────────────────────────────────────────────

export interface ThemeFilter {
  projectId?: string;
  status?: ThemeStatus;
}

export function listThemes(snapshot: RoadmapSnapshot, filter: ThemeFilter = {}): Theme[] {
  return snapshot.themes.filter(
    (t) =>
      (filter.projectId === undefined || t.projectId === filter.projectId) &&
      (filter.status === undefined || t.status === filter.status),
  );
}
