import type {
  DaybookConfig, ManualEntry, Proposal, RoadmapProject, RoadmapSnapshot, Theme, ThemeStatus,
} from "../shared/types.js";
import { appendManualEntry, type ManualEntryInput } from "../collectors/manual.js";
import { loadConfig } from "./config.js";
import { RoadmapEditInvalid } from "./errors.js";
import { withLock } from "./lock.js";
import {
  approve, createMergeProposal, listProposals, loadProposals, proposalsPath, reject, stageProposals,
  type ProposalFilter, type ReviewResult,
} from "./review.js";
import {
  addTheme, findTheme, listThemes, loadRoadmap, removeTheme, roadmapPath, saveRoadmap, setDefaultTheme, setThemeStatus,
  type ThemeFilter,
} from "./roadmap.js";
import { runAggregation, type RunReport } from "./run.js";
import { buildWinsReport, type WinsReport } from "./wins.js";
import { resolveConfigPath, resolveDataDir, writeJsonFilesAtomically } from "./store.js";

/**
 * Where a command reads and writes. Every writer runs under the data
 * directory lock; readers do not lock.
 */
export interface Workspace {
  dataDir: string;
  configPath: string;
  now?: () => Date;
}

export function defaultWorkspace(env: NodeJS.ProcessEnv = process.env): Workspace {
  const dataDir = resolveDataDir(env);
  return { dataDir, configPath: resolveConfigPath(dataDir, env) };
}

function clock(ws: Workspace): Date {
  return ws.now ? ws.now() : new Date();
}

/** Lock timeout for commands that cannot wait for a config (a broken one must not block review). */
const FALLBACK_STALE_MINUTES = 120;

function locked<T>(ws: Workspace, fn: () => T): T {
  return withLock(ws.dataDir, FALLBACK_STALE_MINUTES, fn, clock(ws));
}

// ── Run ─────────────────────────────────────────────────────

export function runCommand(ws: Workspace, hours?: number): { config: DaybookConfig; report: RunReport } {
  const config = loadConfig(ws.configPath);
  const report = runAggregation({ dataDir: ws.dataDir, config, hours, now: clock(ws) });
  return { config, report };
}

// ── Reports ─────────────────────────────────────────────────

export const DEFAULT_WINS_DAYS = 7;

export function winsCommand(ws: Workspace, days = DEFAULT_WINS_DAYS): { config: DaybookConfig; report: WinsReport } {
  const config = loadConfig(ws.configPath);
  return { config, report: buildWinsReport(ws.dataDir, clock(ws), days) };
}

export interface StatusReport {
  roadmapVersion: number;
  roadmapUpdatedAt: string | null;   // null before the first edit
  activeThemes: Theme[];
  projects: RoadmapProject[];
  pending: number;
  unapplied: number;
}

/** Active themes and what waits for review. Reads only; needs no configuration. */
export function statusCommand(ws: Workspace): StatusReport {
  const roadmap = loadRoadmap(ws.dataDir);
  const proposals = loadProposals(ws.dataDir);
  return {
    roadmapVersion: roadmap.version,
    roadmapUpdatedAt: roadmap.version > 0 ? roadmap.updatedAt : null,
    activeThemes: listThemes(roadmap, { status: "active" }),
    projects: roadmap.projects,
    pending: listProposals(proposals, "pending").length,
    unapplied: listProposals(proposals, "unapplied").length,
  };
}

// ── Review ──────────────────────────────────────────────────

export function reviewList(ws: Workspace, filter: ProposalFilter = "pending"): Proposal[] {
  return listProposals(loadProposals(ws.dataDir), filter);
}

export interface ReviewCommandResult {
  results: ReviewResult[];
  roadmap: RoadmapSnapshot;
}

export function reviewApprove(ws: Workspace, target: string): ReviewCommandResult {
  return locked(ws, () => {
    const roadmap = loadRoadmap(ws.dataDir);
    const batch = approve(loadProposals(ws.dataDir), roadmap, target, clock(ws));
    // Roadmap first: its appliedProposalIds keeps a half-finished commit from applying twice.
    const writes: Array<{ file: string; data: unknown }> = [];
    if (batch.roadmap !== roadmap) writes.push({ file: roadmapPath(ws.dataDir), data: batch.roadmap });
    writes.push({ file: proposalsPath(ws.dataDir), data: batch.proposals });
    writeJsonFilesAtomically(writes);
    return { results: batch.results, roadmap: batch.roadmap };
  });
}

export function reviewReject(ws: Workspace, target: string): ReviewResult[] {
  return locked(ws, () => {
    const batch = reject(loadProposals(ws.dataDir), target, clock(ws));
    writeJsonFilesAtomically([{ file: proposalsPath(ws.dataDir), data: batch.proposals }]);
    return batch.results;
  });
}

export function reviewMerge(ws: Workspace, source: string, target: string): Proposal {
  return locked(ws, () => {
    const proposal = createMergeProposal(loadRoadmap(ws.dataDir), source, target, clock(ws));
    const stage = stageProposals(loadProposals(ws.dataDir), [proposal]);
    if (stage.staged > 0) {
      writeJsonFilesAtomically([{ file: proposalsPath(ws.dataDir), data: stage.proposals }]);
    }
    return stage.proposals.find((p) => p.id === proposal.id) ?? proposal;
  });
}

// ── Manual log ──────────────────────────────────────────────

export function logEntry(ws: Workspace, input: ManualEntryInput): ManualEntry {
  if (!input.text.trim()) throw new RoadmapEditInvalid("Entry text is required");
  return locked(ws, () => appendManualEntry(ws.dataDir, input, clock(ws)));
}

// ── Themes ──────────────────────────────────────────────────

export function themesList(ws: Workspace, filter: ThemeFilter = {}): Theme[] {
  return listThemes(loadRoadmap(ws.dataDir), filter);
}

function editRoadmap(ws: Workspace, edit: (snapshot: RoadmapSnapshot, now: Date) => RoadmapSnapshot): RoadmapSnapshot {
  return locked(ws, () => {
    const next = edit(loadRoadmap(ws.dataDir), clock(ws));
    saveRoadmap(ws.dataDir, next);
    return next;
  });
}

export function themeAdd(ws: Workspace, projectRef: string, name: string, isDefault = false): Theme {
  const config = loadConfig(ws.configPath);
  const needle = projectRef.toLowerCase();
  const project =
    config.projects.find((p) => p.id === projectRef) ??
    config.projects.find((p) => p.name.toLowerCase() === needle);
  if (!project) throw new RoadmapEditInvalid(`Unknown project: ${projectRef}`);

  const next = editRoadmap(ws, (snapshot, now) => addTheme(snapshot, { project, name, isDefault }, now));
  const theme = findTheme(next, name, project.id);
  if (!theme) throw new RoadmapEditInvalid(`Theme "${name}" was not recorded`);
  return theme;
}

export function themeStatus(ws: Workspace, ref: string, status: ThemeStatus): RoadmapSnapshot {
  return editRoadmap(ws, (snapshot, now) => setThemeStatus(snapshot, ref, status, now));
}

export function themeRemove(ws: Workspace, ref: string): RoadmapSnapshot {
  return editRoadmap(ws, (snapshot, now) => removeTheme(snapshot, ref, now));
}

export function themeDefault(ws: Workspace, ref: string): RoadmapSnapshot {
  return editRoadmap(ws, (snapshot, now) => setDefaultTheme(snapshot, ref, now));
}
