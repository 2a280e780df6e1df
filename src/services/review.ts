import { join } from "path";
import type {
  ActivityNotePayload, NewThemePayload, Proposal, ProposalState, RoadmapMergePayload,
  RoadmapSnapshot, Theme, ThemeStatusChangePayload,
} from "../shared/types.js";
import { proposalListSchema } from "../shared/schemas.js";
import { errorMessage, ProposalApplyConflict, ReviewTargetNotFound } from "./errors.js";
import { notedActivityIds, proposalId, UNTRACKED } from "./proposals.js";
import { findTheme, nextSnapshot, replaceTheme, withProject } from "./roadmap.js";
import { PROPOSALS_FILE, readJsonFile } from "./store.js";

// ── Persistence ─────────────────────────────────────────────

export function proposalsPath(dataDir: string): string {
  return join(dataDir, PROPOSALS_FILE);
}

export function loadProposals(dataDir: string): Proposal[] {
  return readJsonFile(proposalsPath(dataDir), proposalListSchema) ?? [];
}

// ── Staging ─────────────────────────────────────────────────

export interface StageResult {
  proposals: Proposal[];
  staged: number;
  refreshed: number;
  unchanged: number;
}

/**
 * Adds generated proposals to the queue. New ids are appended as pending, a
 * still-pending id gets the fresh payload, and decided proposals are left as
 * they are, so staging the same run twice changes nothing.
 */
export function stageProposals(existing: readonly Proposal[], incoming: readonly Proposal[]): StageResult {
  const proposals = [...existing];
  const index = new Map(proposals.map((p, i) => [p.id, i]));
  let staged = 0;
  let refreshed = 0;
  let unchanged = 0;

  for (const proposal of incoming) {
    const at = index.get(proposal.id);
    if (at === undefined) {
      index.set(proposal.id, proposals.length);
      proposals.push(proposal);
      staged++;
      continue;
    }
    const current = proposals[at];
    if (current.state !== "pending" || JSON.stringify(current.payload) === JSON.stringify(proposal.payload)) {
      unchanged++;
      continue;
    }
    proposals[at] = { ...proposal, createdAt: current.createdAt };
    refreshed++;
  }

  return { proposals, staged, refreshed, unchanged };
}

// ── Queries ─────────────────────────────────────────────────

export type ProposalFilter = ProposalState | "unapplied" | "all";

export function isUnapplied(p: Proposal): boolean {
  return p.state === "approved" && !p.applied;
}

/** Creation order is queue order. */
export function listProposals(proposals: readonly Proposal[], filter: ProposalFilter = "all"): Proposal[] {
  if (filter === "all") return [...proposals];
  if (filter === "unapplied") return proposals.filter(isUnapplied);
  return proposals.filter((p) => p.state === filter);
}

// ── Apply ───────────────────────────────────────────────────

function requireTheme(snapshot: RoadmapSnapshot, proposalId: string, themeId: string): Theme {
  const theme = snapshot.themes.find((t) => t.id === themeId);
  if (!theme) throw new ProposalApplyConflict(proposalId, `Theme ${themeId} no longer exists`);
  return theme;
}

function applyStatusChange(snapshot: RoadmapSnapshot, id: string, payload: ThemeStatusChangePayload, now: Date): RoadmapSnapshot {
  const theme = requireTheme(snapshot, id, payload.themeId);
  return nextSnapshot(snapshot, now, {
    themes: replaceTheme(snapshot.themes, { ...theme, status: payload.to, updatedAt: now.toISOString() }),
  });
}

function applyNewTheme(snapshot: RoadmapSnapshot, id: string, payload: NewThemePayload, now: Date): RoadmapSnapshot {
  const { project, name } = payload;
  const duplicate = snapshot.themes.some(
    (t) => t.projectId === project.id && t.name.toLowerCase() === name.toLowerCase(),
  );
  if (duplicate) throw new ProposalApplyConflict(id, `Project ${project.id} already has a theme named "${name}"`);

  const theme: Theme = {
    id: `t_${id.slice(2)}`,
    name,
    projectId: project.id,
    status: "active",
    activityCount: payload.activityCount,
    updatedAt: now.toISOString(),
    isDefault: false,
    mergedInto: null,
  };
  return nextSnapshot(snapshot, now, {
    projects: withProject(snapshot.projects, project),
    themes: [...snapshot.themes, theme],
  });
}

/** Adds the note's activities to their themes, skipping any an earlier note already counted. */
function applyActivityNote(snapshot: RoadmapSnapshot, id: string, payload: ActivityNotePayload, now: Date): RoadmapSnapshot {
  const noted = notedActivityIds(snapshot);
  const entries = Object.entries(payload.activities).filter(([activityId]) => !noted.has(activityId));
  const countsByTheme: Record<string, number> = {};
  for (const [, bucket] of entries) countsByTheme[bucket] = (countsByTheme[bucket] ?? 0) + 1;

  const counts = Object.entries(countsByTheme).filter(([themeId]) => themeId !== UNTRACKED);
  for (const [themeId] of counts) requireTheme(snapshot, id, themeId);

  const stamp = now.toISOString();
  const added = new Map(counts);
  const themes = snapshot.themes.map((t) => {
    const n = added.get(t.id);
    return n === undefined ? t : { ...t, activityCount: t.activityCount + n, updatedAt: stamp };
  });
  const record = {
    proposalId: id,
    date: payload.date,
    countsByTheme,
    total: entries.length,
    activityIds: entries.map(([activityId]) => activityId),
  };
  return nextSnapshot(snapshot, now, { themes, notes: [...snapshot.notes, record] });
}

function applyMerge(snapshot: RoadmapSnapshot, id: string, payload: RoadmapMergePayload, now: Date): RoadmapSnapshot {
  const source = requireTheme(snapshot, id, payload.sourceThemeId);
  const target = requireTheme(snapshot, id, payload.targetThemeId);
  if (source.projectId !== target.projectId) {
    throw new ProposalApplyConflict(id, `Themes ${source.id} and ${target.id} belong to different projects`);
  }
  if (source.mergedInto !== null) {
    throw new ProposalApplyConflict(id, `Theme ${source.id} was already merged into ${source.mergedInto}`);
  }

  const stamp = now.toISOString();
  let themes = replaceTheme(snapshot.themes, {
    ...target,
    activityCount: target.activityCount + source.activityCount,
    updatedAt: stamp,
  });
  themes = replaceTheme(themes, { ...source, status: "done", mergedInto: target.id, updatedAt: stamp });
  return nextSnapshot(snapshot, now, { themes });
}

function applyByKind(snapshot: RoadmapSnapshot, proposal: Proposal, now: Date): RoadmapSnapshot {
  switch (proposal.kind) {
    case "theme_status_change":
      return applyStatusChange(snapshot, proposal.id, proposal.payload, now);
    case "new_theme":
      return applyNewTheme(snapshot, proposal.id, proposal.payload, now);
    case "activity_note":
      return applyActivityNote(snapshot, proposal.id, proposal.payload, now);
    case "roadmap_merge":
      return applyMerge(snapshot, proposal.id, proposal.payload, now);
  }
}

/**
 * Applies one proposal to a snapshot and returns the next snapshot. A
 * proposal already recorded in the snapshot leaves it unchanged.
 * Throws ProposalApplyConflict when the roadmap no longer fits the proposal.
 */
export function applyProposal(snapshot: RoadmapSnapshot, proposal: Proposal, now: Date): RoadmapSnapshot {
  if (snapshot.appliedProposalIds.includes(proposal.id)) return snapshot;
  const next = applyByKind(snapshot, proposal, now);
  return { ...next, appliedProposalIds: [...next.appliedProposalIds, proposal.id] };
}

// ── Decisions ───────────────────────────────────────────────

export type ReviewOutcome = "applied" | "already_applied" | "rejected" | "conflict" | "invalid_transition" | "not_found";

export interface ReviewResult {
  id: string;
  outcome: ReviewOutcome;
  message: string | null;
}

export interface ReviewBatch {
  proposals: Proposal[];
  roadmap: RoadmapSnapshot;
  results: ReviewResult[];
}

/** True when any result should make the command exit non-zero. */
export function hasFailures(results: readonly ReviewResult[]): boolean {
  return results.some((r) => r.outcome === "conflict" || r.outcome === "invalid_transition" || r.outcome === "not_found");
}

function targets(proposals: readonly Proposal[], target: string, eligible: (p: Proposal) => boolean): string[] {
  return target === "all" ? proposals.filter(eligible).map((p) => p.id) : [target];
}

/**
 * Approves a proposal (or every pending and approved-but-unapplied one for
 * "all") and applies it. A failed apply leaves the proposal approved with
 * `lastError` set; approving it again retries.
 */
export function approve(
  proposals: readonly Proposal[],
  roadmap: RoadmapSnapshot,
  target: string,
  now: Date,
): ReviewBatch {
  const queue = [...proposals];
  const results: ReviewResult[] = [];
  let snapshot = roadmap;
  const stamp = now.toISOString();

  for (const id of targets(queue, target, (p) => p.state === "pending" || isUnapplied(p))) {
    const at = queue.findIndex((p) => p.id === id);
    if (at === -1) {
      results.push({ id, outcome: "not_found", message: new ReviewTargetNotFound(id).message });
      continue;
    }
    const proposal = queue[at];
    if (proposal.state === "rejected") {
      results.push({ id, outcome: "invalid_transition", message: `Proposal ${id} was rejected` });
      continue;
    }
    if (proposal.applied) {
      results.push({ id, outcome: "already_applied", message: null });
      continue;
    }

    const approved: Proposal = { ...proposal, state: "approved", decidedAt: proposal.decidedAt ?? stamp };
    try {
      snapshot = applyProposal(snapshot, approved, now);
      queue[at] = { ...approved, applied: true, appliedAt: stamp, lastError: null };
      results.push({ id, outcome: "applied", message: null });
    } catch (error) {
      if (!(error instanceof ProposalApplyConflict)) throw error;
      queue[at] = { ...approved, lastError: errorMessage(error) };
      results.push({ id, outcome: "conflict", message: error.message });
    }
  }

  return { proposals: queue, roadmap: snapshot, results };
}

/** Rejects pending proposals. Decided proposals stay as they are. */
export function reject(
  proposals: readonly Proposal[],
  target: string,
  now: Date,
): Omit<ReviewBatch, "roadmap"> {
  const queue = [...proposals];
  const results: ReviewResult[] = [];

  for (const id of targets(queue, target, (p) => p.state === "pending")) {
    const at = queue.findIndex((p) => p.id === id);
    if (at === -1) {
      results.push({ id, outcome: "not_found", message: new ReviewTargetNotFound(id).message });
      continue;
    }
    const proposal = queue[at];
    if (proposal.state !== "pending") {
      results.push({ id, outcome: "invalid_transition", message: `Proposal ${id} is already ${proposal.state}` });
      continue;
    }
    queue[at] = { ...proposal, state: "rejected", decidedAt: now.toISOString() };
    results.push({ id, outcome: "rejected", message: null });
  }

  return { proposals: queue, results };
}

/**
 * Builds a pending proposal that folds `sourceRef` into `targetRef`. Both
 * references are theme ids or names; the themes must share a project.
 */
export function createMergeProposal(
  roadmap: RoadmapSnapshot,
  sourceRef: string,
  targetRef: string,
  now: Date,
): Proposal {
  const source = findTheme(roadmap, sourceRef);
  if (!source) throw new ReviewTargetNotFound(sourceRef);
  const target = findTheme(roadmap, targetRef, source.projectId) ?? findTheme(roadmap, targetRef);
  if (!target) throw new ReviewTargetNotFound(targetRef);

  return {
    id: proposalId("roadmap_merge", `${source.id}\0${target.id}`),
    state: "pending",
    applied: false,
    createdAt: now.toISOString(),
    decidedAt: null,
    appliedAt: null,
    lastError: null,
    kind: "roadmap_merge",
    payload: { projectId: source.projectId, sourceThemeId: source.id, targetThemeId: target.id },
  };
}
