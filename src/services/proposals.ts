import { createHash } from "crypto";
import type {
  Activity, DailySummary, Proposal, ProposalKind, RoadmapProject, RoadmapSnapshot, Theme,
} from "../shared/types.js";
import { attributeTheme, attributionText, bestTheme, tokenize, tokenSet, type ThemeAttribution } from "./attribution.js";

export const UNTRACKED = "untracked";

export interface ProposalOptions {
  newThemeThreshold: number;
  overlapThreshold: number;
  /** Activities first seen by this run. Only these suggest reactivating a theme; all do when absent. */
  freshActivityIds?: ReadonlySet<string>;
}

export const DEFAULT_PROPOSAL_OPTIONS: ProposalOptions = { newThemeThreshold: 3, overlapThreshold: 1 };

/** Deterministic id from the proposal kind and what identifies its payload. */
export function proposalId(kind: ProposalKind, key: string): string {
  const digest = createHash("sha1").update(`${kind}\0${key}`).digest("hex");
  return `p_${digest.slice(0, 10)}`;
}

function base(id: string, createdAt: string) {
  return {
    id,
    state: "pending" as const,
    applied: false,
    createdAt,
    decidedAt: null,
    appliedAt: null,
    lastError: null,
  };
}

// ── Theme naming ────────────────────────────────────────────

function titleCase(words: string[]): string {
  return words.map((w) => w.charAt(0).toUpperCase() + w.slice(1)).join(" ");
}

/**
 * Name for a cluster of unmatched activities: the three most frequent tokens
 * seen in at least two descriptions, else the opening words of the first one.
 */
export function suggestThemeName(descriptions: readonly string[]): string {
  const frequency = new Map<string, number>();
  for (const description of descriptions) {
    for (const token of new Set(tokenize(description))) {
      frequency.set(token, (frequency.get(token) ?? 0) + 1);
    }
  }
  const frequent = [...frequency.entries()]
    .filter(([, n]) => n >= 2)
    .sort((a, b) => b[1] - a[1])
    .slice(0, 3)
    .map(([token]) => token);
  if (frequent.length > 0) return titleCase(frequent);

  const words = (descriptions[0] ?? "").split(/\s+/).filter(Boolean).slice(0, 4);
  return words.length > 0 ? words.join(" ") : "Untitled";
}

// ── Generator ───────────────────────────────────────────────

interface ProjectScan {
  project: RoadmapProject;
  unmatched: Activity[];
  reactivate: Map<string, number>;   // paused theme id → supporting activities
}

export interface GeneratedProposals {
  proposals: Proposal[];
  attributions: Map<string, ThemeAttribution>;   // activity id → attribution
}

/** Activity ids already counted by a note on the roadmap. */
export function notedActivityIds(snapshot: RoadmapSnapshot): Set<string> {
  return new Set(snapshot.notes.flatMap((n) => n.activityIds));
}

/**
 * Derives roadmap edit proposals from a summary. Pure: the same summary,
 * snapshot and options always give the same proposals, and nothing is mutated.
 *
 * The activity note covers only activities no applied note has counted. Its
 * id changes with each note applied for the day, so later runs that day
 * propose a new note for what came after.
 */
export function generateProposals(
  summary: DailySummary,
  snapshot: RoadmapSnapshot,
  projects: readonly RoadmapProject[],
  options: ProposalOptions = DEFAULT_PROPOSAL_OPTIONS,
): GeneratedProposals {
  const createdAt = summary.generatedAt;
  const threshold = options.overlapThreshold;
  const live = snapshot.themes.filter((t) => t.mergedInto === null);
  const attributions = new Map<string, ThemeAttribution>();
  const scans = new Map<string, ProjectScan>();
  const noted = notedActivityIds(snapshot);
  const countsByTheme: Record<string, number> = {};
  const unnoted: Record<string, string> = {};

  for (const activity of summary.activities) {
    const attribution = attributeTheme(activity, activity.projectId, live, threshold);
    attributions.set(activity.id, attribution);
    if (!noted.has(activity.id)) {
      const bucket = attribution.themeId ?? UNTRACKED;
      countsByTheme[bucket] = (countsByTheme[bucket] ?? 0) + 1;
      unnoted[activity.id] = bucket;
    }

    const project = projects.find((p) => p.id === activity.projectId);
    if (!project) continue;
    let scan = scans.get(project.id);
    if (!scan) {
      scan = { project: { id: project.id, name: project.name, team: project.team }, unmatched: [], reactivate: new Map() };
      scans.set(project.id, scan);
    }

    const own: Theme[] = live.filter((t) => t.projectId === project.id);
    const tokens = tokenSet(attributionText(activity));
    const activeBest = bestTheme(tokens, own.filter((t) => t.status === "active"), 0)?.overlap ?? 0;
    const paused = bestTheme(tokens, own.filter((t) => t.status === "paused"), threshold);
    const fresh = options.freshActivityIds?.has(activity.id) ?? true;
    if (fresh && paused && paused.overlap > activeBest) {
      scan.reactivate.set(paused.theme.id, (scan.reactivate.get(paused.theme.id) ?? 0) + 1);
    }
    if (!bestTheme(tokens, own, threshold) && attribution.reason !== "explicit") {
      scan.unmatched.push(activity);
    }
  }

  const proposals: Proposal[] = [];

  for (const scan of scans.values()) {
    for (const [themeId, count] of scan.reactivate) {
      const theme = live.find((t) => t.id === themeId);
      if (!theme) continue;
      proposals.push({
        ...base(proposalId("theme_status_change", `${themeId}\0active\0${summary.date}`), createdAt),
        kind: "theme_status_change",
        payload: {
          themeId,
          themeName: theme.name,
          projectId: theme.projectId,
          from: "paused",
          to: "active",
          activityCount: count,
        },
      });
    }
  }

  for (const scan of scans.values()) {
    if (scan.unmatched.length < options.newThemeThreshold) continue;
    const descriptions = scan.unmatched.map(attributionText);
    const name = suggestThemeName(descriptions);
    const taken = snapshot.themes.some(
      (t) => t.projectId === scan.project.id && t.name.toLowerCase() === name.toLowerCase(),
    );
    if (taken) continue;
    proposals.push({
      ...base(proposalId("new_theme", `${scan.project.id}\0${name.toLowerCase()}`), createdAt),
      kind: "new_theme",
      payload: {
        project: scan.project,
        name,
        activityCount: scan.unmatched.length,
        sampleDescriptions: descriptions.slice(0, 3),
      },
    });
  }

  const total = Object.keys(unnoted).length;
  if (total > 0) {
    const applied = snapshot.notes.filter((n) => n.date === summary.date).length;
    proposals.push({
      ...base(proposalId("activity_note", `${summary.date}\0${applied}`), createdAt),
      kind: "activity_note",
      payload: { date: summary.date, countsByTheme, total, activities: unnoted },
    });
  }

  return { proposals, attributions };
}
