import type { Activity, Project, Theme } from "../shared/types.js";
import { isWithin } from "../shared/paths.js";

// ── Tokens ──────────────────────────────────────────────────

const STOP_WORDS = new Set([
  "the", "and", "for", "with", "from", "into", "that", "this", "are", "was",
  "but", "not", "can", "you", "all", "any", "its", "our", "out", "use",
  "via", "per", "let", "now", "add", "fix", "update", "file", "files",
  "modified", "edited", "session", "claude",
]);

/** Lower-case alphanumeric runs of three or more characters, minus stop words. */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.toLowerCase().matchAll(/[a-z0-9]+/g)) {
    const token = match[0];
    if (token.length >= 3 && !STOP_WORDS.has(token)) tokens.push(token);
  }
  return tokens;
}

export function tokenSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

export function overlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let n = 0;
  for (const token of a) if (b.has(token)) n++;
  return n;
}

/**
 * The text matched against theme names. Commit descriptions carry a project
 * prefix that would otherwise count as a keyword.
 */
export function attributionText(activity: Activity): string {
  return activity.source === "git" ? activity.rawMetadata.subject : activity.description;
}

// ── Projects ────────────────────────────────────────────────

/** The filesystem location an activity happened in, if it has one. */
export function activityPath(activity: Activity): string | null {
  switch (activity.source) {
    case "filesystem":
      return activity.rawMetadata.directory;
    case "git":
      return activity.rawMetadata.repoPath;
    case "claude":
      return activity.rawMetadata.cwd;
    case "manual":
      return null;
  }
}

/** Longest project folder containing `path`, matched on whole path segments. */
export function matchProjectByPath(path: string, projects: readonly Project[]): Project | null {
  let best: Project | null = null;
  for (const project of projects) {
    if (!isWithin(path, project.folderPath)) continue;
    if (!best || project.folderPath.length > best.folderPath.length) best = project;
  }
  return best;
}

export function resolveProject(activity: Activity, projects: readonly Project[]): Project | null {
  if (activity.source === "manual") {
    const ref = activity.rawMetadata.project?.trim().toLowerCase();
    if (!ref) return null;
    return projects.find((p) => p.id.toLowerCase() === ref) ?? projects.find((p) => p.name.toLowerCase() === ref) ?? null;
  }
  const path = activityPath(activity);
  return path ? matchProjectByPath(path, projects) : null;
}

// ── Themes ──────────────────────────────────────────────────

export type AttributionReason = "explicit" | "single_active" | "keyword" | "default" | "none";

export interface ThemeAttribution {
  themeId: string | null;
  overlap: number;
  reason: AttributionReason;
}

export interface ThemeScore {
  theme: Theme;
  overlap: number;
}

/**
 * Best-scoring theme at or above `threshold`. Ties go to the most recently
 * updated theme, then to the one listed first.
 */
export function bestTheme(tokens: ReadonlySet<string>, themes: readonly Theme[], threshold: number): ThemeScore | null {
  let best: ThemeScore | null = null;
  for (const theme of themes) {
    const score = overlap(tokens, tokenSet(theme.name));
    if (score < threshold) continue;
    if (
      !best ||
      score > best.overlap ||
      (score === best.overlap && Date.parse(theme.updatedAt) > Date.parse(best.theme.updatedAt))
    ) {
      best = { theme, overlap: score };
    }
  }
  return best;
}

function findByRef(themes: readonly Theme[], ref: string): Theme | undefined {
  const needle = ref.trim().toLowerCase();
  return themes.find((t) => t.id === ref) ?? themes.find((t) => t.name.toLowerCase() === needle);
}

/**
 * Picks the theme an activity counts toward among the themes of its project.
 * Never creates themes; falls back to the project's default theme, then null.
 */
export function attributeTheme(
  activity: Activity,
  projectId: string | null,
  themes: readonly Theme[],
  threshold = 1,
): ThemeAttribution {
  if (projectId === null) return { themeId: null, overlap: 0, reason: "none" };
  const own = themes.filter((t) => t.projectId === projectId);

  if (activity.source === "manual" && activity.rawMetadata.theme) {
    const named = findByRef(own, activity.rawMetadata.theme);
    if (named && named.status !== "done") return { themeId: named.id, overlap: 0, reason: "explicit" };
  }

  const active = own.filter((t) => t.status === "active");
  if (active.length === 1) {
    const score = overlap(tokenSet(attributionText(activity)), tokenSet(active[0].name));
    return { themeId: active[0].id, overlap: score, reason: "single_active" };
  }
  if (active.length > 1) {
    const best = bestTheme(tokenSet(attributionText(activity)), active, threshold);
    if (best) return { themeId: best.theme.id, overlap: best.overlap, reason: "keyword" };
  }

  const fallback = own.find((t) => t.isDefault && t.status !== "done");
  return fallback
    ? { themeId: fallback.id, overlap: 0, reason: "default" }
    : { themeId: null, overlap: 0, reason: "none" };
}
