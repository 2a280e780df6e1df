import type { Activity, DaybookConfig, ManualEntry, Project, Proposal, RoadmapProject, Theme } from "../shared/types.js";
import type { SourceStatus } from "../collectors/index.js";
import type { StatusReport } from "./commands.js";
import type { ProposalFilter, ReviewResult } from "./review.js";
import type { RunReport } from "./run.js";
import type { Win, WinKind, WinsReport } from "./wins.js";

export interface FormatOptions {
  /** Show names and descriptions of private projects. */
  showPrivate?: boolean;
}

const PRIVATE_LABEL = "🔒 private";

function projectLabel(project: Project | undefined, projectId: string, opts: FormatOptions): string {
  if (!project) return projectId;
  if (project.privacy === "private" && !opts.showPrivate) return PRIVATE_LABEL;
  return project.name;
}

function isHidden(activity: Activity, projects: readonly Project[], opts: FormatOptions): boolean {
  if (opts.showPrivate || activity.projectId === null) return false;
  return projects.find((p) => p.id === activity.projectId)?.privacy === "private";
}

const SOURCE_ICON: Record<string, string> = {
  filesystem: "📁",
  git: "💾",
  claude: "🤖",
  manual: "📝",
};

function sourceLine(status: SourceStatus): string {
  const icon = status.state === "ok" ? "✅" : status.state === "partial" ? "⚠️" : "❌";
  const detail = status.state === "failed" ? "failed to scan" : `${status.activityCount} activit${status.activityCount === 1 ? "y" : "ies"}`;
  return `- ${icon} **${status.source}**: ${detail}`;
}

export function formatRunReport(report: RunReport, config: DaybookConfig, opts: FormatOptions = {}): string {
  if (report.status === "skipped" || !report.summary) {
    return `⏭️ Run skipped: ${report.message ?? "lock held"}`;
  }

  const { summary } = report;
  const lines: string[] = [];
  lines.push(`# 📅 Daybook — ${summary.date}`);
  lines.push(`Window: ${new Date(report.since).toLocaleString()} → ${new Date(report.until).toLocaleString()}`);
  lines.push("");

  lines.push(`## 🔎 Sources`);
  for (const status of report.sources) {
    lines.push(sourceLine(status));
    for (const warning of status.warnings) lines.push(`  - ${warning}`);
  }
  lines.push("");

  const failed = report.sources.filter((s) => s.state === "failed").length;
  if (summary.activities.length === 0) {
    lines.push(failed > 0 ? `No activities found; ${failed} source(s) failed to scan.` : "No activities found in this window.");
    return lines.join("\n");
  }

  lines.push(`## 📊 Totals`);
  lines.push(`- **Activities:** ${summary.activities.length} (${report.newActivities} new)`);
  lines.push(`- **Files touched:** ${summary.fileCount}`);
  const bySource = Object.entries(summary.countsBySource).map(([source, n]) => `${source} ${n}`);
  lines.push(`- **By source:** ${bySource.join(", ")}`);
  if (summary.unmatchedCount > 0) lines.push(`- **Outside configured projects:** ${summary.unmatchedCount}`);
  lines.push("");

  const byProject = Object.entries(summary.countsByProject);
  if (byProject.length > 0) {
    lines.push(`## 🗂️ Projects`);
    for (const [projectId, count] of byProject) {
      const project = config.projects.find((p) => p.id === projectId);
      lines.push(`- ${projectLabel(project, projectId, opts)}: ${count}`);
    }
    lines.push("");
  }

  if (summary.teamDistribution.length > 0) {
    lines.push(`## 👥 Teams`);
    for (const share of summary.teamDistribution) {
      lines.push(`- ${share.team}: ${share.percent}% (${share.count})`);
    }
    lines.push("");
  }

  const themes = Object.entries(report.themeCounts);
  if (themes.length > 0) {
    lines.push(`## 🎯 Themes`);
    for (const [name, count] of themes) lines.push(`- ${name}: ${count}`);
    lines.push("");
  }

  lines.push(`## 🕒 Activities`);
  for (const activity of summary.activities) {
    const time = new Date(activity.timestamp).toLocaleTimeString();
    const text = isHidden(activity, config.projects, opts) ? "(private)" : activity.description;
    lines.push(`- ${SOURCE_ICON[activity.source] ?? "📌"} ${time} ${text}`);
  }
  lines.push("");

  const { staged, refreshed, pending } = report.proposals;
  lines.push(`---`);
  lines.push(`*${staged} proposal(s) staged, ${refreshed} refreshed, ${pending} pending review.*`);
  return lines.join("\n");
}

// ── Reports ─────────────────────────────────────────────────

const WIN_ICON: Record<WinKind, string> = {
  logged_win: "🏆",
  git_milestone: "🚀",
  significant_session: "🤖",
  sustained_effort: "💪",
};

const WINS_PER_PROJECT = 3;

export function formatWinsReport(report: WinsReport, config: DaybookConfig, opts: FormatOptions = {}): string {
  const span = `${report.from} → ${report.to}`;
  if (report.wins.length === 0) return `No wins found for ${span} (${report.activityCount} activities recorded).`;

  const lines: string[] = [`# 🏆 Wins — ${span}`];
  const groups = new Map<string | null, Win[]>();
  for (const w of report.wins) groups.set(w.projectId, [...(groups.get(w.projectId) ?? []), w]);

  for (const [projectId, group] of groups) {
    const project = config.projects.find((p) => p.id === projectId);
    const hidden = project?.privacy === "private" && !opts.showPrivate;
    lines.push("");
    lines.push(`## ${projectId === null ? "Other" : projectLabel(project, projectId, opts)}`);
    for (const w of group.slice(0, WINS_PER_PROJECT)) {
      const files = w.fileCount > 0 ? ` (${w.fileCount} files)` : "";
      lines.push(`- ${WIN_ICON[w.kind]} ${hidden ? "(private)" : w.description}${files}`);
    }
    if (group.length > WINS_PER_PROJECT) lines.push(`- …and ${group.length - WINS_PER_PROJECT} more`);
  }

  lines.push("");
  lines.push(`---`);
  lines.push(`*${report.wins.length} win(s) across ${groups.size} project(s) from ${report.activityCount} activities.*`);
  return lines.join("\n");
}

export function formatStatus(report: StatusReport): string {
  const lines: string[] = [`# 📌 Status`];
  lines.push(report.roadmapUpdatedAt
    ? `Roadmap v${report.roadmapVersion}, updated ${new Date(report.roadmapUpdatedAt).toLocaleString()}`
    : "Roadmap is empty.");
  lines.push("");

  lines.push(`## 🟢 Active themes`);
  if (report.activeThemes.length === 0) lines.push("- none");
  for (const t of report.activeThemes) {
    const team = report.projects.find((p) => p.id === t.projectId)?.team ?? t.projectId;
    lines.push(`- [${team}] **${t.name}** — ${t.activityCount} activities`);
  }
  lines.push("");

  lines.push(`## 📋 Review`);
  lines.push(`- ${report.pending} pending proposal(s)`);
  if (report.unapplied > 0) lines.push(`- ⚠️ ${report.unapplied} approved but not applied`);
  return lines.join("\n");
}

// ── Proposals ───────────────────────────────────────────────

export function describeProposal(p: Proposal): string {
  switch (p.kind) {
    case "theme_status_change":
      return `Set theme "${p.payload.themeName}" ${p.payload.from} → ${p.payload.to} (${p.payload.activityCount} matching activities)`;
    case "new_theme":
      return `New theme "${p.payload.name}" in ${p.payload.project.name} (${p.payload.activityCount} unmatched activities)`;
    case "activity_note": {
      const tracked = p.payload.total - (p.payload.countsByTheme.untracked ?? 0);
      return `Activity note for ${p.payload.date}: ${p.payload.total} activities, ${tracked} on themes`;
    }
    case "roadmap_merge":
      return `Merge theme ${p.payload.sourceThemeId} into ${p.payload.targetThemeId}`;
  }
}

function stateLabel(p: Proposal): string {
  if (p.state === "approved") return p.applied ? "applied" : "approved, not applied";
  return p.state;
}

export function formatProposalList(proposals: readonly Proposal[], filter: ProposalFilter): string {
  if (proposals.length === 0) return filter === "all" ? "No proposals." : `No ${filter} proposals.`;

  const lines: string[] = [`# 📋 Proposals (${proposals.length})`, ""];
  for (const p of proposals) {
    lines.push(`- \`${p.id}\` [${stateLabel(p)}] ${describeProposal(p)}`);
    if (p.kind === "new_theme") {
      for (const sample of p.payload.sampleDescriptions) lines.push(`  - ${sample}`);
    }
    if (p.lastError) lines.push(`  - ⚠️ ${p.lastError}`);
  }
  return lines.join("\n");
}

const OUTCOME_ICON: Record<ReviewResult["outcome"], string> = {
  applied: "✅",
  already_applied: "☑️",
  rejected: "🗑️",
  conflict: "⚠️",
  invalid_transition: "🚫",
  not_found: "❓",
};

export function formatReviewResults(results: readonly ReviewResult[]): string {
  if (results.length === 0) return "Nothing to review.";
  return results
    .map((r) => `${OUTCOME_ICON[r.outcome]} \`${r.id}\` ${r.outcome.replace(/_/g, " ")}${r.message ? `: ${r.message}` : ""}`)
    .join("\n");
}

// ── Themes ──────────────────────────────────────────────────

const STATUS_ICON: Record<Theme["status"], string> = { active: "🟢", paused: "⏸️", done: "✅" };

export function formatThemeList(themes: readonly Theme[], projects: readonly RoadmapProject[]): string {
  if (themes.length === 0) return "No themes found.";

  const lines: string[] = [`# 🎯 Themes (${themes.length})`];
  const groups = new Map<string, Theme[]>();
  for (const t of themes) groups.set(t.projectId, [...(groups.get(t.projectId) ?? []), t]);

  for (const [projectId, group] of groups) {
    const project = projects.find((p) => p.id === projectId);
    lines.push("");
    lines.push(`## ${project ? `${project.name} (${project.team})` : projectId}`);
    for (const t of group) {
      const flags = [t.isDefault ? "default" : "", t.mergedInto ? `merged into ${t.mergedInto}` : ""].filter(Boolean);
      lines.push(`- ${STATUS_ICON[t.status]} **${t.name}** — ${t.activityCount} activities \`${t.id}\`${flags.length ? ` [${flags.join(", ")}]` : ""}`);
    }
  }
  return lines.join("\n");
}

export function formatManualEntry(entry: ManualEntry): string {
  const icon = entry.kind === "win" ? "🏆" : entry.kind === "blocker" ? "🚧" : "📝";
  const context = [entry.project, entry.theme].filter(Boolean).join(" / ");
  return `${icon} Logged ${entry.kind} \`${entry.id}\`${context ? ` (${context})` : ""}: ${entry.text}`;
}
