// ── Activities ──────────────────────────────────────────────

export const ACTIVITY_SOURCES = ["filesystem", "git", "claude", "manual"] as const;
export type ActivitySource = (typeof ACTIVITY_SOURCES)[number];

export interface FilesystemMetadata {
  directory: string;
  day: string;              // YYYY-MM-DD, local time
  files: string[];          // absolute paths
}

export interface GitMetadata {
  hash: string;
  author: string;
  email: string;
  subject: string;
  repoPath: string;
  filesChanged: string[];   // absolute paths
}

export interface ClaudeMetadata {
  sessionId: string;
  sessionFile: string;
  cwd: string;
  messages: number;
  tools: Record<string, number>;
  filesEdited: string[];
  taskDescriptions: string[];
  durationMinutes: number | null;
}

export type ManualEntryKind = "win" | "blocker" | "note";

export interface ManualMetadata {
  kind: ManualEntryKind;
  project?: string;
  theme?: string;
}

interface ActivityBase {
  readonly id: string;
  readonly naturalKey: string;
  readonly timestamp: string;   // ISO 8601
  readonly projectId: string | null;
  readonly description: string;
}

export interface FilesystemActivity extends ActivityBase {
  readonly source: "filesystem";
  readonly rawMetadata: Readonly<FilesystemMetadata>;
}

export interface GitActivity extends ActivityBase {
  readonly source: "git";
  readonly rawMetadata: Readonly<GitMetadata>;
}

export interface ClaudeActivity extends ActivityBase {
  readonly source: "claude";
  readonly rawMetadata: Readonly<ClaudeMetadata>;
}

export interface ManualActivity extends ActivityBase {
  readonly source: "manual";
  readonly rawMetadata: Readonly<ManualMetadata>;
}

export type Activity = FilesystemActivity | GitActivity | ClaudeActivity | ManualActivity;

export interface ManualEntry {
  id: string;
  timestamp: string;
  kind: ManualEntryKind;
  text: string;
  project?: string;
  theme?: string;
}

// ── Configuration ───────────────────────────────────────────

export type Privacy = "public" | "private";

export interface Project {
  id: string;
  name: string;
  team: string;
  folderPath: string;
  privacy: Privacy;
}

export interface Settings {
  lookbackHours: number;
  fileExtensions: string[];
  excludedPatterns: string[];
  newThemeThreshold: number;
  overlapThreshold: number;
  claudeProjectsDir: string;
  authorEmail: string | null;
  lockStaleMinutes: number;
}

export interface DaybookConfig {
  projects: Project[];
  excludedFolders: string[];
  settings: Settings;
}

// ── Roadmap ─────────────────────────────────────────────────

export type ThemeStatus = "active" | "paused" | "done";

export interface Theme {
  id: string;
  name: string;
  projectId: string;
  status: ThemeStatus;
  activityCount: number;
  updatedAt: string;
  isDefault: boolean;
  mergedInto: string | null;
}

export interface RoadmapProject {
  id: string;
  name: string;
  team: string;
}

export interface ActivityNoteRecord {
  proposalId: string;
  date: string;
  countsByTheme: Record<string, number>;
  total: number;
  activityIds: string[];   // counted by this note; never counted again
}

export interface RoadmapSnapshot {
  version: number;
  updatedAt: string;
  projects: RoadmapProject[];
  themes: Theme[];
  notes: ActivityNoteRecord[];
  appliedProposalIds: string[];
}

// ── Proposals ───────────────────────────────────────────────

export type ProposalState = "pending" | "approved" | "rejected";

export interface ThemeStatusChangePayload {
  themeId: string;
  themeName: string;
  projectId: string;
  from: ThemeStatus;
  to: ThemeStatus;
  activityCount: number;
}

export interface NewThemePayload {
  project: RoadmapProject;
  name: string;
  activityCount: number;
  sampleDescriptions: string[];
}

export interface ActivityNotePayload {
  date: string;
  countsByTheme: Record<string, number>;   // theme id, or "untracked"
  total: number;
  activities: Record<string, string>;      // activity id → theme id, or "untracked"
}

export interface RoadmapMergePayload {
  projectId: string;
  sourceThemeId: string;
  targetThemeId: string;
}

interface ProposalBase {
  id: string;
  state: ProposalState;
  applied: boolean;
  createdAt: string;
  decidedAt: string | null;
  appliedAt: string | null;
  lastError: string | null;
}

export type Proposal =
  | (ProposalBase & { kind: "theme_status_change"; payload: ThemeStatusChangePayload })
  | (ProposalBase & { kind: "new_theme"; payload: NewThemePayload })
  | (ProposalBase & { kind: "activity_note"; payload: ActivityNotePayload })
  | (ProposalBase & { kind: "roadmap_merge"; payload: RoadmapMergePayload });

export type ProposalKind = Proposal["kind"];

// ── Summaries ───────────────────────────────────────────────

export interface TeamShare {
  team: string;
  count: number;
  percent: number;
}

export interface DailySummary {
  date: string;
  generatedAt: string;
  activities: Activity[];
  countsBySource: Partial<Record<ActivitySource, number>>;
  countsByProject: Record<string, number>;
  countsByTeam: Record<string, number>;
  teamDistribution: TeamShare[];
  unmatchedCount: number;
  fileCount: number;
  duplicatesDiscarded: number;
}
