import { existsSync, readdirSync, readFileSync, statSync, type Dirent } from "fs";
import { basename, dirname, join, sep } from "path";
import type { ClaudeActivity } from "../shared/types.js";
import { isWithin } from "../shared/paths.js";
import { inWindow } from "../shared/time.js";
import { errorMessage, SourceUnavailable } from "../services/errors.js";
import {
  byTimestamp, makeActivityId,
  type Collector, type CollectorContext, type CollectorResult,
} from "./collector.js";

// ── Session log parsing ─────────────────────────────────────

const EDIT_TOOLS = new Set(["Edit", "Write", "MultiEdit", "NotebookEdit"]);

const TASK_PATTERNS = [
  /^(create|build|add|fix|update|implement|write|make|refactor|remove|migrate|debug|help|can you|please)\b/i,
  /^(i need|i want|let's|we need)\b/i,
];

/** Machine-generated wrappers injected into the user turn stream. */
const NOISE_RE = /^(<[a-z][\w:-]*[>\s/]|\[Request interrupted|This session is being continued|Caveat:)/;

export interface ParsedSession {
  sessionId: string | null;
  cwd: string | null;
  startedAt: number | null;   // first timestamped entry, regardless of window
  firstTurn: number | null;   // line index of the first in-window message
  lastTurn: number | null;
  firstInWindow: number | null;
  lastInWindow: number | null;
  messages: number;
  tools: Record<string, number>;
  filesEdited: string[];
  prompts: string[];
  corruptLines: number;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

/** Text of a user turn, or null for turns that only carry tool results. */
function promptText(content: unknown): string | null {
  if (typeof content === "string") return content.trim() || null;
  if (!Array.isArray(content)) return null;
  for (const block of content) {
    if (isRecord(block) && block.type === "text") {
      const text = str(block.text);
      if (text && text.trim()) return text.trim();
    }
  }
  return null;
}

export function parseSessionLog(content: string, since: Date, until: Date): ParsedSession {
  const session: ParsedSession = {
    sessionId: null,
    cwd: null,
    startedAt: null,
    firstTurn: null,
    lastTurn: null,
    firstInWindow: null,
    lastInWindow: null,
    messages: 0,
    tools: {},
    filesEdited: [],
    prompts: [],
    corruptLines: 0,
  };
  const edited = new Set<string>();

  content.split("\n").forEach((line, index) => {
    if (!line.trim()) return;
    let entry: unknown;
    try {
      entry = JSON.parse(line);
    } catch {
      session.corruptLines++;
      return;
    }
    if (!isRecord(entry)) return;

    session.sessionId ??= str(entry.sessionId);
    session.cwd ??= str(entry.cwd);

    const ts = str(entry.timestamp);
    const time = ts ? new Date(ts).getTime() : NaN;
    if (Number.isNaN(time)) return;
    if (session.startedAt === null || time < session.startedAt) session.startedAt = time;
    if (!inWindow(time, since, until)) return;
    if (entry.type !== "user" && entry.type !== "assistant") return;

    session.firstTurn ??= index;
    session.lastTurn = index;
    if (session.firstInWindow === null || time < session.firstInWindow) session.firstInWindow = time;
    if (session.lastInWindow === null || time > session.lastInWindow) session.lastInWindow = time;

    const message: JsonRecord = isRecord(entry.message) ? entry.message : {};

    if (entry.type === "user") {
      const text = promptText(message.content);
      if (text === null) return;
      session.messages++;
      if (!NOISE_RE.test(text)) session.prompts.push(text.split("\n")[0].slice(0, 200).trim());
      return;
    }

    if (!Array.isArray(message.content)) return;
    for (const block of message.content) {
      if (!isRecord(block) || block.type !== "tool_use") continue;
      const name = str(block.name) ?? "unknown";
      session.tools[name] = (session.tools[name] ?? 0) + 1;
      if (EDIT_TOOLS.has(name) && isRecord(block.input)) {
        const file = str(block.input.file_path) ?? str(block.input.notebook_path);
        if (file) edited.add(file);
      }
    }
  });

  session.filesEdited = [...edited].sort();
  return session;
}

export function isTaskLike(prompt: string): boolean {
  return prompt.length > 10 && TASK_PATTERNS.some((re) => re.test(prompt));
}

/** "-home-me-code-api" → "/home/me/code/api". Lossy for names containing dashes. */
export function decodeProjectDir(encoded: string): string {
  return sep + encoded.replace(/^-/, "").split("-").join(sep);
}

export function findSessionFiles(root: string): string[] {
  const files: string[] = [];
  const stack = [root];
  for (let dir = stack.pop(); dir !== undefined; dir = stack.pop()) {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch {
      continue;
    }
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name !== "subagents") stack.push(full);
      } else if (entry.isFile() && entry.name.endsWith(".jsonl")) {
        files.push(full);
      }
    }
  }
  return files.sort();
}

// ── Collector ───────────────────────────────────────────────

function describeSession(parsed: ParsedSession, tasks: string[], where: string): string {
  if (tasks.length > 0) return tasks[tasks.length - 1];
  const firstPrompt = parsed.prompts.find((p) => p.length > 10);
  if (firstPrompt) return firstPrompt;
  if (parsed.filesEdited.length > 0) return `Edited ${parsed.filesEdited.length} file(s) in ${where}`;
  return `Claude session in ${where}`;
}

/**
 * One activity per coding-assistant session whose start falls in the window,
 * keyed and stamped by that start. Message and tool counts are aggregated
 * into the metadata.
 */
export function createClaudeCollector({ config }: CollectorContext): Collector {
  const root = config.settings.claudeProjectsDir;

  return {
    source: "claude",

    collect(since: Date, until: Date): CollectorResult {
      const warnings: SourceUnavailable[] = [];
      if (!existsSync(root)) {
        warnings.push(new SourceUnavailable("claude", `Session log directory not found: ${root}`, root));
        return { source: "claude", activities: [], warnings };
      }

      const activities: ClaudeActivity[] = [];

      for (const file of findSessionFiles(root)) {
        let content: string;
        try {
          // A session last written before the window cannot start inside it.
          if (statSync(file).mtimeMs < since.getTime()) continue;
          content = readFileSync(file, "utf-8");
        } catch (error) {
          warnings.push(new SourceUnavailable("claude", `Cannot read ${file}: ${errorMessage(error)}`, file));
          continue;
        }

        const parsed = parseSessionLog(content, since, until);
        if (parsed.corruptLines > 0) {
          warnings.push(new SourceUnavailable("claude", `${parsed.corruptLines} unreadable line(s) in ${file}`, file));
        }
        if (parsed.startedAt === null || !inWindow(parsed.startedAt, since, until)) continue;
        if (parsed.firstTurn === null || parsed.lastTurn === null || parsed.lastInWindow === null) continue;

        const cwd = parsed.cwd ?? decodeProjectDir(basename(dirname(file)));
        if (config.excludedFolders.some((excluded) => isWithin(cwd, excluded))) continue;

        // The start is inside the window, so the first turn is the same for every run that sees it.
        const sessionId = parsed.sessionId ?? basename(file, ".jsonl");
        const naturalKey = `${sessionId}:${parsed.firstTurn}`;
        const tasks = parsed.prompts.filter(isTaskLike);
        const duration = parsed.firstInWindow !== null
          ? Math.round((parsed.lastInWindow - parsed.firstInWindow) / 60000)
          : null;

        activities.push({
          id: makeActivityId("claude", naturalKey),
          source: "claude",
          naturalKey,
          timestamp: new Date(parsed.startedAt).toISOString(),
          projectId: null,
          description: describeSession(parsed, tasks, basename(cwd)),
          rawMetadata: {
            sessionId,
            sessionFile: file,
            cwd,
            messages: parsed.messages,
            tools: parsed.tools,
            filesEdited: parsed.filesEdited,
            taskDescriptions: tasks.slice(-5),
            durationMinutes: duration,
          },
        });
      }

      return { source: "claude", activities: activities.sort(byTimestamp), warnings };
    },
  };
}
