import { execFileSync } from "child_process";
import { existsSync, readdirSync, type Dirent } from "fs";
import { join } from "path";

export interface GitCommit {
  hash: string;
  author: string;
  email: string;
  date: string;     // ISO 8601 author date
  subject: string;
}

const FIELD_SEP = "\x1f";
const RECORD_SEP = "\x1e";
const LOG_FORMAT = "%H%x1f%an%x1f%ae%x1f%aI%x1f%s%x1e";

/** Runs git and returns trimmed stdout. Throws when git is missing or exits non-zero. */
export function runGit(args: string[], cwd: string, timeoutMs = 30000): string {
  return execFileSync("git", args, {
    cwd,
    encoding: "utf-8",
    timeout: timeoutMs,
    stdio: ["pipe", "pipe", "pipe"],
  }).trim();
}

/** Like runGit, but failures become an empty string. */
function gitOutput(args: string[], cwd: string): string {
  try {
    return runGit(args, cwd, 10000);
  } catch {
    return "";
  }
}

export function isGitAvailable(): boolean {
  return gitOutput(["--version"], process.cwd()).startsWith("git version");
}

export function hasGitRepo(dir: string): boolean {
  return existsSync(join(dir, ".git"));
}

export function hasCommits(repo: string): boolean {
  return gitOutput(["rev-parse", "--verify", "--quiet", "HEAD"], repo) !== "";
}

/**
 * Finds repositories at or under `root`. Does not descend into a repository
 * once found; `skip` prunes directories before they are entered.
 */
export function findGitRepos(root: string, skip: (dir: string, name: string) => boolean): string[] {
  const repos: string[] = [];
  const stack = [root];

  for (let dir = stack.pop(); dir !== undefined; dir = stack.pop()) {
    if (hasGitRepo(dir)) {
      repos.push(dir);
      continue;
    }
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch {
      continue;
    }
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const full = join(dir, entry.name);
      if (skip(full, entry.name)) continue;
      stack.push(full);
    }
  }

  return repos.sort();
}

/**
 * Matches git stash bookkeeping commits ("WIP on main: ...", "index on main: ...").
 * These are not developer work.
 */
const STASH_MESSAGE_RE = /^(WIP on |On |index on |untracked files on )\S+:/;

export function isStashCommit(subject: string): boolean {
  return STASH_MESSAGE_RE.test(subject);
}

/** Parses output produced with LOG_FORMAT. */
export function parseGitLog(raw: string): GitCommit[] {
  const commits: GitCommit[] = [];
  for (const record of raw.split(RECORD_SEP)) {
    const line = record.trim();
    if (!line) continue;
    const parts = line.split(FIELD_SEP);
    if (parts.length < 5) continue;
    const [hash, author, email, date] = parts;
    // Subjects may in theory contain the separator; keep everything after the date.
    const subject = parts.slice(4).join(FIELD_SEP);
    if (!/^[0-9a-f]{7,64}$/.test(hash)) continue;
    if (Number.isNaN(new Date(date).getTime())) continue;
    commits.push({ hash, author, email, date, subject });
  }
  return commits;
}

export function getCommitsInWindow(repo: string, since: Date, until: Date, authorEmail?: string | null): GitCommit[] {
  const args = [
    "log",
    "--all",
    "--no-merges",
    `--since=${since.toISOString()}`,
    `--until=${until.toISOString()}`,
    `--format=${LOG_FORMAT}`,
  ];
  if (authorEmail) args.push(`--author=${authorEmail}`);

  const start = since.getTime();
  const end = until.getTime();
  return parseGitLog(runGit(args, repo))
    .filter((c) => !isStashCommit(c.subject))
    .filter((c) => {
      const t = new Date(c.date).getTime();
      return t >= start && t < end;
    });
}

export function getChangedFiles(repo: string, hash: string): string[] {
  const raw = gitOutput(["diff-tree", "--no-commit-id", "--name-only", "-r", "--root", hash], repo);
  return raw.split("\n").filter(Boolean).map((f) => join(repo, f));
}
