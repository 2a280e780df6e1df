import { existsSync, readFileSync } from "fs";
import { isAbsolute, resolve } from "path";
import { z } from "zod";
import type { DaybookConfig } from "../shared/types.js";
import { ConfigInvalid } from "./errors.js";
import { expandHome } from "./store.js";

export const DEFAULT_EXCLUDED_PATTERNS = [
  "node_modules", ".git", "__pycache__", ".venv", "venv", "dist", "build", "target", ".next", ".cache", ".daybook",
];

// The file is snake_case JSON; the rest of the code sees camelCase.

const projectSchema = z.object({
  id: z.string().trim().min(1, "project id is required"),
  name: z.string().trim().min(1, "project name is required"),
  team: z.string().trim().min(1, "project team is required"),
  folder_path: z.string().trim().min(1, "folder_path is required"),
  privacy: z.enum(["public", "private"]).default("public"),
});

const settingsSchema = z
  .object({
    lookback_hours: z.number().positive().default(24),
    file_extensions: z.array(z.string()).default([]),
    excluded_patterns: z.array(z.string()).default(DEFAULT_EXCLUDED_PATTERNS),
    new_theme_threshold: z.number().int().min(1).default(3),
    overlap_threshold: z.number().int().min(1).default(1),
    claude_projects_dir: z.string().min(1).default("~/.claude/projects"),
    author_email: z.string().nullable().default(null),
    lock_stale_minutes: z.number().positive().default(120),
  })
  .strict();

const configSchema = z
  .object({
    projects: z.array(projectSchema),
    excluded_folders: z.array(z.string().min(1)).default([]),
    settings: settingsSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.projects.forEach((p, index) => {
      if (seen.has(p.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["projects", index, "id"],
          message: `duplicate project id "${p.id}"`,
        });
      }
      seen.add(p.id);
      const folder = expandHome(p.folder_path);
      if (!isAbsolute(folder)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["projects", index, "folder_path"],
          message: `folder_path must be absolute or start with ~ (got "${p.folder_path}")`,
        });
      }
    });
  });

export type RawConfig = z.input<typeof configSchema>;

function normalizePath(path: string): string {
  return resolve(expandHome(path));
}

/** Validates an already-parsed config object. Throws ConfigInvalid. */
export function parseConfig(raw: unknown, origin = "config"): DaybookConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigInvalid(`Invalid configuration in ${origin}`, issues);
  }

  const { projects, excluded_folders, settings } = parsed.data;
  return {
    projects: projects.map((p) => ({
      id: p.id,
      name: p.name,
      team: p.team,
      folderPath: normalizePath(p.folder_path),
      privacy: p.privacy,
    })),
    excludedFolders: excluded_folders.map(normalizePath),
    settings: {
      lookbackHours: settings.lookback_hours,
      fileExtensions: settings.file_extensions.map((e) => (e.startsWith(".") ? e : `.${e}`)),
      excludedPatterns: settings.excluded_patterns,
      newThemeThreshold: settings.new_theme_threshold,
      overlapThreshold: settings.overlap_threshold,
      claudeProjectsDir: normalizePath(settings.claude_projects_dir),
      authorEmail: settings.author_email,
      lockStaleMinutes: settings.lock_stale_minutes,
    },
  };
}

export function loadConfig(path: string): DaybookConfig {
  if (!existsSync(path)) {
    throw new ConfigInvalid(`Configuration file not found: ${path}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigInvalid(`Configuration file is not valid JSON: ${path}`, [detail]);
  }
  return parseConfig(raw, path);
}
