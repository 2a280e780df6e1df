import { existsSync, readdirSync, statSync, type Dirent } from "fs";
import { basename, extname, join, relative } from "path";
import type { FilesystemActivity } from "../shared/types.js";
import { inWindow, localDay } from "../shared/time.js";
import { SourceUnavailable } from "../services/errors.js";
import {
  byTimestamp, makeActivityId, makeDirectoryFilter,
  type Collector, type CollectorContext, type CollectorResult,
} from "./collector.js";

interface DirectoryGroup {
  root: string;
  directory: string;
  day: string;
  files: string[];
  latest: number;
}

function describe(group: DirectoryGroup): string {
  const rel = relative(group.root, group.directory);
  const where = rel ? `${basename(group.root)}/${rel}` : basename(group.root);
  if (group.files.length === 1) return `Modified ${basename(group.files[0])} in ${where}`;
  return `Modified ${group.files.length} files in ${where}`;
}

/**
 * Walks every configured project folder and emits one activity per directory
 * with changes per day. The directory, not the file, is the unit of work.
 */
export function createFilesystemCollector({ config }: CollectorContext): Collector {
  const skipDir = makeDirectoryFilter(config);
  const extensions = new Set(config.settings.fileExtensions);

  return {
    source: "filesystem",

    collect(since: Date, until: Date): CollectorResult {
      const warnings: SourceUnavailable[] = [];
      const groups = new Map<string, DirectoryGroup>();
      const visited = new Set<string>();

      for (const project of config.projects) {
        const root = project.folderPath;
        if (!existsSync(root)) {
          warnings.push(new SourceUnavailable("filesystem", `Project folder not found: ${root}`, root));
          continue;
        }
        if (skipDir(root, basename(root))) continue;

        const stack = [root];
        for (let dir = stack.pop(); dir !== undefined; dir = stack.pop()) {
          if (visited.has(dir)) continue;
          visited.add(dir);

          let entries: Dirent[];
          try {
            entries = readdirSync(dir, { withFileTypes: true });
          } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            warnings.push(new SourceUnavailable("filesystem", `Cannot read ${dir}: ${detail}`, dir));
            continue;
          }

          for (const entry of entries) {
            const full = join(dir, entry.name);
            if (entry.isDirectory()) {
              if (!skipDir(full, entry.name)) stack.push(full);
              continue;
            }
            if (!entry.isFile()) continue;
            if (extensions.size > 0 && !extensions.has(extname(entry.name))) continue;

            let mtime: number;
            try {
              mtime = statSync(full).mtimeMs;
            } catch {
              continue; // removed while scanning
            }
            if (!inWindow(mtime, since, until)) continue;

            const day = localDay(new Date(mtime));
            const key = `${dir}\0${day}`;
            const group = groups.get(key);
            if (group) {
              group.files.push(full);
              group.latest = Math.max(group.latest, mtime);
            } else {
              groups.set(key, { root, directory: dir, day, files: [full], latest: mtime });
            }
          }
        }
      }

      const activities: FilesystemActivity[] = [...groups.values()].map((group): FilesystemActivity => {
        const naturalKey = `${group.directory}@${group.day}`;
        return {
          id: makeActivityId("filesystem", naturalKey),
          source: "filesystem",
          naturalKey,
          timestamp: new Date(group.latest).toISOString(),
          projectId: null,
          description: describe(group),
          rawMetadata: {
            directory: group.directory,
            day: group.day,
            files: [...group.files].sort(),
          },
        };
      });

      return { source: "filesystem", activities: activities.sort(byTimestamp), warnings };
    },
  };
}
