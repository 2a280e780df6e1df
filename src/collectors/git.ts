import { existsSync } from "fs";
import { basename } from "path";
import type { GitActivity } from "../shared/types.js";
import { errorMessage, SourceUnavailable } from "../services/errors.js";
import { findGitRepos, getChangedFiles, getCommitsInWindow, hasCommits, isGitAvailable, type GitCommit } from "../services/git.js";
import {
  byTimestamp, makeActivityId, makeDirectoryFilter,
  type Collector, type CollectorContext, type CollectorResult,
} from "./collector.js";

/** One activity per non-merge commit found in the repositories under each project folder. */
export function createGitCollector({ config }: CollectorContext): Collector {
  const skipDir = makeDirectoryFilter(config);

  return {
    source: "git",

    collect(since: Date, until: Date): CollectorResult {
      const warnings: SourceUnavailable[] = [];
      const repos = new Map<string, string>();   // repo → owning project name

      if (!isGitAvailable()) {
        warnings.push(new SourceUnavailable("git", "git executable not available"));
        return { source: "git", activities: [], warnings };
      }

      for (const project of config.projects) {
        if (!existsSync(project.folderPath)) {
          warnings.push(new SourceUnavailable("git", `Project folder not found: ${project.folderPath}`, project.folderPath));
          continue;
        }
        if (skipDir(project.folderPath, basename(project.folderPath))) continue;
        for (const repo of findGitRepos(project.folderPath, skipDir)) {
          if (!repos.has(repo)) repos.set(repo, project.name);
        }
      }

      const activities: GitActivity[] = [];
      const seen = new Set<string>();

      for (const [repo, projectName] of repos) {
        if (!hasCommits(repo)) continue;

        let commits: GitCommit[];
        try {
          commits = getCommitsInWindow(repo, since, until, config.settings.authorEmail);
        } catch (error) {
          warnings.push(new SourceUnavailable("git", `git log failed in ${repo}: ${errorMessage(error)}`, repo));
          continue;
        }

        for (const commit of commits) {
          // The same commit can be reachable from a clone nested in another project.
          if (seen.has(commit.hash)) continue;
          seen.add(commit.hash);

          activities.push({
            id: makeActivityId("git", commit.hash),
            source: "git",
            naturalKey: commit.hash,
            timestamp: new Date(commit.date).toISOString(),
            projectId: null,
            description: `[${projectName}] ${commit.subject}`,
            rawMetadata: {
              hash: commit.hash,
              author: commit.author,
              email: commit.email,
              subject: commit.subject,
              repoPath: repo,
              filesChanged: getChangedFiles(repo, commit.hash),
            },
          });
        }
      }

      return { source: "git", activities: activities.sort(byTimestamp), warnings };
    },
  };
}
