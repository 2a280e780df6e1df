import type { ManualEntryKind, ThemeStatus } from "../shared/types.js";
import {
  DEFAULT_WINS_DAYS, logEntry, reviewApprove, reviewList, reviewMerge, reviewReject, runCommand, statusCommand,
  themeAdd, themeDefault, themeRemove, themesList, themeStatus, winsCommand,
  type Workspace,
} from "./commands.js";
import { ConfigInvalid, DaybookError, errorMessage } from "./errors.js";
import {
  describeProposal, formatManualEntry, formatProposalList, formatReviewResults, formatRunReport, formatStatus,
  formatThemeList, formatWinsReport,
} from "./format.js";
import * as log from "./log.js";
import { hasFailures, type ProposalFilter } from "./review.js";
import { loadRoadmap } from "./roadmap.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;
export const EXIT_USAGE = 64;

export const USAGE = `Usage: daybook <command> [options]

Commands:
  run [--hours N] [--show-private] [--json]   Collect activity and stage proposals
  review list [pending|approved|rejected|unapplied|all]
  review approve <id|all>                      Approve and apply proposals
  review reject <id|all>                       Reject pending proposals
  review merge <source-theme> <target-theme>   Propose merging two themes
  log <win|blocker|note> <text> [--project P] [--theme T]
  themes [--project P] [--status S]            List roadmap themes
  theme add <project> <name> [--default]
  theme status <theme> <active|paused|done>
  theme remove <theme>
  theme default <theme>
  wins [--days N] [--show-private] [--json]    Report wins from the activity log
  status [--json]                              Active themes and the review queue

Environment:
  DAYBOOK_HOME     data directory (default ~/.daybook)
  DAYBOOK_CONFIG   configuration file (default $DAYBOOK_HOME/config.json)
  DAYBOOK_DEBUG=1  verbose logging on stderr`;

class UsageError extends Error {}

export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string | true>;
}

const VALUE_FLAGS = new Set(["--hours", "--days", "--project", "--theme", "--status"]);

export function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--") {
      positional.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq !== -1) {
      flags.set(arg.slice(0, eq), arg.slice(eq + 1));
    } else if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined) throw new UsageError(`${arg} needs a value`);
      flags.set(arg, value);
      i++;
    } else {
      flags.set(arg, true);
    }
  }

  return { positional, flags };
}

function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags.get(name);
  if (value === true) throw new UsageError(`${name} needs a value`);
  return value;
}

function arg(parsed: ParsedArgs, index: number, what: string): string {
  const value = parsed.positional[index];
  if (value === undefined) throw new UsageError(`Missing ${what}`);
  return value;
}

const FILTERS: readonly ProposalFilter[] = ["pending", "approved", "rejected", "unapplied", "all"];
const STATUSES: readonly ThemeStatus[] = ["active", "paused", "done"];
const KINDS: readonly ManualEntryKind[] = ["win", "blocker", "note"];

function oneOf<T extends string>(allowed: readonly T[], value: string, what: string): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) throw new UsageError(`Unknown ${what} "${value}" (expected ${allowed.join(", ")})`);
  return match;
}

export interface CliIO {
  out: (text: string) => void;
}

const defaultIO: CliIO = { out: (text) => console.log(text) };

function review(ws: Workspace, parsed: ParsedArgs, io: CliIO): number {
  const action = arg(parsed, 1, "review action");
  switch (action) {
    case "list": {
      const filter = oneOf(FILTERS, parsed.positional[2] ?? "pending", "filter");
      io.out(formatProposalList(reviewList(ws, filter), filter));
      return EXIT_OK;
    }
    case "approve": {
      const { results } = reviewApprove(ws, arg(parsed, 2, "proposal id or \"all\""));
      io.out(formatReviewResults(results));
      return hasFailures(results) ? EXIT_FAILURE : EXIT_OK;
    }
    case "reject": {
      const results = reviewReject(ws, arg(parsed, 2, "proposal id or \"all\""));
      io.out(formatReviewResults(results));
      return hasFailures(results) ? EXIT_FAILURE : EXIT_OK;
    }
    case "merge": {
      const proposal = reviewMerge(ws, arg(parsed, 2, "source theme"), arg(parsed, 3, "target theme"));
      io.out(`Staged \`${proposal.id}\` [${proposal.state}] ${describeProposal(proposal)}`);
      return EXIT_OK;
    }
    default:
      throw new UsageError(`Unknown review action "${action}"`);
  }
}

function theme(ws: Workspace, parsed: ParsedArgs, io: CliIO): number {
  const action = arg(parsed, 1, "theme action");
  switch (action) {
    case "add": {
      const added = themeAdd(ws, arg(parsed, 2, "project"), arg(parsed, 3, "theme name"), parsed.flags.has("--default"));
      io.out(`Added theme **${added.name}** \`${added.id}\``);
      return EXIT_OK;
    }
    case "status": {
      const status = oneOf(STATUSES, arg(parsed, 3, "status"), "status");
      themeStatus(ws, arg(parsed, 2, "theme"), status);
      io.out(`Theme ${parsed.positional[2]} is now ${status}`);
      return EXIT_OK;
    }
    case "remove":
      themeRemove(ws, arg(parsed, 2, "theme"));
      io.out(`Removed theme ${parsed.positional[2]}`);
      return EXIT_OK;
    case "default":
      themeDefault(ws, arg(parsed, 2, "theme"));
      io.out(`Theme ${parsed.positional[2]} is now its project's default`);
      return EXIT_OK;
    default:
      throw new UsageError(`Unknown theme action "${action}"`);
  }
}

function dispatch(ws: Workspace, parsed: ParsedArgs, io: CliIO): number {
  const command = parsed.positional[0];
  switch (command) {
    case "run": {
      const hoursFlag = stringFlag(parsed, "--hours");
      const hours = hoursFlag === undefined ? undefined : Number(hoursFlag);
      if (hours !== undefined && !(hours > 0)) throw new UsageError(`--hours must be a positive number (got "${hoursFlag}")`);
      const { config, report } = runCommand(ws, hours);
      io.out(parsed.flags.has("--json")
        ? JSON.stringify(report, null, 2)
        : formatRunReport(report, config, { showPrivate: parsed.flags.has("--show-private") }));
      return EXIT_OK;
    }
    case "review":
      return review(ws, parsed, io);
    case "log": {
      const kind = oneOf(KINDS, arg(parsed, 1, "entry kind"), "entry kind");
      const text = parsed.positional.slice(2).join(" ");
      if (!text.trim()) throw new UsageError("Missing entry text");
      const entry = logEntry(ws, { kind, text, project: stringFlag(parsed, "--project"), theme: stringFlag(parsed, "--theme") });
      io.out(formatManualEntry(entry));
      return EXIT_OK;
    }
    case "themes": {
      const status = stringFlag(parsed, "--status");
      const themes = themesList(ws, {
        projectId: stringFlag(parsed, "--project"),
        status: status === undefined ? undefined : oneOf(STATUSES, status, "status"),
      });
      io.out(formatThemeList(themes, loadRoadmap(ws.dataDir).projects));
      return EXIT_OK;
    }
    case "theme":
      return theme(ws, parsed, io);
    case "wins": {
      const daysFlag = stringFlag(parsed, "--days");
      const days = daysFlag === undefined ? DEFAULT_WINS_DAYS : Number(daysFlag);
      if (!Number.isInteger(days) || days < 1) throw new UsageError(`--days must be a positive whole number (got "${daysFlag}")`);
      const { config, report } = winsCommand(ws, days);
      io.out(parsed.flags.has("--json")
        ? JSON.stringify(report, null, 2)
        : formatWinsReport(report, config, { showPrivate: parsed.flags.has("--show-private") }));
      return EXIT_OK;
    }
    case "status": {
      const status = statusCommand(ws);
      io.out(parsed.flags.has("--json") ? JSON.stringify(status, null, 2) : formatStatus(status));
      return EXIT_OK;
    }
    case undefined:
    case "help":
      io.out(USAGE);
      return command === undefined ? EXIT_USAGE : EXIT_OK;
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

/** Runs one CLI invocation and returns its exit code. */
export function runCli(args: readonly string[], ws: Workspace, io: CliIO = defaultIO): number {
  try {
    const parsed = parseArgs(args);
    if (parsed.flags.has("--debug")) log.setDebugEnabled(true);
    if (parsed.flags.has("--help")) {
      io.out(USAGE);
      return EXIT_OK;
    }
    return dispatch(ws, parsed, io);
  } catch (error) {
    if (error instanceof UsageError) {
      log.error(error.message);
      log.error(`Run "daybook help" for usage.`);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigInvalid) {
      log.error(error.message);
      return EXIT_CONFIG;
    }
    if (error instanceof DaybookError) {
      log.error(error.message);
      return EXIT_FAILURE;
    }
    log.error("Unexpected error:", errorMessage(error));
    log.debug(error);
    return EXIT_FAILURE;
  }
}
