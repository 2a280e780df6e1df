#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";

import {
  DEFAULT_WINS_DAYS, defaultWorkspace, logEntry, reviewApprove, reviewList, reviewMerge, reviewReject, runCommand,
  statusCommand, themeAdd, themeDefault, themeRemove, themesList, themeStatus, winsCommand,
} from "./services/commands.js";
import { DaybookError, errorMessage } from "./services/errors.js";
import {
  describeProposal, formatManualEntry, formatProposalList, formatReviewResults, formatRunReport, formatStatus,
  formatThemeList, formatWinsReport,
} from "./services/format.js";
import * as log from "./services/log.js";
import { hasFailures } from "./services/review.js";
import { loadRoadmap } from "./services/roadmap.js";

type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

const ws = defaultWorkspace();

/** Runs a tool body; daybook errors become an error result instead of a protocol failure. */
function respond(body: () => string | { text: string; isError: boolean }): ToolResult {
  try {
    const result = body();
    return typeof result === "string"
      ? { content: [{ type: "text", text: result }] }
      : { content: [{ type: "text", text: result.text }], isError: result.isError };
  } catch (error) {
    if (!(error instanceof DaybookError)) log.error("Tool failed:", error);
    return { content: [{ type: "text", text: `❌ ${errorMessage(error)}` }], isError: true };
  }
}

const READ_ONLY = { readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false };

const server = new McpServer({
  name: "daybook-mcp-server",
  version: "0.1.0",
});

// ============================================================
// TOOL: daybook_run
// ============================================================
server.registerTool(
  "daybook_run",
  {
    title: "Collect Daily Activity",
    description: `Collect work activity from project folders, git history, coding-assistant sessions and the manual log for the look-back window, record it in the daily activity log, and stage roadmap proposals for review. Sources that cannot be read are reported as warnings; the run still completes.`,
    inputSchema: {
      hours: z.number().positive().max(24 * 31).optional().describe("Look-back window in hours (defaults to lookback_hours from config)"),
      show_private: z.boolean().default(false).describe("Show names and descriptions of private projects"),
    },
    annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: false },
  },
  async ({ hours, show_private }) =>
    respond(() => {
      const { config, report } = runCommand(ws, hours);
      return formatRunReport(report, config, { showPrivate: show_private });
    })
);

// ============================================================
// TOOL: daybook_review_list
// ============================================================
server.registerTool(
  "daybook_review_list",
  {
    title: "List Proposals",
    description: `List staged roadmap proposals in creation order. Filter by state, or use "unapplied" for approved proposals whose apply failed.`,
    inputSchema: {
      filter: z.enum(["pending", "approved", "rejected", "unapplied", "all"]).default("pending").describe("Which proposals to show"),
    },
    annotations: READ_ONLY,
  },
  async ({ filter }) => respond(() => formatProposalList(reviewList(ws, filter), filter))
);

// ============================================================
// TOOL: daybook_review_approve / daybook_review_reject
// ============================================================
server.registerTool(
  "daybook_review_approve",
  {
    title: "Approve Proposals",
    description: `Approve a proposal by id, or "all" pending ones, and apply it to the roadmap. A proposal whose apply conflicts with the current roadmap stays approved but unapplied; approving it again retries.`,
    inputSchema: {
      target: z.string().min(1).describe('Proposal id (p_...) or "all"'),
    },
    annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: false },
  },
  async ({ target }) =>
    respond(() => {
      const { results } = reviewApprove(ws, target);
      return { text: formatReviewResults(results), isError: hasFailures(results) };
    })
);

server.registerTool(
  "daybook_review_reject",
  {
    title: "Reject Proposals",
    description: `Reject a pending proposal by id, or "all" pending ones. Rejected proposals never touch the roadmap.`,
    inputSchema: {
      target: z.string().min(1).describe('Proposal id (p_...) or "all"'),
    },
    annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: false },
  },
  async ({ target }) =>
    respond(() => {
      const results = reviewReject(ws, target);
      return { text: formatReviewResults(results), isError: hasFailures(results) };
    })
);

// ============================================================
// TOOL: daybook_review_merge
// ============================================================
server.registerTool(
  "daybook_review_merge",
  {
    title: "Propose Theme Merge",
    description: `Stage a proposal that merges one theme into another of the same project. Nothing changes until the proposal is approved.`,
    inputSchema: {
      source: z.string().min(1).describe("Theme id or name to fold away"),
      target: z.string().min(1).describe("Theme id or name that absorbs it"),
    },
    annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: false },
  },
  async ({ source, target }) =>
    respond(() => {
      const proposal = reviewMerge(ws, source, target);
      return `📋 Staged \`${proposal.id}\` [${proposal.state}] ${describeProposal(proposal)}`;
    })
);

// ============================================================
// TOOL: daybook_log
// ============================================================
server.registerTool(
  "daybook_log",
  {
    title: "Log Win, Blocker or Note",
    description: `Record a manual entry. It is picked up by the next run as a manual activity, attributed to the given project and theme when they exist.`,
    inputSchema: {
      kind: z.enum(["win", "blocker", "note"]).describe("Entry kind"),
      text: z.string().min(1).max(1000).describe("What happened"),
      project: z.string().optional().describe("Project id or name"),
      theme: z.string().optional().describe("Theme id or name"),
    },
    annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false },
  },
  async ({ kind, text, project, theme }) => respond(() => formatManualEntry(logEntry(ws, { kind, text, project, theme })))
);

// ============================================================
// TOOL: daybook_themes
// ============================================================
server.registerTool(
  "daybook_themes",
  {
    title: "List Themes",
    description: `List roadmap themes with their status and activity counts, grouped by project.`,
    inputSchema: {
      project: z.string().optional().describe("Only themes of this project id"),
      status: z.enum(["active", "paused", "done"]).optional().describe("Only themes with this status"),
    },
    annotations: READ_ONLY,
  },
  async ({ project, status }) =>
    respond(() => formatThemeList(themesList(ws, { projectId: project, status }), loadRoadmap(ws.dataDir).projects))
);

// ============================================================
// TOOL: daybook_theme_edit
// ============================================================
server.registerTool(
  "daybook_theme_edit",
  {
    title: "Edit Theme",
    description: `Edit the roadmap directly: add a theme to a configured project, change a theme's status, remove it, or make it its project's default (untracked) theme.`,
    inputSchema: {
      action: z.enum(["add", "status", "remove", "default"]).describe("Edit to make"),
      theme: z.string().min(1).describe("Theme name for add; theme id or name otherwise"),
      project: z.string().optional().describe("Project id or name (required for add)"),
      status: z.enum(["active", "paused", "done"]).optional().describe("New status (required for status)"),
      is_default: z.boolean().default(false).describe("For add: make the new theme the project's default"),
    },
    annotations: { readOnlyHint: false, destructiveHint: true, idempotentHint: false, openWorldHint: false },
  },
  async ({ action, theme, project, status, is_default }) =>
    respond(() => {
      switch (action) {
        case "add": {
          if (!project) return { text: "❌ `project` is required to add a theme.", isError: true };
          const added = themeAdd(ws, project, theme, is_default);
          return `✅ Added theme **${added.name}** \`${added.id}\``;
        }
        case "status":
          if (!status) return { text: "❌ `status` is required.", isError: true };
          themeStatus(ws, theme, status);
          return `✅ Theme ${theme} is now ${status}`;
        case "remove":
          themeRemove(ws, theme);
          return `🗑️ Removed theme ${theme}`;
        case "default":
          themeDefault(ws, theme);
          return `✅ Theme ${theme} is now its project's default`;
      }
    })
);

// ============================================================
// TOOL: daybook_wins
// ============================================================
server.registerTool(
  "daybook_wins",
  {
    title: "Report Wins",
    description: `Pick out wins from the recorded activity of the last few days: hand-logged wins, milestone commits, coding-assistant sessions that touched many files or tasks, and projects with sustained work. Shows the top three per project.`,
    inputSchema: {
      days: z.number().int().positive().max(366).default(DEFAULT_WINS_DAYS).describe("Local days to look back, today included"),
      show_private: z.boolean().default(false).describe("Show names and descriptions of private projects"),
    },
    annotations: READ_ONLY,
  },
  async ({ days, show_private }) =>
    respond(() => {
      const { config, report } = winsCommand(ws, days);
      return formatWinsReport(report, config, { showPrivate: show_private });
    })
);

// ============================================================
// TOOL: daybook_status
// ============================================================
server.registerTool(
  "daybook_status",
  {
    title: "Roadmap Status",
    description: `Show the active roadmap themes with their teams and activity counts, and how many proposals wait for review.`,
    inputSchema: {},
    annotations: READ_ONLY,
  },
  async () => respond(() => formatStatus(statusCommand(ws)))
);

// ============================================================
// Start server
// ============================================================

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection in daybook MCP server:", reason);
});

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info(`MCP server running (stdio), data dir ${ws.dataDir}`);
}

main().catch((error) => {
  log.error("Fatal error:", error);
  process.exit(1);
});
