import { z } from "zod";

// Schemas for everything daybook persists. Their outputs must stay assignable
// to the domain types in types.ts; the stores assign them directly.

const isoString = z.string().min(1);

const activityBase = {
  id: z.string().min(1),
  naturalKey: z.string().min(1),
  timestamp: isoString,
  projectId: z.string().nullable(),
  description: z.string(),
};

export const activitySchema = z.discriminatedUnion("source", [
  z.object({
    ...activityBase,
    source: z.literal("filesystem"),
    rawMetadata: z.object({
      directory: z.string(),
      day: z.string(),
      files: z.array(z.string()),
    }),
  }),
  z.object({
    ...activityBase,
    source: z.literal("git"),
    rawMetadata: z.object({
      hash: z.string(),
      author: z.string(),
      email: z.string(),
      subject: z.string(),
      repoPath: z.string(),
      filesChanged: z.array(z.string()),
    }),
  }),
  z.object({
    ...activityBase,
    source: z.literal("claude"),
    rawMetadata: z.object({
      sessionId: z.string(),
      sessionFile: z.string(),
      cwd: z.string(),
      messages: z.number().int().nonnegative(),
      tools: z.record(z.number()),
      filesEdited: z.array(z.string()),
      taskDescriptions: z.array(z.string()),
      durationMinutes: z.number().nullable(),
    }),
  }),
  z.object({
    ...activityBase,
    source: z.literal("manual"),
    rawMetadata: z.object({
      kind: z.enum(["win", "blocker", "note"]),
      project: z.string().optional(),
      theme: z.string().optional(),
    }),
  }),
]);

export const activityLogDaySchema = z.object({
  date: z.string(),
  updatedAt: isoString,
  activities: z.array(activitySchema),
});

export const manualEntrySchema = z.object({
  id: z.string().min(1),
  timestamp: isoString,
  kind: z.enum(["win", "blocker", "note"]),
  text: z.string().min(1),
  project: z.string().optional(),
  theme: z.string().optional(),
});

const themeStatus = z.enum(["active", "paused", "done"]);

const roadmapProjectSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  team: z.string(),
});

export const roadmapSchema = z
  .object({
    version: z.number().int().nonnegative(),
    updatedAt: isoString,
    projects: z.array(roadmapProjectSchema).default([]),
    themes: z
      .array(
        z.object({
          id: z.string().min(1),
          name: z.string().min(1),
          projectId: z.string().min(1),
          status: themeStatus,
          activityCount: z.number().int().nonnegative().default(0),
          updatedAt: isoString,
          isDefault: z.boolean().default(false),
          mergedInto: z.string().nullable().default(null),
        }),
      )
      .default([]),
    notes: z
      .array(
        z.object({
          proposalId: z.string(),
          date: z.string(),
          countsByTheme: z.record(z.number()),
          total: z.number(),
          activityIds: z.array(z.string()).default([]),
        }),
      )
      .default([]),
    appliedProposalIds: z.array(z.string()).default([]),
  })
  .superRefine((roadmap, ctx) => {
    const projectIds = new Set(roadmap.projects.map((p) => p.id));
    for (const theme of roadmap.themes) {
      if (!projectIds.has(theme.projectId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `theme ${theme.id} references unknown project ${theme.projectId}`,
        });
      }
    }
  });

const proposalBase = {
  id: z.string().min(1),
  state: z.enum(["pending", "approved", "rejected"]),
  applied: z.boolean(),
  createdAt: isoString,
  decidedAt: z.string().nullable(),
  appliedAt: z.string().nullable(),
  lastError: z.string().nullable(),
};

export const proposalSchema = z.discriminatedUnion("kind", [
  z.object({
    ...proposalBase,
    kind: z.literal("theme_status_change"),
    payload: z.object({
      themeId: z.string(),
      themeName: z.string(),
      projectId: z.string(),
      from: themeStatus,
      to: themeStatus,
      activityCount: z.number(),
    }),
  }),
  z.object({
    ...proposalBase,
    kind: z.literal("new_theme"),
    payload: z.object({
      project: roadmapProjectSchema,
      name: z.string(),
      activityCount: z.number(),
      sampleDescriptions: z.array(z.string()),
    }),
  }),
  z.object({
    ...proposalBase,
    kind: z.literal("activity_note"),
    payload: z.object({
      date: z.string(),
      countsByTheme: z.record(z.number()),
      total: z.number(),
      activities: z.record(z.string()),
    }),
  }),
  z.object({
    ...proposalBase,
    kind: z.literal("roadmap_merge"),
    payload: z.object({
      projectId: z.string(),
      sourceThemeId: z.string(),
      targetThemeId: z.string(),
    }),
  }),
]);

export const proposalListSchema = z.array(proposalSchema);
