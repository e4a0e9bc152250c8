import { z } from "zod";
import { idField, timestamp, type Draft } from "./entity";

export const PROGRESS_TYPES = ["session", "form", "technique", "assessment", "note"] as const;
export type ProgressType = (typeof PROGRESS_TYPES)[number];

const fraction = z.number().min(0).max(1);

export const programProgressSchema = z.object({
  id: idField,
  userId: idField,
  programId: idField,
  sessionId: z.string().nullable().default(null),
  rankId: z.string().nullable().default(null),
  formId: z.string().nullable().default(null),
  techniqueId: z.string().nullable().default(null),
  progressType: z.enum(PROGRESS_TYPES).default("session"),
  durationSec: z.number().nonnegative().default(0),
  score: z.number().nullable().default(null),
  notes: z.string().default(""),
  timestamp: timestamp,
  createdAt: timestamp,
  updatedAt: timestamp,
});

export type ProgramProgress = z.infer<typeof programProgressSchema>;
export type ProgramProgressDraft = Omit<Draft<typeof programProgressSchema>, "timestamp"> & { timestamp?: number };

export const rankProgressSchema = z.object({
  id: idField,
  userId: idField,
  programId: idField,
  rankId: idField,
  overallProgress: fraction.default(0),
  itemCompletion: z.record(fraction).default({}),
  itemNotes: z.record(z.string()).default({}),
  createdAt: timestamp,
  updatedAt: timestamp,
});

export type RankProgress = z.infer<typeof rankProgressSchema>;

export const rankProgressPatchSchema = z.object({
  overallProgress: fraction.optional(),
  itemCompletion: z.record(fraction).optional(),
  itemNotes: z.record(z.string()).optional(),
});

export type RankProgressPatch = z.infer<typeof rankProgressPatchSchema>;

export const rankProgressId = (userId: string, programId: string, rankId: string) => `${userId}_${programId}_${rankId}`;
