import { z } from "zod";
import { idField, timestamp, type Draft } from "./entity";

export const PROGRAM_CATEGORIES = [
  "kung_fu",
  "youth_kung_fu",
  "tai_chi",
  "meditation",
  "self_defense",
  "weapons_forms",
  "conditioning",
  "demonstration",
  "competition",
] as const;

export const PROGRAM_ACCESS_LEVELS = [
  "free_public",
  "subscription_required",
  "studio_member_discount",
  "user_private",
] as const;

export type ProgramCategory = (typeof PROGRAM_CATEGORIES)[number];
export type ProgramAccessLevel = (typeof PROGRAM_ACCESS_LEVELS)[number];

export const rankSchema = z.object({
  id: idField,
  name: z.string().trim().min(1),
  ordinal: z.number().int().nonnegative(),
  color: z.string().default(""),
  description: z.string().default(""),
  // Curriculum item ids that must be completed before promotion.
  requirements: z.array(z.string()).default([]),
  stripes: z.number().int().nonnegative().default(0),
});

export type Rank = z.infer<typeof rankSchema>;
export type RankInput = z.input<typeof rankSchema>;

export const programSchema = z
  .object({
    id: idField,
    name: z.string().trim().min(1),
    description: z.string().default(""),
    category: z.enum(PROGRAM_CATEGORIES),
    accessLevel: z.enum(PROGRAM_ACCESS_LEVELS).default("free_public"),
    ranks: z.array(rankSchema).default([]),
    isActive: z.boolean().default(true),
    instructorIds: z.array(z.string()).default([]),
    createdAt: timestamp,
    updatedAt: timestamp,
  })
  .superRefine((program, ctx) => {
    const ids = new Set<string>();
    const ordinals = new Set<number>();
    program.ranks.forEach((rank, i) => {
      if (ids.has(rank.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["ranks", i, "id"], message: `duplicate rank id ${rank.id}` });
      }
      if (ordinals.has(rank.ordinal)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["ranks", i, "ordinal"], message: `duplicate rank ordinal ${rank.ordinal}` });
      }
      ids.add(rank.id);
      ordinals.add(rank.ordinal);
    });
  });

export type Program = z.infer<typeof programSchema>;
export type ProgramDraft = Draft<typeof programSchema>;

export function sortedRanks(program: Program): Rank[] {
  return [...program.ranks].sort((a, b) => a.ordinal - b.ordinal);
}
