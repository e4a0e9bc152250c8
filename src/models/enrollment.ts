import { z } from "zod";
import { idField, timestamp, type Draft } from "./entity";

export const MEMBERSHIP_TYPES = ["student", "instructor", "assistant"] as const;
export type MembershipType = (typeof MEMBERSHIP_TYPES)[number];

export const enrollmentSchema = z.object({
  id: idField,
  userId: idField,
  programId: idField,
  enrolled: z.boolean().default(true),
  enrollmentDate: timestamp,
  currentRankId: z.string().nullable().default(null),
  rankDate: timestamp.nullable().default(null),
  isActive: z.boolean().default(true),
  membershipType: z.enum(MEMBERSHIP_TYPES).default("student"),
  createdAt: timestamp,
  updatedAt: timestamp,
});

export type Enrollment = z.infer<typeof enrollmentSchema>;
export type EnrollmentDraft = Draft<typeof enrollmentSchema>;

export const enrollmentKey = (userId: string, programId: string) => `${userId}:${programId}`;
