import type { EnrollmentRepository } from "../repositories/enrollmentRepository";
import type { ProgressRepository, TimeRange } from "../repositories/progressRepository";
import type { RankProgressRepository } from "../repositories/rankProgressRepository";
import type { ProgramProgress } from "../models/progress";

export type UserProgramAnalytics = {
  totalSessions: number;
  totalPracticeSec: number;
  averageSessionSec: number;
  currentRankId: string | null;
  currentRankProgress: number;
  recentActivity: ProgramProgress[];
};

export type ProgramAnalytics = {
  enrolledCount: number;
  rankDistribution: Record<string, number>;
  dailyActivity: Record<string, number>;
  averageDurationSec: number;
};

const RECENT_ACTIVITY = 10;

export const utcDay = (ms: number) => new Date(ms).toISOString().slice(0, 10);

export class ProgressAnalytics {
  constructor(
    private readonly deps: {
      enrollments: EnrollmentRepository;
      progress: ProgressRepository;
      rankProgress: RankProgressRepository;
    },
  ) {}

  async userProgramAnalytics(userId: string, programId: string): Promise<UserProgramAnalytics> {
    const [records, enrollment] = await Promise.all([
      this.deps.progress.listForUser(userId, programId),
      this.deps.enrollments.findActive(userId, programId),
    ]);
    const totalPracticeSec = records.reduce((sum, r) => sum + r.durationSec, 0);
    const currentRankId = enrollment?.currentRankId ?? null;
    const rankProgress = currentRankId ? await this.deps.rankProgress.get(userId, programId, currentRankId) : null;
    return {
      totalSessions: records.length,
      totalPracticeSec,
      averageSessionSec: records.length > 0 ? totalPracticeSec / records.length : 0,
      currentRankId,
      currentRankProgress: rankProgress?.overallProgress ?? 0,
      recentActivity: records.slice(0, RECENT_ACTIVITY),
    };
  }

  async programAnalytics(programId: string, range: TimeRange = {}): Promise<ProgramAnalytics> {
    const [enrollments, records] = await Promise.all([
      this.deps.enrollments.listForProgram(programId),
      this.deps.progress.listForProgram(programId, range),
    ]);
    const enrolled = enrollments.filter(e => e.enrolled);
    const rankDistribution: Record<string, number> = {};
    for (const e of enrolled) {
      if (!e.currentRankId) continue;
      rankDistribution[e.currentRankId] = (rankDistribution[e.currentRankId] ?? 0) + 1;
    }
    const dailyActivity: Record<string, number> = {};
    for (const r of records) {
      const day = utcDay(r.timestamp);
      dailyActivity[day] = (dailyActivity[day] ?? 0) + 1;
    }
    const totalSec = records.reduce((sum, r) => sum + r.durationSec, 0);
    return {
      enrolledCount: enrolled.length,
      rankDistribution,
      dailyActivity,
      averageDurationSec: records.length > 0 ? totalSec / records.length : 0,
    };
  }
}
