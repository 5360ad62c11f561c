/**
 * Results Store
 *
 * Durable solve records and the leaderboard derived from them. A record is
 * keyed by the judge's run id: appending the same run twice stores it once.
 * Leaderboards are computed on every read, never cached, so a fresh accepted
 * solve shows up immediately.
 *
 * Ranking: distinct accepted (judge, problem) pairs per user, descending;
 * ties go to the earlier first accepted submission, then to the user id.
 */

import { and, asc, desc, eq, sql } from 'drizzle-orm';
import type { Verdict } from '@judgebot/shared';

import type { Database } from '../db';
import { solveRecords, users } from '../db/schema';
import type { SubmissionHandle } from './judge-client';

export interface SolveRecord {
  submissionHandle: SubmissionHandle;
  userId: string;
  judge: string;
  problemId: string;
  language: string;
  verdict: Verdict;
  executionTime: string | null;
  memory: string | null;
  submittedAt: Date;
}

export interface LeaderboardEntry {
  rank: number;
  userId: string;
  displayName: string;
  solved: number;
  firstAcceptedAt: Date;
}

export interface ResultsStore {
  // Returns false when a record for this run already exists
  append(record: SolveRecord): Promise<boolean>;
  leaderboard(judge?: string): Promise<LeaderboardEntry[]>;
  solvedCount(userId: string, judge?: string): Promise<number>;
  history(userId: string, limit: number): Promise<SolveRecord[]>;
}

function compareEntries(
  a: Omit<LeaderboardEntry, 'rank'>,
  b: Omit<LeaderboardEntry, 'rank'>
): number {
  if (a.solved !== b.solved) return b.solved - a.solved;
  const byTime = a.firstAcceptedAt.getTime() - b.firstAcceptedAt.getTime();
  if (byTime !== 0) return byTime;
  if (a.userId === b.userId) return 0;
  return a.userId < b.userId ? -1 : 1;
}

/**
 * Aggregate solve records into an ordered leaderboard.
 */
export function rankLeaderboard(
  records: Iterable<SolveRecord>,
  displayNames: ReadonlyMap<string, string>,
  judge?: string
): LeaderboardEntry[] {
  const byUser = new Map<string, { problems: Set<string>; firstAcceptedAt: Date }>();

  for (const record of records) {
    if (record.verdict !== 'ACCEPTED') continue;
    if (judge && record.judge !== judge) continue;

    const current = byUser.get(record.userId);
    const problemKey = `${record.judge}\u0000${record.problemId}`;
    if (!current) {
      byUser.set(record.userId, {
        problems: new Set([problemKey]),
        firstAcceptedAt: record.submittedAt,
      });
      continue;
    }

    current.problems.add(problemKey);
    if (record.submittedAt < current.firstAcceptedAt) {
      current.firstAcceptedAt = record.submittedAt;
    }
  }

  return Array.from(byUser.entries())
    .map(([userId, stats]) => ({
      userId,
      displayName: displayNames.get(userId) ?? userId,
      solved: stats.problems.size,
      firstAcceptedAt: stats.firstAcceptedAt,
    }))
    .sort(compareEntries)
    .map((entry, index) => ({ rank: index + 1, ...entry }));
}

export class DrizzleResultsStore implements ResultsStore {
  constructor(private readonly db: Database) {}

  async append(record: SolveRecord): Promise<boolean> {
    const inserted = await this.db
      .insert(solveRecords)
      .values(record)
      .onConflictDoNothing({ target: solveRecords.submissionHandle })
      .returning({ id: solveRecords.id });

    return inserted.length > 0;
  }

  async leaderboard(judge?: string): Promise<LeaderboardEntry[]> {
    const solved = sql<number>`count(distinct (${solveRecords.judge}, ${solveRecords.problemId}))::int`;
    const firstAcceptedAt = sql<Date>`min(${solveRecords.submittedAt})`;

    const rows = await this.db
      .select({
        userId: solveRecords.userId,
        displayName: users.displayName,
        solved,
        firstAcceptedAt,
      })
      .from(solveRecords)
      .innerJoin(users, eq(users.id, solveRecords.userId))
      .where(
        and(
          eq(solveRecords.verdict, 'ACCEPTED'),
          judge ? eq(solveRecords.judge, judge) : undefined
        )
      )
      .groupBy(solveRecords.userId, users.displayName)
      .orderBy(desc(solved), asc(firstAcceptedAt), asc(solveRecords.userId));

    return rows.map((row, index) => ({
      rank: index + 1,
      userId: row.userId,
      displayName: row.displayName ?? row.userId,
      solved: Number(row.solved),
      firstAcceptedAt: new Date(row.firstAcceptedAt),
    }));
  }

  async solvedCount(userId: string, judge?: string): Promise<number> {
    const [row] = await this.db
      .select({
        solved: sql<number>`count(distinct (${solveRecords.judge}, ${solveRecords.problemId}))::int`,
      })
      .from(solveRecords)
      .where(
        and(
          eq(solveRecords.userId, userId),
          eq(solveRecords.verdict, 'ACCEPTED'),
          judge ? eq(solveRecords.judge, judge) : undefined
        )
      );

    return Number(row?.solved ?? 0);
  }

  async history(userId: string, limit: number): Promise<SolveRecord[]> {
    const rows = await this.db
      .select()
      .from(solveRecords)
      .where(eq(solveRecords.userId, userId))
      .orderBy(desc(solveRecords.submittedAt))
      .limit(limit);

    return rows.map((row) => ({
      submissionHandle: row.submissionHandle,
      userId: row.userId,
      judge: row.judge,
      problemId: row.problemId,
      language: row.language,
      verdict: row.verdict,
      executionTime: row.executionTime,
      memory: row.memory,
      submittedAt: row.submittedAt,
    }));
  }
}

export class InMemoryResultsStore implements ResultsStore {
  private readonly records = new Map<SubmissionHandle, SolveRecord>();

  constructor(private readonly displayNames: ReadonlyMap<string, string> = new Map()) {}

  async append(record: SolveRecord): Promise<boolean> {
    if (this.records.has(record.submissionHandle)) {
      return false;
    }
    this.records.set(record.submissionHandle, { ...record });
    return true;
  }

  async leaderboard(judge?: string): Promise<LeaderboardEntry[]> {
    return rankLeaderboard(this.records.values(), this.displayNames, judge);
  }

  async solvedCount(userId: string, judge?: string): Promise<number> {
    const entry = rankLeaderboard(this.records.values(), this.displayNames, judge).find(
      (candidate) => candidate.userId === userId
    );
    return entry?.solved ?? 0;
  }

  async history(userId: string, limit: number): Promise<SolveRecord[]> {
    return Array.from(this.records.values())
      .filter((record) => record.userId === userId)
      .sort((a, b) => b.submittedAt.getTime() - a.submittedAt.getTime())
      .slice(0, limit);
  }

  size(): number {
    return this.records.size;
  }
}
