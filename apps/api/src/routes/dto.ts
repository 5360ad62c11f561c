import type { LeaderboardEntryDto, SolveRecordDto } from '@judgebot/shared';

import type { LeaderboardEntry, SolveRecord } from '../lib/results-store';

export function toSolveRecordDto(record: SolveRecord): SolveRecordDto {
  return {
    submissionHandle: record.submissionHandle,
    userId: record.userId,
    judge: record.judge,
    problemId: record.problemId,
    language: record.language,
    verdict: record.verdict,
    executionTime: record.executionTime,
    memory: record.memory,
    submittedAt: record.submittedAt.toISOString(),
  };
}

export function toLeaderboardEntryDto(entry: LeaderboardEntry): LeaderboardEntryDto {
  return {
    rank: entry.rank,
    userId: entry.userId,
    displayName: entry.displayName,
    solved: entry.solved,
    firstAcceptedAt: entry.firstAcceptedAt.toISOString(),
  };
}
