import { pgTable, uuid, varchar, timestamp, pgEnum, index } from 'drizzle-orm/pg-core';
import { VERDICTS } from '@judgebot/shared';

import { users } from './users';

// Verdict enum
export const verdictEnum = pgEnum('verdict', VERDICTS);

// Solve records table; the judge's run id is the dedup key
export const solveRecords = pgTable(
  'solve_records',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    submissionHandle: varchar('submission_handle', { length: 128 }).notNull().unique(),
    userId: varchar('user_id', { length: 64 })
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    judge: varchar('judge', { length: 32 }).notNull(),
    problemId: varchar('problem_id', { length: 64 }).notNull(),
    language: varchar('language', { length: 100 }).notNull(),
    verdict: verdictEnum('verdict').notNull(),
    executionTime: varchar('execution_time', { length: 32 }),
    memory: varchar('memory', { length: 32 }),
    submittedAt: timestamp('submitted_at', { withTimezone: true }).notNull(),
    recordedAt: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userVerdictIdx: index('solve_records_user_verdict_idx').on(table.userId, table.verdict),
  })
);

// Types
export type SolveRecordRow = typeof solveRecords.$inferSelect;
export type NewSolveRecordRow = typeof solveRecords.$inferInsert;
