import { pgTable, varchar, timestamp, uuid, uniqueIndex } from 'drizzle-orm/pg-core';

// Users table, keyed by the chat platform's user id
export const users = pgTable('users', {
  id: varchar('id', { length: 64 }).primaryKey(),
  displayName: varchar('display_name', { length: 100 }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// Judge credentials table (one per user and judge)
export const judgeCredentials = pgTable(
  'judge_credentials',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: varchar('user_id', { length: 64 })
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    judge: varchar('judge', { length: 32 }).notNull(),
    username: varchar('username', { length: 255 }).notNull(),
    secretEncrypted: varchar('secret_encrypted', { length: 1000 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userJudgeIdx: uniqueIndex('judge_credentials_user_judge_idx').on(table.userId, table.judge),
  })
);

// Types
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type JudgeCredentialRow = typeof judgeCredentials.$inferSelect;
export type NewJudgeCredentialRow = typeof judgeCredentials.$inferInsert;
