/**
 * Credential Store
 *
 * Per-user judge credentials, one per (user, judge). Saving again overwrites
 * atomically. Secrets are sealed before they reach the database and are only
 * handed back through `get`, which the submission coordinator uses.
 */

import { and, asc, eq } from 'drizzle-orm';
import type { LinkedJudge } from '@judgebot/shared';

import type { Database } from '../db';
import { judgeCredentials, users } from '../db/schema';
import type { JudgeCredential } from './judge-client';
import type { SecretBox } from './secret-box';

export interface CredentialStore {
  save(
    userId: string,
    judge: string,
    username: string,
    secret: string,
    displayName?: string
  ): Promise<void>;
  // null means the user never linked this judge
  get(userId: string, judge: string): Promise<JudgeCredential | null>;
  remove(userId: string, judge: string): Promise<boolean>;
  listJudges(userId: string): Promise<LinkedJudge[]>;
  // Upsert the name the leaderboard shows for the user
  setDisplayName(userId: string, displayName: string): Promise<void>;
}

export class DrizzleCredentialStore implements CredentialStore {
  constructor(
    private readonly db: Database,
    private readonly secrets: SecretBox
  ) {}

  async save(
    userId: string,
    judge: string,
    username: string,
    secret: string,
    displayName?: string
  ): Promise<void> {
    const secretEncrypted = this.secrets.seal(secret);

    await this.db.transaction(async (tx) => {
      if (displayName) {
        await tx
          .insert(users)
          .values({ id: userId, displayName })
          .onConflictDoUpdate({ target: users.id, set: { displayName } });
      } else {
        await tx.insert(users).values({ id: userId }).onConflictDoNothing();
      }

      await tx
        .insert(judgeCredentials)
        .values({ userId, judge, username, secretEncrypted })
        .onConflictDoUpdate({
          target: [judgeCredentials.userId, judgeCredentials.judge],
          set: { username, secretEncrypted, updatedAt: new Date() },
        });
    });
  }

  async get(userId: string, judge: string): Promise<JudgeCredential | null> {
    const [row] = await this.db
      .select({
        judge: judgeCredentials.judge,
        username: judgeCredentials.username,
        secretEncrypted: judgeCredentials.secretEncrypted,
      })
      .from(judgeCredentials)
      .where(and(eq(judgeCredentials.userId, userId), eq(judgeCredentials.judge, judge)))
      .limit(1);

    if (!row) return null;

    return {
      judge: row.judge,
      username: row.username,
      secret: this.secrets.open(row.secretEncrypted),
    };
  }

  async remove(userId: string, judge: string): Promise<boolean> {
    const deleted = await this.db
      .delete(judgeCredentials)
      .where(and(eq(judgeCredentials.userId, userId), eq(judgeCredentials.judge, judge)))
      .returning({ id: judgeCredentials.id });

    return deleted.length > 0;
  }

  async listJudges(userId: string): Promise<LinkedJudge[]> {
    const rows = await this.db
      .select({
        judge: judgeCredentials.judge,
        username: judgeCredentials.username,
        updatedAt: judgeCredentials.updatedAt,
      })
      .from(judgeCredentials)
      .where(eq(judgeCredentials.userId, userId))
      .orderBy(asc(judgeCredentials.judge));

    return rows.map((row) => ({
      judge: row.judge,
      username: row.username,
      linkedAt: row.updatedAt.toISOString(),
    }));
  }

  async setDisplayName(userId: string, displayName: string): Promise<void> {
    await this.db
      .insert(users)
      .values({ id: userId, displayName })
      .onConflictDoUpdate({ target: users.id, set: { displayName } });
  }
}

interface StoredCredential extends JudgeCredential {
  linkedAt: Date;
}

export class InMemoryCredentialStore implements CredentialStore {
  private readonly credentials = new Map<string, StoredCredential>();
  readonly displayNames = new Map<string, string>();

  private key(userId: string, judge: string): string {
    return `${userId}\u0000${judge}`;
  }

  async save(
    userId: string,
    judge: string,
    username: string,
    secret: string,
    displayName?: string
  ): Promise<void> {
    if (displayName) {
      this.displayNames.set(userId, displayName);
    }
    this.credentials.set(this.key(userId, judge), { judge, username, secret, linkedAt: new Date() });
  }

  async get(userId: string, judge: string): Promise<JudgeCredential | null> {
    const stored = this.credentials.get(this.key(userId, judge));
    if (!stored) return null;
    return { judge: stored.judge, username: stored.username, secret: stored.secret };
  }

  async remove(userId: string, judge: string): Promise<boolean> {
    return this.credentials.delete(this.key(userId, judge));
  }

  async listJudges(userId: string): Promise<LinkedJudge[]> {
    const prefix = `${userId}\u0000`;
    return Array.from(this.credentials.entries())
      .filter(([key]) => key.startsWith(prefix))
      .map(([, stored]) => ({
        judge: stored.judge,
        username: stored.username,
        linkedAt: stored.linkedAt.toISOString(),
      }))
      .sort((a, b) => a.judge.localeCompare(b.judge));
  }

  async setDisplayName(userId: string, displayName: string): Promise<void> {
    this.displayNames.set(userId, displayName);
  }
}
