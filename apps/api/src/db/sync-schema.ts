import 'dotenv/config';
import { VERDICTS } from '@judgebot/shared';
import { Pool } from 'pg';

import { env } from '../lib/env';
import { logger } from '../lib/logger';

/**
 * Create or update the tables idempotently. Safe to run on every deploy.
 */
export async function syncSchema(pool: Pool): Promise<void> {
  const verdictList = VERDICTS.map((verdict) => `'${verdict}'`).join(', ');

  // Create enums
  await pool.query(`
    DO $$ BEGIN
      CREATE TYPE verdict AS ENUM(${verdictList});
    EXCEPTION WHEN duplicate_object THEN null;
    END $$;
  `);

  for (const verdict of VERDICTS) {
    await pool.query(`ALTER TYPE verdict ADD VALUE IF NOT EXISTS '${verdict}'`);
  }

  // Create tables
  await pool.query(`
    CREATE TABLE IF NOT EXISTS users (
      id VARCHAR(64) PRIMARY KEY,
      display_name VARCHAR(100),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS judge_credentials (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      user_id VARCHAR(64) NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      judge VARCHAR(32) NOT NULL,
      username VARCHAR(255) NOT NULL,
      secret_encrypted VARCHAR(1000) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE UNIQUE INDEX IF NOT EXISTS judge_credentials_user_judge_idx
      ON judge_credentials (user_id, judge);

    CREATE TABLE IF NOT EXISTS solve_records (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      submission_handle VARCHAR(128) NOT NULL UNIQUE,
      user_id VARCHAR(64) NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      judge VARCHAR(32) NOT NULL,
      problem_id VARCHAR(64) NOT NULL,
      language VARCHAR(100) NOT NULL,
      verdict verdict NOT NULL,
      execution_time VARCHAR(32),
      memory VARCHAR(32),
      submitted_at TIMESTAMPTZ NOT NULL,
      recorded_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS solve_records_user_verdict_idx
      ON solve_records (user_id, verdict);
  `);
}

async function main() {
  logger.info('Starting database schema sync...');

  const pool = new Pool({ connectionString: env.DATABASE_URL });

  try {
    await syncSchema(pool);
    logger.info('✅ Schema sync completed successfully');
  } catch (error) {
    logger.error({ err: error }, '❌ Schema sync failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ err }, 'Schema sync crashed');
    process.exit(1);
  });
}
