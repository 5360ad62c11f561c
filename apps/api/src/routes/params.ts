import { z } from 'zod';

// Opaque platform user id (a chat snowflake, for instance)
export const userIdSchema = z.string().trim().min(1).max(64);

// Judge names as VJudge spells them: "CodeForces", "AtCoder", "UVA"
export const judgeSchema = z
  .string()
  .trim()
  .min(1)
  .max(32)
  .regex(/^[A-Za-z0-9_]+$/, 'Judge name may only contain letters, digits and underscores');

export const problemIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_.-]+$/, 'Problem id may only contain letters, digits, dots, dashes and underscores');
