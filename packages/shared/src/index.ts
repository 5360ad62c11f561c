import type { Verdict } from './types';

// Re-export all types
export * from './types';

// Constants
export const VERDICTS = [
  'ACCEPTED',
  'WRONG_ANSWER',
  'RUNTIME_ERROR',
  'TIME_LIMIT_EXCEEDED',
  'MEMORY_LIMIT_EXCEEDED',
  'OUTPUT_LIMIT_EXCEEDED',
  'COMPILE_ERROR',
  'SYSTEM_ERROR',
] as const satisfies readonly Verdict[];

const VERDICT_LABELS: Record<Verdict, string> = {
  ACCEPTED: 'Accepted',
  WRONG_ANSWER: 'Wrong Answer',
  RUNTIME_ERROR: 'Runtime Error',
  TIME_LIMIT_EXCEEDED: 'Time Limit Exceeded',
  MEMORY_LIMIT_EXCEEDED: 'Memory Limit Exceeded',
  OUTPUT_LIMIT_EXCEEDED: 'Output Limit Exceeded',
  COMPILE_ERROR: 'Compilation Error',
  SYSTEM_ERROR: 'System Error',
};

// Utility functions
export function formatVerdict(verdict: Verdict): string {
  return VERDICT_LABELS[verdict];
}

export function formatSolveCount(count: number): string {
  return `${count} solve${count === 1 ? '' : 's'}`;
}

export function formatProblemCode(judge: string, problemId: string): string {
  return `${judge}-${problemId}`;
}
