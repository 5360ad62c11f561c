/**
 * External judge boundary.
 *
 * A session is opened per submission with the user's credential; it owns
 * whatever login state the judge needs and must be closed on every path.
 */

import type { PendingState, Verdict } from '@judgebot/shared';

export interface JudgeCredential {
  judge: string;
  username: string;
  secret: string;
}

export interface SubmissionRequest {
  userId: string;
  judge: string;
  problemId: string;
  language: string;
  sourceCode: string;
  displayName?: string;
}

// Opaque run id assigned by the judge
export type SubmissionHandle = string;

export type JudgeStatus =
  | { state: PendingState }
  | {
      state: 'VERDICT';
      verdict: Verdict;
      executionTime: string | null;
      memory: string | null;
    };

export interface JudgeSession {
  /**
   * Upload the source. Throws JudgeUploadError (retryable) or InvalidProblemError.
   */
  submit(request: SubmissionRequest, signal?: AbortSignal): Promise<SubmissionHandle>;
  getStatus(handle: SubmissionHandle, signal?: AbortSignal): Promise<JudgeStatus>;
  close(): Promise<void>;
}

export interface JudgeClient {
  /**
   * Authenticate with the judge. Throws JudgeAuthError when the credential is rejected.
   */
  openSession(credential: JudgeCredential, signal?: AbortSignal): Promise<JudgeSession>;
  problemUrl(judge: string, problemId: string): string;
}

// Judge labels, normalised to upper snake case, mapped onto our states
const STATUS_ALIASES: Record<string, Verdict | PendingState> = {
  ACCEPTED: 'ACCEPTED',
  AC: 'ACCEPTED',
  OK: 'ACCEPTED',
  WRONG_ANSWER: 'WRONG_ANSWER',
  WA: 'WRONG_ANSWER',
  PRESENTATION_ERROR: 'WRONG_ANSWER',
  PE: 'WRONG_ANSWER',
  RUNTIME_ERROR: 'RUNTIME_ERROR',
  RE: 'RUNTIME_ERROR',
  TIME_LIMIT_EXCEEDED: 'TIME_LIMIT_EXCEEDED',
  TLE: 'TIME_LIMIT_EXCEEDED',
  MEMORY_LIMIT_EXCEEDED: 'MEMORY_LIMIT_EXCEEDED',
  MLE: 'MEMORY_LIMIT_EXCEEDED',
  OUTPUT_LIMIT_EXCEEDED: 'OUTPUT_LIMIT_EXCEEDED',
  OLE: 'OUTPUT_LIMIT_EXCEEDED',
  COMPILE_ERROR: 'COMPILE_ERROR',
  COMPILATION_ERROR: 'COMPILE_ERROR',
  CE: 'COMPILE_ERROR',
  SYSTEM_ERROR: 'SYSTEM_ERROR',
  SE: 'SYSTEM_ERROR',
  SUBMIT_FAILED: 'SYSTEM_ERROR',
  PENDING: 'PENDING',
  QUEUING: 'PENDING',
  SUBMITTED: 'PENDING',
  WAITING: 'PENDING',
  JUDGING: 'JUDGING',
  RUNNING: 'JUDGING',
  COMPILING: 'JUDGING',
  TESTING: 'JUDGING',
};

/**
 * Map a raw judge label ("Accepted", "Wrong_Answer", "TLE", ...) onto a state.
 * Returns null for labels we do not recognise.
 */
export function normalizeJudgeStatus(label: string): Verdict | PendingState | null {
  const key = label
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return STATUS_ALIASES[key] ?? null;
}
