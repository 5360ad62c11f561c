// Verdict Types
export type Verdict =
  | 'ACCEPTED'
  | 'WRONG_ANSWER'
  | 'RUNTIME_ERROR'
  | 'TIME_LIMIT_EXCEEDED'
  | 'MEMORY_LIMIT_EXCEEDED'
  | 'OUTPUT_LIMIT_EXCEEDED'
  | 'COMPILE_ERROR'
  | 'SYSTEM_ERROR';

// Non-terminal states reported while the judge is still working
export type PendingState = 'PENDING' | 'JUDGING';

// Failure Types
export type FailureReason =
  | 'NOT_FOUND'
  | 'AUTH_FAILURE'
  | 'UPLOAD_FAILURE'
  | 'INVALID_PROBLEM'
  | 'BUSY'
  | 'TIMED_OUT'
  | 'CANCELLED';

// Credential Types
export interface LinkedJudge {
  judge: string;
  username: string;
  linkedAt: string;
}

export interface LinkCredentialRequest {
  username: string;
  secret: string;
  displayName?: string;
}

// Submission Types
export interface SubmitRequest {
  userId: string;
  judge: string;
  problemId: string;
  language: string;
  code: string;
  displayName?: string;
}

export interface SolveRecordDto {
  submissionHandle: string;
  userId: string;
  judge: string;
  problemId: string;
  language: string;
  verdict: Verdict;
  executionTime: string | null;
  memory: string | null;
  submittedAt: string;
}

export interface JudgedResponse {
  status: 'judged';
  verdict: Verdict;
  handle: string;
  problemUrl: string;
  record: SolveRecordDto;
  newlySolved: boolean;
  solvedCount: number;
  // Ready-to-post summary, e.g. "Accepted on CodeForces-123A. You now have 3 solves."
  message: string;
}

export interface FailedResponse {
  error: {
    code: FailureReason | string;
    message: string;
    details?: Record<string, unknown>;
  };
}

// Leaderboard Types
export interface LeaderboardEntryDto {
  rank: number;
  userId: string;
  displayName: string;
  solved: number;
  firstAcceptedAt: string;
}

export interface LeaderboardResponse {
  judge: string | null;
  entries: LeaderboardEntryDto[];
}
