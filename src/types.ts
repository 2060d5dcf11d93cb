/**
 * Type definitions for the judge client
 */

export type SubmissionId = number | string;

export type TestCaseVerdict =
  | 'Pending'
  | 'Running'
  | 'Accepted'
  | 'WrongAnswer'
  | 'TimeLimitExceeded'
  | 'MemoryLimitExceeded'
  | 'RuntimeError'
  | 'CompileError'
  | 'SystemError';

export type OverallVerdict = TestCaseVerdict | 'Queued' | 'Judging' | 'Aborted';

export interface TestCaseResult {
  readonly index: number;
  readonly verdict: TestCaseVerdict;
  readonly timeMs?: number;
  readonly memoryKb?: number;
  readonly message?: string;
}

export interface VerdictSnapshot {
  readonly submissionId: SubmissionId;
  readonly overallVerdict: OverallVerdict;
  readonly testCases: readonly TestCaseResult[];
  /** The judge reported a final status; no further test cases will arrive. */
  readonly judgingComplete: boolean;
  readonly fetchedAt: Date;
  readonly timeMs?: number;
  readonly memoryKb?: number;
  readonly score?: number;
  readonly message?: string;
}

export type ApiErrorKind =
  | 'Transient'
  | 'Unauthorized'
  | 'NotFound'
  | 'Malformed'
  | 'Rejected';

export type FinishReason = 'Terminal' | 'Cancelled' | 'Exhausted';

export interface SnapshotChangedEvent {
  readonly type: 'SnapshotChanged';
  readonly snapshot: VerdictSnapshot;
}

export interface WatchErrorEvent {
  readonly type: 'Error';
  readonly kind: ApiErrorKind;
  readonly message: string;
  readonly attempt: number;
  readonly maxAttempts: number;
}

export interface FinishedEvent {
  readonly type: 'Finished';
  readonly submissionId: SubmissionId;
  readonly snapshot: VerdictSnapshot | null;
  readonly reason: FinishReason;
  readonly cause?: ApiErrorKind;
  readonly message?: string;
}

export type WatchEvent = SnapshotChangedEvent | WatchErrorEvent | FinishedEvent;

export interface TokenProvider {
  getToken(): string | undefined;
}

export interface Profile {
  username: string;
  friendlyName?: string;
  studentId?: string;
}

export interface SubmissionBrief {
  id: number;
  problemId?: number;
  problemTitle?: string;
  language?: string;
  status?: string;
  createdAt?: string;
}

export interface SubmissionListQuery {
  username?: string;
  problemId?: number;
  status?: string;
  language?: string;
  cursor?: string;
}

export interface SubmissionList {
  submissions: SubmissionBrief[];
  nextCursor?: string;
}
