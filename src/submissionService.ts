import type { JudgeApi } from './apiClient';
import { moduleLogger } from './logger';
import type { TerminalRenderer } from './renderer';
import { isFailing } from './verdictModel';
import { watch, type WatchOptions } from './watchSession';
import type { FinishedEvent, SubmissionId, SubmissionListQuery, VerdictSnapshot } from './types';

const log = moduleLogger('submissionService');

export const ExitCode = {
  Success: 0,
  Failure: 1,
  Exhausted: 2,
  Cancelled: 130
} as const;

/**
 * Registers a handler for a user interrupt and returns a function that
 * unregisters it
 */
export type InterruptSource = (handler: () => void) => () => void;

export function exitCodeForSnapshot(snapshot: VerdictSnapshot): number {
  return isFailing(snapshot.overallVerdict) ? ExitCode.Failure : ExitCode.Success;
}

export function exitCodeForFinish(event: FinishedEvent): number {
  switch (event.reason) {
    case 'Terminal':
      return event.snapshot?.overallVerdict === 'Accepted'
        ? ExitCode.Success
        : ExitCode.Failure;
    case 'Exhausted':
      return ExitCode.Exhausted;
    case 'Cancelled':
      return ExitCode.Cancelled;
  }
}

export class SubmissionService {
  constructor(
    private apiClient: JudgeApi,
    private renderer: TerminalRenderer
  ) {}

  /**
   * Fetch and print the status once
   */
  async showStatus(submissionId: SubmissionId): Promise<number> {
    const snapshot = await this.apiClient.fetchStatus(submissionId);
    this.renderer.showSnapshot(snapshot);
    return exitCodeForSnapshot(snapshot);
  }

  /**
   * Follow the submission until it has a final verdict, streaming changes
   * to the renderer. The exit code reflects how the watch ended.
   */
  async watchStatus(
    submissionId: SubmissionId,
    options: WatchOptions = {},
    onInterrupt?: InterruptSource
  ): Promise<number> {
    const session = watch(this.apiClient, submissionId, options);
    const unsubscribe = onInterrupt?.(() => session.cancel());

    log.info(`Watching submission ${submissionId}`);
    this.renderer.showMessage('Watching submission status (Ctrl+C to stop)...');

    let finished: FinishedEvent | undefined;
    try {
      for await (const event of session) {
        this.renderer.render(event);
        if (event.type === 'Finished') {
          finished = event;
        }
      }
    } finally {
      unsubscribe?.();
    }

    if (!finished) {
      throw new Error(`Watch of submission ${submissionId} ended without a result`);
    }

    log.info(
      `Watch of submission ${submissionId} finished: ${finished.reason} after ${session.pollCount} polls`
    );
    return exitCodeForFinish(finished);
  }

  async abort(submissionId: SubmissionId): Promise<number> {
    await this.apiClient.abortSubmission(submissionId);
    this.renderer.showMessage(`Abort requested for submission ${submissionId}.`, 'success');
    return ExitCode.Success;
  }

  /**
   * List the current user's submissions
   */
  async list(query: Omit<SubmissionListQuery, 'username'> = {}): Promise<number> {
    const profile = await this.apiClient.getProfile();
    const { submissions, nextCursor } = await this.apiClient.listSubmissions({
      ...query,
      username: profile.username
    });

    if (submissions.length === 0) {
      this.renderer.showMessage('No submissions found.');
      return ExitCode.Success;
    }

    this.renderer.showTable(
      ['ID', 'Problem ID', 'Problem Title', 'Language', 'Status', 'Created At'],
      submissions.map((submission) => [
        submission.id,
        submission.problemId ?? 'N/A',
        submission.problemTitle ?? 'N/A',
        submission.language ?? 'N/A',
        submission.status ?? 'N/A',
        submission.createdAt ?? 'N/A'
      ])
    );

    if (nextCursor) {
      this.renderer.showMessage(`Next cursor: ${nextCursor}`);
      this.renderer.showMessage("Use '--cursor <cursor>' to load the next page.");
    }

    return ExitCode.Success;
  }
}
