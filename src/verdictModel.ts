import type { OverallVerdict, TestCaseResult, VerdictSnapshot } from './types';

const NON_TERMINAL: ReadonlySet<OverallVerdict> = new Set<OverallVerdict>([
  'Queued',
  'Judging',
  'Pending',
  'Running'
]);

// Verdicts the judge gives for the submission as a whole rather than per test.
const SUBMISSION_LEVEL: ReadonlySet<OverallVerdict> = new Set<OverallVerdict>([
  'CompileError',
  'SystemError',
  'Aborted'
]);

export function isTerminal(verdict: OverallVerdict): boolean {
  return !NON_TERMINAL.has(verdict);
}

export function isFailing(verdict: OverallVerdict): boolean {
  return isTerminal(verdict) && verdict !== 'Accepted';
}

function byIndex(testCases: readonly TestCaseResult[]): TestCaseResult[] {
  return [...testCases].sort((a, b) => a.index - b.index);
}

/**
 * Overall verdict implied by the per-test results.
 *
 * Until the judge confirms that no more test cases remain the result is
 * Queued (nothing reported yet) or Judging. Once complete, the first
 * non-Accepted case by index decides: its verdict if it is terminal, Judging
 * if it is still outstanding. All Accepted gives Accepted.
 */
export function deriveOverall(
  testCases: readonly TestCaseResult[],
  judgingComplete: boolean
): OverallVerdict {
  if (!judgingComplete) {
    return testCases.length === 0 ? 'Queued' : 'Judging';
  }

  for (const testCase of byIndex(testCases)) {
    if (testCase.verdict === 'Accepted') {
      continue;
    }
    return isTerminal(testCase.verdict) ? testCase.verdict : 'Judging';
  }

  return 'Accepted';
}

/**
 * Combine the verdict the judge reports for the submission with what its
 * test cases imply.
 *
 * Once the judge reports a final status, cases it never ran (reported as
 * skipped, parsed as Pending) stay Pending under a terminal overall verdict.
 * The judge has nothing more to report for them, so the submission counts as
 * finished even though those cases are not.
 */
export function reconcileOverall(
  reported: OverallVerdict,
  testCases: readonly TestCaseResult[]
): OverallVerdict {
  if (!isTerminal(reported)) {
    // Results are arriving, so the submission has left the queue.
    return reported === 'Queued' && testCases.length > 0 ? 'Judging' : reported;
  }

  if (testCases.length === 0 || SUBMISSION_LEVEL.has(reported)) {
    return reported;
  }

  const derived = deriveOverall(testCases, true);
  return isTerminal(derived) ? derived : reported;
}

/**
 * Apply the newer per-test results on top of the older ones. A test case that
 * already has a terminal verdict is never replaced by a non-terminal report.
 * Cases a later response leaves out keep their earlier result.
 */
export function mergeTestCases(
  previous: readonly TestCaseResult[],
  current: readonly TestCaseResult[]
): TestCaseResult[] {
  const merged = new Map(previous.map((testCase) => [testCase.index, testCase]));

  for (const testCase of current) {
    const earlier = merged.get(testCase.index);
    if (earlier && isTerminal(earlier.verdict) && !isTerminal(testCase.verdict)) {
      continue;
    }
    merged.set(testCase.index, testCase);
  }

  return byIndex([...merged.values()]);
}

function sameTestCase(a: TestCaseResult, b: TestCaseResult): boolean {
  return (
    a.index === b.index &&
    a.verdict === b.verdict &&
    a.timeMs === b.timeMs &&
    a.memoryKb === b.memoryKb
  );
}

/**
 * Whether `current` is worth rendering after `previous`.
 */
export function hasChanged(
  previous: VerdictSnapshot | undefined,
  current: VerdictSnapshot
): boolean {
  if (!previous) {
    return true;
  }

  if (previous.overallVerdict !== current.overallVerdict) {
    return true;
  }

  if (previous.testCases.length !== current.testCases.length) {
    return true;
  }

  return previous.testCases.some(
    (testCase, i) => !sameTestCase(testCase, current.testCases[i])
  );
}
