import { z } from 'zod';
import { ApiError } from './apiErrors';
import { moduleLogger } from './logger';
import { isTerminal, reconcileOverall } from './verdictModel';
import type {
  OverallVerdict,
  Profile,
  SubmissionBrief,
  SubmissionId,
  SubmissionList,
  TestCaseResult,
  TestCaseVerdict,
  VerdictSnapshot
} from './types';

const log = moduleLogger('responseParser');

const measurement = z.number().nonnegative().nullish();

const TestSchema = z
  .object({
    status: z.string().nullish(),
    time_msecs: measurement,
    memory_bytes: measurement,
    message: z.string().nullish()
  })
  .passthrough();

const SubmissionSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    status: z.string(),
    details: z
      .object({ tests: z.array(TestSchema.nullable()).nullish() })
      .passthrough()
      .nullish(),
    time_msecs: measurement,
    memory_bytes: measurement,
    score: z.number().nullish(),
    should_show_score: z.boolean().nullish(),
    message: z.string().nullish()
  })
  .passthrough();

const ProfileSchema = z
  .object({
    username: z.string(),
    friendly_name: z.string().nullish(),
    student_id: z.string().nullish()
  })
  .passthrough();

const SubmissionBriefSchema = z
  .object({
    id: z.number(),
    problem: z
      .object({ id: z.number().nullish(), title: z.string().nullish() })
      .passthrough()
      .nullish(),
    language: z.string().nullish(),
    status: z.string().nullish(),
    created_at: z.string().nullish()
  })
  .passthrough();

const SubmissionListSchema = z
  .object({
    submissions: z.array(SubmissionBriefSchema).default([]),
    next: z.union([z.string(), z.number()]).nullish()
  })
  .passthrough();

const OVERALL_STATUS: Record<string, OverallVerdict> = {
  pending: 'Queued',
  compiling: 'Judging',
  judging: 'Judging',
  accepted: 'Accepted',
  wrong_answer: 'WrongAnswer',
  time_limit_exceeded: 'TimeLimitExceeded',
  memory_limit_exceeded: 'MemoryLimitExceeded',
  memory_leak: 'MemoryLimitExceeded',
  runtime_error: 'RuntimeError',
  compile_error: 'CompileError',
  system_error: 'SystemError',
  disk_limit_exceeded: 'SystemError',
  bad_problem: 'SystemError',
  aborted: 'Aborted',
  void: 'Aborted'
};

const TEST_STATUS: Record<string, TestCaseVerdict> = {
  pending: 'Pending',
  skipped: 'Pending',
  compiling: 'Running',
  judging: 'Running',
  running: 'Running',
  accepted: 'Accepted',
  wrong_answer: 'WrongAnswer',
  time_limit_exceeded: 'TimeLimitExceeded',
  memory_limit_exceeded: 'MemoryLimitExceeded',
  memory_leak: 'MemoryLimitExceeded',
  runtime_error: 'RuntimeError',
  compile_error: 'CompileError',
  system_error: 'SystemError',
  disk_limit_exceeded: 'SystemError',
  bad_problem: 'SystemError',
  aborted: 'SystemError',
  void: 'SystemError'
};

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

function optional<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function toKb(bytes: number | null | undefined): number | undefined {
  return bytes === null || bytes === undefined ? undefined : Math.round(bytes / 1024);
}

function malformed(message: string, cause?: unknown): ApiError {
  return new ApiError('Malformed', message, { cause });
}

function validate<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') || '(root)' : '(root)';
    log.debug({ issues: result.error.issues }, `[ResponseParser] Invalid ${what}`);
    throw malformed(`Invalid ${what} at ${where}: ${issue?.message ?? 'unknown issue'}`, result.error);
  }
  return result.data;
}

export class ResponseParser {
  /**
   * Parse a JSON body, reporting anything that is not JSON as Malformed
   */
  static parseJson(body: string): unknown {
    try {
      return JSON.parse(body);
    } catch (error) {
      throw malformed(`Response is not valid JSON: ${body.substring(0, 80)}`, error);
    }
  }

  /**
   * Map a submission detail body to a VerdictSnapshot.
   *
   * Test cases the judge has not started yet may come with no fields at all;
   * they are Pending with no measurements.
   */
  static parseSubmissionStatus(
    body: unknown,
    submissionId: SubmissionId,
    fetchedAt: Date
  ): VerdictSnapshot {
    const data = validate(SubmissionSchema, body, 'submission');

    const reported = lookup(OVERALL_STATUS, data.status);
    if (!reported) {
      throw malformed(`Unknown submission status: ${data.status}`);
    }

    const tests = data.details?.tests ?? [];
    const testCases = tests.map((test, i): TestCaseResult => {
      const index = i + 1;
      if (!test) {
        return { index, verdict: 'Pending' };
      }

      const status = test.status ?? 'pending';
      const verdict = lookup(TEST_STATUS, status);
      if (!verdict) {
        throw malformed(`Unknown status for test ${index}: ${status}`);
      }

      return {
        index,
        verdict,
        timeMs: optional(test.time_msecs),
        memoryKb: toKb(test.memory_bytes),
        message: optional(test.message)
      };
    });

    const overallVerdict = reconcileOverall(reported, testCases);
    const showScore = data.should_show_score ?? true;

    log.debug(
      `[ResponseParser] Submission ${submissionId}: ${data.status} -> ${overallVerdict}, ${testCases.length} tests`
    );

    return {
      submissionId,
      overallVerdict,
      testCases,
      judgingComplete: isTerminal(reported),
      fetchedAt,
      timeMs: optional(data.time_msecs),
      memoryKb: toKb(data.memory_bytes),
      score: showScore ? optional(data.score) : undefined,
      message: optional(data.message) || undefined
    };
  }

  static parseProfile(body: unknown): Profile {
    const data = validate(ProfileSchema, body, 'profile');
    return {
      username: data.username,
      friendlyName: optional(data.friendly_name),
      studentId: optional(data.student_id)
    };
  }

  static parseSubmissionList(body: unknown): SubmissionList {
    const data = validate(SubmissionListSchema, body, 'submission list');
    const submissions: SubmissionBrief[] = data.submissions.map((item) => ({
      id: item.id,
      problemId: optional(item.problem?.id),
      problemTitle: optional(item.problem?.title),
      language: optional(item.language),
      status: optional(item.status),
      createdAt: optional(item.created_at)
    }));

    const next = data.next;
    return {
      submissions,
      nextCursor: next === null || next === undefined ? undefined : String(next)
    };
  }
}
