import { Command, InvalidArgumentError } from 'commander';
import { ZodError } from 'zod';
import { JudgeApiClient } from './apiClient';
import { ApiError } from './apiErrors';
import { ConfigStore, isConfigKey, CONFIG_KEYS } from './config';
import { logger } from './logger';
import type { PollSchedulerOptions } from './pollScheduler';
import { TerminalRenderer } from './renderer';
import { ExitCode, type InterruptSource, SubmissionService } from './submissionService';

const VERSION = '0.1.0';

interface CliContext {
  store: ConfigStore;
  apiClient: JudgeApiClient;
  renderer: TerminalRenderer;
  submissions: SubmissionService;
}

export interface WatchFlags {
  interval?: number;
  maxInterval?: number;
  backoff?: number;
  maxErrors?: number;
  maxPolls?: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseBackoffFactor(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a number of at least 1.');
  }
  return parsed;
}

/**
 * Command-line flags win over the configured defaults
 */
export function buildWatchOptions(
  defaults: PollSchedulerOptions,
  flags: WatchFlags
): PollSchedulerOptions {
  const initialIntervalMs = flags.interval ?? defaults.initialIntervalMs;
  let maxIntervalMs = flags.maxInterval ?? defaults.maxIntervalMs;

  // A longer --interval alone lifts the backoff cap with it
  if (
    flags.maxInterval === undefined &&
    initialIntervalMs !== undefined &&
    maxIntervalMs !== undefined &&
    initialIntervalMs > maxIntervalMs
  ) {
    maxIntervalMs = initialIntervalMs;
  }

  return {
    initialIntervalMs,
    maxIntervalMs,
    backoffMultiplier: flags.backoff ?? defaults.backoffMultiplier,
    maxConsecutiveErrors: flags.maxErrors ?? defaults.maxConsecutiveErrors,
    maxTotalPolls: flags.maxPolls ?? defaults.maxTotalPolls
  };
}

const sigintSource: InterruptSource = (handler) => {
  process.once('SIGINT', handler);
  return () => {
    process.removeListener('SIGINT', handler);
  };
};

function createContext(): CliContext {
  const store = new ConfigStore();
  const apiClient = new JudgeApiClient({
    baseUrl: store.apiBaseUrl,
    tokenProvider: store
  });
  const renderer = new TerminalRenderer({ out: process.stdout });
  return {
    store,
    apiClient,
    renderer,
    submissions: new SubmissionService(apiClient, renderer)
  };
}

export function describeError(error: unknown): string {
  if (error instanceof ApiError) {
    switch (error.kind) {
      case 'Unauthorized':
        return `Authentication failed. Please log in first. (${error.message})`;
      case 'NotFound':
        return `Not found. (${error.message})`;
      default:
        return error.message;
    }
  }
  if (error instanceof ZodError) {
    return `Invalid settings: ${error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wraps every command action: runs it, sets the exit code from its result,
 * and prints failures to stderr
 */
async function handleCommand(
  action: (context: CliContext) => Promise<number>
): Promise<void> {
  let context: CliContext | undefined;
  try {
    context = createContext();
    process.exitCode = await action(context);
  } catch (error) {
    logger.debug({ err: error }, 'Command failed');
    process.stderr.write(`Error: ${describeError(error)}\n`);
    process.exitCode = ExitCode.Failure;
  } finally {
    await context?.apiClient.dispose();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('termjudge')
    .description('Command-line client for the online judge.')
    .version(VERSION, '-v, --version')
    .helpOption('-h, --help');

  const auth = program.command('auth').description('Authentication related commands.');

  auth
    .command('login')
    .description('Log in using a personal access token.')
    .argument('<token>', 'personal access token from the judge website')
    .action((token: string) =>
      handleCommand(async ({ store, apiClient, renderer }) => {
        store.setToken(token);
        try {
          const profile = await apiClient.getProfile();
          renderer.showMessage(`Successfully logged in as ${profile.username}!`, 'success');
          return ExitCode.Success;
        } catch (error) {
          if (error instanceof ApiError && error.kind === 'Unauthorized') {
            store.setToken(undefined);
          }
          throw error;
        }
      })
    );

  auth
    .command('whoami')
    .description('Show current user information.')
    .action(() =>
      handleCommand(async ({ apiClient, renderer }) => {
        const profile = await apiClient.getProfile();
        renderer.showMessage(`Logged in as: ${profile.username}`);
        if (profile.friendlyName) {
          renderer.showMessage(`Name: ${profile.friendlyName}`);
        }
        if (profile.studentId) {
          renderer.showMessage(`Student ID: ${profile.studentId}`);
        }
        return ExitCode.Success;
      })
    );

  auth
    .command('logout')
    .description('Log out by clearing the stored token.')
    .action(() =>
      handleCommand(async ({ store, renderer }) => {
        store.setToken(undefined);
        renderer.showMessage('Successfully logged out!', 'success');
        return ExitCode.Success;
      })
    );

  const submission = program
    .command('submission')
    .alias('submissions')
    .description('Manage and track submissions.');

  submission
    .command('status')
    .description('Check the status of a submission; with --watch, follow it until judging ends.')
    .argument('<id>', 'submission id')
    .option('-w, --watch', 'watch submission status in real time')
    .option('-i, --interval <ms>', 'polling interval in milliseconds', parsePositiveInt)
    .option('--max-interval <ms>', 'longest wait between polls when backing off', parsePositiveInt)
    .option('--backoff <factor>', 'interval multiplier after each failed poll', parseBackoffFactor)
    .option('--max-errors <n>', 'consecutive failed polls before giving up', parsePositiveInt)
    .option('--max-polls <n>', 'stop after this many polls', parsePositiveInt)
    .action((id: string, flags: WatchFlags & { watch?: boolean }) =>
      handleCommand(async ({ store, submissions }) => {
        if (!flags.watch) {
          return submissions.showStatus(id);
        }
        const options = buildWatchOptions(store.watchDefaults(), flags);
        return submissions.watchStatus(id, options, sigintSource);
      })
    );

  submission
    .command('abort')
    .description('Abort a running submission.')
    .argument('<id>', 'submission id')
    .action((id: string) => handleCommand(({ submissions }) => submissions.abort(id)));

  submission
    .command('list')
    .description('List your recent submissions.')
    .option('-p, --problem <id>', 'filter by problem id', parsePositiveInt)
    .option('-s, --status <status>', 'filter by submission status')
    .option('-l, --language <language>', 'filter by programming language')
    .option('-c, --cursor <cursor>', 'pagination cursor')
    .action(
      (flags: { problem?: number; status?: string; language?: string; cursor?: string }) =>
        handleCommand(({ submissions }) =>
          submissions.list({
            problemId: flags.problem,
            status: flags.status,
            language: flags.language,
            cursor: flags.cursor
          })
        )
    );

  const config = program.command('config').description('Configuration management commands.');

  config
    .command('view')
    .description('View current configuration settings.')
    .action(() =>
      handleCommand(async ({ store, renderer }) => {
        renderer.showTable(
          ['Setting', 'Value'],
          [
            ...store.entries().map(([key, value]): [string, string] => [key, String(value ?? '')]),
            ['configFile', store.configFile],
            ['loggedIn', store.getToken() ? 'yes' : 'no']
          ]
        );
        return ExitCode.Success;
      })
    );

  config
    .command('get')
    .description(`Get the value of a configuration option (${CONFIG_KEYS.join(', ')}).`)
    .argument('<option>')
    .action((option: string) =>
      handleCommand(async ({ store, renderer }) => {
        if (!isConfigKey(option)) {
          renderer.showMessage(`Unknown option: ${option}`, 'failure');
          return ExitCode.Failure;
        }
        renderer.showMessage(`${option} = ${store.get(option) ?? ''}`);
        return ExitCode.Success;
      })
    );

  config
    .command('set')
    .description(`Set a configuration option (${CONFIG_KEYS.join(', ')}).`)
    .argument('<option>')
    .argument('<value>')
    .action((option: string, value: string) =>
      handleCommand(async ({ store, renderer }) => {
        if (!isConfigKey(option)) {
          renderer.showMessage(`Unknown option: ${option}`, 'failure');
          return ExitCode.Failure;
        }
        store.set(option, value);
        renderer.showMessage(`Option ${option} set to: ${store.get(option)}`);
        return ExitCode.Success;
      })
    );

  config
    .command('reset')
    .description('Reset all settings to default values (the stored token is kept).')
    .action(() =>
      handleCommand(async ({ store, renderer }) => {
        store.reset();
        renderer.showMessage('Configuration has been reset to default values.');
        return ExitCode.Success;
      })
    );

  return program;
}
