/**
 * Submission client backed by the `oj` command-line helper.
 *
 * Each session gets its own temporary directory holding the cookie jar and
 * the source file, so concurrent users never share login state.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { formatProblemCode } from '@judgebot/shared';

import { InvalidProblemError, JudgeAuthError, JudgeUploadError } from './errors';
import {
  normalizeJudgeStatus,
  type JudgeClient,
  type JudgeCredential,
  type JudgeSession,
  type JudgeStatus,
  type SubmissionHandle,
  type SubmissionRequest,
} from './judge-client';
import { logger as baseLogger, type Logger } from './logger';
import { ProcessError, runCommand, type CommandResult, type CommandRunner } from './process-runner';

export interface OjClientOptions {
  baseUrl: string;
  command: string;
  commandArgs: string[];
  timeoutMs: number;
  run?: CommandRunner;
  logger?: Logger;
}

const INVALID_PROBLEM_PATTERN =
  /(problem\b.*\b(not found|does not exist|invalid|unknown))|no such problem|\b404\b/i;

// Login output that means the judge refused the username or password
const AUTH_REJECTED_PATTERN =
  /(invalid|incorrect|wrong|bad)\s+(username|password|credentials?|login)|authentication failed|login failed|unauthori[sz]ed|\b40[13]\b/i;
const NETWORK_ERROR_PATTERN =
  /connection|timed?\s*out|temporar|name resolution|unreachable|\bssl\b|\b5\d\d\b/i;

/**
 * A non-zero login exit is an auth failure only when the helper says the
 * credentials were refused. Network trouble and anything unrecognized stay
 * retryable.
 */
export function classifyLoginFailure(
  credential: JudgeCredential,
  result: CommandResult
): JudgeAuthError | JudgeUploadError {
  const { judge } = credential;
  const output = `${result.stdout}\n${result.stderr}`;
  if (!NETWORK_ERROR_PATTERN.test(output) && AUTH_REJECTED_PATTERN.test(output)) {
    return new JudgeAuthError(judge);
  }
  let reason = lastLine(result.stderr) || lastLine(result.stdout);
  if (credential.secret) {
    reason = reason.split(credential.secret).join('[redacted]');
  }
  return new JudgeUploadError(reason ? `Login to ${judge} failed: ${reason}` : `Login to ${judge} failed`);
}

const EXTENSIONS: Array<[RegExp, string]> = [
  [/c\+\+|cpp|g\+\+|clang\+\+/i, 'cpp'],
  [/python|pypy/i, 'py'],
  [/kotlin/i, 'kt'],
  [/java(?!script)/i, 'java'],
  [/javascript|node/i, 'js'],
  [/rust/i, 'rs'],
  [/\bgo\b|golang/i, 'go'],
  [/c#|csharp|mono|\.net/i, 'cs'],
  [/^(gnu )?c(\d+)?$|\bgcc\b/i, 'c'],
];

/**
 * Pick a source file extension the judge will accept for the language name.
 */
export function sourceExtension(language: string): string {
  for (const [pattern, extension] of EXTENSIONS) {
    if (pattern.test(language)) return extension;
  }
  return 'txt';
}

// Tokens that start the time and memory columns
const VALUE_TOKEN = /^(\d|N\/A$|-$)/i;
const UNIT_TOKEN = /^(ms|s|sec|b|bytes|[kmg]i?b)$/i;
const NUMBER_TOKEN = /^\d+(\.\d+)?$/;
const TEST_SUFFIX = /\s+on\s+test$/i;

/**
 * Parse `oj get` output. The row whose tokens include the handle reads
 * `id user problem <status words> [time] [memory]`. Status labels span
 * several words ("Time Limit Exceeded on test 5"), and values may carry a
 * separate unit ("46 ms").
 */
export function parseStatusOutput(stdout: string, handle: SubmissionHandle): {
  label: string;
  executionTime: string | null;
  memory: string | null;
} | null {
  for (const line of stdout.split(/\r?\n/)) {
    const parts = line.trim().split(/\s+/);
    if (!parts.includes(handle) || parts.length < 4) continue;

    const columns = parts.slice(3);
    let index = 0;
    while (index < columns.length && !VALUE_TOKEN.test(columns[index])) {
      index += 1;
    }

    let label = columns.slice(0, index).join(' ');
    if (TEST_SUFFIX.test(label) && NUMBER_TOKEN.test(columns[index] ?? '')) {
      label = label.replace(TEST_SUFFIX, '');
      index += 1;
    }
    // "Runtime Error (SIGSEGV)"
    label = label.replace(/\s*\(.*\)$/, '');

    const [executionTime = null, memory = null] = groupValues(columns.slice(index));
    return { label, executionTime, memory };
  }
  return null;
}

// Join "46" "ms" into "46 ms"; N/A and "-" become null
function groupValues(tokens: string[]): Array<string | null> {
  const values: Array<string | null> = [];
  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index];
    const unit = tokens[index + 1];
    if (NUMBER_TOKEN.test(token) && unit !== undefined && UNIT_TOKEN.test(unit)) {
      values.push(`${token} ${unit}`);
      index += 1;
    } else {
      values.push(token === 'N/A' || token === '-' ? null : token);
    }
  }
  return values;
}

/**
 * The run id is the last token `oj submit` prints, or the last path segment
 * when that token is a URL.
 */
export function parseSubmitOutput(stdout: string): SubmissionHandle | null {
  const token = stdout.trim().split(/\s+/).pop();
  if (!token) return null;
  const handle = token.split('/').filter(Boolean).pop();
  return handle ?? null;
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return (lines[lines.length - 1] ?? '').slice(0, 200);
}

export class OjJudgeClient implements JudgeClient {
  private readonly run: CommandRunner;
  private readonly logger: Logger;

  constructor(private readonly options: OjClientOptions) {
    this.run = options.run ?? runCommand;
    this.logger = options.logger ?? baseLogger;
  }

  problemUrl(judge: string, problemId: string): string {
    return `${this.options.baseUrl}/problem/${formatProblemCode(judge, problemId)}`;
  }

  async openSession(credential: JudgeCredential, signal?: AbortSignal): Promise<JudgeSession> {
    const workdir = await fs.mkdtemp(path.join(os.tmpdir(), 'judgebot-'));
    const session = new OjSession(this, workdir, credential.judge);

    try {
      const result = await session.exec(
        [
          'login',
          `${this.options.baseUrl}/user/login`,
          '--username',
          credential.username,
          '--password',
          credential.secret,
        ],
        'login',
        signal
      );

      if (result.exitCode !== 0) {
        const error = classifyLoginFailure(credential, result);
        this.logger.warn(
          { judge: credential.judge, exitCode: result.exitCode, reason: error.reason },
          'Judge login failed'
        );
        throw error;
      }
    } catch (error) {
      await session.close();
      throw error;
    }

    return session;
  }

  /** @internal */
  async exec(
    cookieJar: string,
    args: string[],
    operation: string,
    signal?: AbortSignal
  ): Promise<CommandResult> {
    let result: CommandResult;
    try {
      result = await this.run(
        this.options.command,
        [...this.options.commandArgs, '--cookie', cookieJar, ...args],
        { timeoutMs: this.options.timeoutMs, signal }
      );
    } catch (error) {
      if (error instanceof ProcessError) {
        this.logger.error({ err: error, operation }, 'Submission helper could not be started');
        throw new JudgeUploadError('The submission helper could not be started');
      }
      throw error;
    }

    if (result.timedOut) {
      throw new JudgeUploadError(`The judge did not answer the ${operation} request in time`);
    }

    this.logger.debug({ operation, exitCode: result.exitCode, durationMs: result.durationMs }, 'oj finished');
    return result;
  }
}

class OjSession implements JudgeSession {
  private closed = false;

  constructor(
    private readonly client: OjJudgeClient,
    private readonly workdir: string,
    private readonly judge: string
  ) {}

  exec(args: string[], operation: string, signal?: AbortSignal): Promise<CommandResult> {
    return this.client.exec(path.join(this.workdir, 'cookie.jar'), args, operation, signal);
  }

  async submit(request: SubmissionRequest, signal?: AbortSignal): Promise<SubmissionHandle> {
    const sourcePath = path.join(this.workdir, `Main.${sourceExtension(request.language)}`);
    await fs.writeFile(sourcePath, request.sourceCode, 'utf8');

    const result = await this.exec(
      [
        'submit',
        this.client.problemUrl(request.judge, request.problemId),
        '--language',
        request.language,
        '--yes',
        sourcePath,
      ],
      'submit',
      signal
    );

    if (result.exitCode !== 0) {
      const output = `${result.stderr}\n${result.stdout}`;
      if (INVALID_PROBLEM_PATTERN.test(output)) {
        throw new InvalidProblemError(request.judge, request.problemId);
      }
      const reason = lastLine(result.stderr);
      throw new JudgeUploadError(
        reason ? `Submission upload failed: ${reason}` : `Submission upload failed (exit ${result.exitCode})`
      );
    }

    const handle = parseSubmitOutput(result.stdout);
    if (!handle) {
      throw new JudgeUploadError('The judge accepted the upload but returned no run id');
    }
    return handle;
  }

  async getStatus(handle: SubmissionHandle, signal?: AbortSignal): Promise<JudgeStatus> {
    const result = await this.exec(['get', handle], 'status', signal);

    if (result.exitCode !== 0) {
      throw new JudgeUploadError(`Could not fetch the status of run ${handle} on ${this.judge}`);
    }

    const row = parseStatusOutput(result.stdout, handle);
    if (!row) {
      return { state: 'PENDING' };
    }

    const state = normalizeJudgeStatus(row.label);
    if (state === null || state === 'PENDING' || state === 'JUDGING') {
      return { state: state ?? 'JUDGING' };
    }

    return {
      state: 'VERDICT',
      verdict: state,
      executionTime: row.executionTime,
      memory: row.memory,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await fs.rm(this.workdir, { recursive: true, force: true });
  }
}
