/**
 * Unit tests for the oj submission client
 *
 * The command runner is faked; sessions still use real temporary directories.
 */

import fs from 'fs/promises';
import path from 'path';
import { describe, it, expect } from 'vitest';

import { InvalidProblemError, JudgeAuthError, JudgeUploadError } from './errors';
import { normalizeJudgeStatus } from './judge-client';
import {
  classifyLoginFailure,
  OjJudgeClient,
  parseStatusOutput,
  parseSubmitOutput,
  sourceExtension,
} from './oj-client';
import { ProcessError, type CommandResult, type CommandRunner } from './process-runner';

// ============================================
// Test Fixtures
// ============================================

const credential = { judge: 'CodeForces', username: 'alice', secret: 'test-secret' };

const request = {
  userId: 'u1',
  judge: 'CodeForces',
  problemId: '123A',
  language: 'GNU G++17 7.3.0',
  sourceCode: 'int main() { return 0; }',
};

function ok(stdout = '', stderr = ''): CommandResult {
  return { exitCode: 0, stdout, stderr, durationMs: 5, timedOut: false };
}

function failed(stderr: string, exitCode = 1): CommandResult {
  return { exitCode, stdout: '', stderr, durationMs: 5, timedOut: false };
}

interface Call {
  command: string;
  args: string[];
}

function fakeRunner(respond: (subcommand: string, args: string[]) => Promise<CommandResult> | CommandResult) {
  const calls: Call[] = [];
  const run: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    const subcommand = args[args.indexOf('--cookie') + 2];
    return respond(subcommand, args);
  };
  return { run, calls };
}

function client(run: CommandRunner): OjJudgeClient {
  return new OjJudgeClient({
    baseUrl: 'https://judge.test',
    command: 'python3',
    commandArgs: ['-m', 'oj'],
    timeoutMs: 1000,
    run,
  });
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

// ============================================
// Parsing
// ============================================

describe('sourceExtension', () => {
  it('should map language names onto file extensions', () => {
    expect(sourceExtension('GNU G++17 7.3.0')).toBe('cpp');
    expect(sourceExtension('Python 3')).toBe('py');
    expect(sourceExtension('Java 11')).toBe('java');
    expect(sourceExtension('JavaScript')).toBe('js');
    expect(sourceExtension('GNU C11')).toBe('c');
  });

  it('should fall back to txt for unknown languages', () => {
    expect(sourceExtension('Brainfuck')).toBe('txt');
  });
});

describe('parseStatusOutput', () => {
  it('should read verdict, time and memory from the row with the handle', () => {
    const stdout = ['id user problem status time memory', '4567 alice 123A Accepted 46ms 1200KB'].join('\n');

    expect(parseStatusOutput(stdout, '4567')).toEqual({
      label: 'Accepted',
      executionTime: '46ms',
      memory: '1200KB',
    });
  });

  it('should treat N/A and missing columns as null', () => {
    expect(parseStatusOutput('4567 alice 123A Running N/A', '4567')).toEqual({
      label: 'Running',
      executionTime: null,
      memory: null,
    });
  });

  it('should keep every word of a multi-word status', () => {
    expect(parseStatusOutput('4567 alice 123A Wrong Answer 15ms 800KB', '4567')).toEqual({
      label: 'Wrong Answer',
      executionTime: '15ms',
      memory: '800KB',
    });
  });

  it('should drop an "on test N" suffix and join values with separate units', () => {
    const stdout = [
      '#     user   problem  status                              time     memory',
      '4567  alice  123A     Time Limit Exceeded on test 5       2000 ms  800 KB',
    ].join('\n');

    expect(parseStatusOutput(stdout, '4567')).toEqual({
      label: 'Time Limit Exceeded',
      executionTime: '2000 ms',
      memory: '800 KB',
    });
  });

  it('should drop a parenthesised detail after the status', () => {
    expect(parseStatusOutput('4567 alice 123A Runtime Error (SIGSEGV) 46 ms 1200 KB', '4567')).toEqual({
      label: 'Runtime Error',
      executionTime: '46 ms',
      memory: '1200 KB',
    });
  });

  it('should read a multi-word in-progress status without values', () => {
    expect(parseStatusOutput('4567 alice 123A Running on test 3', '4567')).toEqual({
      label: 'Running',
      executionTime: null,
      memory: null,
    });
  });

  it('should return null when no row carries the handle', () => {
    expect(parseStatusOutput('4568 bob 123A Accepted 46ms 1200KB', '4567')).toBeNull();
  });
});

describe('classifyLoginFailure', () => {
  it('should treat refused credentials as an auth failure', () => {
    expect(classifyLoginFailure(credential, failed('Error: incorrect password'))).toBeInstanceOf(JudgeAuthError);
    expect(classifyLoginFailure(credential, failed('HTTP 403 Forbidden'))).toBeInstanceOf(JudgeAuthError);
  });

  it('should keep network and unrecognized failures retryable', () => {
    const timeout = classifyLoginFailure(credential, failed('login failed: read timed out'));
    expect(timeout).toBeInstanceOf(JudgeUploadError);
    expect(timeout.message).toBe('Login to CodeForces failed: login failed: read timed out');

    const unknown = classifyLoginFailure(credential, failed('', 2));
    expect(unknown).toBeInstanceOf(JudgeUploadError);
    expect(unknown.message).toBe('Login to CodeForces failed');
  });

  it('should never echo the secret in the failure message', () => {
    const error = classifyLoginFailure(credential, failed('unexpected reply for test-secret'));
    expect(error.message).toBe('Login to CodeForces failed: unexpected reply for [redacted]');
  });
});

describe('parseSubmitOutput', () => {
  it('should take the last path segment of a trailing URL', () => {
    expect(parseSubmitOutput('[SUCCESS] result: https://judge.test/solution/4567890\n')).toBe('4567890');
  });

  it('should take a bare trailing token', () => {
    expect(parseSubmitOutput('submitted\n4567890')).toBe('4567890');
  });

  it('should return null for empty output', () => {
    expect(parseSubmitOutput('  \n')).toBeNull();
  });
});

describe('normalizeJudgeStatus', () => {
  it('should map judge labels onto verdicts', () => {
    expect(normalizeJudgeStatus('Accepted')).toBe('ACCEPTED');
    expect(normalizeJudgeStatus('ac')).toBe('ACCEPTED');
    expect(normalizeJudgeStatus('Wrong Answer')).toBe('WRONG_ANSWER');
    expect(normalizeJudgeStatus('Time Limit Exceeded')).toBe('TIME_LIMIT_EXCEEDED');
    expect(normalizeJudgeStatus('Compilation Error')).toBe('COMPILE_ERROR');
  });

  it('should map in-progress labels onto pending states', () => {
    expect(normalizeJudgeStatus('Queuing')).toBe('PENDING');
    expect(normalizeJudgeStatus(' Running ')).toBe('JUDGING');
  });

  it('should return null for unknown labels', () => {
    expect(normalizeJudgeStatus('Mystery')).toBeNull();
  });
});

// ============================================
// Sessions
// ============================================

describe('OjJudgeClient', () => {
  it('should build problem URLs from the base URL', () => {
    const { run } = fakeRunner(() => ok());
    expect(client(run).problemUrl('AtCoder', 'abc100_a')).toBe('https://judge.test/problem/AtCoder-abc100_a');
  });

  it('should log in with a per-session cookie jar', async () => {
    const { run, calls } = fakeRunner(() => ok());
    const session = await client(run).openSession(credential);

    expect(calls).toHaveLength(1);
    const [{ command, args }] = calls;
    expect(command).toBe('python3');
    expect(args.slice(0, 3)).toEqual(['-m', 'oj', '--cookie']);
    expect(path.basename(args[3])).toBe('cookie.jar');
    expect(args.slice(4)).toEqual([
      'login',
      'https://judge.test/user/login',
      '--username',
      'alice',
      '--password',
      'test-secret',
    ]);

    await session.close();
  });

  it('should reject bad credentials and remove the session directory', async () => {
    const { run, calls } = fakeRunner(() => failed('[FAILURE] login failed: invalid username or password'));

    await expect(client(run).openSession(credential)).rejects.toBeInstanceOf(JudgeAuthError);
    const workdir = path.dirname(calls[0].args[3]);
    expect(await exists(workdir)).toBe(false);
  });

  it('should report a login network error as a retryable upload failure', async () => {
    const { run, calls } = fakeRunner(() =>
      failed('Traceback (most recent call last):\nConnectionError: Max retries exceeded with url: /user/login')
    );

    const error = await client(run).openSession(credential).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(JudgeUploadError);
    expect(error).toHaveProperty(
      'message',
      'Login to CodeForces failed: ConnectionError: Max retries exceeded with url: /user/login'
    );
    expect(error).toHaveProperty('retryable', true);
    expect(await exists(path.dirname(calls[0].args[3]))).toBe(false);
  });

  it('should report a helper that cannot start as an upload failure', async () => {
    const run: CommandRunner = async () => {
      throw new ProcessError('spawn python3 ENOENT');
    };

    await expect(client(run).openSession(credential)).rejects.toThrow(
      'The submission helper could not be started'
    );
  });

  it('should upload the source and return the run id', async () => {
    let uploadedSource = '';
    const { run, calls } = fakeRunner(async (subcommand, args) => {
      if (subcommand === 'submit') {
        uploadedSource = await fs.readFile(args[args.length - 1], 'utf8');
        return ok('[SUCCESS] result: https://judge.test/solution/4567');
      }
      return ok();
    });

    const session = await client(run).openSession(credential);
    const handle = await session.submit(request);

    expect(handle).toBe('4567');
    expect(uploadedSource).toBe('int main() { return 0; }');
    const submitArgs = calls[1].args.slice(4);
    expect(submitArgs.slice(0, 5)).toEqual([
      'submit',
      'https://judge.test/problem/CodeForces-123A',
      '--language',
      'GNU G++17 7.3.0',
      '--yes',
    ]);
    expect(path.basename(submitArgs[5])).toBe('Main.cpp');

    await session.close();
    expect(await exists(path.dirname(submitArgs[5]))).toBe(false);
  });

  it('should map an unknown problem to InvalidProblemError', async () => {
    const { run } = fakeRunner((subcommand) =>
      subcommand === 'submit' ? failed('error: Problem not found') : ok()
    );
    const session = await client(run).openSession(credential);

    await expect(session.submit(request)).rejects.toBeInstanceOf(InvalidProblemError);
    await session.close();
  });

  it('should map other submit failures to a retryable upload failure', async () => {
    const { run } = fakeRunner((subcommand) =>
      subcommand === 'submit' ? failed('warning: slow network\nconnection reset') : ok()
    );
    const session = await client(run).openSession(credential);

    const error = await session.submit(request).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(JudgeUploadError);
    expect(error).toHaveProperty('message', 'Submission upload failed: connection reset');
    expect(error).toHaveProperty('retryable', true);
    await session.close();
  });

  it('should report a timed out submit as an upload failure', async () => {
    const { run } = fakeRunner((subcommand) =>
      subcommand === 'submit' ? { ...failed('', 137), timedOut: true } : ok()
    );
    const session = await client(run).openSession(credential);

    await expect(session.submit(request)).rejects.toThrow(
      'The judge did not answer the submit request in time'
    );
    await session.close();
  });

  it('should fail the upload when no run id comes back', async () => {
    const { run } = fakeRunner(() => ok());
    const session = await client(run).openSession(credential);

    await expect(session.submit(request)).rejects.toThrow(
      'The judge accepted the upload but returned no run id'
    );
    await session.close();
  });

  it('should translate status rows into judge states', async () => {
    const rows = [
      '',
      '4567 alice 123A Running N/A N/A',
      '4567 alice 123A Mystery N/A N/A',
      '4567 alice 123A Wrong_Answer 15ms 800KB',
      '4567 alice 123A Time Limit Exceeded on test 5 2000 ms 800 KB',
    ];
    const { run } = fakeRunner((subcommand) => (subcommand === 'get' ? ok(rows.shift()) : ok()));
    const session = await client(run).openSession(credential);

    expect(await session.getStatus('4567')).toEqual({ state: 'PENDING' });
    expect(await session.getStatus('4567')).toEqual({ state: 'JUDGING' });
    expect(await session.getStatus('4567')).toEqual({ state: 'JUDGING' });
    expect(await session.getStatus('4567')).toEqual({
      state: 'VERDICT',
      verdict: 'WRONG_ANSWER',
      executionTime: '15ms',
      memory: '800KB',
    });
    expect(await session.getStatus('4567')).toEqual({
      state: 'VERDICT',
      verdict: 'TIME_LIMIT_EXCEEDED',
      executionTime: '2000 ms',
      memory: '800 KB',
    });
    await session.close();
  });

  it('should raise an upload failure when the status query fails', async () => {
    const { run } = fakeRunner((subcommand) => (subcommand === 'get' ? failed('boom') : ok()));
    const session = await client(run).openSession(credential);

    await expect(session.getStatus('4567')).rejects.toThrow(
      'Could not fetch the status of run 4567 on CodeForces'
    );
    await session.close();
  });
});
