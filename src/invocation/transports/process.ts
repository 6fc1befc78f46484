/**
 * Out-of-process tool transport (e.g. the gcloud CLI).
 */

import { execFile } from 'child_process';
import { ExternalServiceError } from '../../domain/errors';
import { ProcessTransport } from '../types';

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/** Failure of a child process, as reported by the runner. */
export interface ProcessFailure {
  /** Exit status, when the process exited on its own. */
  exitCode?: number;
  /** Signal that terminated the process. */
  signal?: string;
  /** Spawn error code such as ENOENT. */
  spawnError?: string;
  stderr: string;
}

export type ProcessRunner = (
  command: string,
  args: readonly string[],
  signal: AbortSignal,
) => Promise<{ ok: true; output: ProcessOutput } | { ok: false; failure: ProcessFailure }>;

const MAX_BUFFER_BYTES = 16 * 1024 * 1024;

/** ProcessRunner over child_process.execFile. No shell is involved. */
export const execFileRunner: ProcessRunner = (command, args, signal) =>
  new Promise((resolve) => {
    execFile(command, [...args], { signal, maxBuffer: MAX_BUFFER_BYTES, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ ok: true, output: { stdout, stderr } });
        return;
      }
      const code: unknown = error.code;
      resolve({
        ok: false,
        failure: {
          exitCode: typeof code === 'number' ? code : undefined,
          spawnError: typeof code === 'string' ? code : undefined,
          signal: error.signal ?? undefined,
          stderr,
        },
      });
    });
  });

export function createProcessTransport(run: ProcessRunner = execFileRunner): ProcessTransport {
  return async function processTransport(request, signal) {
    const result = await run(request.command, request.args, signal);
    if (result.ok) {
      return { kind: 'process', ...result.output };
    }
    throw processError(request.command, result.failure);
  };
}

/** Killed by a signal counts as transient; a missing binary or non-zero exit is fatal. */
export function processError(command: string, failure: ProcessFailure): ExternalServiceError {
  const target = `process:${command}`;
  const stderr = failure.stderr.trim().slice(0, 200);
  if (failure.signal) {
    return new ExternalServiceError({
      code: 'EXTERNAL.PROCESS.KILLED',
      message: `${command} was terminated by ${failure.signal}`,
      transient: true,
      target,
    });
  }
  if (failure.spawnError) {
    return new ExternalServiceError({
      code: 'EXTERNAL.PROCESS.SPAWN',
      message: `${command} could not be started: ${failure.spawnError}`,
      transient: false,
      target,
    });
  }
  return new ExternalServiceError({
    code: 'EXTERNAL.PROCESS.EXIT',
    message: `${command} exited with status ${failure.exitCode ?? 'unknown'}${stderr ? `: ${stderr}` : ''}`,
    transient: false,
    target,
  });
}
