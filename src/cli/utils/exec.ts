import { spawn } from 'node:child_process';

import { RingLabError } from '../../errors.js';

export type RunCommandResult = {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  readonly code: number;
};

export type RunCommandOptions = {
  cwd?: string;
  /** Kill the child after this many milliseconds; 0 disables the limit. */
  timeoutMs?: number;
};

export class CommandError extends RingLabError {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, args: readonly string[], exitCode: number, stderr: Buffer) {
    const text = stderr.toString('utf8').trim();
    super(
      'command-failed',
      `[exec] "${command}" exited with code ${exitCode}${text ? `: ${text.split('\n')[0]}` : ''}`,
      { command, exitCode },
    );
    this.name = 'CommandError';
    this.command = command;
    this.args = [...args];
    this.exitCode = exitCode;
    this.stderr = text;
  }
}

export const runCommand = async (
  command: string,
  args: readonly string[],
  options: RunCommandOptions = {},
): Promise<RunCommandResult> => {
  const child = spawn(command, args, {
    cwd: options.cwd,
    stdio: ['ignore', 'pipe', 'pipe'],
    timeout: options.timeoutMs ?? 0,
  });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];

  child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
  child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

  const exitCode: number = await new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code) => resolve(code ?? -1));
  });

  const stdout = Buffer.concat(stdoutChunks);
  const stderr = Buffer.concat(stderrChunks);

  if (exitCode !== 0) {
    throw new CommandError(command, args, exitCode, stderr);
  }

  return { stdout, stderr, code: exitCode };
};
