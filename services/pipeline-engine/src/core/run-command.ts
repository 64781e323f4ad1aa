import { exec } from 'child_process';

import { CommandFailedError } from './errors.js';

export type LogCallback = (line: string) => void;

export interface RunCommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Written to the child's stdin, then stdin is closed. */
  input?: string;
  signal?: AbortSignal;
  onLog?: LogCallback;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export const shellEscape = (value: string): string =>
  process.platform === 'win32' ? `"${value.replace(/"/g, '\\"')}"` : `'${value.replace(/'/g, `'"'"'`)}'`;

/**
 * Run a command and stream stdout/stderr lines to a callback in real time.
 * Resolves with the exit code instead of rejecting on a non-zero exit, so
 * callers can decide how a failure maps onto their own result.
 */
export const spawnCommand = async (command: string, options: RunCommandOptions = {}): Promise<CommandResult> => {
  return new Promise((resolve, reject) => {
    const child = exec(command, {
      maxBuffer: 1024 * 1024 * 50,
      ...(options.cwd ? { cwd: options.cwd } : {}),
      ...(options.env ? { env: { ...process.env, ...options.env } } : {}),
      ...(options.signal ? { signal: options.signal } : {}),
    });

    const stdoutChunks: Buffer[] = [];
    let stderrText = '';

    const emitLine = (line: string) => {
      const trimmed = line.trim();
      if (trimmed && options.onLog) {
        options.onLog(trimmed);
      }
    };

    let stdoutRemainder = '';
    child.stdout?.on('data', (chunk: Buffer | string) => {
      const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      stdoutChunks.push(data);
      const lines = (stdoutRemainder + data.toString('utf8')).split(/\r?\n/);
      stdoutRemainder = lines.pop() ?? '';
      for (const line of lines) {
        emitLine(line);
      }
    });

    let stderrRemainder = '';
    child.stderr?.on('data', (chunk: Buffer | string) => {
      const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      stderrText += text;
      const lines = (stderrRemainder + text).split(/\r?\n/);
      stderrRemainder = lines.pop() ?? '';
      for (const line of lines) {
        emitLine(line);
      }
    });

    if (options.input !== undefined) {
      child.stdin?.end(options.input);
    }

    child.on('close', (code) => {
      if (stdoutRemainder.trim()) emitLine(stdoutRemainder);
      if (stderrRemainder.trim()) emitLine(stderrRemainder);

      resolve({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdoutChunks).toString('utf8').trim(),
        stderr: stderrText.trim(),
      });
    });

    child.on('error', (error) => {
      reject(error);
    });
  });
};

export const runCommand = async (command: string, options: RunCommandOptions = {}): Promise<string> => {
  const result = await spawnCommand(command, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(command, result.exitCode, result.stdout, result.stderr);
  }
  return result.stdout;
};
