/**
 * Command Execution
 * 
 * Runs a short-lived external command to completion and captures its output.
 * Long-running encodes do not go through here; they are driven by the
 * engine in @transcoder/processing so telemetry can be streamed.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds
}

const KILL_GRACE_MS = 10000;
const MAX_OUTPUT_SIZE = 10 * 1024 * 1024; // bytes per stream

/**
 * Execute an external command and collect stdout/stderr.
 * Rejects only when the process cannot be spawned.
 */
export async function executeCommand(
  command: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { timeout = 300000 } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | null = null;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
    }, timeout);

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
    };

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < MAX_OUTPUT_SIZE) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < MAX_OUTPUT_SIZE) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      cleanup();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}
