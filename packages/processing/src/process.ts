/**
 * Process Launcher
 *
 * The one place the encoder is spawned. The orchestrator only sees the
 * `LaunchedProcess` shape, so tests hand it in-process fakes.
 */

import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface LaunchedProcess {
  readonly pid: number | undefined;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Settles once the process is gone; rejects when it never started */
  readonly exited: Promise<ProcessExit>;
  kill(signal: NodeJS.Signals): boolean;
}

export type ProcessLauncher = (command: string, args: readonly string[]) => LaunchedProcess;

/**
 * Spawn with stdin closed and both output streams piped
 */
export const spawnProcess: ProcessLauncher = (command, args) => {
  const child = spawn(command, [...args], {
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  const exited = new Promise<ProcessExit>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code, signal) => resolve({ code, signal }));
  });

  return {
    pid: child.pid,
    stdout: child.stdout,
    stderr: child.stderr,
    exited,
    kill: (signal) => child.kill(signal),
  };
};

/**
 * Fixed-size tail of a text stream, for error reports
 */
export class TailBuffer {
  private text = '';

  constructor(private readonly maxChars: number = 4000) {}

  push(chunk: string): void {
    this.text += chunk;
    if (this.text.length > this.maxChars * 2) {
      this.text = this.text.slice(-this.maxChars);
    }
  }

  toString(): string {
    return this.text.slice(-this.maxChars).trim();
  }
}
