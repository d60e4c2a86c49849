import { setTimeout as delay } from 'timers/promises';
import type { Task, TaskResult } from './types.js';

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_TASK_TIMEOUT_MS = 300_000;
const MAX_CONSECUTIVE_POLL_ERRORS = 3;

export type TaskState = 'queued' | 'running' | 'success' | 'error';

export interface TaskInfo {
  state: TaskState;
  error?: string;
  progress?: number;
}

export type TaskInfoFetcher = () => Promise<TaskInfo>;

/**
 * A vCenter task tracked by polling its `info` until it reaches a terminal
 * state or the timeout elapses.
 */
export class PolledTask implements Task {
  constructor(
    readonly id: string,
    private readonly fetchInfo: TaskInfoFetcher,
    private readonly pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS,
    private readonly trace?: (line: string) => void
  ) {}

  async awaitCompletion(timeoutMs: number = DEFAULT_TASK_TIMEOUT_MS): Promise<TaskResult> {
    const deadline = Date.now() + timeoutMs;
    let pollErrors = 0;

    while (true) {
      try {
        const info = await this.fetchInfo();
        pollErrors = 0;
        this.trace?.(`Task ${this.id}: ${info.state}${info.progress !== undefined ? ` (${info.progress}%)` : ''}`);

        if (info.state === 'success') {
          return { state: 'success' };
        }
        if (info.state === 'error') {
          return { state: 'error', error: info.error || `Task ${this.id} failed` };
        }
      } catch (error) {
        pollErrors++;
        const message = error instanceof Error ? error.message : String(error);
        this.trace?.(`Task ${this.id}: status check failed (${pollErrors}/${MAX_CONSECUTIVE_POLL_ERRORS}): ${message}`);
        if (pollErrors > MAX_CONSECUTIVE_POLL_ERRORS) {
          return { state: 'error', error: `Lost track of task ${this.id}: ${message}` };
        }
      }

      if (Date.now() >= deadline) {
        return {
          state: 'timeout',
          error: `Task ${this.id} did not complete within ${Math.round(timeoutMs / 1000)}s`,
        };
      }
      await delay(this.pollIntervalMs);
    }
  }
}
