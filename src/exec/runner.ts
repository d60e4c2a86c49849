import type { Task } from '../vsphere/types.js';
import { describeError } from '../utils/describeError.js';

export interface ExecutionResult {
  success: boolean;
  taskId?: string;
  error?: string;
  startedAt: number;
  endedAt: number;
}

/**
 * Starts a vCenter task and waits for its terminal state.
 *
 * Never throws: a failure to start the task, a task that ends in error and
 * a task that outlives the timeout all come back as `success: false` with
 * the collaborator's detail in `error`.
 *
 * @param start - Issues the remote call and returns its task handle
 * @param timeoutMs - Upper bound on the wait for the task to finish
 */
export async function executeTask(start: () => Promise<Task>, timeoutMs: number): Promise<ExecutionResult> {
  const startedAt = Date.now();

  let task: Task;
  try {
    task = await start();
  } catch (error) {
    return {
      success: false,
      error: describeError(error),
      startedAt,
      endedAt: Date.now(),
    };
  }

  try {
    const result = await task.awaitCompletion(timeoutMs);
    return {
      success: result.state === 'success',
      taskId: task.id,
      error: result.state === 'success' ? undefined : result.error,
      startedAt,
      endedAt: Date.now(),
    };
  } catch (error) {
    return {
      success: false,
      taskId: task.id,
      error: describeError(error),
      startedAt,
      endedAt: Date.now(),
    };
  }
}
