import { describe, expect, it } from 'vitest';
import type { Task, TaskResult } from '../vsphere/types.js';
import { executeTask } from './runner.js';

function taskEnding(result: TaskResult): Task {
  return { id: 'task-1', awaitCompletion: async () => result };
}

describe('executeTask', () => {
  it('reports success with the task id', async () => {
    const result = await executeTask(async () => taskEnding({ state: 'success' }), 1000);

    expect(result.success).toBe(true);
    expect(result.taskId).toBe('task-1');
    expect(result.error).toBeUndefined();
    expect(result.endedAt).toBeGreaterThanOrEqual(result.startedAt);
  });

  it('passes the timeout through to the wait', async () => {
    let seenTimeout: number | undefined;
    const task: Task = {
      id: 'task-2',
      awaitCompletion: async (timeoutMs) => {
        seenTimeout = timeoutMs;
        return { state: 'success' };
      },
    };

    await executeTask(async () => task, 4200);

    expect(seenTimeout).toBe(4200);
  });

  it('carries the error of a failed or timed-out task', async () => {
    const failed = await executeTask(async () => taskEnding({ state: 'error', error: 'disk full' }), 1000);
    const timedOut = await executeTask(
      async () => taskEnding({ state: 'timeout', error: 'Task task-1 did not complete within 1s' }),
      1000
    );

    expect(failed).toMatchObject({ success: false, taskId: 'task-1', error: 'disk full' });
    expect(timedOut).toMatchObject({ success: false, error: 'Task task-1 did not complete within 1s' });
  });

  it('turns a failure to start into a result instead of throwing', async () => {
    const result = await executeTask(async () => {
      throw new Error('connect ECONNREFUSED 10.0.0.1:443');
    }, 1000);

    expect(result).toMatchObject({ success: false, error: 'connect ECONNREFUSED 10.0.0.1:443' });
    expect(result.taskId).toBeUndefined();
  });

  it('turns a failure while waiting into a result', async () => {
    const task: Task = {
      id: 'task-3',
      awaitCompletion: async () => {
        throw new Error('session expired');
      },
    };

    expect(await executeTask(async () => task, 1000)).toMatchObject({
      success: false,
      taskId: 'task-3',
      error: 'session expired',
    });
  });
});
