import { describe, expect, it } from 'vitest';
import { PolledTask, type TaskInfo } from './task.js';

function scripted(steps: Array<TaskInfo | Error>) {
  let calls = 0;
  const fetchInfo = async (): Promise<TaskInfo> => {
    const step = steps[Math.min(calls, steps.length - 1)];
    calls++;
    if (step instanceof Error) {
      throw step;
    }
    return step;
  };
  return { fetchInfo, calls: () => calls };
}

describe('PolledTask', () => {
  it('polls until the task succeeds', async () => {
    const { fetchInfo, calls } = scripted([{ state: 'queued' }, { state: 'running', progress: 40 }, { state: 'success' }]);
    const trace: string[] = [];

    const result = await new PolledTask('task-7', fetchInfo, 1, (line) => trace.push(line)).awaitCompletion(5000);

    expect(result).toEqual({ state: 'success' });
    expect(calls()).toBe(3);
    expect(trace).toEqual(['Task task-7: queued', 'Task task-7: running (40%)', 'Task task-7: success']);
  });

  it('returns the error reported by vCenter', async () => {
    const { fetchInfo } = scripted([{ state: 'error', error: 'Insufficient disk space on datastore.' }]);

    const result = await new PolledTask('task-8', fetchInfo, 1).awaitCompletion(5000);

    expect(result).toEqual({ state: 'error', error: 'Insufficient disk space on datastore.' });
  });

  it('falls back to a generic message for an error without detail', async () => {
    const { fetchInfo } = scripted([{ state: 'error' }]);

    expect(await new PolledTask('task-9', fetchInfo, 1).awaitCompletion(5000)).toEqual({
      state: 'error',
      error: 'Task task-9 failed',
    });
  });

  it('times out when the task never finishes', async () => {
    const { fetchInfo } = scripted([{ state: 'running' }]);

    const result = await new PolledTask('task-10', fetchInfo, 1).awaitCompletion(0);

    expect(result).toEqual({ state: 'timeout', error: 'Task task-10 did not complete within 0s' });
  });

  it('rides out a few failed status checks', async () => {
    const blip = new Error('ECONNRESET');
    const { fetchInfo, calls } = scripted([blip, blip, blip, { state: 'success' }]);

    expect(await new PolledTask('task-11', fetchInfo, 1).awaitCompletion(5000)).toEqual({ state: 'success' });
    expect(calls()).toBe(4);
  });

  it('gives up after the fourth consecutive failed status check', async () => {
    const { fetchInfo, calls } = scripted([new Error('ECONNRESET')]);

    const result = await new PolledTask('task-12', fetchInfo, 1).awaitCompletion(5000);

    expect(result).toEqual({ state: 'error', error: 'Lost track of task task-12: ECONNRESET' });
    expect(calls()).toBe(4);
  });
});
