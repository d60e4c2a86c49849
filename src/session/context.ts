import type { Prompter } from '../ui/prompt.js';
import type { Output } from '../ui/output.js';
import { DEFAULT_TASK_TIMEOUT_MS } from '../vsphere/task.js';
import type { VCenterSession } from '../vsphere/types.js';

/**
 * Everything a menu handler needs, created once per connected session and
 * passed down explicitly.
 */
export interface ActionContext {
  session: VCenterSession;
  prompt: Prompter;
  out: Output;
  taskTimeoutMs: number;
  now: () => Date;
}

export function createActionContext(
  session: VCenterSession,
  prompt: Prompter,
  out: Output,
  options: { taskTimeoutMs?: number; now?: () => Date } = {}
): ActionContext {
  return {
    session,
    prompt,
    out,
    taskTimeoutMs: options.taskTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS,
    now: options.now ?? (() => new Date()),
  };
}
