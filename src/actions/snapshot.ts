import { format } from 'date-fns';
import { executeTask } from '../exec/runner.js';
import { confirmOperation, requirementFor } from '../session/confirmation.js';
import type { ActionContext } from '../session/context.js';
import { OperationKind, type Outcome } from '../session/state.js';
import { selectTarget } from './targets.js';

export function defaultSnapshotName(now: Date): string {
  return `Snapshot-${format(now, 'yyyyMMdd-HHmmss')}`;
}

/**
 * Take a Snapshot menu entry. Disk-only, no guest quiescing.
 */
export async function createSnapshot(ctx: ActionContext): Promise<Outcome> {
  ctx.out.line('\n=== Take a Snapshot ===');

  const vm = await selectTarget(ctx, 'snapshot');
  if (!vm) {
    return 'no-target';
  }

  const confirmation = await confirmOperation(ctx, {
    kind: OperationKind.SNAPSHOT,
    target: vm,
    requirement: requirementFor(OperationKind.SNAPSHOT, 'single'),
    question: `Create snapshot of '${vm.name}'? (Y/N): `,
  });
  if (confirmation !== 'accepted') {
    return 'declined';
  }

  const name = (await ctx.prompt.ask('Enter snapshot name: ')).trim() || defaultSnapshotName(ctx.now());
  const description = (await ctx.prompt.ask('Enter snapshot description (optional): ')).trim();

  ctx.out.line(`\nCreating snapshot '${name}' for ${vm.name}...`);
  const result = await executeTask(
    () => ctx.session.createSnapshot(vm, { name, description, memory: false, quiesce: false }),
    ctx.taskTimeoutMs
  );
  if (!result.success) {
    ctx.out.error(`❌ Failed to create snapshot of ${vm.name}: ${result.error}`);
    return 'failed';
  }

  ctx.out.line(`✅ Snapshot '${name}' created for ${vm.name}!`);
  return 'completed';
}
