import { executeTask } from '../exec/runner.js';
import { confirmOperation, requirementFor } from '../session/confirmation.js';
import type { ActionContext } from '../session/context.js';
import { OperationKind, type Outcome } from '../session/state.js';
import { selectTarget } from './targets.js';

/**
 * Delete a VM menu entry: YES, then the exact name, then (if the VM is not
 * off) a nested power-off offer. The power-off is not rolled back when the
 * delete itself fails.
 */
export async function deleteVM(ctx: ActionContext): Promise<Outcome> {
  const { out, session } = ctx;
  out.line('\n=== Delete a VM ===');

  const vm = await selectTarget(ctx, 'DELETE');
  if (!vm) {
    return 'no-target';
  }

  const confirmation = await confirmOperation(ctx, {
    kind: OperationKind.DELETE,
    target: vm,
    requirement: requirementFor(OperationKind.DELETE, 'single'),
    question: `Are you ABSOLUTELY SURE you want to delete '${vm.name}'? (YES/NO): `,
  });
  if (confirmation === 'mismatch') {
    return 'mismatch';
  }
  if (confirmation !== 'accepted') {
    return 'declined';
  }

  if ((await session.getState(vm)) !== 'poweredOff') {
    out.line(`\n${vm.name} must be powered off before deletion.`);
    const powerOff = await confirmOperation(ctx, {
      kind: OperationKind.POWER_OFF,
      target: vm,
      requirement: 'single',
      question: 'Power off now? (Y/N): ',
      declinedMessage: 'Deletion cancelled.',
    });
    if (powerOff !== 'accepted') {
      return 'declined';
    }

    const stopped = await executeTask(() => session.powerOff(vm), ctx.taskTimeoutMs);
    if (!stopped.success) {
      out.error(`❌ Failed to power off ${vm.name}: ${stopped.error}`);
      out.line('Deletion cancelled.');
      return 'failed';
    }
    out.line(`${vm.name} powered off.`);
  }

  out.line(`\nDeleting ${vm.name} from disk...`);
  const result = await executeTask(() => session.destroy(vm), ctx.taskTimeoutMs);
  if (!result.success) {
    out.error(`❌ Failed to delete ${vm.name}: ${result.error}`);
    return 'failed';
  }

  out.line(`✅ ${vm.name} has been deleted successfully!`);
  return 'completed';
}
