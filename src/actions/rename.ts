import { executeTask } from '../exec/runner.js';
import { confirmOperation, requirementFor } from '../session/confirmation.js';
import type { ActionContext } from '../session/context.js';
import { OperationKind, type Outcome } from '../session/state.js';
import { selectTarget } from './targets.js';

export async function renameVM(ctx: ActionContext): Promise<Outcome> {
  const { out, prompt } = ctx;
  out.line('\n=== Rename a VM ===');

  const vm = await selectTarget(ctx, 'rename');
  if (!vm) {
    return 'no-target';
  }

  const confirmation = await confirmOperation(ctx, {
    kind: OperationKind.RENAME,
    target: vm,
    requirement: requirementFor(OperationKind.RENAME, 'single'),
    question: `Rename '${vm.name}'? (Y/N): `,
  });
  if (confirmation !== 'accepted') {
    return 'declined';
  }

  const newName = (await prompt.ask('Enter new VM name: ')).trim();
  if (!newName) {
    out.error('❌ VM name cannot be empty.');
    return 'invalid-input';
  }
  if (newName === vm.name) {
    out.line(`${vm.name} already has that name, nothing to do.`);
    return 'skipped';
  }

  out.line(`\nRenaming ${vm.name} to ${newName}...`);
  const result = await executeTask(() => ctx.session.rename(vm, newName), ctx.taskTimeoutMs);
  if (!result.success) {
    out.error(`❌ Failed to rename ${vm.name}: ${result.error}`);
    return 'failed';
  }

  out.line(`✅ VM renamed successfully to '${newName}'!`);
  return 'completed';
}
