import { executeTask } from '../exec/runner.js';
import { confirmOperation, isYes, requirementFor } from '../session/confirmation.js';
import type { ActionContext } from '../session/context.js';
import { OperationKind, type Outcome } from '../session/state.js';
import type { ReconfigureSpec } from '../vsphere/types.js';
import { selectTarget } from './targets.js';

/**
 * Whole positive number, or null for anything else ("2.5", "-1", "0", "four").
 */
export function parsePositiveInt(input: string): number | null {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

/**
 * Reconfigure a VM menu entry. Refuses outright unless the VM is powered
 * off; both answers are collected before anything is sent, so a bad entry
 * leaves the VM untouched.
 */
export async function reconfigureVM(ctx: ActionContext): Promise<Outcome> {
  const { out, prompt } = ctx;
  out.line('\n=== Reconfigure a VM ===');

  const vm = await selectTarget(ctx, 'reconfigure');
  if (!vm) {
    return 'no-target';
  }

  if ((await ctx.session.getState(vm)) !== 'poweredOff') {
    out.warn(`\n⚠️  ${vm.name} must be powered off to reconfigure hardware!`);
    out.line('Please power off the VM first.');
    return 'precondition';
  }

  const confirmation = await confirmOperation(ctx, {
    kind: OperationKind.RECONFIGURE,
    target: vm,
    requirement: requirementFor(OperationKind.RECONFIGURE, 'single'),
    question: `Reconfigure '${vm.name}'? (Y/N): `,
  });
  if (confirmation !== 'accepted') {
    return 'declined';
  }

  const spec: ReconfigureSpec = {};

  if (isYes(await prompt.ask('Change CPU count? (Y/N): '))) {
    const cpuCount = parsePositiveInt(await prompt.ask('Enter new CPU count: '));
    if (cpuCount === null) {
      out.error('❌ Invalid CPU count');
      return 'invalid-input';
    }
    spec.cpuCount = cpuCount;
  }

  let memoryGB: number | undefined;
  if (isYes(await prompt.ask('Change Memory? (Y/N): '))) {
    const parsed = parsePositiveInt(await prompt.ask('Enter new Memory in GB: '));
    if (parsed === null) {
      out.error('❌ Invalid memory size');
      return 'invalid-input';
    }
    memoryGB = parsed;
    spec.memoryMB = parsed * 1024;
  }

  if (spec.cpuCount === undefined && spec.memoryMB === undefined) {
    out.line('No changes requested.');
    return 'skipped';
  }

  out.line(`\nReconfiguring ${vm.name}...`);
  const result = await executeTask(() => ctx.session.reconfigure(vm, spec), ctx.taskTimeoutMs);
  if (!result.success) {
    out.error(`❌ Failed to reconfigure ${vm.name}: ${result.error}`);
    return 'failed';
  }

  out.line(`✅ ${vm.name} has been reconfigured!`);
  if (spec.cpuCount !== undefined) {
    out.line(`  - CPUs: ${spec.cpuCount}`);
  }
  if (memoryGB !== undefined) {
    out.line(`  - Memory: ${memoryGB} GB`);
  }
  return 'completed';
}
