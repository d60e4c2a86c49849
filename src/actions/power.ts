import { executeTask } from '../exec/runner.js';
import { describeError } from '../utils/describeError.js';
import { confirmOperation, requirementFor } from '../session/confirmation.js';
import type { ActionContext } from '../session/context.js';
import { OperationKind, type Outcome, type PendingOperation, type TargetScope } from '../session/state.js';
import type { PowerState, Task, VCenterSession, VMHandle } from '../vsphere/types.js';
import { loadInventory, matchTargets } from './targets.js';

export type PowerAction = 'on' | 'off';

interface PowerSpec {
  kind: OperationKind;
  title: string;
  verb: string;
  verbing: string;
  desiredState: PowerState;
  start: (session: VCenterSession, vm: VMHandle) => Promise<Task>;
}

const POWER_SPECS: Record<PowerAction, PowerSpec> = {
  on: {
    kind: OperationKind.POWER_ON,
    title: 'Power On',
    verb: 'power on',
    verbing: 'powering on',
    desiredState: 'poweredOn',
    start: (session, vm) => session.powerOn(vm),
  },
  off: {
    kind: OperationKind.POWER_OFF,
    title: 'Power Off',
    verb: 'power off',
    verbing: 'powering off',
    desiredState: 'poweredOff',
    start: (session, vm) => session.powerOff(vm),
  },
};

export function describePowerState(state: PowerState): string {
  switch (state) {
    case 'poweredOn':
      return 'powered on';
    case 'poweredOff':
      return 'powered off';
    case 'suspended':
      return 'suspended';
  }
}

/**
 * Brings one VM to the desired power state, skipping it when it is already
 * there. A failed state read or task is reported and returned, never thrown.
 */
export async function applyPower(ctx: ActionContext, vm: VMHandle, action: PowerAction): Promise<Outcome> {
  const spec = POWER_SPECS[action];
  const target = describePowerState(spec.desiredState);

  let current: PowerState;
  try {
    current = await ctx.session.getState(vm);
  } catch (error) {
    ctx.out.error(`❌ Failed to ${spec.verb} ${vm.name}: ${describeError(error)}`);
    return 'failed';
  }
  if (current === spec.desiredState) {
    ctx.out.line(`${vm.name} is already ${target}, skipping!`);
    return 'skipped';
  }

  ctx.out.line(`${vm.name} is ${describePowerState(current)}, ${spec.verbing} now!`);
  const result = await executeTask(() => spec.start(ctx.session, vm), ctx.taskTimeoutMs);
  if (!result.success) {
    ctx.out.error(`❌ Failed to ${spec.verb} ${vm.name}: ${result.error}`);
    return 'failed';
  }

  ctx.out.line(`✅ ${vm.name} is now ${target}!`);
  return 'completed';
}

/**
 * Power On / Power Off menu entry. An empty name means every VM; that, or a
 * name matching several VMs, needs an explicit Y first.
 */
export async function powerVMs(ctx: ActionContext, action: PowerAction): Promise<Outcome> {
  const spec = POWER_SPECS[action];
  ctx.out.line(`\n=== ${spec.title} VM(s) ===`);

  const vms = await loadInventory(ctx);
  if (vms.length === 0) {
    return 'no-target';
  }

  const query = (await ctx.prompt.ask(`Enter VM name to ${spec.verb} (leave empty for ALL): `)).trim();

  let targets: VMHandle[];
  let pending: PendingOperation;
  if (query) {
    targets = matchTargets(vms, query);
    if (targets.length === 0) {
      ctx.out.line(`No VM found matching '${query}'`);
      return 'no-target';
    }
    const scope: TargetScope = targets.length > 1 ? 'bulk' : 'single';
    pending = {
      kind: spec.kind,
      target: scope === 'single' ? targets[0] : targets,
      requirement: requirementFor(spec.kind, scope),
      question: `Are you sure you want to ${spec.verb} ${targets.length} VMs matching '${query}'? (Y/N): `,
    };
  } else {
    targets = vms;
    pending = {
      kind: spec.kind,
      target: 'ALL',
      requirement: requirementFor(spec.kind, 'bulk'),
      question: `Are you sure you want to ${spec.verb} ALL VMs? (Y/N): `,
    };
  }

  if ((await confirmOperation(ctx, pending)) !== 'accepted') {
    return 'declined';
  }

  const outcomes: Outcome[] = [];
  for (const vm of targets) {
    outcomes.push(await applyPower(ctx, vm, action));
  }

  if (outcomes.includes('failed')) {
    return 'failed';
  }
  return outcomes.includes('completed') ? 'completed' : 'skipped';
}
