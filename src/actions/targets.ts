import type { ActionContext } from '../session/context.js';
import { formatVMList } from '../ui/table.js';
import type { Output } from '../ui/output.js';
import { filterByName } from '../vsphere/client.js';
import type { VMHandle } from '../vsphere/types.js';

/**
 * Fetches the inventory and prints the names the operator can pick from.
 */
export async function loadInventory(ctx: ActionContext): Promise<VMHandle[]> {
  const vms = await ctx.session.listVMs();
  if (vms.length === 0) {
    ctx.out.line('No VMs found!');
    return vms;
  }
  ctx.out.line();
  for (const line of formatVMList(vms)) {
    ctx.out.line(line);
  }
  ctx.out.line();
  return vms;
}

/**
 * VMs a typed name refers to: exact (case-insensitive) matches when there
 * are any, substring matches otherwise.
 */
export function matchTargets(vms: VMHandle[], query: string): VMHandle[] {
  const needle = query.toLowerCase();
  const exact = vms.filter((vm) => vm.name.toLowerCase() === needle);
  return exact.length > 0 ? exact : filterByName(vms, query);
}

/**
 * Resolves a typed name to exactly one VM, reporting why when it cannot.
 */
export function resolveSingle(out: Output, vms: VMHandle[], query: string): VMHandle | null {
  if (!query) {
    out.line('No VM name entered.');
    return null;
  }

  const matches = matchTargets(vms, query);
  if (matches.length === 0) {
    out.line(`No VM found matching '${query}'`);
    return null;
  }
  if (matches.length > 1) {
    out.line(`Multiple VMs match '${query}':`);
    for (const vm of matches) {
      out.line(`  - ${vm.name}`);
    }
    out.line('Please enter a more specific name.');
    return null;
  }
  return matches[0];
}

/**
 * Shows the inventory, asks for one VM name and resolves it.
 *
 * @param verb - Fills "Enter VM name to <verb>: "
 */
export async function selectTarget(ctx: ActionContext, verb: string): Promise<VMHandle | null> {
  const vms = await loadInventory(ctx);
  if (vms.length === 0) {
    return null;
  }
  const query = (await ctx.prompt.ask(`Enter VM name to ${verb}: `)).trim();
  return resolveSingle(ctx.out, vms, query);
}
