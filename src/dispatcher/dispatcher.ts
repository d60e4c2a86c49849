import { deleteVM } from '../actions/delete.js';
import { powerVMs } from '../actions/power.js';
import { reconfigureVM } from '../actions/reconfigure.js';
import { renameVM } from '../actions/rename.js';
import { createSnapshot } from '../actions/snapshot.js';
import type { ActionContext } from '../session/context.js';
import { OperationKind, type Outcome } from '../session/state.js';
import { formatAboutInfo, formatSessionInfo, formatVMTable } from '../ui/table.js';

/**
 * Top-level entries are either informational (read-only, print and return),
 * the VM Actions submenu, or exit.
 */
export type MenuCategory = 'info' | 'action' | 'exit';

export enum MainOption {
  EXIT = 0,
  VCENTER_INFO = 1,
  SESSION_DETAILS = 2,
  VM_DETAILS = 3,
  VM_ACTIONS = 4,
}

export interface MenuEntry<T> {
  key: number;
  label: string;
  value: T;
}

export const MAIN_MENU: ReadonlyArray<MenuEntry<MainOption>> = [
  { key: 1, label: 'VCenter Info', value: MainOption.VCENTER_INFO },
  { key: 2, label: 'Session Details', value: MainOption.SESSION_DETAILS },
  { key: 3, label: 'VM Details', value: MainOption.VM_DETAILS },
  { key: 4, label: 'Perform VM Actions', value: MainOption.VM_ACTIONS },
  { key: 0, label: 'Exit the program.', value: MainOption.EXIT },
];

/** `null` leaves the submenu. */
export const VM_ACTIONS_MENU: ReadonlyArray<MenuEntry<OperationKind | null>> = [
  { key: 1, label: 'Power on VM', value: OperationKind.POWER_ON },
  { key: 2, label: 'Power Off VM', value: OperationKind.POWER_OFF },
  { key: 3, label: 'Take a Snapshot', value: OperationKind.SNAPSHOT },
  { key: 4, label: 'Delete a VM', value: OperationKind.DELETE },
  { key: 5, label: 'Reconfigure a VM', value: OperationKind.RECONFIGURE },
  { key: 6, label: 'Rename a VM', value: OperationKind.RENAME },
  { key: 0, label: 'Exit the VM Actions.', value: null },
];

export function renderMenu<T>(entries: ReadonlyArray<MenuEntry<T>>): string[] {
  return entries.map((entry) => `[${entry.key}] ${entry.label}`);
}

/**
 * Looks a typed choice up in a menu. Surrounding whitespace is ignored;
 * anything that is not one of the listed numbers yields undefined.
 */
export function parseMenuChoice<T>(entries: ReadonlyArray<MenuEntry<T>>, input: string): MenuEntry<T> | undefined {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const key = Number(trimmed);
  return entries.find((entry) => entry.key === key);
}

export function categorizeOption(option: MainOption): MenuCategory {
  switch (option) {
    case MainOption.EXIT:
      return 'exit';
    case MainOption.VM_ACTIONS:
      return 'action';
    default:
      return 'info';
  }
}

/**
 * Prints the read-only views: vCenter info, session details, VM table.
 */
export async function handleInfoOption(option: MainOption, ctx: ActionContext): Promise<void> {
  const { out, session } = ctx;

  switch (option) {
    case MainOption.VCENTER_INFO:
      out.line('VCenter Info Option Selected.');
      for (const line of formatAboutInfo(session.about())) {
        out.line(line);
      }
      return;

    case MainOption.SESSION_DETAILS:
      out.line('Session Details Selected.');
      for (const line of formatSessionInfo(await session.currentSession(), session.host)) {
        out.line(line);
      }
      return;

    case MainOption.VM_DETAILS: {
      out.line('VM Details Selected.');
      const filter = (await ctx.prompt.ask('Enter VM name to search (leave empty for all): ')).trim();
      const vms = await session.listVMs(filter || undefined);
      if (filter && vms.length === 0) {
        out.line(`No VMs found matching '${filter}'`);
        return;
      }
      out.line();
      for (const line of formatVMTable(vms)) {
        out.line(line);
      }
      return;
    }

    default:
      out.line(`Nothing to show for option ${option}.`);
  }
}

/**
 * Runs the handler for one VM action. Handlers report their own outcome.
 */
export async function dispatchOperation(kind: OperationKind, ctx: ActionContext): Promise<Outcome> {
  switch (kind) {
    case OperationKind.POWER_ON:
      return powerVMs(ctx, 'on');
    case OperationKind.POWER_OFF:
      return powerVMs(ctx, 'off');
    case OperationKind.SNAPSHOT:
      return createSnapshot(ctx);
    case OperationKind.DELETE:
      return deleteVM(ctx);
    case OperationKind.RECONFIGURE:
      return reconfigureVM(ctx);
    case OperationKind.RENAME:
      return renameVM(ctx);
  }
}
