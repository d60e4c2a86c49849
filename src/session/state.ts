import type { VMHandle } from '../vsphere/types.js';

/**
 * Which menu the console loop is currently showing.
 */
export enum MenuLevel {
  MAIN = 'MAIN',
  VM_ACTIONS = 'VM_ACTIONS',
}

/**
 * Mutating operations offered by the VM Actions menu.
 */
export enum OperationKind {
  POWER_ON = 'PowerOn',
  POWER_OFF = 'PowerOff',
  SNAPSHOT = 'Snapshot',
  DELETE = 'Delete',
  RECONFIGURE = 'Reconfigure',
  RENAME = 'Rename',
}

/**
 * How much the operator has to type before an operation goes ahead.
 * - none: nothing (single named power target)
 * - single: one Y
 * - typed-name: YES, then the VM name retyped exactly
 */
export type ConfirmationRequirement = 'none' | 'single' | 'typed-name';

/** `bulk` covers ALL VMs as well as a name that matched several. */
export type TargetScope = 'single' | 'bulk';

/**
 * An operation waiting on the operator's answer. Lives only for the
 * duration of one handler call.
 */
export interface PendingOperation {
  kind: OperationKind;
  /** One VM, the VMs a name matched, or every VM in the inventory. */
  target: VMHandle | VMHandle[] | 'ALL';
  requirement: ConfirmationRequirement;
  question: string;
  declinedMessage?: string;
}

/**
 * What a handler ended with. Every outcome has been reported to the
 * operator by the time it is returned.
 */
export type Outcome =
  | 'completed'
  | 'skipped'
  | 'declined'
  | 'mismatch'
  | 'no-target'
  | 'precondition'
  | 'invalid-input'
  | 'failed';
