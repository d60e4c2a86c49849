/**
 * Confirmation policy and prompts for mutating VM operations.
 */

import type { ActionContext } from './context.js';
import { OperationKind, type ConfirmationRequirement, type PendingOperation, type TargetScope } from './state.js';

export type ConfirmationResult = 'accepted' | 'declined' | 'mismatch';

/**
 * A single Y (any case, surrounding whitespace ignored). Everything else,
 * including "yes", counts as no.
 */
export function isYes(input: string): boolean {
  return input.trim().toUpperCase() === 'Y';
}

/**
 * The irreversibility acknowledgment: YES in any case.
 */
export function isAcknowledged(input: string): boolean {
  return input.trim().toUpperCase() === 'YES';
}

/**
 * Derives the confirmation weight of an operation from its kind and how
 * many VMs it targets.
 */
export function requirementFor(kind: OperationKind, scope: TargetScope): ConfirmationRequirement {
  switch (kind) {
    case OperationKind.DELETE:
      return 'typed-name';
    case OperationKind.POWER_ON:
    case OperationKind.POWER_OFF:
      return scope === 'bulk' ? 'single' : 'none';
    case OperationKind.SNAPSHOT:
    case OperationKind.RECONFIGURE:
    case OperationKind.RENAME:
      return 'single';
  }
}

/**
 * Asks whatever the pending operation's requirement calls for and reports a
 * refusal. Nothing remote is touched here.
 *
 * @returns 'accepted' only when every stage was answered correctly
 */
export async function confirmOperation(ctx: ActionContext, pending: PendingOperation): Promise<ConfirmationResult> {
  const { prompt, out } = ctx;

  switch (pending.requirement) {
    case 'none':
      return 'accepted';

    case 'single': {
      const answer = await prompt.ask(pending.question);
      if (!isYes(answer)) {
        out.line(pending.declinedMessage ?? 'Cancelled.');
        return 'declined';
      }
      return 'accepted';
    }

    case 'typed-name': {
      const target = pending.target;
      if (target === 'ALL' || Array.isArray(target)) {
        out.error('❌ A typed-name confirmation needs a single target.');
        return 'declined';
      }
      const name = target.name;

      out.line(`\n⚠️  WARNING: You are about to DELETE '${name}' permanently!`);
      const acknowledgment = await prompt.ask(pending.question);
      if (!isAcknowledged(acknowledgment)) {
        out.line(pending.declinedMessage ?? 'Cancelled.');
        return 'declined';
      }

      const typed = await prompt.ask(`Type the VM name '${name}' to confirm deletion: `);
      if (typed.trim() !== name) {
        out.line('VM name does not match. Deletion cancelled.');
        return 'mismatch';
      }
      return 'accepted';
    }
  }
}
