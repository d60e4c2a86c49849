import { describe, expect, it } from 'vitest';
import { VSphereFaultError } from '../vsphere/errors.js';
import { createHarness, makeVM } from '../testing/fakes.js';
import { createSnapshot, defaultSnapshotName } from './snapshot.js';

const NOW = new Date(2024, 2, 5, 14, 7, 9);

describe('defaultSnapshotName', () => {
  it('stamps the local date and time', () => {
    expect(defaultSnapshotName(NOW)).toBe('Snapshot-20240305-140709');
  });
});

describe('createSnapshot', () => {
  it('takes a disk-only snapshot with the given name and description', async () => {
    const { ctx, vcenter, out } = createHarness([makeVM('db01')], ['db01', 'Y', 'before-upgrade', 'pre patch'], NOW);

    const outcome = await createSnapshot(ctx);

    expect(outcome).toBe('completed');
    expect(vcenter.calls).toEqual([
      {
        method: 'createSnapshot',
        vm: 'db01',
        args: { name: 'before-upgrade', description: 'pre patch', memory: false, quiesce: false },
      },
    ]);
    expect(out.lines.slice(-2)).toEqual([
      "\nCreating snapshot 'before-upgrade' for db01...",
      "✅ Snapshot 'before-upgrade' created for db01!",
    ]);
  });

  it('falls back to a timestamped name', async () => {
    const { ctx, vcenter } = createHarness([makeVM('db01')], ['db01', 'y', '', ''], NOW);

    await createSnapshot(ctx);

    expect(vcenter.calls[0].args).toEqual({
      name: 'Snapshot-20240305-140709',
      description: '',
      memory: false,
      quiesce: false,
    });
  });

  it('does nothing when the confirmation is declined', async () => {
    const { ctx, vcenter, prompt } = createHarness([makeVM('db01')], ['db01', 'N'], NOW);

    expect(await createSnapshot(ctx)).toBe('declined');
    expect(prompt.questions).toEqual(['Enter VM name to snapshot: ', "Create snapshot of 'db01'? (Y/N): "]);
    expect(vcenter.calls).toEqual([]);
  });

  it('reports a fault raised when starting the task', async () => {
    const { ctx, vcenter, out } = createHarness([makeVM('db01')], ['db01', 'Y', 'snap', ''], NOW);
    vcenter.startErrors.set(
      'createSnapshot',
      new VSphereFaultError('CreateSnapshot_Task', 'InvalidState', 'The operation is not allowed in the current state.')
    );

    expect(await createSnapshot(ctx)).toBe('failed');
    expect(out.errors).toEqual(['❌ Failed to create snapshot of db01: The operation is not allowed in the current state.']);
  });

  it('lists every candidate when the name is ambiguous', async () => {
    const { ctx, vcenter, out } = createHarness([makeVM('web01'), makeVM('web02')], ['web'], NOW);

    expect(await createSnapshot(ctx)).toBe('no-target');
    expect(out.lines.slice(-4)).toEqual([
      "Multiple VMs match 'web':",
      '  - web01',
      '  - web02',
      'Please enter a more specific name.',
    ]);
    expect(vcenter.calls).toEqual([]);
  });
});
