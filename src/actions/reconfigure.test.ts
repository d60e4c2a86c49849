import { describe, expect, it } from 'vitest';
import { createHarness, makeVM } from '../testing/fakes.js';
import { parsePositiveInt, reconfigureVM } from './reconfigure.js';

function inventory() {
  return [makeVM('web01', 'poweredOn'), makeVM('db01', 'poweredOff')];
}

describe('parsePositiveInt', () => {
  it.each<[string, number | null]>([
    ['4', 4],
    [' 16 ', 16],
    ['0', null],
    ['-1', null],
    ['2.5', null],
    ['four', null],
    ['', null],
  ])('parses %j as %j', (input, expected) => {
    expect(parsePositiveInt(input)).toBe(expected);
  });
});

describe('reconfigureVM', () => {
  it('refuses a VM that is not powered off before asking anything else', async () => {
    const { ctx, vcenter, out, prompt } = createHarness(inventory(), ['web01']);

    const outcome = await reconfigureVM(ctx);

    expect(outcome).toBe('precondition');
    expect(prompt.questions).toEqual(['Enter VM name to reconfigure: ']);
    expect(out.entries.slice(-2)).toEqual([
      { level: 'warn', text: '\n⚠️  web01 must be powered off to reconfigure hardware!' },
      { level: 'line', text: 'Please power off the VM first.' },
    ]);
    expect(vcenter.calls).toEqual([]);
  });

  it('refuses a suspended VM', async () => {
    const { ctx, vcenter, prompt } = createHarness([makeVM('app01', 'suspended')], ['app01']);

    expect(await reconfigureVM(ctx)).toBe('precondition');
    expect(prompt.questions).toEqual(['Enter VM name to reconfigure: ']);
    expect(vcenter.calls).toEqual([]);
  });

  it('sends CPU count and memory converted to MB', async () => {
    const { ctx, vcenter, out } = createHarness(inventory(), ['db01', 'Y', 'Y', '4', 'Y', '8']);

    const outcome = await reconfigureVM(ctx);

    expect(outcome).toBe('completed');
    expect(vcenter.calls).toEqual([{ method: 'reconfigure', vm: 'db01', args: { cpuCount: 4, memoryMB: 8192 } }]);
    expect(out.lines.slice(-4)).toEqual([
      '\nReconfiguring db01...',
      '✅ db01 has been reconfigured!',
      '  - CPUs: 4',
      '  - Memory: 8 GB',
    ]);
  });

  it('changes only memory when the CPU change is declined', async () => {
    const { ctx, vcenter, out } = createHarness(inventory(), ['db01', 'Y', 'N', 'Y', '2']);

    await reconfigureVM(ctx);

    expect(vcenter.calls).toEqual([{ method: 'reconfigure', vm: 'db01', args: { memoryMB: 2048 } }]);
    expect(out.lines.at(-1)).toBe('  - Memory: 2 GB');
  });

  it('rejects a non-numeric CPU count without contacting vCenter', async () => {
    const { ctx, vcenter, out, prompt } = createHarness(inventory(), ['db01', 'Y', 'Y', 'four']);

    const outcome = await reconfigureVM(ctx);

    expect(outcome).toBe('invalid-input');
    expect(out.errors).toEqual(['❌ Invalid CPU count']);
    expect(prompt.remaining).toBe(0);
    expect(vcenter.calls).toEqual([]);
  });

  it('rejects a fractional memory size', async () => {
    const { ctx, vcenter, out } = createHarness(inventory(), ['db01', 'Y', 'Y', '4', 'Y', '1.5']);

    expect(await reconfigureVM(ctx)).toBe('invalid-input');
    expect(out.errors).toEqual(['❌ Invalid memory size']);
    expect(vcenter.calls).toEqual([]);
  });

  it('does nothing when no change is requested', async () => {
    const { ctx, vcenter, out } = createHarness(inventory(), ['db01', 'Y', 'N', 'N']);

    expect(await reconfigureVM(ctx)).toBe('skipped');
    expect(out.lines.at(-1)).toBe('No changes requested.');
    expect(vcenter.calls).toEqual([]);
  });

  it('stops at the confirmation when it is declined', async () => {
    const { ctx, vcenter, out } = createHarness(inventory(), ['db01', 'N']);

    expect(await reconfigureVM(ctx)).toBe('declined');
    expect(out.lines.at(-1)).toBe('Cancelled.');
    expect(vcenter.calls).toEqual([]);
  });
});
