import { PassThrough } from 'stream';
import { describe, expect, it } from 'vitest';
import { createPrompter, InputClosedError } from './prompt.js';

function streams() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString();
  });
  return { input, output, written: () => written };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('createPrompter', () => {
  it('answers questions from piped lines in order', async () => {
    const { input, output, written } = streams();
    const prompt = createPrompter(input, output);

    input.write('first\nsecond\n');

    expect(await prompt.ask('Q1: ')).toBe('first');
    expect(await prompt.ask('Q2: ')).toBe('second');
    await flush();
    expect(written()).toContain('Q1: ');
    prompt.close();
  });

  it('reads a secret without echoing it', async () => {
    const { input, output, written } = streams();
    const prompt = createPrompter(input, output);

    const answer = prompt.askSecret('Password: ');
    input.write('test-secret\n');

    expect(await answer).toBe('test-secret');
    await flush();
    expect(written()).toContain('Password: ');
    expect(written()).not.toContain('test-secret');
    prompt.close();
  });

  it('rejects pending and later questions once input ends', async () => {
    const { input, output } = streams();
    const prompt = createPrompter(input, output);

    const pending = prompt.ask('Q: ');
    input.end();

    await expect(pending).rejects.toBeInstanceOf(InputClosedError);
    await expect(prompt.ask('Again: ')).rejects.toBeInstanceOf(InputClosedError);
  });
});
