import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createPrompter } from '../src/prompt';

function terminal(answer: string) {
  const input = Object.assign(new PassThrough(), { isTTY: true });
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString();
  });
  setImmediate(() => input.write(`${answer}\n`));
  return { prompter: createPrompter(input, output), written: () => written };
}

describe('createPrompter', () => {
  it('asks and returns the typed line', async () => {
    const { prompter } = terminal('https://a.test/1');

    await expect(prompter.ask('URLs: ')).resolves.toBe('https://a.test/1');
  });

  it('confirms on y and shows the choices', async () => {
    const { prompter, written } = terminal('Y');

    await expect(prompter.confirm('Save changes?')).resolves.toBe(true);
    expect(written()).toContain('Save changes? [y/N] ');
  });

  it('declines on anything else', async () => {
    const { prompter } = terminal('yes');

    await expect(prompter.confirm('Save changes?')).resolves.toBe(false);
  });

  it('reads a piped answer without a terminal', async () => {
    const input = new PassThrough();
    const prompter = createPrompter(input, new PassThrough());
    setImmediate(() => input.end('https://a.test/1,https://a.test/2\n'));

    await expect(prompter.ask('URLs: ')).resolves.toBe('https://a.test/1,https://a.test/2');
  });

  it('returns an empty answer when the input ends', async () => {
    const input = new PassThrough();
    const prompter = createPrompter(input, new PassThrough());
    setImmediate(() => input.end());

    await expect(prompter.ask('URLs: ')).resolves.toBe('');
  });

  it('declines without a terminal', async () => {
    const prompter = createPrompter(new PassThrough(), new PassThrough());

    await expect(prompter.confirm('Save changes?')).resolves.toBe(false);
  });
});
