import { describe, it, expect } from '@jest/globals';
import { PassThrough } from 'stream';
import { PresetConfirmationGate, ReadlineConfirmationGate } from '../../../adapters/confirmation.readline';

function streams() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString();
  });
  return { input, output, written: () => written };
}

describe('ReadlineConfirmationGate', () => {
  it('shows the prompt and returns the typed line', async () => {
    const io = streams();
    const gate = new ReadlineConfirmationGate(io);

    const answer = gate.prompt('Type YES to delete 45 messages');
    io.input.write('YES\n');

    await expect(answer).resolves.toBe('YES');
    expect(io.written()).toContain('Type YES to delete 45 messages: ');
  });

  it('keeps the answer exactly as typed', async () => {
    const io = streams();
    const answer = new ReadlineConfirmationGate(io).prompt('Confirm');
    io.input.write('yes\n');
    await expect(answer).resolves.toBe('yes');
  });

  it('treats end of input as an empty answer', async () => {
    const io = streams();
    const answer = new ReadlineConfirmationGate(io).prompt('Confirm');
    io.input.end();
    await expect(answer).resolves.toBe('');
  });
});

describe('PresetConfirmationGate', () => {
  it('returns the preset token and records the prompt', async () => {
    const gate = new PresetConfirmationGate('DELETE');
    await expect(gate.prompt('Type DELETE to purge')).resolves.toBe('DELETE');
    expect(gate.prompts).toEqual(['Type DELETE to purge']);
  });
});
