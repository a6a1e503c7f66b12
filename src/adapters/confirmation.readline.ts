import readline from 'readline';
import type { ConfirmationGatePort } from '../services/ports/confirmation.port';

interface ReadlineGateStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/** Asks on the terminal; end of input counts as an empty (declining) answer. */
export class ReadlineConfirmationGate implements ConfirmationGatePort {
  constructor(private readonly streams: ReadlineGateStreams = { input: process.stdin, output: process.stdout }) {}

  prompt(message: string): Promise<string> {
    return new Promise((resolve) => {
      const rl = readline.createInterface({ input: this.streams.input, output: this.streams.output });
      let answered = false;
      rl.on('close', () => {
        if (!answered) resolve('');
      });
      rl.question(`${message}: `, (answer) => {
        answered = true;
        rl.close();
        resolve(answer);
      });
    });
  }
}

/**
 * Answers every prompt with the token given on the command line.
 * The engine compares it exactly as it would a typed answer.
 */
export class PresetConfirmationGate implements ConfirmationGatePort {
  readonly prompts: string[] = [];

  constructor(private readonly answer: string) {}

  async prompt(message: string): Promise<string> {
    this.prompts.push(message);
    return this.answer;
  }
}
