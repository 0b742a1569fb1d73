import process from 'process';
import readline from 'readline/promises';
import { Writable } from 'stream';

export interface Prompter {
  ask(question: string): Promise<string>;
  askHidden(question: string): Promise<string>;
}

export class TerminalPrompter implements Prompter {
  async ask(question: string): Promise<string> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: true });
    try {
      return (await rl.question(`${question}: `)).trim();
    } finally {
      rl.close();
    }
  }

  async askHidden(question: string): Promise<string> {
    process.stdout.write(`${question}: `);
    let muted = true;
    const output = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) {
          process.stdout.write(chunk);
        }
        callback();
      },
    });
    const rl = readline.createInterface({ input: process.stdin, output, terminal: true });
    try {
      return await rl.question('');
    } finally {
      muted = false;
      rl.close();
      process.stdout.write('\n');
    }
  }
}
