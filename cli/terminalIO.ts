import * as readline from 'readline';
import { ShellIO } from './session';

/**
 * ShellIO over process streams
 */
export class TerminalIO implements ShellIO {
  private rl: readline.Interface;
  private lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
    private errors: NodeJS.WritableStream = process.stderr
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  write(text: string): void {
    this.output.write(text);
  }

  writeError(text: string): void {
    this.errors.write(text);
  }

  close(): void {
    this.rl.close();
  }
}
