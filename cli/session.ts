import { Calculator } from '../crafting/calculator';

/**
 * Line-oriented input and output of the shell
 */
export interface ShellIO {
  /**
   * Shows `prompt` and reads one line without its line break
   *
   * @returns The line, or null at end of input
   */
  readLine(prompt: string): Promise<string | null>;

  /**
   * Writes `text` as-is to the output stream
   */
  write(text: string): void;

  /**
   * Writes `text` as-is to the error stream
   */
  writeError(text: string): void;
}

export interface Session {
  calculator: Calculator;
  io: ShellIO;
}
