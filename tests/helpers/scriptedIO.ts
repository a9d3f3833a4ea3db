import { ShellIO } from '../../cli/session';

/**
 * ShellIO fed from a fixed list of input lines; input ends after the last one
 */
export class ScriptedIO implements ShellIO {
    output = '';
    errors = '';
    prompts: string[] = [];
    private remaining: string[];

    constructor(lines: string[]) {
        this.remaining = [...lines];
    }

    async readLine(prompt: string): Promise<string | null> {
        this.prompts.push(prompt);
        const line = this.remaining.shift();
        return line === undefined ? null : line;
    }

    write(text: string): void {
        this.output += text;
    }

    writeError(text: string): void {
        this.errors += text;
    }
}
