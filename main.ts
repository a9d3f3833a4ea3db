#!/usr/bin/env node
import { USAGE, parseArgs, CliOptions } from './cli/args';
import { Session } from './cli/session';
import { executeLine, runShell } from './cli/shell';
import { TerminalIO } from './cli/terminalIO';
import { Calculator } from './crafting/calculator';
import { loadConfigFromEnv } from './utils/config';
import logger from './utils/logger';

async function main(argv: readonly string[]): Promise<number> {
  loadConfigFromEnv();

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n${USAGE}\n`);
    return 2;
  }
  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const io = new TerminalIO();
  const session: Session = { calculator: new Calculator(), io };
  try {
    for (const file of options.recipeFiles) {
      await executeLine(`load ${file}`, session);
    }
    if (options.minecraftVersion) {
      await executeLine(`import ${options.minecraftVersion}`, session);
    }
    await runShell(session);
  } finally {
    io.close();
  }
  return 0;
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  err => {
    logger.error('crafting calculator failed:', err);
    process.exitCode = 1;
  }
);
