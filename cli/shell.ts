import { CraftingError } from '../crafting/errors';
import logger from '../utils/logger';
import { CommandError, findCommand, helpCommand } from './commands';
import { Session } from './session';

const log = logger.child('shell');

function describeError(err: unknown): string {
  if (err instanceof CommandError || err instanceof CraftingError) return err.message;
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

/**
 * Runs one command line. Unknown commands print the help table; failures are
 * reported on the error stream and do not end the session.
 */
export async function executeLine(line: string, session: Session): Promise<void> {
  const trimmed = line.trim();
  if (trimmed.length === 0) return;
  const word = trimmed.split(/\s+/)[0];
  const args = trimmed.slice(word.length).trim();
  const command = findCommand(word);
  try {
    if (command) {
      await command.apply(args, session);
    } else {
      await helpCommand.apply('', session);
    }
  } catch (err) {
    log.debug(`command "${word}" failed:`, err);
    session.io.writeError(`${describeError(err)}\n`);
  }
}

/**
 * Reads and runs commands until the input ends
 */
export async function runShell(session: Session): Promise<void> {
  for (;;) {
    const line = await session.io.readLine('$ ');
    if (line === null) {
      session.io.write('\n');
      return;
    }
    await executeLine(line, session);
  }
}
