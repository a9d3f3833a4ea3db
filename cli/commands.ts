/**
 * Shell commands
 *
 * Each command is a capability record: `apply` runs it against the session,
 * `describe` feeds `help`. The registry order decides which command an
 * abbreviation picks (`p` is `print`, not an error).
 */

import { Calculator } from '../crafting/calculator';
import { Recipe } from '../crafting/recipe';
import { Stack } from '../crafting/stack';
import { parseStack } from '../recipe_format/parser';
import { formatPlan, formatRecipes, formatResources } from '../recipe_format/serialize';
import { buildRecipesFromMinecraftData } from '../recipe_sources/minecraftRecipes';
import { resolveMinecraftData } from '../recipe_sources/mcDataResolver';
import { getDefaultRecipeMethod, getMinecraftVersion } from '../utils/config';
import { readRecipeFile, writeTextFile } from '../utils/recipeFiles';
import { Session } from './session';

export interface CommandDescription {
  example: string;
  summary: string;
  details?: string;
}

export interface Command {
  apply(args: string, session: Session): Promise<void>;
  describe: CommandDescription;
}

/**
 * A failure the user can fix; reported without a stack trace
 */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export type StateView = 'steps' | 'resources' | 'recipes';

function isStateView(what: string): what is StateView {
  return what === 'steps' || what === 'resources' || what === 'recipes';
}

/**
 * Renders one part of the calculator state in the text formats
 */
export function renderState(what: StateView, calculator: Calculator): string {
  switch (what) {
    case 'steps':
      return formatPlan(calculator.getSteps());
    case 'resources':
      return formatResources(calculator.getResources());
    case 'recipes':
      return formatRecipes(calculator.getRecipes());
  }
}

async function promptStack(session: Session, prompt: string, what: string): Promise<Stack> {
  const answer = await session.io.readLine(`${prompt}: `);
  if (answer === null) {
    throw new CommandError(`Couldn't get ${what}: end of input`);
  }
  return parseStack(answer);
}

const help: Command = {
  async apply(args, session) {
    const command = args.length > 0 ? COMMANDS.get(args) : undefined;
    if (command) {
      session.io.write(`${command.describe.details ?? command.describe.summary}\n`);
      return;
    }
    const descriptions = Array.from(COMMANDS.values(), c => c.describe);
    const width = Math.max(...descriptions.map(d => d.example.length));
    for (const d of descriptions) {
      session.io.write(`${d.example.padEnd(width)}   ${d.summary}\n`);
    }
  },
  describe: {
    example: 'help [cmd]',
    summary: 'Print this help message or print detailed help about `cmd`.',
    details: 'Print information about the available commands. Use `help cmd` to print help about the command `cmd`.'
  }
};

const load: Command = {
  async apply(args, session) {
    if (args.length === 0) {
      throw new CommandError("Can't load recipes with no `file` argument.");
    }
    const recipes = readRecipeFile(args, getDefaultRecipeMethod());
    session.calculator.addRecipes(recipes);
    session.io.write(`Loaded ${recipes.length} recipe(s) from ${args}\n`);
  },
  describe: {
    example: 'load <file>',
    summary: 'Read recipes from `file`.'
  }
};

const print: Command = {
  async apply(args, session) {
    const what = args.length > 0 ? args : 'steps';
    if (!isStateView(what)) {
      throw new CommandError(`Unknown \`what\`: ${JSON.stringify(what)}`);
    }
    session.io.write(renderState(what, session.calculator));
  },
  describe: {
    example: 'print [what]',
    summary: 'Print the current state of the calculator.',
    details:
      'Print the current state of the calculator.\n' +
      '`what` can be `steps`, `resources`, or `recipes`. ' +
      'If `what` is omitted, it is assumed to be `steps`.'
  }
};

const recipe: Command = {
  async apply(_args, session) {
    const result = await promptStack(session, 'Enter result (ex: Oak Planks (4))', 'result');
    const method = await session.io.readLine('Enter crafting method: ');
    if (method === null) {
      throw new CommandError("Couldn't get crafting method: end of input");
    }
    const ingredients: Stack[] = [];
    for (;;) {
      const answer = await session.io.readLine('Enter ingredient (leave blank to finish): ');
      if (answer === null || answer.trim().length === 0) break;
      ingredients.push(parseStack(answer));
    }
    const trimmedMethod = method.trim();
    session.calculator.setRecipe(
      new Recipe(result, trimmedMethod.length > 0 ? trimmedMethod : getDefaultRecipeMethod(), ingredients)
    );
  },
  describe: {
    example: 'recipe',
    summary: 'Add a new recipe to the calculator',
    details: 'Prompts for the result, the crafting method and the ingredients (until a blank line) and adds that recipe to the calculator.'
  }
};

const resource: Command = {
  async apply(args, session) {
    const stack = args.length > 0 ? parseStack(args) : await promptStack(session, 'Enter resource', 'resource');
    session.calculator.addResource(stack);
  },
  describe: {
    example: 'resource [stack]',
    summary: 'Adds `stack` as a resource that is already available for crafting',
    details: 'Adds `stack` as a resource that is already available and therefore does not need to be crafted'
  }
};

const target: Command = {
  async apply(args, session) {
    if (args.length === 0) {
      session.io.write(`Current target is ${session.calculator.getTarget()}\n`);
      return;
    }
    session.calculator.setTarget(parseStack(args));
  },
  describe: {
    example: 'target [stack]',
    summary: 'Sets the calculator to target `stack` or prints the current target',
    details: "If `stack` is given, the calculator's target is set to `stack`. Otherwise, prints the calculator's current target."
  }
};

/**
 * Splits `write` arguments into a file name and what to write. The last word
 * names the view only when it is one; otherwise it is part of the file name.
 */
export function splitWriteArgs(args: string): { file: string; what: StateView } {
  const words = args.split(/\s+/).filter(Boolean);
  if (words.length === 0) {
    throw new CommandError("Can't write state with no `file` argument.");
  }
  const last = words[words.length - 1];
  if (words.length > 1 && isStateView(last)) {
    return { file: args.slice(0, args.length - last.length).trim(), what: last };
  }
  return { file: args, what: 'recipes' };
}

const write: Command = {
  async apply(args, session) {
    const { file, what } = splitWriteArgs(args);
    writeTextFile(file, renderState(what, session.calculator));
  },
  describe: {
    example: 'write <file> [what]',
    summary: 'Similar to `print what` but writes to `file` and defaults to `recipes`.',
    details:
      'Write the current state of the calculator to `file`.\n' +
      '`what` can be `steps`, `resources`, or `recipes`. ' +
      'If `what` is omitted, it is assumed to be `recipes`.'
  }
};

const importRecipes: Command = {
  async apply(args, session) {
    const version = args.length > 0 ? args : getMinecraftVersion();
    const mcData = resolveMinecraftData(version);
    if (!mcData) {
      throw new CommandError(`Unknown minecraft version ${JSON.stringify(version)}`);
    }
    const recipes = buildRecipesFromMinecraftData(mcData);
    session.calculator.addRecipes(recipes);
    session.io.write(`Imported ${recipes.length} recipe(s) for minecraft ${version}\n`);
  },
  describe: {
    example: 'import [version]',
    summary: 'Add the crafting and smelting recipes of a minecraft version.',
    details: 'Add the crafting and smelting recipes of minecraft `version` (from minecraft-data). Without `version`, the configured version is used.'
  }
};

export const COMMANDS: ReadonlyMap<string, Command> = new Map<string, Command>([
  ['help', help],
  ['import', importRecipes],
  ['load', load],
  ['print', print],
  ['recipe', recipe],
  ['resource', resource],
  ['target', target],
  ['write', write]
]);

/**
 * First command whose name starts with `word`
 */
export function findCommand(word: string): Command | undefined {
  for (const [name, command] of COMMANDS) {
    if (name.startsWith(word)) return command;
  }
  return undefined;
}

export const helpCommand = help;
