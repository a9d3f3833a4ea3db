export interface CliOptions {
  recipeFiles: string[];
  minecraftVersion?: string;
  help: boolean;
}

export const USAGE = [
  'usage: crafting-calculator [-r <file>]... [--minecraft <version>] [-h]',
  '',
  '  -r, --recipes <file>     load recipes from <file> (repeatable)',
  '      --minecraft <version> import the recipes of a minecraft version',
  '  -h, --help               show this message'
].join('\n');

/**
 * Parses command line arguments (without the node and script entries)
 *
 * @throws Error describing the first unusable argument
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { recipeFiles: [], help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const inlineValue = eq >= 0 ? arg.slice(eq + 1) : undefined;
    const value = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[++i];
      if (next === undefined) throw new Error(`missing value for ${flag}`);
      return next;
    };
    switch (flag) {
      case '-r':
      case '--recipes':
        options.recipeFiles.push(value());
        break;
      case '--minecraft':
        options.minecraftVersion = value();
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new Error(`unknown argument: ${arg}`);
    }
  }
  return options;
}
