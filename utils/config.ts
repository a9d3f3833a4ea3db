/**
 * Global configuration for parsing and planning
 */

let defaultRecipeMethod = 'Crafting Table';
let maxCraftDepth = Number.MAX_SAFE_INTEGER;
let minecraftVersion = '1.20.1';
let useDisplayNames = true;

export function setDefaultRecipeMethod(method: string): void {
  const trimmed = method.trim();
  if (trimmed.length > 0) {
    defaultRecipeMethod = trimmed;
  }
}

export function getDefaultRecipeMethod(): string {
  return defaultRecipeMethod;
}

/**
 * Largest depth the demand queue may assign before it compacts itself.
 * Lowering it is mostly useful to exercise compaction.
 */
export function setMaxCraftDepth(n: number): void {
  if (Number.isSafeInteger(n) && n >= 1) {
    maxCraftDepth = n;
  }
}

export function getMaxCraftDepth(): number {
  return maxCraftDepth;
}

export function setMinecraftVersion(version: string): void {
  const trimmed = version.trim();
  if (trimmed.length > 0) {
    minecraftVersion = trimmed;
  }
}

export function getMinecraftVersion(): string {
  return minecraftVersion;
}

export function setUseDisplayNames(v: boolean): void {
  useDisplayNames = !!v;
}

export function getUseDisplayNames(): boolean {
  return useDisplayNames;
}

/**
 * Applies overrides from the process environment
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  if (env.CRAFTING_DEFAULT_METHOD) setDefaultRecipeMethod(env.CRAFTING_DEFAULT_METHOD);
  if (env.CRAFTING_MINECRAFT_VERSION) setMinecraftVersion(env.CRAFTING_MINECRAFT_VERSION);
  if (env.CRAFTING_USE_DISPLAY_NAMES) setUseDisplayNames(env.CRAFTING_USE_DISPLAY_NAMES !== 'false');
}

export function resetConfig(): void {
  defaultRecipeMethod = 'Crafting Table';
  maxCraftDepth = Number.MAX_SAFE_INTEGER;
  minecraftVersion = '1.20.1';
  useDisplayNames = true;
}
