/**
 * Furnace recipes. minecraft-data ships crafting recipes only.
 */

/**
 * Map output item -> input item for furnace smelting
 */
const FURNACE_INPUTS: Record<string, string> = {
  // Ores and materials
  iron_ingot: 'raw_iron',
  gold_ingot: 'raw_gold',
  copper_ingot: 'raw_copper',
  stone: 'cobblestone',
  smooth_stone: 'stone',
  glass: 'sand',
  brick: 'clay_ball',
  charcoal: 'oak_log',

  // Cooked meats
  cooked_beef: 'beef',
  cooked_porkchop: 'porkchop',
  cooked_mutton: 'mutton',
  cooked_chicken: 'chicken',
  cooked_rabbit: 'rabbit',

  // Cooked fish
  cooked_salmon: 'salmon',
  cooked_cod: 'cod',

  // Other food
  baked_potato: 'potato',
  dried_kelp: 'kelp'
};

export const FURNACE_METHOD = 'Furnace';

/**
 * Gets the furnace input for an output item
 *
 * @param outputItemName - The smelted item (e.g., 'iron_ingot')
 * @returns The input item (e.g., 'raw_iron'), or undefined if it is not smelted
 */
export function getFurnaceInputFor(outputItemName: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(FURNACE_INPUTS, outputItemName) ? FURNACE_INPUTS[outputItemName] : undefined;
}

export function getSmeltedItemNames(): string[] {
  return Object.keys(FURNACE_INPUTS);
}
