/**
 * Minecraft data resolution
 */

import minecraftData from 'minecraft-data';
import { MinecraftData } from './types';
import logger from '../utils/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Checks the shape the importer relies on
 */
export function isMinecraftData(value: unknown): value is MinecraftData {
  return isRecord(value) && isRecord(value.items) && isRecord(value.itemsByName) && isRecord(value.recipes);
}

/**
 * Loads the minecraft-data tables for a game version
 *
 * @param version - Game version (e.g., '1.20.1')
 * @returns MinecraftData object, or undefined for versions minecraft-data does not know
 *
 * @example
 * ```typescript
 * const mcData = resolveMinecraftData('1.20.1');
 * ```
 */
export function resolveMinecraftData(version: string): MinecraftData | undefined {
  let loaded: unknown;
  try {
    loaded = minecraftData(version);
  } catch (err) {
    logger.debug(`minecraft-data rejected version ${version}:`, err);
    return undefined;
  }
  return isMinecraftData(loaded) ? loaded : undefined;
}
