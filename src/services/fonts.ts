/**
 * Font registration
 *
 * Registers font files with the canvas backend so templates can name
 * them in `fontFamily`.
 */

import { GlobalFonts } from '@napi-rs/canvas';
import { readdir } from 'fs/promises';
import path from 'path';
import { createLogger } from './logger';

const logger = createLogger('Fonts');

const FONT_EXTENSIONS = new Set(['.ttf', '.otf', '.woff2']);

/**
 * Register every font file in `dir`, using the file stem as the family
 * alias. Returns the registered family names, or `[]` when the directory
 * cannot be read.
 */
export async function registerFontDirectory(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    logger.warn(`Font directory not readable: ${dir}`, { error: String(error) });
    return [];
  }

  const families: string[] = [];
  for (const entry of [...entries].sort()) {
    const extension = path.extname(entry).toLowerCase();
    if (!FONT_EXTENSIONS.has(extension)) continue;

    const family = path.basename(entry, path.extname(entry));
    if (GlobalFonts.registerFromPath(path.join(dir, entry), family)) {
      families.push(family);
    } else {
      logger.warn(`Could not register font ${entry}`);
    }
  }

  logger.debug(`Registered ${families.length} fonts from ${dir}`);
  return families;
}
