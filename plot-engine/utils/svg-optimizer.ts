import { readFile, writeFile } from 'fs/promises';
import { optimize } from 'svgo';
import type { Logger } from './logger.js';

/**
 * Rewrite an SVG file in place through svgo. Returns false when the file is
 * missing or svgo cannot parse it; the file is then left untouched.
 */
export async function optimizeSvgFile(path: string, logger: Logger): Promise<boolean> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    logger.warn(`SVG optimization skipped, ${path} is not readable:`, error instanceof Error ? error.message : error);
    return false;
  }

  let optimized: string;
  try {
    optimized = optimize(raw, { path, multipass: true }).data;
  } catch (error) {
    logger.warn(`SVG optimization failed for ${path}:`, error instanceof Error ? error.message : error);
    return false;
  }

  await writeFile(path, optimized, 'utf8');
  logger.debug(`Optimized ${path} (${raw.length} -> ${optimized.length} bytes)`);
  return true;
}
