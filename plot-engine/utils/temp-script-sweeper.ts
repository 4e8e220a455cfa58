/**
 * Temporary Script Sweeper
 * Removes instrumented scripts left in the temp directory by earlier runs.
 * The render pipeline never deletes them itself; call this between runs.
 */

import { readdir, stat, unlink } from 'fs/promises';
import { join } from 'path';
import type { RendererConfig } from '../../renderer.config.js';
import { pathValidation } from '../../config/paths.js';
import { identifierScriptStem } from '../toolkits/src/matlab.js';
import type { Logger } from './logger.js';

export interface SweepOptions {
  maxAgeMs: number;
  now?: number;
}

export interface SweepResult {
  filesRemoved: number;
  bytesFreed: number;
  errors: string[];
  duration: number;
  timestamp: string;
}

const DEFAULT_MAX_AGE_MS = 24 * 60 * 60 * 1000; // 24 hours

export async function sweepTempScripts(
  config: RendererConfig,
  logger: Logger,
  options: Partial<SweepOptions> = {}
): Promise<SweepResult> {
  const startTime = Date.now();
  const now = options.now ?? startTime;
  const maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_AGE_MS;

  const result: SweepResult = {
    filesRemoved: 0,
    bytesFreed: 0,
    errors: [],
    duration: 0,
    timestamp: new Date(now).toISOString()
  };

  let entries: string[];
  try {
    entries = await readdir(config.tempDir);
  } catch (error) {
    result.errors.push(`Failed to read ${config.tempDir}: ${error instanceof Error ? error.message : String(error)}`);
    result.duration = Date.now() - startTime;
    return result;
  }

  // MATLAB-family scripts carry the prefix in identifier form
  const prefixes = [config.tempScriptPrefix, identifierScriptStem(config.tempScriptPrefix, '')];

  for (const name of entries) {
    // An empty prefix would match every file in the shared temp directory
    if (!config.tempScriptPrefix || !prefixes.some((prefix) => name.startsWith(prefix))) continue;

    const fullPath = join(config.tempDir, name);
    if (!pathValidation.isWithinDirectory(fullPath, config.tempDir)) continue;

    try {
      const info = await stat(fullPath);
      if (!info.isFile() || now - info.mtimeMs <= maxAgeMs) continue;

      await unlink(fullPath);
      result.filesRemoved++;
      result.bytesFreed += info.size;
    } catch (error) {
      result.errors.push(`Failed to remove ${fullPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  result.duration = Date.now() - startTime;
  logger.info(`Sweep completed: ${result.filesRemoved} temp scripts removed, ${(result.bytesFreed / 1024).toFixed(1)}KB freed`);

  return result;
}
