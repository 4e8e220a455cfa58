/**
 * Centralized Path Configuration
 * Single source of truth for the file system locations figures are written to
 */

import { resolve, normalize, relative, isAbsolute } from 'path';

/**
 * Path configuration with environment variable overrides
 */
export const PATHS = {
  ROOT_DIR: process.cwd(),

  // Default output directory for figures whose request names none
  FIGURE_DIR: process.env.FIGURE_DIR || 'plots'
} as const;

/**
 * Resolve path relative to project root
 */
export function resolvePath(...segments: string[]): string {
  return resolve(PATHS.ROOT_DIR, ...segments);
}

export const pathUtils = {
  /**
   * Interpreters such as R, MATLAB and gnuplot read backslashes in string
   * literals as escapes; they all accept forward slashes on Windows.
   */
  toForwardSlashes: (filePath: string): string => filePath.replace(/\\/g, '/')
};

/**
 * Validation utilities for paths
 */
export const pathValidation = {
  /**
   * Check if path is within allowed directory
   */
  isWithinDirectory: (filePath: string, allowedDir: string): boolean => {
    const normalizedPath = normalize(filePath);
    const normalizedDir = normalize(allowedDir);
    const relativePath = relative(normalizedDir, normalizedPath);

    // Path is within directory if relative path doesn't start with '..' or '/'
    return !relativePath.startsWith('..') && !isAbsolute(relativePath);
  }
};
