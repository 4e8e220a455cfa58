/**
 * Renderer Configuration
 * Centralized configuration for figure rendering with environment variable support
 */

import { tmpdir } from 'os';
import { resolve } from 'path';
import { SAVE_FORMATS, TOOLKITS, type SaveFormat, type Toolkit } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RendererConfig {
  // Temporary scripts
  tempDir: string;
  tempScriptPrefix: string;

  // Figure defaults
  defaultDpi: number;
  defaultSaveFormat: SaveFormat;

  // Post-processing
  optimizeSvg: boolean;

  // Interpreters, keyed by toolkit
  executables: Record<Toolkit, string>;

  // Logging
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function resolveRepoPathRelative(binPath: string | undefined): string {
  if (!binPath) return '';
  if (binPath.startsWith('./') || binPath.startsWith('.\\')) {
    return resolve(process.cwd(), binPath);
  }
  return binPath;
}

function executableFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  return resolveRepoPathRelative(env[name]) || fallback;
}

// Leaves room for the hash in interpreters that cap file names at 63 characters.
const MAX_PREFIX_LENGTH = 32;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isSaveFormat(value: string): value is SaveFormat {
  return (SAVE_FORMATS as readonly string[]).includes(value);
}

/**
 * Read configuration from the environment. Values are not validated here;
 * use loadRendererConfig() for that.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RendererConfig {
  const logLevel = env.PLOT_LOG_LEVEL ?? 'info';
  const defaultSaveFormat = env.PLOT_DEFAULT_FORMAT ?? 'png';

  if (!isLogLevel(logLevel)) {
    throw new Error(`PLOT_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }
  if (!isSaveFormat(defaultSaveFormat)) {
    throw new Error(`PLOT_DEFAULT_FORMAT must be one of ${SAVE_FORMATS.join(', ')}`);
  }

  return {
    tempDir: env.PLOT_TEMP_DIR || tmpdir(),
    tempScriptPrefix: env.PLOT_TEMP_PREFIX || 'plotengine_',

    defaultDpi: parseInt(env.PLOT_DEFAULT_DPI || '80', 10),
    defaultSaveFormat,

    optimizeSvg: env.PLOT_OPTIMIZE_SVG !== 'false',

    executables: {
      matplotlib: executableFromEnv(env, 'MATPLOTLIB_BIN', 'python'),
      'plotly-python': executableFromEnv(env, 'PLOTLY_PYTHON_BIN', 'python'),
      matlab: executableFromEnv(env, 'MATLAB_BIN', 'matlab'),
      mathematica: executableFromEnv(env, 'MATHEMATICA_BIN', 'math'),
      octave: executableFromEnv(env, 'OCTAVE_BIN', 'octave'),
      ggplot2: executableFromEnv(env, 'RSCRIPT_BIN', 'Rscript'),
      gnuplot: executableFromEnv(env, 'GNUPLOT_BIN', 'gnuplot'),
      graphviz: executableFromEnv(env, 'GRAPHVIZ_DOT_BIN', 'dot')
    },

    logLevel
  };
}

/**
 * Load and validate renderer configuration
 */
export function loadRendererConfig(
  overrides: Partial<RendererConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): RendererConfig {
  const config: RendererConfig = { ...configFromEnv(env), ...overrides };

  if (!Number.isInteger(config.defaultDpi) || config.defaultDpi < 1 || config.defaultDpi > 2400) {
    throw new Error('PLOT_DEFAULT_DPI must be an integer between 1 and 2400');
  }

  if (!/^[A-Za-z0-9_.-]*$/.test(config.tempScriptPrefix)) {
    throw new Error('PLOT_TEMP_PREFIX may only contain letters, digits, dots, dashes and underscores');
  }
  if (config.tempScriptPrefix.length > MAX_PREFIX_LENGTH) {
    throw new Error(`PLOT_TEMP_PREFIX may be at most ${MAX_PREFIX_LENGTH} characters`);
  }

  for (const toolkit of TOOLKITS) {
    if (!config.executables[toolkit]) {
      throw new Error(`No executable configured for toolkit ${toolkit}`);
    }
  }

  return config;
}
