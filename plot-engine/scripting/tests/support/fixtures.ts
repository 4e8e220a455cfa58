import type { RendererConfig } from '../../../../renderer.config.js';
import type { FigureSpec } from '../../../../types.js';
import { TOOLKIT_PROFILES } from '../../../toolkits/src/registry.js';
import { silentLogger } from '../../../utils/logger.js';
import type { ProcessOutcome, ProcessRunner } from '../../../utils/process-runner.js';
import type { ScriptContext } from '../../src/context.js';

/**
 * Process runner that records every command instead of spawning it.
 */
export class RecordingRunner implements ProcessRunner {
  readonly commands: string[] = [];

  constructor(private readonly respond: (command: string) => ProcessOutcome | Promise<ProcessOutcome>) {}

  async run(command: string): Promise<ProcessOutcome> {
    this.commands.push(command);
    return this.respond(command);
  }
}

export const exitWith = (exitCode: number, output = ''): ProcessOutcome => ({ exitCode, output });

export function testConfig(tempDir: string, overrides: Partial<RendererConfig> = {}): RendererConfig {
  return {
    tempDir,
    tempScriptPrefix: 'plotengine-test-',
    defaultDpi: 80,
    defaultSaveFormat: 'png',
    optimizeSvg: false,
    executables: {
      matplotlib: 'python',
      'plotly-python': 'python',
      matlab: 'matlab',
      mathematica: 'math',
      octave: 'octave',
      ggplot2: 'Rscript',
      gnuplot: 'gnuplot',
      graphviz: 'dot'
    },
    logLevel: 'error',
    ...overrides
  };
}

export function testContext(config: RendererConfig, runner: ProcessRunner): ScriptContext {
  return { config, runner, logger: silentLogger, toolkits: TOOLKIT_PROFILES };
}

export function makeSpec(directory: string, overrides: Partial<FigureSpec> = {}): FigureSpec {
  return {
    toolkit: 'matplotlib',
    script: 'plot(1,2)',
    saveFormat: 'png',
    directory,
    dpi: 80,
    extraAttrs: {},
    blockAttrs: { id: '', classes: [], attributes: {} },
    caption: '',
    withSource: false,
    ...overrides
  };
}
