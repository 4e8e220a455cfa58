import { loadRendererConfig, type RendererConfig } from '../../../renderer.config.js';
import { TOOLKIT_PROFILES, type ToolkitRegistry } from '../../toolkits/src/registry.js';
import { createConsoleLogger, type Logger } from '../../utils/logger.js';
import { ShellProcessRunner, type ProcessRunner } from '../../utils/process-runner.js';

/**
 * Everything a figure run needs besides the figure itself.
 * Passed explicitly to every operation; nothing here is mutated.
 */
export interface ScriptContext {
  readonly config: RendererConfig;
  readonly logger: Logger;
  readonly runner: ProcessRunner;
  readonly toolkits: ToolkitRegistry;
}

export function createScriptContext(overrides: Partial<ScriptContext> = {}): ScriptContext {
  const config = overrides.config ?? loadRendererConfig();
  return {
    config,
    logger: overrides.logger ?? createConsoleLogger(config.logLevel),
    runner: overrides.runner ?? new ShellProcessRunner(),
    toolkits: overrides.toolkits ?? TOOLKIT_PROFILES
  };
}
