// plot-engine public exports

export * from '../types.js';
export { loadRendererConfig, configFromEnv } from '../renderer.config.js';
export type { RendererConfig, LogLevel } from '../renderer.config.js';

export * from './scripting/src/index.js';

export { TOOLKIT_PROFILES, getToolkitProfile } from './toolkits/src/registry.js';
export type { ToolkitRegistry } from './toolkits/src/registry.js';
export type { ToolkitProfile, ScriptCheck, CapturePosition, ScriptStem } from './toolkits/src/types.js';
export { isToolkitAvailable, availableToolkits, unavailableToolkits } from './toolkits/src/availability.js';

export { createConsoleLogger, silentLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export { ShellProcessRunner, ScriptEnvironmentError } from './utils/process-runner.js';
export type { ProcessRunner, ProcessOutcome } from './utils/process-runner.js';
export { sweepTempScripts } from './utils/temp-script-sweeper.js';
export type { SweepOptions, SweepResult } from './utils/temp-script-sweeper.js';
export { optimizeSvgFile } from './utils/svg-optimizer.js';
