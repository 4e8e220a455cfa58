import type { CheckResult, FigureSpec, OutputSpec, SaveFormat, Toolkit } from '../../../types.js';

export type ScriptCheck = (script: string) => CheckResult;

/**
 * Where the capture fragment goes relative to the user's script.
 * Toolkits that need the output target declared before any plotting
 * command use 'prepend'.
 */
export type CapturePosition = 'prepend' | 'append';

/** File name (without extension) of a temp script, from prefix and content hash. */
export type ScriptStem = (prefix: string, hash: string) => string;

export interface ToolkitProfile {
  readonly toolkit: Toolkit;
  readonly displayName: string;
  // Interpreters may refuse scripts without a recognised extension
  readonly scriptExtension: string;
  readonly supportedSaveFormats: readonly SaveFormat[];
  readonly capturePosition: CapturePosition;
  // Interpreters that derive an identifier from the file name restrict it
  readonly scriptStem?: ScriptStem;
  readonly checks: readonly ScriptCheck[];
  captureFragment(spec: FigureSpec, figurePath: string): string;
  commandLine(output: OutputSpec, executable: string): string;
  // Exit code 0 means the toolkit is usable
  probeCommand(executable: string): string;
}
