import type { ScriptResult, Toolkit } from '../../../types.js';
import { isToolkitAvailable } from '../../toolkits/src/availability.js';
import type { ScriptContext } from './context.js';

/**
 * A non-zero exit is ambiguous between a broken script and a missing
 * toolkit, so failures always re-probe the toolkit.
 */
export async function classifyResult(
  exitCode: number,
  command: string,
  toolkit: Toolkit,
  context: ScriptContext
): Promise<ScriptResult> {
  if (exitCode === 0) {
    return { status: 'success' };
  }

  if (!(await isToolkitAvailable(toolkit, context))) {
    return { status: 'toolkit-not-installed', toolkit };
  }

  return { status: 'failure', command, exitCode };
}

export function describeScriptResult(result: ScriptResult): string {
  switch (result.status) {
    case 'success':
      return 'Figure rendered successfully';
    case 'checks-failed':
      return `Script checks failed: ${result.message}`;
    case 'failure':
      return `Command "${result.command}" failed with exit code ${result.exitCode}`;
    case 'toolkit-not-installed':
      return `Toolkit ${result.toolkit} is not installed or not reachable`;
  }
}
