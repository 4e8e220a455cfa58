import type { CheckResult } from '../../../types.js';
import type { ScriptCheck } from './types.js';

export const passed: CheckResult = { status: 'passed' };

export function failed(message: string): CheckResult {
  return { status: 'failed', message };
}

/**
 * Build a check that fails whenever one of the patterns matches the script.
 */
export function forbidPatterns(patterns: readonly RegExp[], message: string): ScriptCheck {
  return (script) => (patterns.some((pattern) => pattern.test(script)) ? failed(message) : passed);
}
