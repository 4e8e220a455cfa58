import type { CheckResult } from '../../../types.js';
import { passed } from '../../toolkits/src/checks.js';
import type { ScriptCheck, ToolkitProfile } from '../../toolkits/src/types.js';

export const CHECK_MESSAGE_SEPARATOR = '; ';

/**
 * Associative combination of two check results. `passed` is the identity;
 * failures absorb passes and accumulate their messages left to right.
 */
export function combineChecks(left: CheckResult, right: CheckResult): CheckResult {
  if (left.status === 'passed') return right;
  if (right.status === 'passed') return left;
  return { status: 'failed', message: `${left.message}${CHECK_MESSAGE_SEPARATOR}${right.message}` };
}

export function foldChecks(results: readonly CheckResult[]): CheckResult {
  return results.reduce(combineChecks, passed);
}

/**
 * Run every check over the script text. All checks run, even after a failure.
 */
export function runChecks(checks: readonly ScriptCheck[], script: string): CheckResult {
  return foldChecks(checks.map((check) => check(script)));
}

export function checkScript(profile: ToolkitProfile, script: string): CheckResult {
  return runChecks(profile.checks, script);
}
