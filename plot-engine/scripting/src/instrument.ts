import type { FigureSpec } from '../../../types.js';
import type { ToolkitProfile } from '../../toolkits/src/types.js';

/**
 * Join the user's script with the toolkit's capture fragment, on the side
 * the toolkit requires.
 */
export function instrumentScript(spec: FigureSpec, profile: ToolkitProfile, figurePath: string): string {
  const capture = profile.captureFragment(spec, figurePath);
  return profile.capturePosition === 'prepend'
    ? `${capture}\n${spec.script}`
    : `${spec.script}\n${capture}`;
}
