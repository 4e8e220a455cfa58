import { pathUtils } from '../../../config/paths.js';
import type { FigureSpec } from '../../../types.js';
import type { ScriptStem, ToolkitProfile } from './types.js';

const MAX_IDENTIFIER_LENGTH = 63;

/**
 * run() turns the file name into a command name, so it must be a valid
 * identifier: a leading letter, then word characters, at most 63 of them.
 * The hash is truncated to fit.
 */
export const identifierScriptStem: ScriptStem = (prefix, hash) => {
  const stem = `${prefix}${hash}`.replace(/\W/g, '_');
  const leading = /^[A-Za-z]/.test(stem) ? stem : `m${stem}`;
  return leading.slice(0, MAX_IDENTIFIER_LENGTH);
};

// MATLAB and Octave share their figure-saving idiom
function saveCurrentFigure(_spec: FigureSpec, figurePath: string): string {
  return `saveas(gcf, '${pathUtils.toForwardSlashes(figurePath)}')`;
}

export const matlabProfile: ToolkitProfile = {
  toolkit: 'matlab',
  displayName: 'MATLAB',
  scriptExtension: '.m',
  supportedSaveFormats: ['png', 'pdf', 'svg', 'jpg', 'eps', 'gif', 'tif'],
  capturePosition: 'append',
  scriptStem: identifierScriptStem,
  checks: [],
  captureFragment: saveCurrentFigure,
  commandLine: (output, executable) => `${executable} -batch "run('${pathUtils.toForwardSlashes(output.scriptPath)}')"`,
  probeCommand: (executable) => `command -v ${executable}`
};

export const octaveProfile: ToolkitProfile = {
  toolkit: 'octave',
  displayName: 'GNU Octave',
  scriptExtension: '.m',
  supportedSaveFormats: ['png', 'pdf', 'svg', 'jpg', 'eps', 'gif', 'tif'],
  capturePosition: 'append',
  scriptStem: identifierScriptStem,
  checks: [],
  captureFragment: saveCurrentFigure,
  commandLine: (output, executable) => `${executable} --no-gui --no-window-system "${output.scriptPath}"`,
  probeCommand: (executable) => `command -v ${executable}`
};
