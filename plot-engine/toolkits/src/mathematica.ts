import { pathUtils } from '../../../config/paths.js';
import type { ToolkitProfile } from './types.js';

export const mathematicaProfile: ToolkitProfile = {
  toolkit: 'mathematica',
  displayName: 'Mathematica',
  scriptExtension: '.m',
  supportedSaveFormats: ['png', 'pdf', 'svg', 'jpg', 'eps', 'gif', 'tif'],
  capturePosition: 'append',
  checks: [],

  // `%` is the result of the script's last expression
  captureFragment: (spec, figurePath) =>
    `Export["${pathUtils.toForwardSlashes(figurePath)}", %, ImageResolution -> ${spec.dpi}]`,

  commandLine: (output, executable) => `${executable} -script "${output.scriptPath}"`,
  probeCommand: (executable) => `command -v ${executable}`
};
