import { pathUtils } from '../../../config/paths.js';
import { forbidPatterns } from './checks.js';
import type { ToolkitProfile } from './types.js';

export const ggplot2Profile: ToolkitProfile = {
  toolkit: 'ggplot2',
  displayName: 'ggplot2',
  scriptExtension: '.r',
  supportedSaveFormats: ['png', 'pdf', 'svg', 'jpg', 'eps', 'tif'],
  capturePosition: 'append',
  checks: [
    forbidPatterns([/\bggsave\s*\(/], 'encountered a call to `ggsave`; the figure is saved automatically')
  ],

  captureFragment: (spec, figurePath) => [
    'library(ggplot2)',
    `ggsave("${pathUtils.toForwardSlashes(figurePath)}", dpi = ${spec.dpi})`
  ].join('\n'),

  commandLine: (output, executable) => `${executable} --vanilla "${output.scriptPath}"`,
  probeCommand: (executable) => `${executable} -e "library(ggplot2)"`
};
