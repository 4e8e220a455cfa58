import { pathUtils } from '../../../config/paths.js';
import type { SaveFormat } from '../../../types.js';
import { forbidPatterns } from './checks.js';
import type { ToolkitProfile } from './types.js';

const TERMINALS: Partial<Record<SaveFormat, string>> = {
  png: 'pngcairo',
  pdf: 'pdfcairo',
  svg: 'svg',
  eps: 'postscript eps',
  gif: 'gif',
  jpg: 'jpeg'
};

/**
 * gnuplot writes to the output declared *before* the plot command,
 * so its capture fragment is prepended.
 */
export const gnuplotProfile: ToolkitProfile = {
  toolkit: 'gnuplot',
  displayName: 'gnuplot',
  scriptExtension: '.gp',
  supportedSaveFormats: ['png', 'pdf', 'svg', 'eps', 'gif', 'jpg'],
  capturePosition: 'prepend',
  checks: [
    forbidPatterns(
      [/^\s*set\s+(?:o|ou|out|outp|outpu|output)\b/m],
      'encountered a `set output` directive; the output file is set automatically'
    )
  ],

  captureFragment: (spec, figurePath) => [
    `set terminal ${TERMINALS[spec.saveFormat] ?? spec.saveFormat}`,
    `set output '${pathUtils.toForwardSlashes(figurePath)}'`
  ].join('\n'),

  commandLine: (output, executable) => `${executable} -c "${output.scriptPath}"`,
  probeCommand: (executable) => `command -v ${executable}`
};
