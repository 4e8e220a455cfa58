import { saveFormatExtension } from '../../../types.js';
import type { ToolkitProfile } from './types.js';

// dot takes the output file on its command line; nothing to capture in-script
export const graphvizProfile: ToolkitProfile = {
  toolkit: 'graphviz',
  displayName: 'Graphviz',
  scriptExtension: '.dot',
  supportedSaveFormats: ['png', 'pdf', 'svg', 'jpg', 'eps', 'gif', 'webp'],
  capturePosition: 'append',
  checks: [],
  captureFragment: () => '',
  commandLine: (output, executable) =>
    `${executable} -T${saveFormatExtension(output.spec.saveFormat)} "${output.scriptPath}" -o "${output.figurePath}"`,
  probeCommand: (executable) => `command -v ${executable}`
};
