import type { FigureSpec } from '../../../types.js';
import { forbidPatterns } from './checks.js';
import type { ToolkitProfile } from './types.js';

function isTrueAttr(value: string | undefined): boolean {
  return value?.trim().toLowerCase() === 'true';
}

function pythonLiteral(value: boolean): string {
  return value ? 'True' : 'False';
}

function pythonCommand(scriptPath: string, executable: string): string {
  return `${executable} "${scriptPath}"`;
}

const noShowCall = forbidPatterns(
  [/\b(?:plt|pyplot)\s*\.\s*show\s*\(/, /^\s*show\s*\(\s*\)/m],
  'encountered a call to `matplotlib.pyplot.show`; remove it so the figure can be saved'
);

export const matplotlibProfile: ToolkitProfile = {
  toolkit: 'matplotlib',
  displayName: 'Matplotlib',
  scriptExtension: '.py',
  supportedSaveFormats: ['png', 'pdf', 'svg', 'jpg', 'eps', 'gif', 'tif'],
  capturePosition: 'append',
  checks: [noShowCall],

  captureFragment(spec: FigureSpec, figurePath: string): string {
    const tight = isTrueAttr(spec.extraAttrs.tight_bbox) ? '"tight"' : 'None';
    const transparent = pythonLiteral(isTrueAttr(spec.extraAttrs.transparent));
    return [
      'import matplotlib.pyplot as plt',
      `plt.savefig(r"${figurePath}", dpi=${spec.dpi}, transparent=${transparent}, bbox_inches=${tight})`
    ].join('\n');
  },

  commandLine: (output, executable) => pythonCommand(output.scriptPath, executable),

  probeCommand: (executable) => `${executable} -c "import matplotlib"`
};

export const plotlyPythonProfile: ToolkitProfile = {
  toolkit: 'plotly-python',
  displayName: 'Plotly (Python)',
  scriptExtension: '.py',
  supportedSaveFormats: ['png', 'pdf', 'svg', 'jpg', 'eps', 'webp', 'html'],
  capturePosition: 'append',
  checks: [],

  captureFragment(spec: FigureSpec, figurePath: string): string {
    const write = spec.saveFormat === 'html'
      ? `write_html(r"${figurePath}", include_plotlyjs="cdn")`
      : `write_image(r"${figurePath}")`;
    // The script's figure is whichever go.Figure it left in the global namespace
    return [
      'import plotly.graph_objects as go',
      '__current_plotly_figure = next(obj for obj in globals().values() if type(obj) == go.Figure)',
      `__current_plotly_figure.${write}`
    ].join('\n');
  },

  commandLine: (output, executable) => pythonCommand(output.scriptPath, executable),

  probeCommand: (executable) => `${executable} -c "import plotly.graph_objects"`
};
