import type { Toolkit } from '../../../types.js';
import { ggplot2Profile } from './ggplot2.js';
import { gnuplotProfile } from './gnuplot.js';
import { graphvizProfile } from './graphviz.js';
import { mathematicaProfile } from './mathematica.js';
import { matlabProfile, octaveProfile } from './matlab.js';
import { matplotlibProfile, plotlyPythonProfile } from './python.js';
import type { ToolkitProfile } from './types.js';

export type ToolkitRegistry = Readonly<Record<Toolkit, ToolkitProfile>>;

export const TOOLKIT_PROFILES: ToolkitRegistry = {
  matplotlib: matplotlibProfile,
  'plotly-python': plotlyPythonProfile,
  matlab: matlabProfile,
  mathematica: mathematicaProfile,
  octave: octaveProfile,
  ggplot2: ggplot2Profile,
  gnuplot: gnuplotProfile,
  graphviz: graphvizProfile
};

export function getToolkitProfile(toolkit: Toolkit, registry: ToolkitRegistry = TOOLKIT_PROFILES): ToolkitProfile {
  return registry[toolkit];
}
