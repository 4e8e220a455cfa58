export const TOOLKITS = [
  'matplotlib',
  'plotly-python',
  'matlab',
  'mathematica',
  'octave',
  'ggplot2',
  'gnuplot',
  'graphviz'
] as const;

export type Toolkit = typeof TOOLKITS[number];

export const SAVE_FORMATS = ['png', 'pdf', 'svg', 'jpg', 'eps', 'gif', 'tif', 'webp', 'html'] as const;

export type SaveFormat = typeof SAVE_FORMATS[number];

/**
 * Canonical file extension (without the dot) of a save format
 */
export function saveFormatExtension(format: SaveFormat): string {
  return format;
}

export interface BlockAttrs {
  id: string;
  classes: string[];
  attributes: Record<string, string>;
}

export interface FigureSpec {
  readonly toolkit: Toolkit;
  readonly script: string;
  readonly saveFormat: SaveFormat;
  readonly directory: string;
  readonly dpi: number;
  readonly extraAttrs: Readonly<Record<string, string>>;
  readonly blockAttrs: Readonly<BlockAttrs>;
  readonly caption: string;
  readonly withSource: boolean;
}

export interface OutputSpec {
  spec: FigureSpec;
  scriptPath: string;
  figurePath: string;
}

export type CheckResult =
  | { status: 'passed' }
  | { status: 'failed'; message: string };

export type ScriptResult =
  | { status: 'success' }
  | { status: 'checks-failed'; message: string }
  | { status: 'failure'; command: string; exitCode: number }
  | { status: 'toolkit-not-installed'; toolkit: Toolkit };
