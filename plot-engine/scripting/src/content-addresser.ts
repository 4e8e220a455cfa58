/**
 * Content-addressed paths for figures, temporary scripts and transcripts.
 * Everything here is pure: no file system access, no randomness.
 */

import { createHash } from 'crypto';
import { join, normalize, extname } from 'path';
import type { RendererConfig } from '../../../renderer.config.js';
import { saveFormatExtension, type FigureSpec } from '../../../types.js';
import type { ScriptStem, ToolkitProfile } from '../../toolkits/src/types.js';
import { instrumentScript } from './instrument.js';

export const TRANSCRIPT_EXTENSION = '.txt';

export function contentHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Hash of the fields that affect the rendered image. Caption, block
 * attributes and withSource are left out so that editing them never
 * forces a re-render.
 */
export function figureHash(spec: FigureSpec): string {
  const extraAttrs = Object.keys(spec.extraAttrs)
    .sort()
    .map((key) => [key, spec.extraAttrs[key]]);

  const normalizedSpec = [
    ['toolkit', spec.toolkit],
    ['script', spec.script],
    ['saveFormat', spec.saveFormat],
    ['dpi', spec.dpi],
    ['extraAttrs', extraAttrs]
  ];

  return contentHash(JSON.stringify(normalizedSpec));
}

export function figurePath(spec: FigureSpec): string {
  return normalize(join(spec.directory, `${figureHash(spec)}.${saveFormatExtension(spec.saveFormat)}`));
}

export const defaultScriptStem: ScriptStem = (prefix, hash) => `${prefix}${hash}`;

export function tempScriptPath(
  content: string,
  extension: string,
  tempDir: string,
  prefix: string,
  stem: ScriptStem = defaultScriptStem
): string {
  return join(tempDir, `${stem(prefix, contentHash(content))}${extension}`);
}

/**
 * Path of the instrumented script for a figure. Named after the text that
 * is actually written, so two requests sharing a temp path always write
 * identical bytes.
 */
export function scriptPath(spec: FigureSpec, profile: ToolkitProfile, config: RendererConfig): string {
  const instrumented = instrumentScript(spec, profile, figurePath(spec));
  return tempScriptPath(
    instrumented,
    profile.scriptExtension,
    config.tempDir,
    config.tempScriptPrefix,
    profile.scriptStem
  );
}

export function transcriptPath(figure: string): string {
  const ext = extname(figure);
  const stem = ext ? figure.slice(0, -ext.length) : figure;
  return normalize(`${stem}${TRANSCRIPT_EXTENSION}`);
}
