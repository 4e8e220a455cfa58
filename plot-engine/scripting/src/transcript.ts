import { writeFile } from 'fs/promises';
import type { FigureSpec } from '../../../types.js';
import { figurePath, transcriptPath } from './content-addresser.js';

/**
 * Write the user's original script next to the figure, replacing any
 * previous transcript.
 */
export async function writeTranscript(spec: FigureSpec): Promise<string> {
  const target = transcriptPath(figurePath(spec));
  await writeFile(target, spec.script, 'utf8');
  return target;
}
