import { access, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { FigureSpec, ScriptResult } from '../../../types.js';
import { optimizeSvgFile } from '../../utils/svg-optimizer.js';
import { checkScript } from './check-engine.js';
import type { ScriptContext } from './context.js';
import { figurePath } from './content-addresser.js';
import { classifyResult, describeScriptResult } from './result-classifier.js';
import { runScript } from './script-runner.js';
import { writeTranscript } from './transcript.js';

async function fileExists(p: string): Promise<boolean> {
  try { await access(p); return true; } catch { return false; }
}

/**
 * Create the figure's directory and report whether the figure still has
 * to be rendered. An existing file is trusted as-is.
 */
export async function shouldRun(spec: FigureSpec): Promise<boolean> {
  const target = figurePath(spec);
  await mkdir(dirname(target), { recursive: true });
  return !(await fileExists(target));
}

/**
 * Check, instrument and run the script, regardless of any existing figure.
 */
export async function runTempScript(spec: FigureSpec, context: ScriptContext): Promise<ScriptResult> {
  const profile = context.toolkits[spec.toolkit];

  const checkResult = checkScript(profile, spec.script);
  if (checkResult.status === 'failed') {
    return { status: 'checks-failed', message: checkResult.message };
  }

  const { command, exitCode } = await runScript(spec, context);
  const result = await classifyResult(exitCode, command, spec.toolkit, context);

  if (result.status === 'success' && spec.saveFormat === 'svg' && context.config.optimizeSvg) {
    await optimizeSvgFile(figurePath(spec), context.logger);
  }

  return result;
}

/**
 * Render a figure unless its content-addressed file already exists.
 * On success the source transcript is (re)written next to the figure.
 */
export async function runScriptIfNecessary(spec: FigureSpec, context: ScriptContext): Promise<ScriptResult> {
  const target = figurePath(spec);

  let result: ScriptResult;
  if (await shouldRun(spec)) {
    result = await runTempScript(spec, context);
  } else {
    context.logger.debug(`Cache hit for ${target}, skipping ${spec.toolkit}`);
    result = { status: 'success' };
  }

  if (result.status === 'success') {
    await writeTranscript(spec);
  } else {
    context.logger.warn(`${target}: ${describeScriptResult(result)}`);
  }

  return result;
}
