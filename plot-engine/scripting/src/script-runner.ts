import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { FigureSpec, OutputSpec } from '../../../types.js';
import type { ScriptContext } from './context.js';
import { figurePath, scriptPath } from './content-addresser.js';
import { instrumentScript } from './instrument.js';

export interface ScriptRun {
  command: string;
  exitCode: number;
  output: string;
}

/**
 * Write the instrumented script to its temp path and run the toolkit on it.
 * Spawn and write failures reject; a non-zero exit does not.
 */
export async function runScript(spec: FigureSpec, context: ScriptContext): Promise<ScriptRun> {
  const { config, logger, runner } = context;
  const profile = context.toolkits[spec.toolkit];

  const figure = figurePath(spec);
  const instrumented = instrumentScript(spec, profile, figure);
  const script = scriptPath(spec, profile, config);

  await mkdir(dirname(script), { recursive: true });
  await writeFile(script, instrumented, 'utf8');

  const output: OutputSpec = { spec, scriptPath: script, figurePath: figure };
  const command = profile.commandLine(output, config.executables[spec.toolkit]);

  logger.info(`Running ${profile.displayName}: ${command}`);
  const outcome = await runner.run(command);

  if (outcome.exitCode === 0) {
    logger.debug(`${profile.displayName} output:\n${outcome.output}`);
  } else {
    logger.error(`${profile.displayName} exited with code ${outcome.exitCode}:\n${outcome.output}`);
  }

  return { command, exitCode: outcome.exitCode, output: outcome.output };
}
