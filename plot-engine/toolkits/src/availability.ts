import { TOOLKITS, type Toolkit } from '../../../types.js';
import type { ScriptContext } from '../../scripting/src/context.js';

/**
 * Probe whether a toolkit's interpreter is usable right now.
 * Never cached: a toolkit installed mid-run is seen on the next call.
 */
export async function isToolkitAvailable(toolkit: Toolkit, context: ScriptContext): Promise<boolean> {
  const profile = context.toolkits[toolkit];
  const command = profile.probeCommand(context.config.executables[toolkit]);
  const { exitCode } = await context.runner.run(command);
  context.logger.debug(`Probe for ${profile.displayName} (${command}) exited with ${exitCode}`);
  return exitCode === 0;
}

async function partitionToolkits(context: ScriptContext): Promise<{ available: Toolkit[]; unavailable: Toolkit[] }> {
  const probes = await Promise.all(
    TOOLKITS.map(async (toolkit) => ({ toolkit, available: await isToolkitAvailable(toolkit, context) }))
  );
  return {
    available: probes.filter((p) => p.available).map((p) => p.toolkit),
    unavailable: probes.filter((p) => !p.available).map((p) => p.toolkit)
  };
}

export async function availableToolkits(context: ScriptContext): Promise<Toolkit[]> {
  return (await partitionToolkits(context)).available;
}

export async function unavailableToolkits(context: ScriptContext): Promise<Toolkit[]> {
  return (await partitionToolkits(context)).unavailable;
}
