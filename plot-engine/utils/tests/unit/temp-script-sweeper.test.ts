import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { access, mkdtemp, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { sweepTempScripts } from '../../temp-script-sweeper.js';
import { silentLogger } from '../../logger.js';
import { testConfig } from '../../../scripting/tests/support/fixtures.js';

describe('sweepTempScripts', () => {
  let tempDir: string;
  const now = Date.now();
  const anHourAgo = new Date(now - 60 * 60 * 1000);

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'plot-engine-sweep-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function seed(name: string, content: string, mtime?: Date): Promise<string> {
    const path = join(tempDir, name);
    await writeFile(path, content);
    if (mtime) await utimes(path, mtime, mtime);
    return path;
  }

  it('removes only old files carrying the script prefix', async () => {
    const stale = await seed('plotengine-test-aaa.py', 'print(1)', anHourAgo);
    const fresh = await seed('plotengine-test-bbb.py', 'print(2)');
    const foreign = await seed('other-ccc.py', 'print(3)', anHourAgo);

    const result = await sweepTempScripts(testConfig(tempDir), silentLogger, { maxAgeMs: 60 * 1000, now });

    expect(result.filesRemoved).toBe(1);
    expect(result.bytesFreed).toBe('print(1)'.length);
    expect(result.errors).toEqual([]);
    await expect(access(stale)).rejects.toThrow();
    await expect(access(fresh)).resolves.toBeUndefined();
    await expect(access(foreign)).resolves.toBeUndefined();
  });

  it('also removes scripts named with the identifier form of the prefix', async () => {
    const stale = await seed('plotengine_test_aaa.m', 'plot(1)', anHourAgo);

    const result = await sweepTempScripts(testConfig(tempDir), silentLogger, { maxAgeMs: 60 * 1000, now });

    expect(result.filesRemoved).toBe(1);
    await expect(access(stale)).rejects.toThrow();
  });

  it('does nothing with an empty prefix', async () => {
    const path = await seed('anything.py', 'x', anHourAgo);

    const result = await sweepTempScripts(testConfig(tempDir, { tempScriptPrefix: '' }), silentLogger, { maxAgeMs: 0, now });

    expect(result.filesRemoved).toBe(0);
    await expect(access(path)).resolves.toBeUndefined();
  });

  it('reports an unreadable temp directory', async () => {
    const missing = join(tempDir, 'missing');
    const result = await sweepTempScripts(testConfig(missing), silentLogger, { maxAgeMs: 0, now });

    expect(result.filesRemoved).toBe(0);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].startsWith(`Failed to read ${missing}:`)).toBe(true);
  });
});
