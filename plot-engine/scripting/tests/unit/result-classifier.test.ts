import { describe, it, expect } from '@jest/globals';
import { classifyResult, describeScriptResult } from '../../src/result-classifier.js';
import { RecordingRunner, exitWith, testConfig, testContext } from '../support/fixtures.js';

describe('classifyResult', () => {
  const config = testConfig('/tmp');

  it('treats exit code 0 as success without probing', async () => {
    const runner = new RecordingRunner(() => exitWith(0));
    expect(await classifyResult(0, 'Rscript --vanilla "s.r"', 'ggplot2', testContext(config, runner)))
      .toEqual({ status: 'success' });
    expect(runner.commands).toHaveLength(0);
  });

  it('keeps the command and exit code when the toolkit is available', async () => {
    const runner = new RecordingRunner(() => exitWith(0));
    expect(await classifyResult(1, 'Rscript --vanilla "s.r"', 'ggplot2', testContext(config, runner)))
      .toEqual({ status: 'failure', command: 'Rscript --vanilla "s.r"', exitCode: 1 });
    expect(runner.commands).toEqual(['Rscript -e "library(ggplot2)"']);
  });

  it('reports the toolkit missing when the probe fails', async () => {
    const runner = new RecordingRunner(() => exitWith(127));
    expect(await classifyResult(1, 'gnuplot -c "s.gp"', 'gnuplot', testContext(config, runner)))
      .toEqual({ status: 'toolkit-not-installed', toolkit: 'gnuplot' });
    expect(runner.commands).toEqual(['command -v gnuplot']);
  });

  it('probes again on every failure', async () => {
    let installed = false;
    const runner = new RecordingRunner(() => exitWith(installed ? 0 : 1));
    const context = testContext(config, runner);

    expect((await classifyResult(1, 'dot', 'graphviz', context)).status).toBe('toolkit-not-installed');
    installed = true;
    expect((await classifyResult(1, 'dot', 'graphviz', context)).status).toBe('failure');
    expect(runner.commands).toHaveLength(2);
  });
});

describe('describeScriptResult', () => {
  it('describes every outcome', () => {
    expect(describeScriptResult({ status: 'success' })).toBe('Figure rendered successfully');
    expect(describeScriptResult({ status: 'checks-failed', message: 'no show' })).toBe('Script checks failed: no show');
    expect(describeScriptResult({ status: 'failure', command: 'python "a.py"', exitCode: 2 }))
      .toBe('Command "python "a.py"" failed with exit code 2');
    expect(describeScriptResult({ status: 'toolkit-not-installed', toolkit: 'octave' }))
      .toBe('Toolkit octave is not installed or not reachable');
  });
});
