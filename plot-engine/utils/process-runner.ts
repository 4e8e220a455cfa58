import { spawn } from 'node:child_process';

export interface ProcessOutcome {
  exitCode: number;
  // stdout and stderr, interleaved in arrival order
  output: string;
}

export interface ProcessRunner {
  run(command: string, options?: { cwd?: string }): Promise<ProcessOutcome>;
}

/**
 * Raised when the environment, not the script, is at fault: the shell could
 * not be spawned or the script could not be written.
 */
export class ScriptEnvironmentError extends Error {
  readonly code: string;
  readonly command?: string;

  constructor(code: string, message: string, options?: { command?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ScriptEnvironmentError';
    this.code = code;
    this.command = options?.command;
  }
}

/**
 * Runs each command through the platform shell and waits for it to exit.
 */
export class ShellProcessRunner implements ProcessRunner {
  run(command: string, options: { cwd?: string } = {}): Promise<ProcessOutcome> {
    return new Promise((resolve, reject) => {
      const ps = spawn(command, { cwd: options.cwd ?? process.cwd(), shell: true, env: process.env });
      const chunks: Buffer[] = [];

      ps.stdout.on('data', (d: Buffer) => chunks.push(d));
      ps.stderr.on('data', (d: Buffer) => chunks.push(d));

      ps.on('error', (err) => {
        reject(new ScriptEnvironmentError('E-SCRIPT-SPAWN', `Could not spawn "${command}": ${err.message}`, {
          command,
          cause: err
        }));
      });

      // A process killed by a signal has no exit code; report it as a failure
      ps.on('close', (code) => resolve({
        exitCode: code ?? 1,
        output: Buffer.concat(chunks).toString('utf8')
      }));
    });
  }
}
