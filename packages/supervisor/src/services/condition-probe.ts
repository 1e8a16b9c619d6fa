/**
 * Condition Probe
 *
 * Runs a condition gate's `check` command through the shell and returns its
 * trimmed stdout. A failing, timed-out or unlaunchable command yields an
 * error string instead; the gate evaluator then keeps the gate closed.
 */

import { spawn } from 'node:child_process';

/** Output beyond this many characters is dropped */
const MAX_OUTPUT_LENGTH = 64 * 1024;

export type ProbeResult =
  | { readonly ok: true; readonly output: string }
  | { readonly ok: false; readonly error: string };

/**
 * Runs condition checks
 */
export interface ConditionProbe {
  run(check: string): Promise<ProbeResult>;
}

export interface ShellConditionProbeOptions {
  /** Working directory of the command */
  readonly cwd: string;
  /** Kill the command after this long */
  readonly timeoutMs: number;
  /** Environment of the command (default: the supervisor's) */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Condition probe backed by a shell
 */
export class ShellConditionProbe implements ConditionProbe {
  constructor(private readonly options: ShellConditionProbeOptions) {}

  run(check: string): Promise<ProbeResult> {
    const { cwd, timeoutMs, env } = this.options;

    return new Promise(resolve => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const child = spawn(check, { shell: true, cwd, env: env ?? process.env });

      const timeoutHandle = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, timeoutMs);

      child.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stdout.length + chunk.length <= MAX_OUTPUT_LENGTH) {
          stdout += chunk;
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stderr.length + chunk.length <= MAX_OUTPUT_LENGTH) {
          stderr += chunk;
        }
      });

      child.on('error', error => {
        clearTimeout(timeoutHandle);
        resolve({ ok: false, error: error.message });
      });

      child.on('close', code => {
        clearTimeout(timeoutHandle);
        if (timedOut) {
          resolve({ ok: false, error: `Check timed out after ${timeoutMs}ms` });
        } else if (code !== 0) {
          const detail = stderr.trim();
          resolve({ ok: false, error: `Check exited with code ${code}${detail ? `: ${detail}` : ''}` });
        } else {
          resolve({ ok: true, output: stdout.trim() });
        }
      });
    });
  }
}

/**
 * Creates a shell-backed condition probe
 */
export function createConditionProbe(options: ShellConditionProbeOptions): ConditionProbe {
  return new ShellConditionProbe(options);
}
