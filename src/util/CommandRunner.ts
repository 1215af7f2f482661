import { spawn } from 'node:child_process';

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** `inherit` hands the terminal to the child (attach). */
  stdio?: 'pipe' | 'inherit';
}

/**
 * Runs an external tool to completion. Injected everywhere a backend shells out, so tests can fake it.
 */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) => new Promise((resolve, reject) => {
  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    stdio: options.stdio === 'inherit' ? 'inherit' : [ 'ignore', 'pipe', 'pipe' ],
  });

  let stdout = '';
  let stderr = '';
  child.stdout?.on('data', (data: Buffer) => {
    stdout += data.toString();
  });
  child.stderr?.on('data', (data: Buffer) => {
    stderr += data.toString();
  });

  child.once('error', reject);
  child.once('close', (code) => resolve({ code, stdout, stderr }));
});

export async function isCommandAvailable(name: string, runner: CommandRunner = runCommand): Promise<boolean> {
  try {
    const result = await runner('which', [ name ]);
    return result.code === 0;
  } catch {
    // `which` itself missing
    return false;
  }
}

/**
 * Last few lines of a tool's output, for error messages.
 */
export function tail(output: string, lines = 5): string {
  return output.trim().split('\n').slice(-lines).join('\n');
}
