/**
 * GNU screen backend.
 *
 * One detached screen session per deployment; every window runs its command under
 * `bash -c` and falls back to an interactive shell when the command exits.
 */
import { getLoggerFor } from 'global-logger-factory';
import { LaunchFailure, SessionCreationError, errorMessage } from '../errors';
import { isCommandAvailable, runCommand, tail, type CommandResult, type CommandRunner } from '../util/CommandRunner';
import { buildWindowScript } from '../util/shell';
import type { OperatorCommands, ProcessSupervisor, WindowSpec, WindowStatus } from './types';

export interface ShellBackendOptions {
  runner?: CommandRunner;
  /** Shell each window drops into after its command exits. */
  keepAliveShell?: string;
}

/**
 * Session names listed by `screen -ls`, e.g. "\t12345.game_system\t(Detached)".
 * Dead sockets ("(Dead ???)") are left out: nothing runs behind them.
 */
export function parseScreenSessions(output: string): string[] {
  const names: string[] = [];
  for (const line of output.split('\n')) {
    const match = /^\s*\d+\.(\S+)\s/.exec(line);
    if (match && !/\(Dead\b/.test(line)) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Window list printed by `screen -Q windows`, e.g. "0$ database  1-$ developer  2*$ player".
 */
export function parseScreenWindows(output: string): WindowStatus[] {
  const windows: WindowStatus[] = [];
  const pattern = /(\d+)[-*$!@&Z]*\s+(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(output)) !== null) {
    windows.push({ index: Number(match[1]), label: match[2], state: 'unknown' });
  }
  return windows.sort((left, right) => left.index - right.index);
}

export class ScreenSupervisor implements ProcessSupervisor {
  public readonly backend = 'screen';
  protected readonly logger = getLoggerFor(this);
  private readonly runner: CommandRunner;
  private readonly keepAliveShell: string;

  public constructor(options: ShellBackendOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.keepAliveShell = options.keepAliveShell ?? 'bash';
  }

  public async isAvailable(): Promise<boolean> {
    return isCommandAvailable('screen', this.runner);
  }

  public async hasSession(name: string): Promise<boolean> {
    // `screen -ls` exits non-zero even when it lists sessions
    const result = await this.runner('screen', [ '-ls', name ]);
    return parseScreenSessions(result.stdout).includes(name);
  }

  public async createSession(name: string, window: WindowSpec): Promise<void> {
    const script = this.script(window);
    let result: CommandResult;
    try {
      result = await this.runner('screen', [ '-dmS', name, '-t', window.label, 'bash', '-c', script ], { cwd: window.cwd });
    } catch (error: unknown) {
      throw new SessionCreationError(name, errorMessage(error));
    }
    if (result.code !== 0) {
      throw new SessionCreationError(name, tail(result.stderr || result.stdout) || `screen exited with code ${result.code ?? 'null'}`);
    }
    this.logger.debug(`screen session ${name} created with window ${window.label}`);
  }

  public async addWindow(name: string, window: WindowSpec): Promise<void> {
    const script = this.script(window);
    let result: CommandResult;
    try {
      result = await this.runner('screen', [ '-S', name, '-X', 'screen', '-t', window.label, 'bash', '-c', script ]);
    } catch (error: unknown) {
      throw new LaunchFailure(window.label, errorMessage(error));
    }
    if (result.code !== 0) {
      throw new LaunchFailure(window.label, tail(result.stderr || result.stdout) || `screen exited with code ${result.code ?? 'null'}`);
    }
  }

  /**
   * Screen cannot tell whether a window's command is still running; liveness is `unknown`.
   */
  public async listWindows(name: string): Promise<WindowStatus[]> {
    const result = await this.runner('screen', [ '-S', name, '-Q', 'windows' ]);
    if (result.code !== 0) {
      return [];
    }
    return parseScreenWindows(result.stdout);
  }

  /**
   * Quits the session, then wipes any dead socket left under its name.
   */
  public async killSession(name: string): Promise<void> {
    const result = await this.runner('screen', [ '-S', name, '-X', 'quit' ]);
    if (result.code !== 0) {
      this.logger.debug(`screen -X quit for ${name} exited with ${result.code ?? 'null'}`);
    }
    // exits non-zero whenever it lists sockets
    await this.runner('screen', [ '-wipe', name ]);
  }

  public async attach(name: string): Promise<number> {
    const result = await this.runner('screen', [ '-r', name ], { stdio: 'inherit' });
    return result.code ?? 1;
  }

  public operatorCommands(name: string): OperatorCommands {
    return {
      attach: `screen -r ${name}`,
      detach: 'Ctrl+A then D',
      kill: `screen -S ${name} -X quit`,
      nextWindow: 'Ctrl+A then N',
    };
  }

  private script(window: WindowSpec): string {
    // screen windows inherit the session's environment, not the caller's, so export explicitly
    return buildWindowScript({
      cwd: window.cwd,
      command: window.command,
      env: window.env,
      activateScript: window.activateScript,
      keepAliveShell: this.keepAliveShell,
    });
  }
}
