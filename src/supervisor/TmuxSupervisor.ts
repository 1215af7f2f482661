import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import { LaunchFailure, SessionCreationError, errorMessage } from '../errors';
import { isCommandAvailable, runCommand, tail, type CommandResult, type CommandRunner } from '../util/CommandRunner';
import { buildWindowScript } from '../util/shell';
import type { ShellBackendOptions } from './ScreenSupervisor';
import type { OperatorCommands, ProcessSupervisor, WindowSpec, WindowStatus } from './types';

const WINDOW_FORMAT = '#{window_index}\t#{window_name}\t#{pane_current_command}';

/**
 * Parses `tmux list-windows -F` output. A pane whose foreground process is the
 * keep-alive shell has finished running its service command.
 */
export function parseTmuxWindows(output: string, keepAliveShell: string): WindowStatus[] {
  const shell = path.basename(keepAliveShell);
  const windows: WindowStatus[] = [];
  for (const line of output.split('\n')) {
    const [ index, label, current ] = line.split('\t');
    if (!label || !/^\d+$/.test(index)) {
      continue;
    }
    windows.push({
      index: Number(index),
      label,
      state: current === undefined || current === '' ? 'unknown' : current === shell ? 'exited' : 'running',
    });
  }
  // tmux may number from base-index 1; expose positions from 0
  return windows
    .sort((left, right) => left.index - right.index)
    .map((window, position) => ({ ...window, index: position }));
}

/**
 * tmux backend. Targets use the `=name` form so a prefix never matches another session.
 */
export class TmuxSupervisor implements ProcessSupervisor {
  public readonly backend = 'tmux';
  protected readonly logger = getLoggerFor(this);
  private readonly runner: CommandRunner;
  private readonly keepAliveShell: string;

  public constructor(options: ShellBackendOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.keepAliveShell = options.keepAliveShell ?? 'bash';
  }

  public async isAvailable(): Promise<boolean> {
    return isCommandAvailable('tmux', this.runner);
  }

  public async hasSession(name: string): Promise<boolean> {
    const result = await this.runner('tmux', [ 'has-session', '-t', `=${name}` ]);
    return result.code === 0;
  }

  public async createSession(name: string, window: WindowSpec): Promise<void> {
    const args = [ 'new-session', '-d', '-s', name, '-n', window.label, '-c', window.cwd, 'bash', '-c', this.script(window) ];
    let result: CommandResult;
    try {
      result = await this.runner('tmux', args);
    } catch (error: unknown) {
      throw new SessionCreationError(name, errorMessage(error));
    }
    if (result.code !== 0) {
      throw new SessionCreationError(name, tail(result.stderr) || `tmux exited with code ${result.code ?? 'null'}`);
    }
    this.logger.debug(`tmux session ${name} created with window ${window.label}`);
  }

  public async addWindow(name: string, window: WindowSpec): Promise<void> {
    const args = [ 'new-window', '-d', '-t', `=${name}:`, '-n', window.label, '-c', window.cwd, 'bash', '-c', this.script(window) ];
    let result: CommandResult;
    try {
      result = await this.runner('tmux', args);
    } catch (error: unknown) {
      throw new LaunchFailure(window.label, errorMessage(error));
    }
    if (result.code !== 0) {
      throw new LaunchFailure(window.label, tail(result.stderr) || `tmux exited with code ${result.code ?? 'null'}`);
    }
  }

  public async listWindows(name: string): Promise<WindowStatus[]> {
    const result = await this.runner('tmux', [ 'list-windows', '-t', `=${name}`, '-F', WINDOW_FORMAT ]);
    if (result.code !== 0) {
      return [];
    }
    return parseTmuxWindows(result.stdout, this.keepAliveShell);
  }

  public async killSession(name: string): Promise<void> {
    const result = await this.runner('tmux', [ 'kill-session', '-t', `=${name}` ]);
    if (result.code !== 0) {
      this.logger.debug(`tmux kill-session for ${name} exited with ${result.code ?? 'null'}`);
    }
  }

  public async attach(name: string): Promise<number> {
    const result = await this.runner('tmux', [ 'attach-session', '-t', `=${name}` ], { stdio: 'inherit' });
    return result.code ?? 1;
  }

  public operatorCommands(name: string): OperatorCommands {
    return {
      attach: `tmux attach-session -t ${name}`,
      detach: 'Ctrl+B then D',
      kill: `tmux kill-session -t ${name}`,
      nextWindow: 'Ctrl+B then N',
    };
  }

  private script(window: WindowSpec): string {
    return buildWindowScript({
      cwd: window.cwd,
      command: window.command,
      env: window.env,
      activateScript: window.activateScript,
      keepAliveShell: this.keepAliveShell,
    });
  }
}
