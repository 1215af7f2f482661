import { spawn, type SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';
import kill from 'tree-kill';
import { getLoggerFor } from 'global-logger-factory';
import { SessionCreationError } from '../errors';
import type { OperatorCommands, ProcessSupervisor, WindowSpec, WindowState, WindowStatus } from './types';

const MAX_LOGS = 500;

export interface WindowLog {
  timestamp: string;
  level: 'info' | 'error';
  source: string;
  message: string;
}

/**
 * The part of a child process a native window uses.
 */
export interface WindowProcess {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type ProcessFactory = (command: string, args: string[], options: SpawnOptions) => WindowProcess;

interface NativeWindow {
  index: number;
  label: string;
  command: string[];
  cwd: string;
  state: WindowState;
  child?: WindowProcess;
  pid?: number;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  error?: string;
}

export interface NativeSupervisorOptions {
  processFactory?: ProcessFactory;
  /** Echo window output through the logger. Defaults to true. */
  forwardOutput?: boolean;
}

/**
 * In-process backend: each window is a child process of this one.
 *
 * Windows are never removed when their process ends; the record stays with its exit status
 * and the last lines of output until the session is killed. Sessions exist only as long as
 * the process that created them.
 */
export class NativeSupervisor implements ProcessSupervisor {
  public readonly backend = 'native';
  protected readonly logger = getLoggerFor(this);
  private readonly sessions: Map<string, NativeWindow[]> = new Map();
  private readonly logs: WindowLog[] = [];
  private readonly processFactory: ProcessFactory;
  private readonly forwardOutput: boolean;

  public constructor(options: NativeSupervisorOptions = {}) {
    this.processFactory = options.processFactory ?? spawn;
    this.forwardOutput = options.forwardOutput ?? true;
  }

  public async isAvailable(): Promise<boolean> {
    return true;
  }

  public async hasSession(name: string): Promise<boolean> {
    return this.sessions.has(name);
  }

  public async createSession(name: string, window: WindowSpec): Promise<void> {
    if (this.sessions.has(name)) {
      throw new SessionCreationError(name, 'a session with this name already exists');
    }
    this.sessions.set(name, []);
    this.open(name, window);
  }

  public async addWindow(name: string, window: WindowSpec): Promise<void> {
    if (!this.sessions.has(name)) {
      throw new SessionCreationError(name, 'session does not exist');
    }
    this.open(name, window);
  }

  public async listWindows(name: string): Promise<WindowStatus[]> {
    return (this.sessions.get(name) ?? []).map(({ index, label, state }) => ({ index, label, state }));
  }

  public async killSession(name: string): Promise<void> {
    const windows = this.sessions.get(name);
    if (!windows) {
      return;
    }
    this.sessions.delete(name);
    await Promise.all(windows.map((window) => this.stop(window)));
  }

  /**
   * Native windows have no terminal to hand over; prints each window's status and recent output instead.
   */
  public async attach(name: string): Promise<number> {
    const windows = this.sessions.get(name);
    if (!windows) {
      return 1;
    }
    for (const window of windows) {
      const exit = window.state === 'exited' ? ` exit=${window.exitCode ?? window.signal ?? window.error ?? 'unknown'}` : '';
      console.log(`[${window.index}] ${window.label} ${window.state}${window.pid ? ` pid=${window.pid}` : ''}${exit}`);
      for (const entry of this.getLogs({ source: window.label, limit: 20 })) {
        console.log(`    ${entry.message}`);
      }
    }
    return 0;
  }

  public operatorCommands(name: string): OperatorCommands {
    return {
      attach: `output of session ${name} is streamed to this terminal`,
      detach: 'not supported by the native backend',
      kill: 'Ctrl+C',
    };
  }

  public getLogs(filters?: { source?: string; limit?: number }): WindowLog[] {
    let rows = this.logs;
    if (filters?.source) {
      rows = rows.filter((item) => item.source === filters.source);
    }
    const limit = filters?.limit;
    if (typeof limit === 'number' && Number.isFinite(limit) && limit > 0) {
      return rows.slice(-limit);
    }
    return rows;
  }

  private addLog(source: string, level: WindowLog['level'], message: string): void {
    this.logs.push({ timestamp: new Date().toISOString(), level, source, message });
    if (this.logs.length > MAX_LOGS) {
      this.logs.splice(0, this.logs.length - MAX_LOGS);
    }
  }

  private open(name: string, spec: WindowSpec): void {
    const windows = this.sessions.get(name) ?? [];
    const window: NativeWindow = {
      index: windows.length,
      label: spec.label,
      command: spec.command,
      cwd: spec.cwd,
      state: 'running',
    };
    windows.push(window);

    const [ executable, ...args ] = spec.command;
    this.logger.info(`Starting ${spec.label} in window ${window.index}: ${spec.command.join(' ')}`);
    const child = this.processFactory(executable, args, {
      stdio: [ 'ignore', 'pipe', 'pipe' ],
      env: { ...process.env, ...spec.env },
      cwd: spec.cwd,
      detached: false,
    });
    window.child = child;
    window.pid = child.pid;

    const prefixLog = (data: Buffer, isError: boolean): void => {
      for (const line of data.toString().split('\n')) {
        const trimmed = line.trim();
        if (!trimmed) {
          continue;
        }
        this.addLog(spec.label, isError ? 'error' : 'info', trimmed);
        if (this.forwardOutput) {
          if (isError) {
            this.logger.error(`[${spec.label}] ${trimmed}`);
          } else {
            this.logger.info(`[${spec.label}] ${trimmed}`);
          }
        }
      }
    };

    child.stdout?.on('data', (data: Buffer) => prefixLog(data, false));
    child.stderr?.on('data', (data: Buffer) => prefixLog(data, true));

    child.on('error', (err: Error) => {
      this.logger.error(`Error spawning ${spec.label}: ${err.message}`);
      this.addLog(spec.label, 'error', `Spawn error: ${err.message}`);
      window.state = 'exited';
      window.error = err.message;
      window.child = undefined;
    });

    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.logger.info(`${spec.label} exited with code ${code ?? 'null'} signal ${signal ?? 'null'}`);
      this.addLog(spec.label, code === 0 ? 'info' : 'error', `Exited with code ${code ?? 'null'} signal ${signal ?? 'null'}`);
      window.state = 'exited';
      window.exitCode = code;
      window.signal = signal;
      window.child = undefined;
    });
  }

  private stop(window: NativeWindow): Promise<void> {
    return new Promise((resolve) => {
      const pid = window.child?.pid;
      if (!pid || window.state === 'exited') {
        resolve();
        return;
      }
      kill(pid, 'SIGTERM', (err?: Error) => {
        if (err) {
          this.logger.error(`Failed to stop ${window.label}: ${err.message}`);
          this.addLog(window.label, 'error', `Failed to stop: ${err.message}`);
        }
        resolve();
      });
    });
  }
}
