import type { SupervisorBackend } from '../config/OrchestrationConfig';

export type { SupervisorBackend };

/**
 * What a backend needs to open one window.
 */
export interface WindowSpec {
  label: string;
  /** Executable followed by its arguments. */
  command: string[];
  /** Absolute working directory. */
  cwd: string;
  /** Variables added on top of the inherited environment. */
  env: Record<string, string>;
  /** Script shell backends source before running the command. */
  activateScript?: string;
}

export type WindowState = 'running' | 'exited' | 'unknown';

export interface WindowStatus {
  index: number;
  label: string;
  state: WindowState;
}

export interface OperatorCommands {
  attach: string;
  /** Keystrokes, not a command. */
  detach: string;
  kill: string;
  /** Switch to the next window, when the backend has one. */
  nextWindow?: string;
}

/**
 * Capability a backend must offer to host a named, multi-window session whose windows
 * outlive the commands they run.
 */
export interface ProcessSupervisor {
  readonly backend: SupervisorBackend;

  isAvailable(): Promise<boolean>;

  hasSession(name: string): Promise<boolean>;

  /**
   * Creates a detached session whose first window runs the given command.
   * Throws `SessionCreationError`.
   */
  createSession(name: string, window: WindowSpec): Promise<void>;

  /**
   * Appends a window at the next index. Throws `LaunchFailure`.
   */
  addWindow(name: string, window: WindowSpec): Promise<void>;

  /** Windows in index order; empty when the session does not exist. */
  listWindows(name: string): Promise<WindowStatus[]>;

  /** Asks the session to quit. Resolves once the request was delivered. */
  killSession(name: string): Promise<void>;

  /** Hands the terminal to the session; resolves with the attach command's exit code. */
  attach(name: string): Promise<number>;

  operatorCommands(name: string): OperatorCommands;
}
