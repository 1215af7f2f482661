import { getLoggerFor } from 'global-logger-factory';
import { SessionConflictError, SessionCreationError } from '../errors';
import type { OperatorCommands, ProcessSupervisor, WindowSpec, WindowStatus } from '../supervisor/types';
import { systemClock, type Clock } from '../util/Clock';

export interface WindowHandle {
  index: number;
  label: string;
  spawnedCommand: string[];
  cwd: string;
  isAlive: boolean;
}

export interface SessionHandle {
  name: string;
  windows: WindowHandle[];
}

export type ResetResult = 'killed' | 'not-found' | 'kill-failed';

export interface SessionRegistryOptions {
  clock?: Clock;
  /** Times the registry re-checks that a killed session is gone. */
  killConfirmAttempts?: number;
  /** Pause between those checks, in ms. */
  killConfirmInterval?: number;
}

/**
 * Owns the named session: idempotent reset, creation, window bookkeeping and operator controls.
 */
export class SessionRegistry {
  protected readonly logger = getLoggerFor(this);
  private readonly clock: Clock;
  private readonly killConfirmAttempts: number;
  private readonly killConfirmInterval: number;

  public constructor(
    private readonly supervisor: ProcessSupervisor,
    options: SessionRegistryOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.killConfirmAttempts = Math.max(1, options.killConfirmAttempts ?? 5);
    this.killConfirmInterval = options.killConfirmInterval ?? 100;
  }

  /**
   * Kills any live session with this name and reports what happened. Does not throw for `kill-failed`.
   */
  public async tryReset(name: string): Promise<ResetResult> {
    if (!await this.supervisor.hasSession(name)) {
      return 'not-found';
    }
    await this.supervisor.killSession(name);
    for (let attempt = 0; attempt < this.killConfirmAttempts; attempt++) {
      if (!await this.supervisor.hasSession(name)) {
        return 'killed';
      }
      await this.clock.sleep(this.killConfirmInterval);
    }
    return 'kill-failed';
  }

  /**
   * Idempotent reset: absence of a prior session is not an error; a session that survives the kill is.
   */
  public async resetSession(name: string): Promise<Exclude<ResetResult, 'kill-failed'>> {
    const result = await this.tryReset(name);
    if (result === 'kill-failed') {
      throw new SessionConflictError(name);
    }
    this.logger.info(result === 'killed' ? `Killed previous session ${name}` : `No previous session ${name}`);
    return result;
  }

  public async createSession(name: string, firstWindow: WindowSpec): Promise<SessionHandle> {
    await this.supervisor.createSession(name, firstWindow);
    if (!await this.supervisor.hasSession(name)) {
      throw new SessionCreationError(name, `${this.supervisor.backend} reported success but the session is not running`);
    }
    return {
      name,
      windows: [ this.toHandle(0, firstWindow) ],
    };
  }

  /**
   * Appends a window at the next index. The handle is only recorded once the backend accepted it.
   */
  public async addWindow(session: SessionHandle, window: WindowSpec): Promise<WindowHandle> {
    await this.supervisor.addWindow(session.name, window);
    const handle = this.toHandle(session.windows.length, window);
    session.windows.push(handle);
    return handle;
  }

  /**
   * Refreshes `isAlive` on each handle from the backend and returns the raw statuses.
   */
  public async refresh(session: SessionHandle): Promise<WindowStatus[]> {
    const statuses = await this.supervisor.listWindows(session.name);
    for (const handle of session.windows) {
      const status = statuses.find((entry) => entry.index === handle.index && entry.label === handle.label);
      handle.isAlive = status !== undefined && status.state !== 'exited';
    }
    return statuses;
  }

  public async describe(name: string): Promise<WindowStatus[] | undefined> {
    if (!await this.supervisor.hasSession(name)) {
      return undefined;
    }
    return this.supervisor.listWindows(name);
  }

  public operatorCommands(name: string): OperatorCommands {
    return this.supervisor.operatorCommands(name);
  }

  public async attach(name: string): Promise<number> {
    return this.supervisor.attach(name);
  }

  /**
   * Operator-facing kill. Returns false when there was nothing to kill; throws when the session survives.
   */
  public async kill(name: string): Promise<boolean> {
    const result = await this.tryReset(name);
    if (result === 'kill-failed') {
      throw new SessionConflictError(name);
    }
    return result === 'killed';
  }

  private toHandle(index: number, window: WindowSpec): WindowHandle {
    return {
      index,
      label: window.label,
      spawnedCommand: [ ...window.command ],
      cwd: window.cwd,
      isAlive: true,
    };
  }
}
