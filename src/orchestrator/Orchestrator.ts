import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import type { OrchestrationConfig, SupervisorBackend } from '../config/OrchestrationConfig';
import { describeEnvironment, type EnvironmentProvisioner } from '../environment/EnvironmentProvisioner';
import { errorMessage } from '../errors';
import { logContext } from '../logging/LogContext';
import type { OperatorCommands, ProcessSupervisor, WindowStatus } from '../supervisor/types';
import { systemClock, type Clock } from '../util/Clock';
import { DependencyGate } from './DependencyGate';
import { ProcessLauncher } from './ProcessLauncher';
import type { ReadinessProbe } from './ReadinessProbe';
import { SessionRegistry, type SessionHandle } from './SessionRegistry';

export type OrchestratorState =
  | { kind: 'idle' }
  | { kind: 'environment-ready' }
  | { kind: 'session-reset' }
  | { kind: 'launching'; index: number; service: string }
  | { kind: 'complete' }
  | { kind: 'aborted'; reason: string };

export type ServiceOutcome = 'launched' | 'exited-early' | 'unknown' | 'failed' | 'skipped';

export interface ServiceSummary {
  name: string;
  windowIndex?: number;
  outcome: ServiceOutcome;
  error?: string;
}

export interface OrchestrationReport {
  runId: string;
  sessionName: string;
  backend: SupervisorBackend;
  state: 'complete' | 'aborted';
  /** Set when aborted. */
  reason?: string;
  errorName?: string;
  elapsedMs: number;
  services: ServiceSummary[];
  operatorCommands?: OperatorCommands;
}

export interface OrchestratorDependencies {
  provisioner: Pick<EnvironmentProvisioner, 'ensure'>;
  supervisor: ProcessSupervisor;
  clock?: Clock;
  /** Used when the settle mode is `probe`. */
  probe?: ReadinessProbe;
  onStateChange?: (state: OrchestratorState) => void;
  /** Receives the operator-facing summary lines. Defaults to console.log. */
  output?: (line: string) => void;
  /** Pause before window liveness is read for the summary, in ms. */
  summaryGrace?: number;
  runId?: string;
}

const RULE = '------------------------------------------------';

/**
 * Brings the stack up: provision the environment, reset the session, then launch each
 * service in declared order with a settle gate after every launch.
 *
 * Idle → EnvironmentReady → SessionReset → Launching(0..n-1) → Complete, or Aborted from any
 * state. An instance runs once; a new run needs a new instance.
 */
export class Orchestrator {
  protected readonly logger = getLoggerFor(this);
  private state: OrchestratorState = { kind: 'idle' };
  private readonly clock: Clock;
  private readonly registry: SessionRegistry;
  private readonly gate: DependencyGate;
  private readonly output: (line: string) => void;

  public constructor(
    private readonly config: OrchestrationConfig,
    private readonly deps: OrchestratorDependencies,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.registry = new SessionRegistry(deps.supervisor, { clock: this.clock });
    this.gate = new DependencyGate({ mode: config.settle.mode, clock: this.clock, probe: deps.probe });
    this.output = deps.output ?? ((line: string): void => console.log(line));
  }

  public getState(): OrchestratorState {
    return this.state;
  }

  public async run(): Promise<OrchestrationReport> {
    if (this.state.kind !== 'idle') {
      throw new Error(`Orchestrator already ran (state ${this.state.kind}); create a new one`);
    }
    const runId = this.deps.runId ?? randomUUID().slice(0, 8);
    return logContext.run({ runId }, () => this.execute(runId));
  }

  private async execute(runId: string): Promise<OrchestrationReport> {
    const startedAt = this.clock.now();
    const { sessionName, services, workingRoot } = this.config;
    const summaries: ServiceSummary[] = services.map((service): ServiceSummary => ({ name: service.name, outcome: 'skipped' }));
    const report = (state: OrchestrationReport['state']): OrchestrationReport => ({
      runId,
      sessionName,
      backend: this.deps.supervisor.backend,
      state,
      elapsedMs: this.clock.now() - startedAt,
      services: summaries,
    });

    this.logger.info(`Bringing up ${services.length} service(s) into session ${sessionName} (${this.deps.supervisor.backend})`);
    let session: SessionHandle | undefined;

    try {
      const descriptor = describeEnvironment(
        path.resolve(workingRoot, this.config.environment.rootPath),
        path.resolve(workingRoot, this.config.environment.manifestPath),
      );
      const environment = await this.deps.provisioner.ensure(descriptor);
      this.transition({ kind: 'environment-ready' });

      await this.registry.resetSession(sessionName);
      this.transition({ kind: 'session-reset' });

      const launcher = new ProcessLauncher(this.registry, { sessionName, workingRoot, environment });

      for (const [ index, spec ] of services.entries()) {
        this.transition({ kind: 'launching', index, service: spec.name });
        const scope = { runId, service: spec.name };
        const current = session;
        const result = await logContext.run(scope, () => launcher.launch(current, spec));
        session = result.session;
        // Recorded before settling: an abort in the gate still reports this window
        summaries[index] = result.error
          ? { name: spec.name, outcome: 'failed', error: result.error.message }
          : { name: spec.name, windowIndex: result.window?.index, outcome: 'launched' };
        await logContext.run(scope, () => this.gate.waitForSettle(spec));
      }

      if (session) {
        await this.clock.sleep(this.deps.summaryGrace ?? 500);
        this.applyLiveness(summaries, await this.registry.refresh(session));
      }

      this.transition({ kind: 'complete' });
      const completed = { ...report('complete'), operatorCommands: this.registry.operatorCommands(sessionName) };
      this.printComplete(completed);
      return completed;
    } catch (error: unknown) {
      const reason = errorMessage(error);
      this.transition({ kind: 'aborted', reason });
      this.logger.error(`Aborted: ${reason}`);
      const aborted = {
        ...report('aborted'),
        reason,
        errorName: error instanceof Error ? error.name : undefined,
        operatorCommands: session ? this.registry.operatorCommands(sessionName) : undefined,
      };
      this.printAborted(aborted);
      return aborted;
    }
  }

  private transition(next: OrchestratorState): void {
    this.state = next;
    const detail = next.kind === 'launching' ? ` ${next.index} (${next.service})` : '';
    this.logger.debug(`State -> ${next.kind}${detail}`);
    this.deps.onStateChange?.(next);
  }

  private applyLiveness(summaries: ServiceSummary[], statuses: WindowStatus[]): void {
    for (const summary of summaries) {
      if (summary.outcome !== 'launched') {
        continue;
      }
      const status = statuses.find((entry) => entry.index === summary.windowIndex && entry.label === summary.name);
      if (!status || status.state === 'unknown') {
        summary.outcome = 'unknown';
      } else if (status.state === 'exited') {
        summary.outcome = 'exited-early';
      }
    }
  }

  private printComplete(report: OrchestrationReport): void {
    const healthy = report.services.filter((service) => service.outcome === 'launched' || service.outcome === 'unknown');
    this.output(RULE);
    if (healthy.length === report.services.length) {
      this.output(`SUCCESS: ${healthy.length} services are running in ${report.backend} session: ${report.sessionName}`);
    } else {
      this.output(`WARNING: ${healthy.length} of ${report.services.length} services are running in ${report.backend} session: ${report.sessionName}`);
    }
    this.printServices(report);
    this.printCommands(report.operatorCommands);
    this.output(RULE);
  }

  private printAborted(report: OrchestrationReport): void {
    this.output(RULE);
    this.output(`ABORTED: ${report.reason ?? 'unknown error'}`);
    this.printServices(report);
    this.printCommands(report.operatorCommands);
    this.output(RULE);
  }

  private printCommands(commands?: OperatorCommands): void {
    if (!commands) {
      return;
    }
    this.output(`Attach: ${commands.attach}`);
    this.output(`Detach: ${commands.detach}`);
    if (commands.nextWindow) {
      this.output(`Next window: ${commands.nextWindow}`);
    }
    this.output(`Kill: ${commands.kill}`);
  }

  private printServices(report: OrchestrationReport): void {
    for (const service of report.services) {
      const index = service.windowIndex === undefined ? '-' : String(service.windowIndex);
      const error = service.error ? ` (${service.error})` : '';
      this.output(`  [${index}] ${service.name.padEnd(10)} ${service.outcome}${error}`);
    }
  }
}
