import { getLoggerFor } from 'global-logger-factory';
import type { ServiceSpec, SettleMode } from '../config/OrchestrationConfig';
import { DependencyNotReadyError } from '../errors';
import { systemClock, type Clock } from '../util/Clock';
import type { ReadinessProbe } from './ReadinessProbe';

export const DEFAULT_PROBE_RETRIES = 5;
export const DEFAULT_PROBE_INITIAL_DELAY = 250;
export const DEFAULT_PROBE_MAX_DELAY = 4000;

export interface DependencyGateOptions {
  mode?: SettleMode;
  clock?: Clock;
  /** Required for the `probe` mode. */
  probe?: ReadinessProbe;
}

/**
 * Holds the orchestrator back after a launch until the next service may start.
 *
 * `fixed`: one unconditional sleep of `settleDelay`; says nothing about actual readiness.
 * `probe`: polls the service's readiness declaration with exponential backoff and fails with
 * `DependencyNotReadyError` once the retries are spent; services without one use the fixed delay.
 * Either way the gate never opens before `settleDelay` has elapsed since it was entered.
 */
export class DependencyGate {
  protected readonly logger = getLoggerFor(this);
  private readonly mode: SettleMode;
  private readonly clock: Clock;
  private readonly probe?: ReadinessProbe;

  public constructor(options: DependencyGateOptions = {}) {
    this.mode = options.mode ?? 'fixed';
    this.clock = options.clock ?? systemClock;
    this.probe = options.probe;
    if (this.mode === 'probe' && !this.probe) {
      throw new Error('Probe settle mode needs a readiness probe');
    }
  }

  public async waitForSettle(spec: ServiceSpec): Promise<void> {
    const startedAt = this.clock.now();
    if (this.mode === 'probe' && this.probe && spec.readiness) {
      await this.pollUntilReady(spec, this.probe);
      const remaining = spec.settleDelay - (this.clock.now() - startedAt);
      if (remaining > 0) {
        await this.clock.sleep(remaining);
      }
      return;
    }

    if (spec.settleDelay > 0) {
      this.logger.info(`Waiting ${spec.settleDelay}ms for ${spec.name} to settle`);
    }
    await this.clock.sleep(spec.settleDelay);
  }

  private async pollUntilReady(spec: ServiceSpec, probe: ReadinessProbe): Promise<void> {
    const retries = Math.max(1, spec.readiness?.retries ?? DEFAULT_PROBE_RETRIES);
    const maxDelay = spec.readiness?.maxDelay ?? DEFAULT_PROBE_MAX_DELAY;
    let delay = spec.readiness?.initialDelay ?? DEFAULT_PROBE_INITIAL_DELAY;

    for (let attempt = 1; attempt <= retries; attempt++) {
      if (await probe.isReady(spec)) {
        this.logger.info(`${spec.name} is ready (attempt ${attempt}/${retries})`);
        return;
      }
      if (attempt < retries) {
        this.logger.debug(`${spec.name} not ready, retrying in ${delay}ms (attempt ${attempt}/${retries})`);
        await this.clock.sleep(delay);
        delay = Math.min(delay * 2, maxDelay);
      }
    }
    throw new DependencyNotReadyError(spec.name, retries);
  }
}
