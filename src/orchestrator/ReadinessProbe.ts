import net from 'node:net';
import type { ReadinessProbeSpec, ServiceSpec } from '../config/OrchestrationConfig';

export interface ReadinessProbe {
  isReady(service: ServiceSpec): Promise<boolean>;
}

/**
 * Replaces `${NAME}` references with values from the environment. Unknown names expand to ''.
 */
export function expandEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => env[name] ?? '');
}

export interface ResolvedTcpTarget {
  host: string;
  port: number;
}

export function resolveTcpTarget(
  spec: Extract<ReadinessProbeSpec, { type: 'tcp' }>,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedTcpTarget | undefined {
  const host = expandEnv(spec.host, env);
  const port = typeof spec.port === 'number' ? spec.port : Number.parseInt(expandEnv(spec.port, env), 10);
  if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) {
    return undefined;
  }
  return { host, port };
}

export interface NetworkReadinessProbeOptions {
  env?: NodeJS.ProcessEnv;
  /** Per-attempt timeout, in ms. */
  timeout?: number;
}

/**
 * Probes a service's declared endpoint: a TCP connect, or an HTTP GET answering below 500.
 * Services without a readiness declaration count as ready.
 */
export class NetworkReadinessProbe implements ReadinessProbe {
  private readonly env: NodeJS.ProcessEnv;
  private readonly timeout: number;

  public constructor(options: NetworkReadinessProbeOptions = {}) {
    this.env = options.env ?? process.env;
    this.timeout = options.timeout ?? 1000;
  }

  public async isReady(service: ServiceSpec): Promise<boolean> {
    const spec = service.readiness;
    if (!spec) {
      return true;
    }
    if (spec.type === 'tcp') {
      const target = resolveTcpTarget(spec, this.env);
      return target ? this.canConnect(target) : false;
    }
    return this.answersHttp(expandEnv(spec.url, this.env));
  }

  private canConnect(target: ResolvedTcpTarget): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = net.connect({ host: target.host, port: target.port });
      const finish = (ready: boolean): void => {
        socket.destroy();
        resolve(ready);
      };
      socket.setTimeout(this.timeout);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
    });
  }

  private async answersHttp(url: string): Promise<boolean> {
    try {
      const res = await fetch(url, { signal: AbortSignal.timeout(this.timeout) });
      return res.status < 500;
    } catch {
      return false;
    }
  }
}
